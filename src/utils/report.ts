import type { DispatchResult, TaskReport } from "../types";
import type { Logger } from "./logger";

export function describeTask(report: TaskReport): string {
  const label = `${report.name} (${report.shell})`;
  switch (report.status) {
    case "succeeded":
      return `${label}: succeeded, ${report.commandsRun} command(s)`;
    case "failed":
      return `${label}: failed after ${report.commandsRun} command(s)`;
    case "skipped": {
      const detail = report.detail ? `: ${report.detail}` : "";
      return `${label}: skipped (${report.skipReason ?? "unknown"})${detail}`;
    }
  }
}

export function summarize(result: DispatchResult): string {
  const count = (status: TaskReport["status"]): number =>
    result.tasks.filter((task) => task.status === status).length;
  return `${count("succeeded")} succeeded, ${count("failed")} failed, ${count("skipped")} skipped`;
}

/**
 * Print every task's terminal state, with the failing commands of failed
 * tasks.
 */
export function printReport(logger: Logger, result: DispatchResult): void {
  for (const report of result.tasks) {
    if (report.status === "succeeded") {
      logger.success(describeTask(report));
    } else if (report.status === "failed") {
      logger.failure(describeTask(report));
      for (const failure of report.failures) {
        logger.failure(`  ${failure.command}: ${failure.message}`);
      }
    } else if (report.skipReason === "disabled") {
      logger.info(describeTask(report));
    } else {
      logger.warn(describeTask(report));
    }
  }

  const summary = summarize(result);
  if (result.success) {
    logger.success(summary);
  } else {
    logger.failure(summary);
  }
}
