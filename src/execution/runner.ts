import { parseCommand } from "../core/parser";
import { loadTasks, taskFromLines } from "../core/task-loader";
import type { ParsedCommand } from "../types";
import { Logger } from "../utils/logger";
import { printReport } from "../utils/report";
import { Dispatcher } from "./dispatcher";
import type { SessionFactory } from "./session";

export type RunnerOptions = {
  createSession?: SessionFactory;
  now?: Date;
};

const pad = (value: number): string => String(value).padStart(2, "0");

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export class Runner {
  private dispatcher?: Dispatcher;

  /**
   * Load, configure and evaluate a task set from command-line arguments.
   * Resolves to the process exit code.
   */
  async run(args: string[], options: RunnerOptions = {}): Promise<number> {
    try {
      const parsed = parseCommand(args);
      const logger = new Logger(parsed.config);
      const dispatcher = this.createDispatcher(parsed, logger, options);
      this.dispatcher = dispatcher;

      if (parsed.dryRun) {
        for (const planned of dispatcher.plan().order) {
          const { task } = planned;
          logger.registerTask(task.name, task.shell);
          const state = task.disabled ? " (disabled)" : "";
          logger.info(`${task.name} on ${task.shell}${state}`);
          for (const command of planned.commands) {
            logger.log(task.name, command.command);
          }
        }
        return 0;
      }

      const result = await dispatcher.evaluate();
      printReport(logger, result);
      return result.success ? 0 : 1;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("Error:", message);
      return 1;
    }
  }

  abort(): void {
    this.dispatcher?.abort();
  }

  private createDispatcher(
    parsed: ParsedCommand,
    logger: Logger,
    options: RunnerOptions
  ): Dispatcher {
    const dispatcher = new Dispatcher({
      ...(options.createSession && { createSession: options.createSession }),
      logger,
      overrides: parsed.overrides,
      vars: { NOW: formatTimestamp(options.now ?? new Date()), ...parsed.vars },
    });

    dispatcher.addTasks(loadTasks(parsed.paths));

    if (parsed.run) {
      dispatcher.addTask(
        taskFromLines(parsed.run.name, parsed.run.lines, {
          echo: true,
          requires: parsed.run.requires,
          shell: parsed.run.shell,
        })
      );
    }

    for (const pattern of parsed.enable) {
      dispatcher.enableTask(pattern, true);
    }
    for (const pattern of parsed.disable) {
      dispatcher.enableTask(pattern, false);
    }

    return dispatcher;
  }
}
