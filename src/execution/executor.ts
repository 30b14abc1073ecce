import debug from "debug";
import type {
  CommandFailure,
  Config,
  ExecutionPlan,
  FailureReason,
  PlannedTask,
  ResolvedCommand,
  SkipReason,
  TaskReport,
} from "../types";
import { Logger, type TaskLogger } from "../utils/logger";
import type { SessionFactory, ShellSession } from "./session";

const log = debug("shell-dispatch:executor");

const MS_PER_SECOND = 1000;

type Outcome = {
  report: TaskReport;
  // Whether dependents may start
  satisfied: boolean;
};

type TaskRun = {
  outcome: Outcome;
  transportError?: string;
};

export type ExecutorOptions = Config & {
  createSession: SessionFactory;
  logger?: Logger;
};

export class Executor {
  private readonly logger: Logger;
  private readonly createSession: SessionFactory;
  private readonly outcomes = new Map<string, Promise<Outcome>>();
  private readonly resolvers = new Map<string, (outcome: Outcome) => void>();
  private aborted = false;

  constructor(options: ExecutorOptions) {
    this.createSession = options.createSession;
    this.logger = options.logger ?? new Logger(options);
  }

  /**
   * Run the plan with one worker per shell. Each worker takes its shell's
   * tasks in plan order and only waits on their dependencies.
   */
  async execute(plan: ExecutionPlan): Promise<TaskReport[]> {
    log("=== Starting execution ===");

    const byShell = new Map<string, PlannedTask[]>();
    for (const planned of plan.order) {
      const { name, shell } = planned.task;
      this.outcomes.set(
        name,
        new Promise((resolve) => this.resolvers.set(name, resolve))
      );
      this.logger.registerTask(name, shell);

      const queue = byShell.get(shell) ?? [];
      queue.push(planned);
      byShell.set(shell, queue);
    }

    log("Workers:", Array.from(byShell.keys()));
    await Promise.all(
      Array.from(byShell, ([shell, tasks]) => this.runShell(shell, tasks))
    );

    const outcomes = await Promise.all(
      plan.order.map((planned) => this.outcomeOf(planned.task.name))
    );
    log("=== Execution finished ===");
    return outcomes.map((outcome) => outcome.report);
  }

  /**
   * Stop starting tasks. Tasks already running finish their commands.
   */
  abort(): void {
    this.aborted = true;
  }

  private async runShell(shell: string, tasks: PlannedTask[]): Promise<void> {
    let session: ShellSession | undefined;
    let broken: string | undefined;

    try {
      for (const planned of tasks) {
        const { task } = planned;
        const blocker = await this.findBlocker(planned);
        let outcome: Outcome;

        if (blocker !== undefined) {
          outcome = this.skipped(
            planned,
            "dependency",
            `'${blocker}' did not succeed`
          );
          this.logger.warn(`Skipped: ${task.name} (${blocker} did not succeed)`);
        } else if (task.disabled) {
          log(`Task ${task.name} is disabled`);
          outcome = { ...this.skipped(planned, "disabled"), satisfied: true };
        } else if (this.aborted) {
          outcome = this.skipped(planned, "aborted");
        } else if (broken !== undefined) {
          outcome = this.skipped(planned, "shell", broken);
        } else {
          try {
            session ??= this.createSession(shell);
          } catch (error) {
            broken = `could not open shell ${shell}: ${errorMessage(error)}`;
            this.logger.failure(broken);
            this.settle(task.name, this.skipped(planned, "shell", broken));
            continue;
          }

          const run = await this.runTask(planned, session);
          outcome = run.outcome;
          if (run.transportError !== undefined) {
            broken = `shell ${shell} failed: ${run.transportError}`;
          }
        }

        this.settle(task.name, outcome);
      }
    } finally {
      if (session) {
        await this.closeSession(session);
      }
    }
  }

  private async findBlocker(planned: PlannedTask): Promise<string | undefined> {
    for (const dep of planned.dependencies) {
      log(`Task ${planned.task.name} waiting for dependency ${dep}`);
      const outcome = await this.outcomeOf(dep);
      if (!outcome.satisfied) {
        return dep;
      }
    }
    return undefined;
  }

  private async runTask(
    planned: PlannedTask,
    session: ShellSession
  ): Promise<TaskRun> {
    const { task } = planned;
    const taskLogger = this.logger.createTaskLogger(task.name, task.shell);
    this.logger.info(`Running: ${task.name}`);

    if (task.sleep > 0) {
      log(`Sleeping ${task.sleep}s before ${task.name}`);
      await new Promise((resolve) =>
        setTimeout(resolve, task.sleep * MS_PER_SECOND)
      );
    }

    const failures: CommandFailure[] = [];
    let commandsRun = 0;
    let transportError: string | undefined;

    for (const command of planned.commands) {
      commandsRun++;
      let failure: CommandFailure | undefined;
      try {
        failure = await this.runCommand(command, session, taskLogger);
      } catch (error) {
        transportError = errorMessage(error);
        failure = toFailure(command, "transport", transportError);
      }

      if (failure) {
        failures.push(failure);
        taskLogger.error(`Failed: ${failure.command}: ${failure.message}`);
        if (task.failFast || transportError !== undefined) {
          break;
        }
      }
    }

    const status = failures.length === 0 ? "succeeded" : "failed";
    if (status === "succeeded") {
      this.logger.success(`Completed: ${task.name}`);
    } else {
      this.logger.failure(`Failed: ${task.name}`);
    }

    return {
      outcome: {
        report: {
          commandsRun,
          failures,
          name: task.name,
          shell: task.shell,
          status,
        },
        satisfied:
          status === "succeeded" ||
          (!task.failFast && transportError === undefined),
      },
      ...(transportError !== undefined && { transportError }),
    };
  }

  private async runCommand(
    command: ResolvedCommand,
    session: ShellSession,
    taskLogger: TaskLogger
  ): Promise<CommandFailure | undefined> {
    const { policy } = command;
    const deadline =
      policy.timeout === undefined
        ? undefined
        : Date.now() + policy.timeout * MS_PER_SECOND;
    const remaining = (): number | undefined =>
      deadline === undefined ? undefined : Math.max(0, deadline - Date.now());
    const within =
      policy.timeout === undefined ? "" : ` within ${policy.timeout}s`;

    log(`[${session.name}] ${command.command}`);
    await session.send(
      command.command,
      policy.echo ? (chunk) => taskLogger.log(chunk) : undefined
    );

    if (policy.expect !== undefined) {
      const outcome = await session.expect(policy.expect, remaining());
      if (outcome === "timeout") {
        return toFailure(
          command,
          "timeout",
          `output did not match /${policy.expect}/${within}`
        );
      }
      if (outcome === "exited") {
        return toFailure(
          command,
          "expect",
          `finished without output matching /${policy.expect}/`
        );
      }
      // The match finishes a command whose exit status is not checked
      if (!policy.checkExitCode) {
        return undefined;
      }
    }

    const result = await session.wait(remaining());
    if (!result) {
      return toFailure(command, "timeout", `did not finish${within}`);
    }

    if (!policy.checkExitCode) {
      return undefined;
    }
    if (policy.shouldFail) {
      return result.exitCode === 0
        ? toFailure(
            command,
            "unexpected-success",
            "exited with status 0 but was expected to fail"
          )
        : undefined;
    }
    return result.exitCode === 0
      ? undefined
      : toFailure(command, "exit-code", `exited with status ${result.exitCode}`);
  }

  private skipped(
    planned: PlannedTask,
    skipReason: SkipReason,
    detail?: string
  ): Outcome {
    return {
      report: {
        commandsRun: 0,
        failures: [],
        name: planned.task.name,
        shell: planned.task.shell,
        skipReason,
        status: "skipped",
        ...(detail !== undefined && { detail }),
      },
      satisfied: false,
    };
  }

  private settle(name: string, outcome: Outcome): void {
    log(`Task ${name} is ${outcome.report.status}`);
    this.resolvers.get(name)?.(outcome);
  }

  private outcomeOf(name: string): Promise<Outcome> {
    const outcome = this.outcomes.get(name);
    if (!outcome) {
      return Promise.reject(new Error(`Task ${name} is not part of the plan`));
    }
    return outcome;
  }

  private async closeSession(session: ShellSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.logger.warn(`Could not close shell ${session.name}: ${errorMessage(error)}`);
    }
  }
}

function toFailure(
  command: ResolvedCommand,
  reason: FailureReason,
  message: string
): CommandFailure {
  return { command: command.command, message, reason };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
