import type { Command, CommandPolicy, Task } from "../types";

/**
 * Effective execution policy of a command: its own setting where present,
 * the owning task's otherwise.
 */
export function resolvePolicy(command: Command, task: Task): CommandPolicy {
  const timeout =
    command.timeout === undefined ? task.timeout : command.timeout;

  return {
    checkExitCode: command.checkExitCode ?? task.checkExitCode,
    echo: command.echo ?? task.echo,
    ...(command.expect !== undefined && { expect: command.expect }),
    shouldFail: command.shouldFail ?? task.shouldFail,
    ...(timeout !== null && timeout !== undefined && { timeout }),
  };
}
