/**
 * Raised for anything wrong with the task set itself. Always thrown before
 * the first command reaches a shell.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class CycleError extends ConfigurationError {
  readonly cycles: string[][];

  constructor(cycles: string[][]) {
    const described = cycles.map((cycle) => cycle.join(" -> ")).join("; ");
    super(`Circular dependency detected: ${described}`);
    this.name = "CycleError";
    this.cycles = cycles;
  }
}

export class UnresolvedVariableError extends ConfigurationError {
  readonly variable: string;
  readonly task?: string;

  constructor(variable: string, task?: string) {
    const where = task === undefined ? "" : ` in task '${task}'`;
    super(`Variable ${variable} not found${where}`);
    this.name = "UnresolvedVariableError";
    this.variable = variable;
    this.task = task;
  }
}

/**
 * Raised by shell sessions when the underlying context is unusable.
 */
export class TransportError extends Error {
  readonly shell: string;

  constructor(shell: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.shell = shell;
  }
}
