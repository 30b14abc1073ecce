import ansis from "ansis";
import type { Config } from "../types";

const COLORS = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.gray,
  ansis.white,
] as const;

const LINE_BREAK = /\r?\n/;

type Color = (typeof COLORS)[number];

type Write = (line: string) => void;

// Output of one task: its label in the prefix and its colour
type Lane = {
  label: string;
  color: Color;
};

/**
 * Console output for a dispatch run. Task output is prefixed with
 * `[task@shell]`, padded so the separators line up.
 */
export class Logger {
  private readonly lanes = new Map<string, Lane>();
  private labelWidth = 0;
  private readonly quiet: boolean;
  private readonly prefix: boolean | string;

  constructor(config: Config = {}) {
    this.quiet = config.quiet ?? false;
    this.prefix = config.prefix ?? true;
  }

  registerTask(taskName: string, shell?: string): void {
    if (this.lanes.has(taskName)) {
      return;
    }
    const label = shell === undefined ? taskName : `${taskName}@${shell}`;
    const color = COLORS[this.lanes.size % COLORS.length] ?? ansis.white;
    this.lanes.set(taskName, { color, label });
    this.labelWidth = Math.max(this.labelWidth, label.length);
  }

  log(taskName: string, message: string): void {
    if (!this.quiet) {
      this.emit((line) => console.log(line), taskName, message);
    }
  }

  // Shown in quiet mode too
  error(taskName: string, message: string): void {
    this.emit((line) => console.error(line), taskName, message, ansis.red);
  }

  info(message: string): void {
    if (!this.quiet) {
      console.log(`${ansis.blue("ℹ")} ${message}`);
    }
  }

  success(message: string): void {
    if (!this.quiet) {
      console.log(`${ansis.green("✓")} ${message}`);
    }
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  failure(message: string): void {
    console.error(`${ansis.red("✗")} ${message}`);
  }

  createTaskLogger(taskName: string, shell?: string): TaskLogger {
    this.registerTask(taskName, shell);
    return new TaskLogger(this, taskName);
  }

  private emit(write: Write, taskName: string, message: string, paint?: Color): void {
    for (const line of message.split(LINE_BREAK)) {
      if (line.trim() !== "") {
        write(this.withPrefix(taskName, paint ? paint(line) : line));
      }
    }
  }

  private withPrefix(taskName: string, line: string): string {
    if (this.prefix === false) {
      return line;
    }

    const lane = this.lanes.get(taskName);
    const color = lane?.color ?? ansis.white;
    if (typeof this.prefix === "string") {
      return `${color(this.prefix)} ${line}`;
    }

    const label = `[${lane?.label ?? taskName}]`.padEnd(this.labelWidth + 2);
    return `${color(label)} ${ansis.gray("|")} ${line}`;
  }
}

export class TaskLogger {
  private readonly parent: Logger;
  private readonly taskName: string;

  constructor(parent: Logger, taskName: string) {
    this.parent = parent;
    this.taskName = taskName;
  }

  log(message: string): void {
    this.parent.log(this.taskName, message);
  }

  error(message: string): void {
    this.parent.error(this.taskName, message);
  }
}
