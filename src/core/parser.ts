import type { ParsedCommand } from "../types";
import { ConfigurationError } from "./errors";

const DEFAULT_RUN_NAME = "action_test";
const DEFAULT_RUN_SHELL = "target";

type RunFields = {
  name?: string;
  shell?: string;
  requires?: string[];
  lines?: string;
};

export class Parser {
  parse(args: string[]): ParsedCommand {
    const result: ParsedCommand = {
      config: {},
      disable: [],
      dryRun: false,
      enable: [],
      overrides: {},
      paths: [],
      vars: {},
    };
    const run: RunFields = {};

    for (const arg of args) {
      this.processArg(arg, result, run);
    }

    if (run.lines !== undefined) {
      result.run = {
        lines: run.lines,
        name: run.name ?? DEFAULT_RUN_NAME,
        requires: run.requires ?? [],
        shell: run.shell ?? DEFAULT_RUN_SHELL,
      };
    } else if (run.name || run.shell || run.requires) {
      throw new ConfigurationError(
        "--run-name, --run-shell and --run-requires need --run"
      );
    }

    return result;
  }

  private processArg(arg: string, result: ParsedCommand, run: RunFields): void {
    if (arg.startsWith("--")) {
      this.processLongFlag(arg.substring(2), result, run);
    } else if (arg.startsWith("-") && arg.length > 1) {
      this.processShortFlags(arg.substring(1), result);
    } else {
      result.paths.push(arg);
    }
  }

  private processLongFlag(
    flag: string,
    result: ParsedCommand,
    run: RunFields
  ): void {
    const separator = flag.indexOf("=");
    const name = separator === -1 ? flag : flag.substring(0, separator);
    const value = separator === -1 ? undefined : flag.substring(separator + 1);

    switch (name) {
      case "quiet":
        result.config.quiet = true;
        return;
      case "no-prefix":
        result.config.prefix = false;
        return;
      case "dry-run":
        result.dryRun = true;
        return;
      default:
        break;
    }

    if (value === undefined) {
      throw new ConfigurationError(`Unknown flag: --${flag}`);
    }

    switch (name) {
      case "prefix":
        result.config.prefix = value;
        break;
      case "var":
        this.assign(result.vars, value, flag);
        break;
      case "override":
        this.assign(result.overrides, value, flag);
        break;
      case "enable":
        result.enable.push(value);
        break;
      case "disable":
        result.disable.push(value);
        break;
      case "run":
        run.lines = value;
        break;
      case "run-name":
        run.name = value;
        break;
      case "run-shell":
        run.shell = value;
        break;
      case "run-requires":
        run.requires = value
          .split(",")
          .map((entry) => entry.trim())
          .filter((entry) => entry);
        break;
      default:
        throw new ConfigurationError(`Unknown flag: --${flag}`);
    }
  }

  private processShortFlags(flags: string, result: ParsedCommand): void {
    for (const flag of flags) {
      if (flag === "q") {
        result.config.quiet = true;
      } else {
        throw new ConfigurationError(`Unknown flag: -${flag}`);
      }
    }
  }

  private assign(
    target: Record<string, string>,
    assignment: string,
    flag: string
  ): void {
    const separator = assignment.indexOf("=");
    if (separator <= 0) {
      throw new ConfigurationError(`Expected NAME=VALUE in --${flag}`);
    }
    target[assignment.substring(0, separator).trim()] = assignment.substring(
      separator + 1
    );
  }
}

export function parseCommand(args: string[]): ParsedCommand {
  const parser = new Parser();
  return parser.parse(args);
}
