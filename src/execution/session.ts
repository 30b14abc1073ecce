import debug from "debug";
import { type ExecaChildProcess, type ExecaReturnValue, execa } from "execa";
import { TransportError } from "../core/errors";

const log = debug("shell-dispatch:session");

// Reported for a command stopped by a signal, as sh does for SIGTERM
const TERMINATED_EXIT_CODE = 143;

// Printed after every command with its id and exit status
const MARKER = "__SHELL_DISPATCH_DONE";
const MARKER_LINE = new RegExp(`^(.*)${MARKER}_(\\d+)__:(\\d+)$`);

export type OutputListener = (chunk: string) => void;

export type InvocationResult = {
  exitCode: number;
  output: string;
};

/**
 * How an `expect` ended: the pattern matched, the deadline passed, or the
 * command finished without printing a match.
 */
export type ExpectOutcome = "matched" | "timeout" | "exited";

/**
 * A persistent execution context the dispatcher drives one command at a
 * time. Implementations throw {@link TransportError} when the context
 * becomes unusable.
 */
export interface ShellSession {
  readonly name: string;

  /** Start a new invocation of `command`. */
  send(command: string, onOutput?: OutputListener): Promise<void>;

  /**
   * Watch the current invocation's output for `pattern`. No timeout waits
   * until the invocation finishes.
   */
  expect(pattern: string, timeoutMs?: number): Promise<ExpectOutcome>;

  /**
   * Wait for the current invocation to finish. Resolves `undefined` on
   * timeout.
   */
  wait(timeoutMs?: number): Promise<InvocationResult | undefined>;

  close(): Promise<void>;
}

export type SessionFactory = (shell: string) => ShellSession;

export type LocalSessionOptions = {
  cwd?: string;
  env?: Record<string, string>;
};

type Completion = { result: InvocationResult } | { error: TransportError };

type Invocation = {
  id: number;
  output: string;
  onOutput?: OutputListener;
  listeners: Set<() => void>;
  completion?: Completion;
  done: Promise<Completion>;
  settle: (completion: Completion) => void;
};

function createInvocation(id: number, onOutput?: OutputListener): Invocation {
  let resolveDone: (completion: Completion) => void = () => undefined;
  const done = new Promise<Completion>((resolve) => {
    resolveDone = resolve;
  });

  const invocation: Invocation = {
    done,
    id,
    listeners: new Set(),
    output: "",
    settle: (completion) => {
      if (invocation.completion) {
        return;
      }
      invocation.completion = completion;
      resolveDone(completion);
      for (const listener of invocation.listeners) {
        listener();
      }
    },
    ...(onOutput && { onOutput }),
  };
  return invocation;
}

/**
 * Drives one long-lived `sh` process on the host. Commands are written to
 * its stdin, so working directory, exported variables and background jobs
 * carry over from one command to the next. Each command is followed by a
 * marker line that reports its exit status.
 *
 * When a command is stopped on timeout, or exits the shell, the next
 * command starts a fresh shell.
 */
export class LocalShellSession implements ShellSession {
  readonly name: string;
  private readonly options: LocalSessionOptions;
  private shell?: ExecaChildProcess;
  private current?: Invocation;
  // Output after the last newline, not yet attributed
  private pending = "";
  private sequence = 0;
  private closed = false;

  constructor(name: string, options: LocalSessionOptions = {}) {
    this.name = name;
    this.options = options;
  }

  send(command: string, onOutput?: OutputListener): Promise<void> {
    if (this.closed) {
      return Promise.reject(
        new TransportError(this.name, `Session ${this.name} is closed`)
      );
    }

    const shell = this.shell ?? this.spawn();
    const invocation = createInvocation(++this.sequence, onOutput);
    this.current = invocation;

    log(`[${this.name}] $ ${command}`);
    shell.stdin?.write(
      `${command}\nprintf '%s\\n' "${MARKER}_${invocation.id}__:$?"\n`
    );
    return Promise.resolve();
  }

  async expect(pattern: string, timeoutMs?: number): Promise<ExpectOutcome> {
    const invocation = this.requireInvocation();
    const regex = new RegExp(pattern);

    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const finish = (outcome: ExpectOutcome): void => {
        clearTimeout(timer);
        invocation.listeners.delete(check);
        resolve(outcome);
      };

      const check = (): void => {
        if (regex.test(this.outputOf(invocation))) {
          finish("matched");
          return;
        }
        const { completion } = invocation;
        if (completion && "error" in completion) {
          clearTimeout(timer);
          invocation.listeners.delete(check);
          reject(completion.error);
        } else if (completion) {
          finish("exited");
        }
      };

      invocation.listeners.add(check);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => finish("timeout"), timeoutMs);
      }
      check();
    });
  }

  async wait(timeoutMs?: number): Promise<InvocationResult | undefined> {
    const invocation = this.requireInvocation();

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<undefined>((resolve) => {
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => resolve(undefined), timeoutMs);
      }
    });

    try {
      const completion = await Promise.race([invocation.done, timeout]);
      if (completion === undefined) {
        log(`[${this.name}] timed out after ${timeoutMs}ms, stopping shell`);
        this.stop();
        return undefined;
      }
      if ("error" in completion) {
        throw completion.error;
      }
      return completion.result;
    } finally {
      clearTimeout(timer);
    }
  }

  close(): Promise<void> {
    this.closed = true;
    this.stop();
    this.current = undefined;
    return Promise.resolve();
  }

  private spawn(): ExecaChildProcess {
    log(`[${this.name}] starting sh`);
    const shell = execa("sh", [], {
      all: true,
      buffer: false,
      // Own process group, so a stop reaches the shell's children too
      detached: true,
      reject: false,
      stdin: "pipe",
      ...(this.options.cwd !== undefined && { cwd: this.options.cwd }),
      ...(this.options.env !== undefined && { env: this.options.env }),
    });

    shell.all?.on("data", (data: Buffer) => this.receive(data.toString()));
    shell.stdin?.on("error", (error) => {
      log(`[${this.name}] stdin closed: ${error.message}`);
    });
    void shell.then((result) => this.exited(shell, result));

    this.shell = shell;
    return shell;
  }

  private receive(chunk: string): void {
    const lines = (this.pending + chunk).split("\n");
    this.pending = lines.pop() ?? "";

    for (const line of lines) {
      const marker = MARKER_LINE.exec(line);
      if (!marker) {
        this.append(`${line}\n`);
        continue;
      }
      const [, before = "", id = "", status = ""] = marker;
      this.append(before);
      const invocation = this.current;
      if (invocation && invocation.id === Number(id)) {
        invocation.settle({
          result: { exitCode: Number(status), output: invocation.output },
        });
      }
    }

    for (const listener of this.current?.listeners ?? []) {
      listener();
    }
  }

  private append(text: string): void {
    const invocation = this.current;
    if (!invocation || text === "") {
      return;
    }
    invocation.output += text;
    invocation.onOutput?.(text);
  }

  private exited(shell: ExecaChildProcess, result: ExecaReturnValue): void {
    if (this.shell !== shell) {
      return;
    }
    this.shell = undefined;
    this.append(this.pending);
    this.pending = "";

    const invocation = this.current;
    if (!invocation) {
      return;
    }
    if (result.signal !== undefined) {
      invocation.settle({
        result: { exitCode: TERMINATED_EXIT_CODE, output: invocation.output },
      });
    } else if (typeof result.exitCode === "number") {
      log(`[${this.name}] sh exited with status ${result.exitCode}`);
      invocation.settle({
        result: { exitCode: result.exitCode, output: invocation.output },
      });
    } else {
      invocation.settle({
        error: new TransportError(
          this.name,
          `Could not start a shell for ${this.name}`
        ),
      });
    }
  }

  private stop(): void {
    const shell = this.shell;
    this.shell = undefined;
    this.pending = "";
    const invocation = this.current;
    if (invocation) {
      invocation.settle({
        result: { exitCode: TERMINATED_EXIT_CODE, output: invocation.output },
      });
    }

    if (!shell || shell.exitCode !== null) {
      return;
    }
    try {
      if (shell.pid === undefined) {
        shell.kill("SIGTERM");
      } else {
        process.kill(-shell.pid, "SIGTERM");
      }
    } catch (error) {
      log(`[${this.name}] could not stop the process group: ${String(error)}`);
      shell.kill("SIGTERM");
    }
  }

  private outputOf(invocation: Invocation): string {
    return invocation === this.current && !invocation.completion
      ? invocation.output + this.pending
      : invocation.output;
  }

  private requireInvocation(): Invocation {
    if (!this.current) {
      throw new TransportError(this.name, `Nothing was sent to ${this.name}`);
    }
    return this.current;
  }
}

export const createLocalSession: SessionFactory = (shell) =>
  new LocalShellSession(shell);
