export type Config = {
  quiet?: boolean;
  prefix?: boolean | string;
};

export type Command = {
  command: string;
  expect?: string;
  // null means "no limit", even when the task has one
  timeout?: number | null;
  echo?: boolean;
  checkExitCode?: boolean;
  shouldFail?: boolean;
};

export type Task = {
  name: string;
  shell: string;
  requires: string[];
  before: string[];
  echo: boolean;
  timeout?: number;
  failFast: boolean;
  checkExitCode: boolean;
  shouldFail: boolean;
  sleep: number;
  disabled: boolean;
  commands: Command[];
  vars: Record<string, string>;
};

export type Variables = Readonly<Record<string, string>>;

export type CommandPolicy = {
  expect?: string;
  timeout?: number;
  echo: boolean;
  checkExitCode: boolean;
  shouldFail: boolean;
};

export type ResolvedCommand = {
  command: string;
  policy: CommandPolicy;
};

export type PlannedTask = {
  task: Task;
  commands: ResolvedCommand[];
  dependencies: string[];
};

export type ExecutionPlan = {
  order: PlannedTask[];
};

export type TaskStatus = "succeeded" | "failed" | "skipped";

export type SkipReason = "disabled" | "dependency" | "shell" | "aborted";

export type FailureReason =
  | "expect"
  | "timeout"
  | "exit-code"
  | "unexpected-success"
  | "transport";

export type CommandFailure = {
  command: string;
  reason: FailureReason;
  message: string;
};

export type TaskReport = {
  name: string;
  shell: string;
  status: TaskStatus;
  skipReason?: SkipReason;
  detail?: string;
  commandsRun: number;
  failures: CommandFailure[];
};

export type DispatchResult = {
  success: boolean;
  order: string[];
  tasks: TaskReport[];
};

export type ParsedCommand = {
  paths: string[];
  config: Config;
  vars: Record<string, string>;
  overrides: Record<string, string>;
  enable: string[];
  disable: string[];
  run?: {
    name: string;
    shell: string;
    requires: string[];
    lines: string;
  };
  dryRun: boolean;
};
