export { Dispatcher, type DispatcherOptions } from "./execution/dispatcher";
export { Executor, type ExecutorOptions } from "./execution/executor";
export { Runner, type RunnerOptions } from "./execution/runner";
export {
  createLocalSession,
  LocalShellSession,
  type ExpectOutcome,
  type InvocationResult,
  type LocalSessionOptions,
  type OutputListener,
  type SessionFactory,
  type ShellSession,
} from "./execution/session";
export { Parser, parseCommand } from "./core/parser";
export { PatternMatcher } from "./core/pattern-matcher";
export { GraphBuilder, type DependencyGraph } from "./core/graph-builder";
export { resolvePolicy } from "./core/policy";
export { mergeScopes, resolveVariables } from "./core/variables";
export {
  loadCommand,
  loadTask,
  loadTaskDirectory,
  loadTaskFile,
  loadTasks,
  taskFromLines,
  taskFromYaml,
} from "./core/task-loader";
export {
  ConfigurationError,
  CycleError,
  TransportError,
  UnresolvedVariableError,
} from "./core/errors";
export { Logger, TaskLogger } from "./utils/logger";
export { printReport, summarize } from "./utils/report";

export type {
  Command,
  CommandFailure,
  CommandPolicy,
  Config,
  DispatchResult,
  ExecutionPlan,
  FailureReason,
  ParsedCommand,
  PlannedTask,
  ResolvedCommand,
  SkipReason,
  Task,
  TaskReport,
  TaskStatus,
  Variables,
} from "./types";
