import debug from "debug";
import { ConfigurationError } from "../core/errors";
import { GraphBuilder } from "../core/graph-builder";
import { PatternMatcher } from "../core/pattern-matcher";
import { resolvePolicy } from "../core/policy";
import { mergeScopes, resolveVariables } from "../core/variables";
import type {
  Config,
  DispatchResult,
  ExecutionPlan,
  PlannedTask,
  Task,
  Variables,
} from "../types";
import { Logger } from "../utils/logger";
import { Executor } from "./executor";
import { createLocalSession, type SessionFactory } from "./session";

const log = debug("shell-dispatch:dispatcher");

export type DispatcherOptions = Config & {
  /** Global defaults, overridden by task `vars`. */
  vars?: Variables;
  /** Per-run values that win over every other scope. */
  overrides?: Variables;
  createSession?: SessionFactory;
  logger?: Logger;
};

/**
 * Holds the task set, lets callers register and toggle tasks, then resolves
 * the dependency graph and drives the shells.
 */
export class Dispatcher {
  private readonly tasks = new Map<string, Task>();
  private readonly matcher = new PatternMatcher();
  private readonly graphBuilder = new GraphBuilder();
  private readonly vars: Variables;
  private readonly overrides: Variables;
  private readonly createSession: SessionFactory;
  private readonly logger: Logger;
  private executor?: Executor;

  constructor(options: DispatcherOptions = {}) {
    this.vars = mergeScopes(options.vars ?? {});
    this.overrides = mergeScopes(options.overrides ?? {});
    this.createSession = options.createSession ?? createLocalSession;
    this.logger = options.logger ?? new Logger(options);
  }

  addTask(task: Task): void {
    this.assertMutable();
    if (this.tasks.has(task.name)) {
      throw new ConfigurationError(`Task '${task.name}' is already registered`);
    }
    log(`Registered task ${task.name} on ${task.shell}`);
    this.tasks.set(task.name, task);
  }

  addTasks(tasks: Task[]): void {
    for (const task of tasks) {
      this.addTask(task);
    }
  }

  /**
   * Enable or disable every task matching `pattern` (a name or a glob,
   * `!`-prefixed patterns excluded). Returns the affected task names.
   */
  enableTask(pattern: string, value: boolean): string[] {
    this.assertMutable();
    const names = this.matcher.resolvePatterns(
      [pattern],
      Array.from(this.tasks.keys())
    );
    if (names.length === 0) {
      throw new ConfigurationError(`No tasks found matching: ${pattern}`);
    }

    for (const name of names) {
      const task = this.tasks.get(name);
      if (task) {
        log(`${value ? "Enabling" : "Disabling"} task ${name}`);
        this.tasks.set(name, { ...task, disabled: !value });
      }
    }
    return names;
  }

  getTask(name: string): Task | undefined {
    return this.tasks.get(name);
  }

  getTasks(): Task[] {
    return Array.from(this.tasks.values());
  }

  /**
   * Validate the task set and resolve every enabled command. Nothing is sent
   * to a shell.
   */
  plan(): ExecutionPlan {
    const tasks = this.getTasks();
    const graph = this.graphBuilder.buildGraph(tasks);
    const order = this.graphBuilder.executionOrder(tasks, graph);

    const planned = order.map((name): PlannedTask => {
      const task = this.tasks.get(name);
      if (!task) {
        throw new ConfigurationError(`Task '${name}' is not registered`);
      }
      return {
        commands: task.disabled ? [] : this.resolveCommands(task),
        dependencies: this.graphBuilder.dependenciesOf(graph, name),
        task,
      };
    });

    return { order: planned };
  }

  /**
   * Run every task. Configuration errors are thrown before any shell is
   * touched; command failures end up in the result.
   */
  async evaluate(): Promise<DispatchResult> {
    this.assertMutable();
    const plan = this.plan();
    this.executor = new Executor({
      createSession: this.createSession,
      logger: this.logger,
    });

    const reports = await this.executor.execute(plan);
    const success = reports.every(
      (report) => report.status === "succeeded" || report.skipReason === "disabled"
    );

    log(`Evaluation ${success ? "succeeded" : "failed"}`);
    return {
      order: plan.order.map((planned) => planned.task.name),
      success,
      tasks: reports,
    };
  }

  abort(): void {
    this.executor?.abort();
  }

  private resolveCommands(task: Task): PlannedTask["commands"] {
    const scope = mergeScopes(this.vars, task.vars, this.overrides);
    return task.commands.map((command) => ({
      command: resolveVariables(command.command, scope, task.name),
      policy: resolvePolicy(command, task),
    }));
  }

  private assertMutable(): void {
    if (this.executor) {
      throw new ConfigurationError(
        "Tasks cannot change once evaluation has started"
      );
    }
  }
}
