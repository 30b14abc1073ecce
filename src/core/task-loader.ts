import { readdirSync, readFileSync, statSync } from "node:fs";
import { extname, join } from "node:path";
import debug from "debug";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import type { Command, Task } from "../types";
import { ConfigurationError } from "./errors";

const log = debug("shell-dispatch:loader");

const TASK_FILE_EXTENSIONS = new Set([".yml", ".yaml"]);
const FIELD_SEPARATOR = /[-_]+([a-zA-Z0-9])/g;

const variableValue = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

const commandSchema = z
  .object({
    command: z.string().default(""),
    expect: z
      .string()
      .refine(isValidPattern, "expect is not a valid regular expression")
      .optional(),
    timeout: z.number().nonnegative().nullable().optional(),
    echo: z.boolean().optional(),
    checkExitCode: z.boolean().optional(),
    shouldFail: z.boolean().optional(),
  })
  .strict();

const taskSchema = z
  .object({
    name: z.string().min(1),
    shell: z.string().min(1),
    requires: z.array(z.string()).default([]),
    before: z.array(z.string()).default([]),
    echo: z.boolean().default(false),
    timeout: z
      .number()
      .nonnegative()
      .nullish()
      .transform((value) => value ?? undefined),
    failFast: z.boolean().default(true),
    checkExitCode: z.boolean().default(true),
    shouldFail: z.boolean().default(false),
    sleep: z.number().nonnegative().default(0),
    disabled: z.boolean().default(false),
    commands: z.array(commandSchema).default([]),
    vars: z.record(variableValue).default({}),
  })
  .strict();

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Maps a display spelling (`check-exit-code`, `fail_fast`) to the field name
 * used by the data model (`checkExitCode`, `failFast`).
 */
export function toFieldName(key: string): string {
  return key.replace(FIELD_SEPARATOR, (_, char: string) => char.toUpperCase());
}

export function normalizeKeys(
  definition: Record<string, unknown>
): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(definition)) {
    normalized[toFieldName(key)] = value;
  }
  return normalized;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

export function loadCommand(definition: unknown): Command {
  const fields =
    typeof definition === "string" ? { command: definition } : definition;
  if (!isRecord(fields)) {
    throw new ConfigurationError(
      "Command must be a string or a mapping of command settings"
    );
  }

  const result = commandSchema.safeParse(normalizeKeys(fields));
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid command: ${describeIssues(result.error)}`
    );
  }
  return result.data;
}

export function loadTask(definition: unknown): Task {
  if (!isRecord(definition)) {
    throw new ConfigurationError("Task definition must be a mapping");
  }

  const fields = normalizeKeys(definition);
  if (fields.name === undefined) {
    throw new ConfigurationError(
      "Task description must at least contain a 'name' field"
    );
  }

  const commands = fields.commands ?? [];
  if (!Array.isArray(commands)) {
    throw new ConfigurationError(
      `Invalid task '${String(fields.name)}': commands must be a list`
    );
  }

  const result = taskSchema.safeParse({
    ...fields,
    commands: commands.map((command: unknown) => loadCommand(command)),
  });
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid task '${String(fields.name)}': ${describeIssues(result.error)}`
    );
  }

  log(`Loaded task ${result.data.name} (${result.data.commands.length} commands)`);
  return result.data;
}

/**
 * Builds a task from a YAML mapping. `overrides` win over the document.
 */
export function taskFromYaml(
  text: string,
  overrides: Record<string, unknown> = {}
): Task {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigurationError(`Invalid task YAML: ${error.message}`);
    }
    throw error;
  }

  if (!isRecord(document)) {
    throw new ConfigurationError("Task YAML must describe a mapping");
  }

  return loadTask({ ...normalizeKeys(document), ...normalizeKeys(overrides) });
}

/**
 * Builds a task whose commands are the non-blank lines of `text`.
 */
export function taskFromLines(
  name: string,
  text: string,
  params: Record<string, unknown> = {}
): Task {
  const commands = text
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "")
    .map((line) => ({ command: line }));

  return loadTask({ ...normalizeKeys(params), commands, name });
}

export function loadTaskFile(path: string): Task {
  log(`Reading task file ${path}`);
  try {
    return taskFromYaml(readFileSync(path, "utf-8"));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(`${path}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Loads every YAML task file of a directory, in file-name order.
 */
export function loadTaskDirectory(dir: string): Task[] {
  return readdirSync(dir)
    .filter((entry) => TASK_FILE_EXTENSIONS.has(extname(entry)))
    .sort()
    .map((entry) => loadTaskFile(join(dir, entry)));
}

export function loadTasks(paths: string[]): Task[] {
  return paths.flatMap((path) =>
    statSync(path).isDirectory() ? loadTaskDirectory(path) : [loadTaskFile(path)]
  );
}
