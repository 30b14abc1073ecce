import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../../core/errors";
import {
  loadCommand,
  loadTask,
  loadTaskDirectory,
  loadTaskFile,
  loadTasks,
  taskFromLines,
  taskFromYaml,
  toFieldName,
} from "../../core/task-loader";

describe("toFieldName", () => {
  it("maps display spellings to field names", () => {
    expect(toFieldName("check-exit-code")).toBe("checkExitCode");
    expect(toFieldName("should_fail")).toBe("shouldFail");
    expect(toFieldName("fail-fast")).toBe("failFast");
    expect(toFieldName("name")).toBe("name");
  });
});

describe("loadCommand", () => {
  it("treats a string as the command text", () => {
    expect(loadCommand("ls /")).toEqual({ command: "ls /" });
  });

  it("normalizes hyphenated keys", () => {
    const command = loadCommand({
      "check-exit-code": false,
      command: "grep root /etc/passwd",
      expect: "root:x",
      "should-fail": true,
      timeout: 5,
    });

    expect(command).toEqual({
      checkExitCode: false,
      command: "grep root /etc/passwd",
      expect: "root:x",
      shouldFail: true,
      timeout: 5,
    });
  });

  it("leaves unset policy fields absent", () => {
    const command = loadCommand({ command: "true" });
    expect("echo" in command).toBe(false);
    expect("timeout" in command).toBe(false);
    expect("checkExitCode" in command).toBe(false);
  });

  it("keeps an explicit null timeout", () => {
    expect(loadCommand({ command: "sleep 60", timeout: null }).timeout).toBeNull();
  });

  it("defaults the command text to an empty line", () => {
    expect(loadCommand({ echo: true })).toEqual({ command: "", echo: true });
  });

  it("rejects unknown keys", () => {
    expect(() => loadCommand({ colour: "red", command: "ls" })).toThrow(
      /colour/
    );
  });

  it("rejects an invalid expect pattern", () => {
    expect(() => loadCommand({ command: "ls", expect: "(" })).toThrow(
      "Invalid command: expect: expect is not a valid regular expression"
    );
  });

  it("rejects values that are neither strings nor mappings", () => {
    expect(() => loadCommand(42)).toThrow(ConfigurationError);
  });
});

describe("loadTask", () => {
  it("fills in task defaults", () => {
    const task = loadTask({ name: "boot", shell: "target" });

    expect(task).toEqual({
      before: [],
      checkExitCode: true,
      commands: [],
      disabled: false,
      echo: false,
      failFast: true,
      name: "boot",
      requires: [],
      shell: "target",
      shouldFail: false,
      sleep: 0,
      vars: {},
    });
    expect(task.timeout).toBeUndefined();
  });

  it("loads commands given as strings and mappings", () => {
    const task = loadTask({
      commands: ["mount -a", { command: "ls /mnt", "check-exit-code": false }],
      name: "mount",
      shell: "target",
    });

    expect(task.commands).toEqual([
      { command: "mount -a" },
      { checkExitCode: false, command: "ls /mnt" },
    ]);
  });

  it("stores scalar variables as strings", () => {
    const task = loadTask({
      name: "serve",
      shell: "host",
      vars: { DEBUG: true, PORT: 8080, ROOT: "/srv" },
    });
    expect(task.vars).toEqual({ DEBUG: "true", PORT: "8080", ROOT: "/srv" });
  });

  it("requires a name", () => {
    expect(() => loadTask({ shell: "host" })).toThrow(
      "Task description must at least contain a 'name' field"
    );
  });

  it("requires a shell", () => {
    expect(() => loadTask({ name: "orphan" })).toThrow(
      /Invalid task 'orphan': shell/
    );
  });

  it("rejects unknown keys", () => {
    expect(() => loadTask({ name: "a", refers: "target", shell: "host" })).toThrow(
      /refers/
    );
  });

  it("rejects a non-list commands field", () => {
    expect(() => loadTask({ commands: "ls", name: "a", shell: "host" })).toThrow(
      "Invalid task 'a': commands must be a list"
    );
  });

  it("rejects mistyped fields", () => {
    expect(() =>
      loadTask({ "fail-fast": "yes", name: "a", shell: "host" })
    ).toThrow(/failFast/);
  });
});

describe("taskFromYaml", () => {
  const yaml = [
    "name: mount",
    "shell: target",
    "requires: [boot]",
    "fail-fast: false",
    "timeout: 30",
    "commands:",
    "  - mount -t proc proc /proc",
    "  - command: ls ${{DIR}}",
    '    expect: "bin"',
    "    check-exit-code: false",
    "vars:",
    "  DIR: /mnt",
  ].join("\n");

  it("builds a task from a YAML mapping", () => {
    const task = taskFromYaml(yaml);

    expect(task.name).toBe("mount");
    expect(task.shell).toBe("target");
    expect(task.requires).toEqual(["boot"]);
    expect(task.failFast).toBe(false);
    expect(task.timeout).toBe(30);
    expect(task.vars).toEqual({ DIR: "/mnt" });
    expect(task.commands).toEqual([
      { command: "mount -t proc proc /proc" },
      { checkExitCode: false, command: "ls ${{DIR}}", expect: "bin" },
    ]);
  });

  it("applies overrides over the document", () => {
    const task = taskFromYaml(yaml, {
      "fail-fast": true,
      name: "mount_again",
      requires: ["chroot"],
    });

    expect(task.name).toBe("mount_again");
    expect(task.requires).toEqual(["chroot"]);
    expect(task.failFast).toBe(true);
  });

  it("rejects documents that are not mappings", () => {
    expect(() => taskFromYaml("- a\n- b")).toThrow(
      "Task YAML must describe a mapping"
    );
    expect(() => taskFromYaml("")).toThrow(ConfigurationError);
  });

  it("reports malformed YAML as a configuration error", () => {
    expect(() => taskFromYaml("name: [unclosed")).toThrow(/Invalid task YAML/);
  });

  it("requires a name", () => {
    expect(() => taskFromYaml("shell: host\ncommands: []")).toThrow(
      /'name' field/
    );
  });
});

describe("taskFromLines", () => {
  it("turns every non-blank line into a command", () => {
    const task = taskFromLines("action_test", "echo one\n\n   \necho two\n", {
      echo: true,
      requires: ["boot"],
      shell: "target",
    });

    expect(task.name).toBe("action_test");
    expect(task.echo).toBe(true);
    expect(task.requires).toEqual(["boot"]);
    expect(task.commands).toEqual([
      { command: "echo one" },
      { command: "echo two" },
    ]);
  });

  it("normalizes parameter keys", () => {
    const task = taskFromLines("check", "false", {
      "should-fail": true,
      shell: "host",
    });
    expect(task.shouldFail).toBe(true);
  });
});

describe("task files", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(os.tmpdir(), "shell-dispatch-tasks-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { force: true, recursive: true });
  });

  it("loads every YAML file of a directory in name order", () => {
    writeFileSync(join(tmpDir, "b.yml"), "name: second\nshell: host\n");
    writeFileSync(join(tmpDir, "a.yaml"), "name: first\nshell: host\n");
    writeFileSync(join(tmpDir, "notes.txt"), "not a task");

    const names = loadTaskDirectory(tmpDir).map((task) => task.name);
    expect(names).toEqual(["first", "second"]);
  });

  it("prefixes errors with the file path", () => {
    const path = join(tmpDir, "broken.yml");
    writeFileSync(path, "shell: host\n");

    expect(() => loadTaskFile(path)).toThrow(
      `${path}: Task description must at least contain a 'name' field`
    );
  });

  it("accepts a mix of files and directories", () => {
    const nested = join(tmpDir, "extra");
    mkdirSync(nested);
    writeFileSync(join(nested, "net.yml"), "name: net\nshell: host\n");
    const single = join(tmpDir, "single.yml");
    writeFileSync(single, "name: single\nshell: target\n");

    const names = loadTasks([single, nested]).map((task) => task.name);
    expect(names).toEqual(["single", "net"]);
  });
});
