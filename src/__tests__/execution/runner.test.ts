import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { formatTimestamp, Runner } from "../../execution/runner";
import { FakeShells } from "../helpers/fake-shell";

const BOOT_TASK = `name: boot
shell: target
commands:
  - echo booted on \${{BOARD}}
`;

const TEST_TASK = `name: test
shell: host
requires: [boot]
commands:
  - run tests
`;

describe("Runner", () => {
  let dir: string;
  let shells: FakeShells;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    vi.spyOn(console, "warn").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });

    dir = mkdtempSync(join(tmpdir(), "shell-dispatch-"));
    mkdirSync(join(dir, "tasks"));
    writeFileSync(join(dir, "tasks", "01-boot.yml"), BOOT_TASK);
    writeFileSync(join(dir, "tasks", "02-test.yaml"), TEST_TASK);
    writeFileSync(join(dir, "tasks", "notes.txt"), "not a task");
    shells = new FakeShells();
  });

  afterEach(() => {
    rmSync(dir, { force: true, recursive: true });
    vi.restoreAllMocks();
  });

  const run = (args: string[], now?: Date): Promise<number> =>
    new Runner().run(args, {
      createSession: shells.factory,
      ...(now && { now }),
    });

  it("runs every task of a directory", async () => {
    const code = await run([join(dir, "tasks"), "--var=BOARD=hifive", "-q"]);

    expect(code).toBe(0);
    expect(shells.journal).toEqual(["target:echo booted on hifive", "host:run tests"]);
  });

  it("exits with 1 when a task fails", async () => {
    shells = new FakeShells({ "run tests": { exitCode: 2 } });

    const code = await run([join(dir, "tasks"), "--var=BOARD=hifive", "-q"]);

    expect(code).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining("run tests: exited with status 2")
    );
  });

  it("reports configuration errors without running anything", async () => {
    const code = await run([join(dir, "tasks")]);

    expect(code).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "Error:",
      "Variable BOARD not found in task 'boot'"
    );
    expect(shells.journal).toEqual([]);
  });

  it("lets overrides win over variables", async () => {
    await run([
      join(dir, "tasks"),
      "--var=BOARD=hifive",
      "--override=BOARD=polarfire",
      "-q",
    ]);

    expect(shells.journal[0]).toBe("target:echo booted on polarfire");
  });

  it("prints the plan on a dry run", async () => {
    const code = await run([join(dir, "tasks"), "--var=BOARD=x", "--dry-run"]);

    expect(code).toBe(0);
    expect(shells.journal).toEqual([]);
    expect(consoleLogSpy).toHaveBeenCalledWith(
      expect.stringContaining("boot on target")
    );
    expect(consoleLogSpy).toHaveBeenCalledWith(
      expect.stringContaining("echo booted on x")
    );
  });

  it("marks disabled tasks on a dry run", async () => {
    await run([join(dir, "tasks"), "--dry-run", "--disable=boot"]);

    expect(consoleLogSpy).toHaveBeenCalledWith(
      expect.stringContaining("boot on target (disabled)")
    );
  });

  it("appends the --run task after its requirements", async () => {
    const code = await run([
      join(dir, "tasks"),
      "--var=BOARD=x",
      "-q",
      "--run=uname -a\n\nls /",
      "--run-requires=test",
      "--run-shell=host",
    ]);

    expect(code).toBe(0);
    expect(shells.journal).toEqual([
      "target:echo booted on x",
      "host:run tests",
      "host:uname -a",
      "host:ls /",
    ]);
  });

  it("disables tasks by pattern", async () => {
    const code = await run([join(dir, "tasks"), "-q", "--disable=b*"]);

    expect(code).toBe(0);
    expect(shells.journal).toEqual(["host:run tests"]);
  });

  it("provides the start time as NOW", async () => {
    const file = join(dir, "stamp.yml");
    writeFileSync(file, "name: stamp\nshell: host\ncommands: ['echo ${{NOW}}']\n");

    await run([file, "-q"], new Date(2024, 0, 2, 3, 4, 5));

    expect(shells.journal).toEqual(["host:echo 2024-01-02 03:04:05"]);
  });

  it("fails on a path that does not exist", async () => {
    const code = await run([join(dir, "missing.yml")]);

    expect(code).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "Error:",
      expect.stringContaining("ENOENT")
    );
  });

  it("names the file of an invalid task", async () => {
    const file = join(dir, "broken.yml");
    writeFileSync(file, "shell: host\n");

    const code = await run([file]);

    expect(code).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "Error:",
      `${file}: Task description must at least contain a 'name' field`
    );
  });

  it("rejects unknown flags", async () => {
    expect(await run(["--bogus"])).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith("Error:", "Unknown flag: --bogus");
  });
});

describe("formatTimestamp", () => {
  it("pads every field", () => {
    expect(formatTimestamp(new Date(2023, 10, 9, 8, 7, 6))).toBe("2023-11-09 08:07:06");
  });
});
