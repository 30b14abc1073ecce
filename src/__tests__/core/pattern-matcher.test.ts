import { describe, expect, it } from "vitest";
import { PatternMatcher } from "../../core/pattern-matcher";

describe("PatternMatcher", () => {
  const matcher = new PatternMatcher();
  const taskNames = [
    "host_network",
    "emulator_network",
    "target_network",
    "mount",
    "toolchain",
  ];

  describe("resolvePatterns", () => {
    it("resolves an exact task name", () => {
      expect(matcher.resolvePatterns(["mount"], taskNames)).toEqual(["mount"]);
    });

    it("resolves a glob in task order", () => {
      expect(matcher.resolvePatterns(["*_network"], taskNames)).toEqual([
        "host_network",
        "emulator_network",
        "target_network",
      ]);
    });

    it("applies exclusions left to right", () => {
      expect(
        matcher.resolvePatterns(["*_network", "!target_*"], taskNames)
      ).toEqual(["host_network", "emulator_network"]);
    });

    it("removes duplicates while preserving order", () => {
      expect(
        matcher.resolvePatterns(["toolchain", "*", "mount"], taskNames)
      ).toEqual([
        "toolchain",
        "host_network",
        "emulator_network",
        "target_network",
        "mount",
      ]);
    });

    it("returns nothing for an unknown name", () => {
      expect(matcher.resolvePatterns(["chroot"], taskNames)).toEqual([]);
    });

    it("supports brace expansion", () => {
      expect(
        matcher.resolvePatterns(["{host,target}_network"], taskNames)
      ).toEqual(["host_network", "target_network"]);
    });
  });
});
