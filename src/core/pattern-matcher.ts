import micromatch from "micromatch";

export class PatternMatcher {
  /**
   * Resolves patterns to task names, processing inclusions and `!`
   * exclusions left to right. Order follows the first inclusion.
   */
  resolvePatterns(patterns: string[], taskNames: string[]): string[] {
    let result: string[] = [];

    for (const pattern of patterns) {
      if (pattern.startsWith("!")) {
        const toRemove = new Set(micromatch(result, pattern.slice(1)));
        result = result.filter((name) => !toRemove.has(name));
      } else {
        result = [...result, ...this.findMatches(pattern, taskNames)];
      }
    }

    // Remove duplicates while preserving order
    return [...new Set(result)];
  }

  findMatches(pattern: string, taskNames: string[]): string[] {
    if (taskNames.includes(pattern)) {
      return [pattern];
    }
    return micromatch(taskNames, pattern);
  }
}
