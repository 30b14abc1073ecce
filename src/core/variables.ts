import type { Variables } from "../types";
import { UnresolvedVariableError } from "./errors";

const PLACEHOLDER_PATTERN = /\$\{\{([\sa-zA-Z0-9_-]*)\}\}/g;

/**
 * Merges scopes left to right; later scopes win.
 */
export function mergeScopes(...scopes: Variables[]): Variables {
  return Object.freeze(
    scopes.reduce<Record<string, string>>(
      (merged, scope) => ({ ...merged, ...scope }),
      {}
    )
  );
}

/**
 * Replaces every `${{ name }}` in `text` with its value from `scope`.
 * Substituted values are not scanned again.
 */
export function resolveVariables(
  text: string,
  scope: Variables,
  task?: string
): string {
  return text.replace(PLACEHOLDER_PATTERN, (_, inner: string) => {
    const name = inner.trim();
    const value = Object.hasOwn(scope, name) ? scope[name] : undefined;
    if (value === undefined) {
      throw new UnresolvedVariableError(name, task);
    }
    return value;
  });
}
