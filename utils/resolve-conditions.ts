/**
 * Package exports/imports condition helpers.
 *
 * A condition set maps a condition name (`"node"`, `"import"`, `"require"`, ...)
 * to a {@link ConditionValue}. The resolution engine walks the `"exports"` /
 * `"imports"` objects of a package manifest and asks, for each key it meets,
 * whether that condition is active.
 *
 * @module
 *
 * @example
 * ```ts
 * const conditions = createConditions([["node", "set"], ["import", "set"]]);
 *
 * getConditionValue(conditions, "import", "unset"); // "set"
 * getConditionValue(conditions, "browser", "unset"); // "unset"
 * ```
 *
 * @see https://nodejs.org/api/packages.html#conditional-exports
 */

import type { ImportKind } from "esbuild";

export type { ImportKind };

// =============================================================================
// Types
// =============================================================================

/**
 * State of a single condition.
 *
 * - `set`: the condition is active, the branch is taken
 * - `unset`: the condition is inactive, the branch is skipped
 * - `unknown`: the engine cannot decide and has to consider both branches
 */
export type ConditionValue = "set" | "unset" | "unknown";

/**
 * Frozen condition map, keys in sorted order so two sets with the same
 * entries are structurally identical.
 */
export type ResolutionConditions = Readonly<Record<string, ConditionValue>>;

// =============================================================================
// Constants
// =============================================================================

/**
 * Conditions the Node.js resolver itself understands.
 */
export const NODE_CONDITIONS = {
  node: "node",
  import: "import",
  require: "require",
  default: "default",
} as const;

// =============================================================================
// Condition Sets
// =============================================================================

/**
 * Builds a frozen condition set. Later entries win over earlier ones.
 */
export function createConditions(
  entries: Iterable<readonly [string, ConditionValue]>
): ResolutionConditions {
  const collected = new Map<string, ConditionValue>();
  for (const [name, value] of entries) collected.set(name, value);

  const sorted = [...collected.keys()].sort();
  const result: Record<string, ConditionValue> = {};
  for (const name of sorted) {
    const value = collected.get(name);
    if (value !== undefined) result[name] = value;
  }

  return Object.freeze(result);
}

/**
 * Look up a condition, falling back to `unspecified` for names the set does
 * not mention. `"default"` is always active.
 */
export function getConditionValue(
  conditions: ResolutionConditions,
  condition: string,
  unspecified: ConditionValue
): ConditionValue {
  if (Object.prototype.hasOwnProperty.call(conditions, condition)) {
    return conditions[condition];
  }
  if (condition === NODE_CONDITIONS.default) return "set";
  return unspecified;
}

/**
 * Check if a condition is satisfied.
 */
export function conditionMatches(
  condition: string,
  conditions: ResolutionConditions,
  unspecified: ConditionValue = "unset"
): boolean {
  return getConditionValue(conditions, condition, unspecified) === "set";
}

/**
 * Merge condition sets; entries in `additions` override `base`.
 */
export function mergeConditions(
  base: ResolutionConditions,
  additions: ResolutionConditions
): ResolutionConditions {
  return createConditions([...Object.entries(base), ...Object.entries(additions)]);
}

export function conditionsEqual(a: ResolutionConditions, b: ResolutionConditions): boolean {
  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) return false;
  return keysA.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}

// =============================================================================
// Import Kinds
// =============================================================================

/**
 * Check if an import kind represents require() usage.
 */
export function isRequireKind(kind: ImportKind): boolean {
  return kind === "require-call" || kind === "require-resolve";
}
