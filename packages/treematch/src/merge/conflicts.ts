import { containsMatch } from "../compare/compare.js";
import type { ContainsOptions, Match } from "../compare/types.js";
import { merge, normalizeOperand } from "./merge.js";

/**
 * Whether merging `v2` into `v1` would change any of v1's values, i.e. the
 * merge no longer contains v1 under `options`.
 *
 * Never throws for operands that cannot be normalized; when the comparison
 * cannot normalize them the merge counts as a conflict.
 */
export function conflicts(v1: unknown, v2: unknown, options: ContainsOptions = {}): boolean {
  return !conflictsMatch(v1, v2, options).matches;
}

/**
 * The containment check behind {@link conflicts}: a conflict exists when the
 * returned match fails, and its details say where.
 */
export function conflictsMatch(v1: unknown, v2: unknown, options: ContainsOptions = {}): Match {
  const pristine = normalizeOperand(v1);
  return containsMatch(merge(pristine, v2), pristine, options);
}
