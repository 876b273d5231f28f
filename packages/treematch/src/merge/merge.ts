import { hasOwn, isPlainObject, setOwn } from "@arbor/treematch-core";

import { NormalizeError } from "../normalize/errors.js";
import { normalize, tryNormalize } from "../normalize/normalize.js";
import { deepEqual } from "./deepEqual.js";

function mergeArrays(a: readonly unknown[], b: readonly unknown[]): unknown[] {
  const out = [...a];
  for (const item of b) {
    if (!out.some((existing) => deepEqual(existing, item))) out.push(item);
  }
  return out;
}

function mergeObjects(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...a };
  for (const [k, bv] of Object.entries(b)) {
    setOwn(out, k, hasOwn(out, k) ? mergeValues(out[k], bv) : bv);
  }
  return out;
}

function mergeValues(a: unknown, b: unknown): unknown {
  if (isPlainObject(a) && isPlainObject(b)) return mergeObjects(a, b);
  if (Array.isArray(a) && Array.isArray(b)) return mergeArrays(a, b);
  return b;
}

/**
 * Normalize a merge operand without failing: leaves the JSON round trip
 * rejects are kept as they are, and a circular operand is copied one level
 * deep.
 */
export function normalizeOperand(value: unknown): unknown {
  const canonical = tryNormalize(value);
  if (canonical.ok) return canonical.value;
  try {
    return normalize(value, { marshal: false });
  } catch (err) {
    if (!(err instanceof NormalizeError)) throw err;
    return normalize(value, { deep: false, marshal: false });
  }
}

/**
 * Deep-merge `v2` into `v1`, v2 winning conflicts.
 *
 * Objects merge key by key; arrays are unioned (v2 elements not deep-equal to
 * an element already present are appended). Both operands are normalized into
 * fresh copies first, so neither is mutated or aliased by the result.
 *
 * The result is canonical unless an operand holds values JSON cannot
 * represent (functions in arrays, maps with non-string keys, cycles); those
 * are kept as they are rather than failing the merge.
 */
export function merge(v1: unknown, v2: unknown): unknown {
  return mergeValues(normalizeOperand(v1), normalizeOperand(v2));
}
