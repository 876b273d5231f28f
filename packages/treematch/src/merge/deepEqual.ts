import { hasOwn, isPlainObject } from "@arbor/treematch-core";

import { TimeValue } from "../value/timeValue.js";

/**
 * Structural equality over canonical trees.
 *
 * Object key order is ignored, `NaN` equals `NaN`, and times are equal when
 * both instant and offset are. Anything else compares with `===`.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;

  if (typeof a === "number" && typeof b === "number") {
    return Number.isNaN(a) && Number.isNaN(b);
  }

  if (a instanceof TimeValue && b instanceof TimeValue) return a.equals(b);

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false;
    }
    return true;
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    for (const k of aKeys) {
      if (!hasOwn(b, k) || !deepEqual(a[k], b[k])) return false;
    }
    return true;
  }

  return false;
}
