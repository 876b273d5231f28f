import { isPlainObject } from "@arbor/treematch-core";

import { TimeValue } from "../value/timeValue.js";

/**
 * Whether `value` is "empty": `null`/`undefined`, a blank string, `0`,
 * `false`, an empty array, object, `Map` or `Set`, the zero time, or an
 * invalid `Date`.
 */
export function isEmpty(value: unknown): boolean {
  if (value === null || value === undefined) return true;

  switch (typeof value) {
    case "string":
      return value.trim() === "";
    case "number":
      return value === 0;
    case "bigint":
      return value === 0n;
    case "boolean":
      return !value;
    default:
      break;
  }

  if (value instanceof TimeValue) return value.isZero();
  if (value instanceof Date) return Number.isNaN(value.getTime());
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Map || value instanceof Set) return value.size === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}
