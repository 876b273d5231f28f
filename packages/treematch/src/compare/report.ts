import { formatPath } from "../path/paths.js";
import { safeStringify } from "../util/safeStringify.js";
import type { Mismatch } from "./types.js";

/**
 * Render a mismatch as the three-line trace:
 *
 * ```
 * values are not equal
 * v1.color -> "red"
 * v2.color -> "blue"
 * ```
 */
export function formatTrace(mismatch: Mismatch): string {
  const v1 = `${formatPath(mismatch.path, "v1")} -> ${safeStringify(mismatch.v1)}`;
  const v2 = `${formatPath(mismatch.path, "v2")} -> ${safeStringify(mismatch.v2)}`;
  return `${mismatch.message}\n${v1}\n${v2}`;
}
