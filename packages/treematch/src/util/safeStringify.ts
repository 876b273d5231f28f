import { isPlainObject } from "@arbor/treematch-core";

function stabilize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(stabilize);
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const k of Object.keys(value).sort()) {
      out[k] = stabilize(value[k]);
    }
    return out;
  }
  return value;
}

/**
 * Compact JSON with sorted object keys, for messages.
 *
 * Never throws: `bigint`s render as `12n`, top-level non-finite numbers and
 * `undefined` render bare, and anything `JSON.stringify` rejects falls back
 * to `String(value)`.
 */
export function safeStringify(value: unknown): string {
  if (typeof value === "bigint") return `${value.toString()}n`;
  if (typeof value === "number" && !Number.isFinite(value)) return String(value);
  try {
    const s = JSON.stringify(
      stabilize(value),
      (_k, v: unknown) => (typeof v === "bigint" ? `${v.toString()}n` : v),
    );
    return s ?? String(value);
  } catch {
    return String(value);
  }
}
