/**
 * A span of time: a `number` of milliseconds, or text such as `"30s"`,
 * `"1m30s"`, `"250ms"`, `"1us"` / `"1µs"`, `"500ns"` or `"2h"`.
 */
export type DurationInput = number | string;

export class DurationParseError extends Error {
  override name = "DurationParseError";
}

const UNIT_NANOS: Record<string, bigint> = {
  ns: 1n,
  us: 1_000n,
  "µs": 1_000n,
  "μs": 1_000n,
  ms: 1_000_000n,
  s: 1_000_000_000n,
  m: 60_000_000_000n,
  h: 3_600_000_000_000n,
};

const SEGMENT_RE = /(\d+(?:\.\d+)?)(ns|us|µs|μs|ms|s|m|h)/gy;

function scaleDecimal(text: string, unit: bigint): bigint {
  const [whole = "0", frac = ""] = text.split(".");
  let out = BigInt(whole) * unit;
  if (frac) {
    const denom = 10n ** BigInt(frac.length);
    out += (BigInt(frac) * unit) / denom;
  }
  return out;
}

/** Parse a {@link DurationInput} into non-negative nanoseconds. */
export function parseDuration(input: DurationInput): bigint {
  if (typeof input === "number") {
    if (!Number.isFinite(input) || input < 0) {
      throw new DurationParseError(`duration must be a non-negative finite number of milliseconds (got ${input})`);
    }
    return BigInt(Math.round(input * 1_000_000));
  }

  const text = input.trim();
  if (text === "0") return 0n;
  if (text.length === 0) {
    throw new DurationParseError("duration must be non-empty");
  }

  SEGMENT_RE.lastIndex = 0;
  let total = 0n;
  let consumed = 0;
  for (let m = SEGMENT_RE.exec(text); m; m = SEGMENT_RE.exec(text)) {
    const [whole, amount, unitName] = m;
    const unit = unitName === undefined ? undefined : UNIT_NANOS[unitName];
    if (amount === undefined || unit === undefined) break;
    total += scaleDecimal(amount, unit);
    consumed += whole.length;
  }

  if (consumed !== text.length) {
    throw new DurationParseError(`invalid duration: ${JSON.stringify(input)}`);
  }

  return total;
}

function formatFraction(value: bigint, unit: bigint): string {
  const whole = value / unit;
  const rest = value % unit;
  if (rest === 0n) return whole.toString();

  const digits = unit.toString().length - 1;
  return `${whole}.${rest.toString().padStart(digits, "0").replace(/0+$/, "")}`;
}

/** Render nanoseconds as e.g. `1m0s`, `30s`, `1.5s`, `250ms`, `1µs`, `0s`. */
export function formatDuration(nanos: bigint): string {
  if (nanos === 0n) return "0s";
  if (nanos < 0n) return `-${formatDuration(-nanos)}`;

  if (nanos < 1_000n) return `${nanos}ns`;
  if (nanos < 1_000_000n) return `${formatFraction(nanos, 1_000n)}µs`;
  if (nanos < 1_000_000_000n) return `${formatFraction(nanos, 1_000_000n)}ms`;

  const hours = nanos / 3_600_000_000_000n;
  const minutes = (nanos % 3_600_000_000_000n) / 60_000_000_000n;
  const seconds = `${formatFraction(nanos % 60_000_000_000n, 1_000_000_000n)}s`;

  if (hours > 0n) return `${hours}h${minutes}m${seconds}`;
  if (minutes > 0n) return `${minutes}m${seconds}`;
  return seconds;
}
