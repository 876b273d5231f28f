import type { NormalizeError } from "../normalize/errors.js";
import type { PathSegment } from "../path/paths.js";
import type { DurationInput } from "../value/duration.js";

/** Receives the trace text: the mismatch explanation, or `""` on a match. */
export type TraceSink = (trace: string) => void;

export type ContainsOptions = {
  /** Strings match when v1's string contains v2's (`a.includes(b)`). */
  stringContains?: boolean;

  /**
   * A v2 value that is `null`, or the zero value of v1's kind (`""`, `0`,
   * `false`, the zero time), matches anything.
   */
  emptyValuesMatchAny?: boolean;

  /** Compare RFC 3339 strings as points in time. */
  parseTimes?: boolean;

  /** Do not require equal UTC offsets when comparing times. Implies `parseTimes`. */
  ignoreTimeZones?: boolean;

  /** Largest difference at which two times still match (default 0). Implies `parseTimes`. */
  allowTimeDelta?: DurationInput;

  /**
   * Truncate both times to this granularity before comparing. Wins over
   * `roundTimes`. Implies `parseTimes`.
   */
  truncateTimes?: DurationInput;

  /** Round both times to this granularity before comparing. Implies `parseTimes`. */
  roundTimes?: DurationInput;

  /** Receives the trace text after the comparison. */
  trace?: TraceSink;
};

export type ResolvedContainsOptions = {
  readonly stringContains: boolean;
  readonly emptyValuesMatchAny: boolean;
  readonly parseTimes: boolean;
  readonly ignoreTimeZones: boolean;
  /** Nanoseconds. */
  readonly allowTimeDelta: bigint;
  /** Nanoseconds; 0 = off. */
  readonly truncateTimes: bigint;
  /** Nanoseconds; 0 = off. */
  readonly roundTimes: bigint;
};

/** The first point at which v1 failed to match v2. */
export type Mismatch = {
  path: readonly PathSegment[];
  v1: unknown;
  v2: unknown;
  message: string;
};

/** Full outcome of {@link containsMatch} / {@link equivalentMatch}. */
export interface Match {
  matches: boolean;

  /** Trace text on failure, `""` on success. */
  message: string;

  /** Path of the mismatch (`""` at the root, `color`, `tags[1]`). */
  path: string;

  /** v1's value at `path`. */
  v1?: unknown;

  /** v2's value at `path`. */
  v2?: unknown;

  /** Set when an operand could not be normalized. */
  error?: NormalizeError;
}
