import { parseDuration } from "../value/duration.js";
import type { ContainsOptions, ResolvedContainsOptions } from "./types.js";

/**
 * Apply defaults and parse durations.
 *
 * Throws {@link DurationParseError} for malformed durations.
 */
export function resolveContainsOptions(options: ContainsOptions = {}): ResolvedContainsOptions {
  const allowTimeDelta = options.allowTimeDelta === undefined ? 0n : parseDuration(options.allowTimeDelta);
  const truncateTimes = options.truncateTimes === undefined ? 0n : parseDuration(options.truncateTimes);
  const roundTimes = options.roundTimes === undefined ? 0n : parseDuration(options.roundTimes);
  const ignoreTimeZones = options.ignoreTimeZones === true;

  const anyTimeOption =
    options.allowTimeDelta !== undefined ||
    options.truncateTimes !== undefined ||
    options.roundTimes !== undefined ||
    options.ignoreTimeZones !== undefined;

  return {
    stringContains: options.stringContains === true,
    emptyValuesMatchAny: options.emptyValuesMatchAny === true,
    parseTimes: options.parseTimes === true || anyTimeOption,
    ignoreTimeZones,
    allowTimeDelta,
    truncateTimes,
    roundTimes,
  };
}
