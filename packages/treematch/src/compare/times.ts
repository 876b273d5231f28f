import { formatDuration } from "../value/duration.js";
import type { TimeValue } from "../value/timeValue.js";
import type { MatchContext } from "./context.js";

export const NOT_EQUAL = "values are not equal";

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

/**
 * Times match when they are identical, or when after truncation/rounding
 * they lie within the allowed delta and (unless ignored) share an offset.
 */
export function matchTimes(a: TimeValue, b: TimeValue, ctx: MatchContext): boolean {
  if (a.equals(b)) return true;

  const { allowTimeDelta, truncateTimes, roundTimes, ignoreTimeZones } = ctx.opts;

  let ta = a;
  let tb = b;
  if (truncateTimes > 0n) {
    ta = a.truncate(truncateTimes);
    tb = b.truncate(truncateTimes);
  } else if (roundTimes > 0n) {
    ta = a.round(roundTimes);
    tb = b.round(roundTimes);
  }

  const delta = abs(ta.sub(tb));
  if (delta > allowTimeDelta) {
    if (allowTimeDelta > 0n) {
      return ctx.fail(a, b, () => `delta of ${formatDuration(delta)} exceeds ${formatDuration(allowTimeDelta)}`);
    }
    return ctx.fail(a, b, NOT_EQUAL);
  }

  if (!ignoreTimeZones && a.offsetMinutes !== b.offsetMinutes) {
    return ctx.fail(a, b, "time zone offsets don't match");
  }

  return true;
}
