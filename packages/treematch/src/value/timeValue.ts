const NANOS_PER_SECOND = 1_000_000_000n;
const NANOS_PER_MINUTE = 60n * NANOS_PER_SECOND;
const NANOS_PER_MILLI = 1_000_000n;
const SECONDS_PER_DAY = 86_400n;

// RFC 3339, fraction of up to nine digits.
const RFC3339_RE =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/;

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return (a % b !== 0n && (a < 0n) !== (b < 0n)) ? q - 1n : q;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

// Days since 1970-01-01 for a proleptic Gregorian date.
function daysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yoe = y - era * 400;
  const mp = (month + 9) % 12;
  const doy = Math.floor((153 * mp + 2) / 5) + day - 1;
  const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy;
  return era * 146_097 + doe - 719_468;
}

function civilFromDays(days: number): { year: number; month: number; day: number } {
  const z = days + 719_468;
  const era = Math.floor(z / 146_097);
  const doe = z - era * 146_097;
  const yoe = Math.floor((doe - Math.floor(doe / 1460) + Math.floor(doe / 36_524) - Math.floor(doe / 146_096)) / 365);
  const doy = doe - (365 * yoe + Math.floor(yoe / 4) - Math.floor(yoe / 100));
  const mp = Math.floor((5 * doy + 2) / 153);
  const day = doy - Math.floor((153 * mp + 2) / 5) + 1;
  const month = mp < 10 ? mp + 3 : mp - 9;
  const year = yoe + era * 400 + (month <= 2 ? 1 : 0);
  return { year, month, day };
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

/**
 * A point in time with nanosecond precision and a fixed UTC offset.
 *
 * `Date` cannot carry either, so timestamps promoted from RFC 3339 text keep
 * both here.
 */
export class TimeValue {
  /** `0001-01-01T00:00:00Z`, the value an unset timestamp starts from. */
  static readonly ZERO: TimeValue = TimeValue.fromCivil(1, 1, 1, 0, 0, 0, 0n, 0);

  /**
   * @param epochNanos - nanoseconds since 1970-01-01T00:00:00Z
   * @param offsetMinutes - UTC offset the value is displayed in
   */
  constructor(
    readonly epochNanos: bigint,
    readonly offsetMinutes: number = 0,
  ) {}

  private static fromCivil(
    year: number,
    month: number,
    day: number,
    hour: number,
    minute: number,
    second: number,
    fraction: bigint,
    offsetMinutes: number,
  ): TimeValue {
    const days = BigInt(daysFromCivil(year, month, day));
    const localSeconds = days * SECONDS_PER_DAY + BigInt(hour * 3600 + minute * 60 + second);
    const local = localSeconds * NANOS_PER_SECOND + fraction;
    return new TimeValue(local - BigInt(offsetMinutes) * NANOS_PER_MINUTE, offsetMinutes);
  }

  /** Parse RFC 3339 text; `undefined` when `text` is not a valid timestamp. */
  static parse(text: string): TimeValue | undefined {
    const m = RFC3339_RE.exec(text);
    if (!m) return undefined;

    const [, y, mo, d, h, mi, s, frac, zone] = m;
    if (!y || !mo || !d || !h || !mi || !s || !zone) return undefined;

    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    const hour = Number(h);
    const minute = Number(mi);
    const second = Number(s);

    if (month < 1 || month > 12) return undefined;
    if (day < 1 || day > daysInMonth(year, month)) return undefined;
    if (hour > 23 || minute > 59 || second > 59) return undefined;

    let offsetMinutes = 0;
    if (zone !== "Z") {
      const sign = zone.startsWith("-") ? -1 : 1;
      const oh = Number(zone.slice(1, 3));
      const om = Number(zone.slice(4, 6));
      if (oh > 23 || om > 59) return undefined;
      offsetMinutes = sign * (oh * 60 + om);
    }

    const fraction = frac ? BigInt(frac.padEnd(9, "0")) : 0n;
    return TimeValue.fromCivil(year, month, day, hour, minute, second, fraction, offsetMinutes);
  }

  /** Convert a `Date` (millisecond precision, UTC). */
  static fromDate(date: Date): TimeValue {
    return new TimeValue(BigInt(date.getTime()) * NANOS_PER_MILLI, 0);
  }

  isZero(): boolean {
    return this.epochNanos === TimeValue.ZERO.epochNanos;
  }

  /** Same instant and same offset. */
  equals(other: TimeValue): boolean {
    return this.epochNanos === other.epochNanos && this.offsetMinutes === other.offsetMinutes;
  }

  /** Signed distance `this - other`, in nanoseconds. */
  sub(other: TimeValue): bigint {
    return this.epochNanos - other.epochNanos;
  }

  /** Round down to a multiple of `granularity` nanoseconds (no-op when `granularity <= 0`). */
  truncate(granularity: bigint): TimeValue {
    if (granularity <= 0n) return this;
    const truncated = floorDiv(this.epochNanos, granularity) * granularity;
    return new TimeValue(truncated, this.offsetMinutes);
  }

  /** Round half up to a multiple of `granularity` nanoseconds (no-op when `granularity <= 0`). */
  round(granularity: bigint): TimeValue {
    if (granularity <= 0n) return this;
    const rounded = floorDiv(this.epochNanos + granularity / 2n, granularity) * granularity;
    return new TimeValue(rounded, this.offsetMinutes);
  }

  toDate(): Date {
    return new Date(Number(floorDiv(this.epochNanos, NANOS_PER_MILLI)));
  }

  /** RFC 3339 text; trailing zeros of the fraction are dropped. */
  toString(): string {
    const local = this.epochNanos + BigInt(this.offsetMinutes) * NANOS_PER_MINUTE;
    const totalSeconds = floorDiv(local, NANOS_PER_SECOND);
    const fraction = local - totalSeconds * NANOS_PER_SECOND;
    const days = floorDiv(totalSeconds, SECONDS_PER_DAY);
    const secondOfDay = Number(totalSeconds - days * SECONDS_PER_DAY);

    const { year, month, day } = civilFromDays(Number(days));
    const hour = Math.floor(secondOfDay / 3600);
    const minute = Math.floor((secondOfDay % 3600) / 60);
    const second = secondOfDay % 60;

    let out = `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}T${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}`;

    if (fraction !== 0n) {
      out += `.${fraction.toString().padStart(9, "0").replace(/0+$/, "")}`;
    }

    if (this.offsetMinutes === 0) return `${out}Z`;

    const sign = this.offsetMinutes < 0 ? "-" : "+";
    const abs = Math.abs(this.offsetMinutes);
    return `${out}${sign}${pad(Math.floor(abs / 60), 2)}:${pad(abs % 60, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
