import type { ContainsOptions } from "@arbor/treematch";

/** Matching options a profile (or the command line) may set. */
export type ProfileOptions = Omit<ContainsOptions, "trace">;

export interface ProfilesConfig {
  schemaVersion: 1;
  profiles: Record<string, ProfileOptions>;
  defaultProfile?: string;
}

export const BOOLEAN_OPTION_KEYS = [
  "stringContains",
  "emptyValuesMatchAny",
  "parseTimes",
  "ignoreTimeZones"
] as const;

export const DURATION_OPTION_KEYS = ["allowTimeDelta", "truncateTimes", "roundTimes"] as const;

export type BooleanOptionKey = (typeof BOOLEAN_OPTION_KEYS)[number];
export type DurationOptionKey = (typeof DURATION_OPTION_KEYS)[number];
