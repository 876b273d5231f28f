import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";

import { hasOwn, isRecord } from "@arbor/treematch-core";
import { DurationParseError, parseDuration } from "@arbor/treematch";
import YAML from "yaml";

import { ConfigError } from "../util/errors.js";
import {
  BOOLEAN_OPTION_KEYS,
  DURATION_OPTION_KEYS,
  type BooleanOptionKey,
  type DurationOptionKey,
  type ProfileOptions,
  type ProfilesConfig
} from "./types.js";

function camelize(key: string): string {
  return key.replace(/-([a-z])/g, (_m, c: string) => c.toUpperCase());
}

function isBooleanKey(key: string): key is BooleanOptionKey {
  return BOOLEAN_OPTION_KEYS.some((k) => k === key);
}

function isDurationKey(key: string): key is DurationOptionKey {
  return DURATION_OPTION_KEYS.some((k) => k === key);
}

function assertProfile(name: string, value: unknown, warnings: string[]): ProfileOptions {
  if (value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`profiles.${name} must be an object`);
  }

  const out: ProfileOptions = {};
  for (const [rawKey, optionValue] of Object.entries(value)) {
    const key = camelize(rawKey);

    if (isBooleanKey(key)) {
      if (typeof optionValue !== "boolean") {
        throw new ConfigError(`profiles.${name}.${rawKey} must be a boolean`);
      }
      out[key] = optionValue;
      continue;
    }

    if (isDurationKey(key)) {
      if (typeof optionValue !== "string" && typeof optionValue !== "number") {
        throw new ConfigError(`profiles.${name}.${rawKey} must be a duration`);
      }
      try {
        parseDuration(optionValue);
      } catch (err) {
        if (!(err instanceof DurationParseError)) throw err;
        throw new ConfigError(`profiles.${name}.${rawKey}: ${err.message}`);
      }
      out[key] = optionValue;
      continue;
    }

    warnings.push(`profiles.${name}.${rawKey}`);
  }

  return out;
}

export interface LoadProfilesOptions {
  cwd: string;
  configPath: string;
  stderr?: NodeJS.WritableStream;
}

/**
 * Load and validate a YAML profile file:
 *
 * ```yaml
 * schemaVersion: 1
 * defaultProfile: lenient
 * profiles:
 *   lenient:
 *     empty-values-match-any: true
 *     allow-time-delta: 1s
 * ```
 *
 * Option keys may be kebab- or camel-case. Unknown keys are reported on
 * `stderr` and ignored.
 */
export async function loadProfiles(opts: LoadProfilesOptions): Promise<ProfilesConfig> {
  const absPath = path.resolve(opts.cwd, opts.configPath);
  const stderr = opts.stderr ?? process.stderr;

  let raw: string;
  try {
    raw = await fs.readFile(absPath, "utf8");
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;

    if (code === "ENOENT") {
      throw new ConfigError(`config not found: ${opts.configPath}`);
    }

    if (code === "EACCES" || code === "EPERM") {
      throw new ConfigError(`cannot read config (permission denied): ${opts.configPath}`);
    }

    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to read config ${opts.configPath}: ${msg}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`invalid YAML in ${opts.configPath}: ${msg}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError("config root must be an object");
  }

  const schemaVersion = parsed.schemaVersion;
  if (schemaVersion !== 1) {
    throw new ConfigError(`schemaVersion must be 1 (got ${String(schemaVersion)})`);
  }

  const profilesRaw = parsed.profiles;
  if (!isRecord(profilesRaw)) {
    throw new ConfigError("profiles must be an object");
  }

  const warnings: string[] = [];
  const profiles: Record<string, ProfileOptions> = {};
  for (const [name, value] of Object.entries(profilesRaw)) {
    profiles[name] = assertProfile(name, value, warnings);
  }

  const defaultProfile = parsed.defaultProfile;
  if (defaultProfile !== undefined) {
    if (typeof defaultProfile !== "string") {
      throw new ConfigError("defaultProfile must be a string");
    }
    if (!hasOwn(profiles, defaultProfile)) {
      throw new ConfigError(`defaultProfile names an unknown profile: ${defaultProfile}`);
    }
  }

  if (warnings.length > 0) {
    stderr.write(`warning: unknown option(s) in ${opts.configPath}: ${warnings.sort().join(", ")} (ignoring)\n`);
  }

  return {
    schemaVersion: 1,
    profiles,
    ...(defaultProfile !== undefined ? { defaultProfile } : {})
  };
}

/**
 * Options of the named profile, or of `defaultProfile` when `name` is
 * omitted (`{}` when neither is set).
 */
export function selectProfile(config: ProfilesConfig, name?: string): ProfileOptions {
  const selected = name ?? config.defaultProfile;
  if (selected === undefined) return {};

  const profile = config.profiles[selected];
  if (!profile) {
    const known = Object.keys(config.profiles).sort().join(", ");
    throw new ConfigError(`unknown profile: ${selected} (known: ${known})`);
  }
  return profile;
}
