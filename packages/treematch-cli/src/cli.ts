import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import { DurationParseError, parseDuration } from "@arbor/treematch";

import { loadProfiles, selectProfile } from "./config/loadProfiles.js";
import type { ProfileOptions } from "./config/types.js";
import { readDocument } from "./input/readDocument.js";
import { formatJsonResult } from "./reporting/formatJson.js";
import { formatPrettyResult } from "./reporting/formatPretty.js";
import { COMMANDS, runCommand, type Command, type CommandResult } from "./run.js";
import { UsageError } from "./util/errors.js";

type OutputFormat = "pretty" | "json";

/** Options parsed from CLI flags (after validation). */
export interface CliOptions {
  command: Command;
  v1Path: string;
  v2Path: string;
  format: OutputFormat;
  configPath?: string;
  profile?: string;
  /** Options set by flags; they override the selected profile. */
  overrides: ProfileOptions;
}

export type ParseResult =
  | {
      kind: "help";
    }
  | {
      kind: "run";
      options: CliOptions;
    };

const BOOLEAN_FLAGS = {
  "--string-contains": "stringContains",
  "--empty-values-match-any": "emptyValuesMatchAny",
  "--parse-times": "parseTimes",
  "--ignore-time-zones": "ignoreTimeZones"
} as const;

const DURATION_FLAGS = {
  "--allow-time-delta": "allowTimeDelta",
  "--truncate-times": "truncateTimes",
  "--round-times": "roundTimes"
} as const;

function isBooleanFlag(arg: string): arg is keyof typeof BOOLEAN_FLAGS {
  return Object.prototype.hasOwnProperty.call(BOOLEAN_FLAGS, arg);
}

function isDurationFlag(arg: string): arg is keyof typeof DURATION_FLAGS {
  return Object.prototype.hasOwnProperty.call(DURATION_FLAGS, arg);
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

/**
 * Returns a help/usage string for the `treematch` CLI.
 */
export function usage(): string {
  return [
    "Compare two JSON/YAML documents",
    "",
    "Usage:",
    "  treematch <contains|equivalent|conflicts|merge> <v1-file> <v2-file> [flags]",
    "",
    "Flags:",
    "  --config <path>            YAML profile file",
    "  --profile <name>           Profile to apply (default: the file's defaultProfile)",
    "  --format pretty|json       Output format (default: pretty)",
    "  --string-contains          Strings match when v1 contains v2",
    "  --empty-values-match-any   null and zero values in v2 match anything",
    "  --parse-times              Compare RFC 3339 strings as times",
    "  --ignore-time-zones        Do not require equal UTC offsets",
    "  --allow-time-delta <dur>   Largest difference at which times match (e.g. 30s)",
    "  --truncate-times <dur>     Truncate times to a multiple of <dur> before comparing",
    "  --round-times <dur>        Round times to a multiple of <dur> before comparing",
    "",
    "Exit codes:",
    "  0 = relation holds (merge: merged)",
    "  1 = relation does not hold",
    "  2 = usage/config/input error"
  ].join("\n");
}

/**
 * Parses raw CLI argv into a strongly-typed run or help request.
 */
export function parseCliArgs(rawArgv: string[]): ParseResult {
  const positionals: string[] = [];
  let parsingFlags = true;

  let format: OutputFormat = "pretty";
  let configPath: string | undefined;
  let profile: string | undefined;
  const overrides: ProfileOptions = {};

  for (let i = 0; i < rawArgv.length; i++) {
    const arg = rawArgv[i];
    if (arg === undefined) continue;

    if (!parsingFlags || !arg.startsWith("-") || arg === "-") {
      positionals.push(arg);
      continue;
    }

    if (arg === "--") {
      parsingFlags = false;
      continue;
    }

    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    }

    if (arg === "--config") {
      const next = rawArgv[i + 1];
      if (!next || next.startsWith("-")) {
        throw new UsageError("--config requires a <path>");
      }
      configPath = next;
      i++;
      continue;
    }

    if (arg === "--profile") {
      const next = rawArgv[i + 1];
      if (!next || next.startsWith("-")) {
        throw new UsageError("--profile requires a <name>");
      }
      profile = next;
      i++;
      continue;
    }

    if (arg === "--format") {
      const next = rawArgv[i + 1];
      if (next !== "pretty" && next !== "json") {
        throw new UsageError("--format must be one of: pretty, json");
      }
      format = next;
      i++;
      continue;
    }

    if (isDurationFlag(arg)) {
      const next = rawArgv[i + 1];
      if (!next || next.startsWith("-")) {
        throw new UsageError(`${arg} requires a <duration>`);
      }
      try {
        parseDuration(next);
      } catch (err) {
        if (!(err instanceof DurationParseError)) throw err;
        throw new UsageError(`${arg}: ${err.message}`);
      }
      overrides[DURATION_FLAGS[arg]] = next;
      i++;
      continue;
    }

    if (isBooleanFlag(arg)) {
      overrides[BOOLEAN_FLAGS[arg]] = true;
      continue;
    }

    throw new UsageError(`unknown flag: ${arg}`);
  }

  const [command, v1Path, v2Path, ...extra] = positionals;

  if (command === undefined) {
    throw new UsageError("missing <command>");
  }
  if (!isCommand(command)) {
    throw new UsageError(`unknown command: ${command} (known: ${COMMANDS.join(", ")})`);
  }
  if (v1Path === undefined || v2Path === undefined) {
    throw new UsageError(`${command} requires <v1-file> and <v2-file>`);
  }
  if (extra.length > 0) {
    throw new UsageError(`unexpected positional arguments: ${extra.join(" ")}`);
  }
  if (profile !== undefined && configPath === undefined) {
    throw new UsageError("--profile requires --config");
  }

  return {
    kind: "run",
    options: {
      command,
      v1Path,
      v2Path,
      format,
      ...(configPath ? { configPath } : {}),
      ...(profile ? { profile } : {}),
      overrides
    }
  };
}

/** IO dependencies for {@link main} (abstracted for testing). */
export interface MainIo {
  cwd: string;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

function exitCodeOf(result: CommandResult): number {
  if (result.kind === "merge") return 0;
  return result.holds ? 0 : 1;
}

/**
 * CLI entrypoint: loads the profile, reads both documents, runs the command
 * and writes the result.
 */
export async function main(rawArgv: string[], io: MainIo): Promise<number> {
  try {
    const parsed = parseCliArgs(rawArgv);

    if (parsed.kind === "help") {
      io.stdout.write(`${usage()}\n`);
      return 0;
    }

    const { options } = parsed;

    let profileOptions: ProfileOptions = {};
    if (options.configPath !== undefined) {
      const config = await loadProfiles({ cwd: io.cwd, configPath: options.configPath, stderr: io.stderr });
      profileOptions = selectProfile(config, options.profile);
    }

    const v1 = await readDocument(io.cwd, options.v1Path);
    const v2 = await readDocument(io.cwd, options.v2Path);

    const result = runCommand(options.command, v1, v2, { ...profileOptions, ...options.overrides });

    const out = options.format === "json" ? formatJsonResult(result) : formatPrettyResult(result);
    io.stdout.write(`${out}\n`);

    return exitCodeOf(result);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);

    if (err instanceof UsageError) {
      io.stderr.write(`error: ${message}\n\n${usage()}\n`);
      return 2;
    }

    io.stderr.write(`error: ${message}\n`);
    return 2;
  }
}

const isMain =
  process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url));

if (isMain) {
  void main(process.argv.slice(2), {
    cwd: process.cwd(),
    stdout: process.stdout,
    stderr: process.stderr
  }).then((code) => {
    process.exitCode = code;
  });
}
