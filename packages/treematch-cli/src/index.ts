export { main, parseCliArgs, usage } from "./cli.js";
export type { CliOptions, MainIo, ParseResult } from "./cli.js";
export { loadProfiles, selectProfile } from "./config/loadProfiles.js";
export type { ProfileOptions, ProfilesConfig } from "./config/types.js";
export { readDocument } from "./input/readDocument.js";
export { runCommand } from "./run.js";
export type { Command, CommandResult } from "./run.js";
export { ConfigError, InputError, UsageError } from "./util/errors.js";
