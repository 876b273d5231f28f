/** Error used for invalid CLI usage / flag combinations. */
export class UsageError extends Error {
  override name = "UsageError";
}

/** Error used for invalid or unreadable profile configuration. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

/** Error used for unreadable or unparseable input documents. */
export class InputError extends Error {
  override name = "InputError";
}
