import { formatPath, type PathSegment } from "../path/paths.js";

/**
 * A value could not be brought into the canonical model (the JSON round trip
 * rejected it, or it is circular).
 */
export class NormalizeError extends Error {
  override name = "NormalizeError";

  /** Where in the input the failure happened (empty at the root). */
  readonly path: readonly PathSegment[];

  /** The offending (raw) value. */
  readonly value: unknown;

  constructor(message: string, path: readonly PathSegment[], value: unknown, options?: { cause?: unknown }) {
    super(path.length > 0 ? `${message} (at ${formatPath(path, "")})` : message, options);
    this.path = [...path];
    this.value = value;
  }
}
