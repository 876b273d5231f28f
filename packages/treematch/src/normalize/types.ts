import type { CanonicalValue } from "../value/types.js";
import type { NormalizeError } from "./errors.js";

export type NormalizeOptions = {
  /**
   * Copy every object/array into a new container (default `true`).
   *
   * When `false` ("borrow" mode), returned containers may be the caller's
   * own; callers must not mutate them concurrently.
   */
  copy?: boolean;

  /** Normalize nested values too (default `true`). */
  deep?: boolean;

  /**
   * Fall back to a JSON round trip for values that are not primitives,
   * string-keyed maps or sequences (default `true`).
   *
   * When `false`, such values are returned unchanged.
   */
  marshal?: boolean;

  /**
   * Keep `Date`/`TimeValue` inputs as {@link TimeValue}s and promote RFC 3339
   * strings to them (default `false`).
   */
  normalizeTime?: boolean;
};

/**
 * Options for which the result is guaranteed to be canonical: children are
 * visited and nothing is left unconverted.
 */
export type CanonicalNormalizeOptions = NormalizeOptions & {
  deep?: true;
  marshal?: true;
};

export type ResolvedNormalizeOptions = Readonly<Required<NormalizeOptions>>;

export const DEFAULT_NORMALIZE_OPTIONS: ResolvedNormalizeOptions = {
  copy: true,
  deep: true,
  marshal: true,
  normalizeTime: false,
};

export type NormalizeResult =
  | { readonly ok: true; readonly value: CanonicalValue }
  | { readonly ok: false; readonly error: NormalizeError };
