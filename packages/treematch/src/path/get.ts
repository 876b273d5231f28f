import { assertNever, hasOwn, invariant, isPlainObject } from "@arbor/treematch-core";

import { normalize } from "../normalize/normalize.js";
import {
  IndexOutOfBoundsError,
  PathError,
  PathNotFoundError,
  PathNotMapError,
  PathNotSequenceError,
} from "./errors.js";
import { formatPath, parsePath, type PathSegment } from "./paths.js";

// Adapt one level (Map -> object, Set/typed array -> array) without copying plain containers.
function adapt(node: unknown): unknown {
  return normalize(node, { copy: false, deep: false, marshal: false });
}

function describePrefix(segments: readonly PathSegment[]): string {
  return segments.length === 0 ? "v" : formatPath(segments, "");
}

/**
 * Extract the value at `path` (e.g. `response.things[2].color`).
 *
 * `value` may be any primitive, string-keyed map or sequence, nested
 * arbitrarily. The value found is returned as stored (not normalized).
 *
 * Throws a {@link PathError} subclass naming the failing prefix:
 * {@link PathNotFoundError}, {@link PathNotMapError},
 * {@link PathNotSequenceError} or {@link IndexOutOfBoundsError}.
 */
export function get(value: unknown, path: string | readonly PathSegment[]): unknown {
  const segments = typeof path === "string" ? parsePath(path) : path;
  let out = value;

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    invariant(segment !== undefined, "path segment out of range");
    const node = adapt(out);

    switch (typeof segment) {
      case "string": {
        if (!isPlainObject(node)) {
          throw new PathNotMapError(`${describePrefix(segments.slice(0, i))} is not a map`);
        }
        if (!hasOwn(node, segment)) {
          throw new PathNotFoundError(`${formatPath(segments.slice(0, i + 1), "")} not found`);
        }
        out = node[segment];
        break;
      }
      case "number": {
        invariant(Number.isInteger(segment) && segment >= 0, `path index must be a non-negative integer (got ${segment})`);
        if (!Array.isArray(node)) {
          throw new PathNotSequenceError(`${describePrefix(segments.slice(0, i))} is not a sequence`);
        }
        if (segment >= node.length) {
          throw new IndexOutOfBoundsError(
            `Index out of bounds at ${formatPath(segments.slice(0, i + 1), "")} (len = ${node.length})`,
          );
        }
        out = node[segment];
        break;
      }
      default:
        assertNever(segment, "Unknown path segment");
    }
  }

  return out;
}

/** Like {@link get}, but `undefined` instead of a thrown {@link PathError}. */
export function lookup(value: unknown, path: string | readonly PathSegment[]): unknown {
  try {
    return get(value, path);
  } catch (err) {
    if (err instanceof PathError) return undefined;
    throw err;
  }
}
