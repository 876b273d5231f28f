export type PathSegment = string | number;

const IDENTIFIER_RE = /^[A-Za-z_$][A-Za-z0-9_$-]*$/;

/** Raised by {@link parsePath} for text that is not a path. */
export class PathSyntaxError extends Error {
  override name = "PathSyntaxError";
}

/**
 * Format a path (e.g. `v1.foo[0].bar`) for traces and error messages.
 *
 * Keys that are not identifiers are bracketed and quoted: `v1['odd key']`.
 * With an empty `root` the leading dot is dropped (`foo[0].bar`).
 */
export function formatPath(path: readonly PathSegment[], root = "$"): string {
  let out = root;

  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
      continue;
    }

    if (IDENTIFIER_RE.test(segment)) {
      out += out === "" ? segment : `.${segment}`;
      continue;
    }

    const escaped = segment.replaceAll("\\", "\\\\").replaceAll("'", "\\'");
    out += `['${escaped}']`;
  }

  return out;
}

function readQuoted(path: string, start: number): { value: string; end: number } {
  const quote = path.charAt(start);
  let value = "";
  let i = start + 1;

  while (i < path.length) {
    const ch = path.charAt(i);
    if (ch === "\\" && i + 1 < path.length) {
      value += path.charAt(i + 1);
      i += 2;
      continue;
    }
    if (ch === quote) {
      return { value, end: i + 1 };
    }
    value += ch;
    i++;
  }

  throw new PathSyntaxError(`unterminated quoted key in path: ${path}`);
}

/**
 * Parse a dotted/bracketed path such as `resource.tags[2]` or
 * `labels['app.kubernetes.io/name']` into segments.
 *
 * Whitespace around dotted keys is trimmed and empty keys are skipped, so
 * `""` and `"."` both address the root.
 */
export function parsePath(path: string): PathSegment[] {
  const out: PathSegment[] = [];
  let i = 0;

  while (i < path.length) {
    const ch = path[i];

    if (ch === ".") {
      i++;
      continue;
    }

    if (ch === "[") {
      const next = path[i + 1];
      if (next === "'" || next === '"') {
        const quoted = readQuoted(path, i + 1);
        if (path[quoted.end] !== "]") {
          throw new PathSyntaxError(`expected ] after quoted key in path: ${path}`);
        }
        out.push(quoted.value);
        i = quoted.end + 1;
        continue;
      }

      const close = path.indexOf("]", i);
      if (close === -1) {
        throw new PathSyntaxError(`unterminated index in path: ${path}`);
      }
      const raw = path.slice(i + 1, close).trim();
      if (!/^\d+$/.test(raw)) {
        throw new PathSyntaxError(`invalid index [${raw}] in path: ${path}`);
      }
      out.push(Number(raw));
      i = close + 1;
      continue;
    }

    let end = i;
    while (end < path.length && path[end] !== "." && path[end] !== "[") end++;
    const key = path.slice(i, end).trim();
    if (key.length > 0) out.push(key);
    i = end;
  }

  return out;
}
