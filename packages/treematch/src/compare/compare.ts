import { assertNever, hasOwn, invariant } from "@arbor/treematch-core";

import { deepEqual } from "../merge/deepEqual.js";
import type { NormalizeError } from "../normalize/errors.js";
import { tryNormalize } from "../normalize/normalize.js";
import { lookup } from "../path/get.js";
import { formatPath } from "../path/paths.js";
import { safeStringify } from "../util/safeStringify.js";
import { TimeValue } from "../value/timeValue.js";
import {
  isCanonicalObject,
  kindOf,
  type CanonicalArray,
  type CanonicalObject,
  type CanonicalValue,
  type ValueKind,
} from "../value/types.js";
import { MatchContext } from "./context.js";
import { resolveContainsOptions } from "./options.js";
import { formatTrace } from "./report.js";
import { matchTimes, NOT_EQUAL } from "./times.js";
import type { ContainsOptions, Match } from "./types.js";

function isZero(value: CanonicalValue): boolean {
  if (value instanceof TimeValue) return value.isZero();
  return value === "" || value === 0 || value === false;
}

// `b` is a wildcard when null, or the zero value of a's kind.
function isWildcard(kind: ValueKind | undefined, b: CanonicalValue): boolean {
  if (b === null) return true;
  if (kind === undefined || kind === "object" || kind === "array") return false;
  return kindOf(b) === kind && isZero(b);
}

function sortedKeys(value: CanonicalObject): string[] {
  return Object.keys(value).sort();
}

function child(value: CanonicalObject, key: string): CanonicalValue {
  const out = value[key];
  invariant(out !== undefined, `missing key ${key}`);
  return out;
}

function element(value: CanonicalArray, index: number): CanonicalValue {
  const out = value[index];
  invariant(out !== undefined, `missing index ${index}`);
  return out;
}

function matchStrings(a: string, b: CanonicalValue, ctx: MatchContext): boolean {
  if (typeof b !== "string") return ctx.fail(a, b, NOT_EQUAL);
  if (ctx.opts.stringContains) {
    return a.includes(b) || ctx.fail(a, b, "v1 does not contain v2");
  }
  return a === b || ctx.fail(a, b, NOT_EQUAL);
}

function matchObjects(a: CanonicalObject, b: CanonicalObject, ctx: MatchContext): boolean {
  const bKeys = sortedKeys(b);
  const extraInB = bKeys.filter((k) => !hasOwn(a, k));
  if (extraInB.length > 0) {
    return ctx.fail(a, b, () => `v2 contains extra keys: [${extraInB.join(" ")}]`);
  }

  if (ctx.equivalence) {
    const extraInA = sortedKeys(a).filter((k) => !hasOwn(b, k));
    if (extraInA.length > 0) {
      return ctx.fail(a, b, () => `v1 contains extra keys: [${extraInA.join(" ")}]`);
    }
  }

  for (const k of bKeys) {
    if (!ctx.at(k, () => matchValues(child(a, k), child(b, k), ctx))) return false;
  }
  return true;
}

// Candidates are not consumed: several pattern elements may match the same element.
function someMatch(candidates: CanonicalArray, pattern: CanonicalValue, ctx: MatchContext): boolean {
  const silent = ctx.silent();
  return candidates.some((candidate) => matchValues(candidate, pattern, silent));
}

function someMatchedBy(patterns: CanonicalArray, value: CanonicalValue, ctx: MatchContext): boolean {
  const silent = ctx.silent();
  return patterns.some((pattern) => matchValues(value, pattern, silent));
}

function matchArrays(a: CanonicalArray, b: CanonicalValue, ctx: MatchContext): boolean {
  if (!Array.isArray(b)) {
    if (ctx.equivalence) return ctx.fail(a, b, NOT_EQUAL);
    return someMatch(a, b, ctx) || ctx.fail(a, b, "v1 does not contain v2");
  }

  if (ctx.equivalence && a.length !== b.length) {
    return ctx.fail(a, b, `v1 and v2 have different lengths: ${a.length} != ${b.length}`);
  }

  for (let j = 0; j < b.length; j++) {
    const pattern = element(b, j);
    if (!someMatch(a, pattern, ctx)) {
      return ctx.fail(a, b, () => `v1 does not contain v2[${j}]: ${safeStringify(pattern)}`);
    }
  }

  if (ctx.equivalence) {
    for (let i = 0; i < a.length; i++) {
      const value = element(a, i);
      if (!someMatchedBy(b, value, ctx)) {
        return ctx.fail(a, b, () => `v2 does not contain v1[${i}]: ${safeStringify(value)}`);
      }
    }
  }

  return true;
}

function matchValues(a: CanonicalValue, b: CanonicalValue, ctx: MatchContext): boolean {
  const kind = kindOf(a);
  if (ctx.opts.emptyValuesMatchAny && isWildcard(kind, b)) return true;

  switch (kind) {
    case "null":
    case "boolean":
      return a === b || ctx.fail(a, b, NOT_EQUAL);
    case "number":
      return deepEqual(a, b) || ctx.fail(a, b, NOT_EQUAL);
    case "string":
      return typeof a === "string" ? matchStrings(a, b, ctx) : ctx.fail(a, b, NOT_EQUAL);
    case "time":
      return a instanceof TimeValue && b instanceof TimeValue ? matchTimes(a, b, ctx) : ctx.fail(a, b, NOT_EQUAL);
    case "object":
      return isCanonicalObject(a) && isCanonicalObject(b) ? matchObjects(a, b, ctx) : ctx.fail(a, b, NOT_EQUAL);
    case "array":
      return Array.isArray(a) ? matchArrays(a, b, ctx) : ctx.fail(a, b, NOT_EQUAL);
    case undefined:
      return deepEqual(a, b) || ctx.fail(a, b, NOT_EQUAL);
    default:
      return assertNever(kind, "Unknown value kind");
  }
}

function normalizeFailure(operand: "v1" | "v2", error: NormalizeError, other: unknown): Match {
  const message = `err normalizing ${operand}: ${error.message}`;
  const found = lookup(other, error.path);
  return {
    matches: false,
    message,
    path: formatPath(error.path, ""),
    v1: operand === "v1" ? error.value : found,
    v2: operand === "v2" ? error.value : found,
    error,
  };
}

function runMatch(v1: unknown, v2: unknown, options: ContainsOptions, equivalence: boolean, recording: boolean): Match {
  const opts = resolveContainsOptions(options);
  const normalizeOptions = { normalizeTime: opts.parseTimes };

  const n1 = tryNormalize(v1, normalizeOptions);
  if (!n1.ok) return normalizeFailure("v1", n1.error, v2);
  const n2 = tryNormalize(v2, normalizeOptions);
  if (!n2.ok) return normalizeFailure("v2", n2.error, n1.value);

  const ctx = new MatchContext(opts, equivalence, recording);
  if (matchValues(n1.value, n2.value, ctx)) {
    return { matches: true, message: "", path: "" };
  }

  const mismatch = ctx.mismatch;
  if (mismatch === undefined) return { matches: false, message: "", path: "" };
  return {
    matches: false,
    message: formatTrace(mismatch),
    path: formatPath(mismatch.path, ""),
    v1: mismatch.v1,
    v2: mismatch.v2,
  };
}

function report(match: Match, options: ContainsOptions): Match {
  options.trace?.(match.message);
  return match;
}

/**
 * Whether `v1` contains `v2`: every key of a v2 object is present in v1 and
 * matches, every element of a v2 array matches some element of v1's, a v2
 * scalar matches a v1 array when some element matches it, and scalars match
 * by equality (as modified by the options).
 *
 * An operand that cannot be normalized makes the result `false`. Malformed
 * duration options are a caller error and throw {@link DurationParseError}.
 */
export function contains(v1: unknown, v2: unknown, options: ContainsOptions = {}): boolean {
  const match = runMatch(v1, v2, options, false, options.trace !== undefined);
  report(match, options);
  return match.matches;
}

/**
 * {@link contains}, with details of the first mismatch. A normalization
 * failure is reported in `error`; malformed durations throw as in `contains`.
 */
export function containsMatch(v1: unknown, v2: unknown, options: ContainsOptions = {}): Match {
  return report(runMatch(v1, v2, options, false, true), options);
}

/**
 * Whether `v1` and `v2` are equivalent: {@link contains} with no extra keys
 * allowed on either side, arrays of equal length, every element of each
 * array matched in the other, and no scalar-in-array match.
 *
 * Failures are reported as for {@link contains}.
 */
export function equivalent(v1: unknown, v2: unknown, options: ContainsOptions = {}): boolean {
  const match = runMatch(v1, v2, options, true, options.trace !== undefined);
  report(match, options);
  return match.matches;
}

/** {@link equivalent}, with details of the first mismatch. */
export function equivalentMatch(v1: unknown, v2: unknown, options: ContainsOptions = {}): Match {
  return report(runMatch(v1, v2, options, true, true), options);
}
