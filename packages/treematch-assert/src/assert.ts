import {
  containsMatch,
  equivalentMatch,
  resolveContainsOptions,
  safeStringify,
  tryNormalize,
  type ContainsOptions,
  type Match,
} from "@arbor/treematch";

import { TreeAssertionError, type AssertOperator } from "./errors.js";

export type AssertOptions = ContainsOptions & {
  /** Drop the lenient defaults (`emptyValuesMatchAny`, `ignoreTimeZones`, `parseTimes`). */
  strict?: boolean;

  /** Prefix for the failure message. */
  message?: string;
};

type Matcher = (v1: unknown, v2: unknown, options: ContainsOptions) => Match;

const FAILURE_HEADINGS: Record<AssertOperator, string> = {
  contains: "v1 does not contain v2:",
  notContains: "v1 should not contain v2:",
  equivalent: "v1 !≈ v2:",
  notEquivalent: "v1 should not ≈ v2:",
};

function matchOptions(options: AssertOptions): ContainsOptions {
  const { strict, message: _message, ...rest } = options;
  if (strict) return rest;
  return { emptyValuesMatchAny: true, ignoreTimeZones: true, parseTimes: true, ...rest };
}

function normalized(value: unknown, parseTimes: boolean): unknown {
  const res = tryNormalize(value, { normalizeTime: parseTimes });
  return res.ok ? res.value : value;
}

function check(
  operator: AssertOperator,
  matcher: Matcher,
  expectMatch: boolean,
  v1: unknown,
  v2: unknown,
  options: AssertOptions,
): void {
  const opts = matchOptions(options);
  const match = matcher(v1, v2, opts);
  if (!match.error && match.matches === expectMatch) return;

  const { parseTimes } = resolveContainsOptions(opts);
  const n1 = normalized(v1, parseTimes);
  const n2 = normalized(v2, parseTimes);

  let text: string;
  if (match.error) {
    text = match.message;
  } else if (expectMatch) {
    text = `${FAILURE_HEADINGS[operator]}\n${match.message}`;
  } else {
    text = `${FAILURE_HEADINGS[operator]}\nv1: ${safeStringify(n1)}\nv2: ${safeStringify(n2)}`;
  }

  const message = options.message ? `${options.message}: ${text}` : text;
  throw new TreeAssertionError(message, operator, n1, n2, match);
}

/** Throw a {@link TreeAssertionError} unless `v1` contains `v2`. */
export function assertContains(v1: unknown, v2: unknown, options: AssertOptions = {}): void {
  check("contains", containsMatch, true, v1, v2, options);
}

/** Throw a {@link TreeAssertionError} if `v1` contains `v2`. */
export function assertNotContains(v1: unknown, v2: unknown, options: AssertOptions = {}): void {
  check("notContains", containsMatch, false, v1, v2, options);
}

/** Throw a {@link TreeAssertionError} unless `v1` and `v2` are equivalent. */
export function assertEquivalent(v1: unknown, v2: unknown, options: AssertOptions = {}): void {
  check("equivalent", equivalentMatch, true, v1, v2, options);
}

/** Throw a {@link TreeAssertionError} if `v1` and `v2` are equivalent. */
export function assertNotEquivalent(v1: unknown, v2: unknown, options: AssertOptions = {}): void {
  check("notEquivalent", equivalentMatch, false, v1, v2, options);
}
