import { assertNever, isPlainObject } from "@arbor/treematch-core";

import { TimeValue } from "./timeValue.js";

/** Object node of a canonical tree. Key order carries no meaning. */
export interface CanonicalObject {
  [key: string]: CanonicalValue;
}

/** Array node of a canonical tree. */
export type CanonicalArray = CanonicalValue[];

/**
 * The canonical value model: exactly the shapes `JSON.parse` produces, plus
 * {@link TimeValue} when time normalization is enabled.
 */
export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | CanonicalObject
  | CanonicalArray
  | TimeValue;

export type ValueKind = "null" | "boolean" | "number" | "string" | "object" | "array" | "time";

/**
 * Discriminates a canonical value.
 *
 * Returns `undefined` for values outside the model (e.g. a class instance left
 * behind by a borrow-mode, non-marshalling normalization).
 */
export function kindOf(value: unknown): ValueKind | undefined {
  if (value === null) return "null";

  switch (typeof value) {
    case "boolean":
      return "boolean";
    case "number":
      return "number";
    case "string":
      return "string";
    case "object":
      if (Array.isArray(value)) return "array";
      if (value instanceof TimeValue) return "time";
      if (isPlainObject(value)) return "object";
      return undefined;
    default:
      return undefined;
  }
}

/** Type guard for {@link CanonicalObject} nodes. */
export function isCanonicalObject(value: unknown): value is CanonicalObject {
  return kindOf(value) === "object";
}

/** The value a kind starts from; `undefined` for containers, which have no wildcard zero. */
export function zeroValueOf(kind: ValueKind): CanonicalValue | undefined {
  switch (kind) {
    case "null":
      return null;
    case "boolean":
      return false;
    case "number":
      return 0;
    case "string":
      return "";
    case "time":
      return TimeValue.ZERO;
    case "object":
    case "array":
      return undefined;
    default:
      return assertNever(kind, "Unknown value kind");
  }
}
