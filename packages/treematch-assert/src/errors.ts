import type { Match } from "@arbor/treematch";

export type AssertOperator = "contains" | "notContains" | "equivalent" | "notEquivalent";

/** Thrown by the tree assertions; carries both (normalized) operands and the match. */
export class TreeAssertionError extends Error {
  override name = "TreeAssertionError";

  constructor(
    message: string,
    readonly operator: AssertOperator,
    readonly v1: unknown,
    readonly v2: unknown,
    readonly match: Match,
  ) {
    super(message);
  }
}
