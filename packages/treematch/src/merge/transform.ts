import { setOwn } from "@arbor/treematch-core";

import { normalize } from "../normalize/normalize.js";
import { isCanonicalObject, type CanonicalValue } from "../value/types.js";

/** Return (or throw) from a transform callback to end the walk early. */
export const STOP: unique symbol = Symbol("treematch.stop");

export type TransformFn = (value: CanonicalValue) => CanonicalValue | typeof STOP;

type WalkState = { stopped: boolean };

function apply(node: CanonicalValue, fn: TransformFn, state: WalkState): CanonicalValue {
  let next: CanonicalValue | typeof STOP;
  try {
    next = fn(node);
  } catch (err) {
    if (err !== STOP) throw err;
    next = STOP;
  }

  if (next === STOP) {
    state.stopped = true;
    return node;
  }
  return next;
}

function visit(node: CanonicalValue, fn: TransformFn, state: WalkState): CanonicalValue {
  const next = apply(node, fn, state);
  if (state.stopped) return next;

  if (Array.isArray(next)) {
    for (let i = 0; i < next.length && !state.stopped; i++) {
      const item = next[i];
      if (item !== undefined) next[i] = visit(item, fn, state);
    }
  } else if (isCanonicalObject(next)) {
    for (const [k, v] of Object.entries(next)) {
      if (state.stopped) break;
      setOwn(next, k, visit(v, fn, state));
    }
  }

  return next;
}

/**
 * Normalize `value`, then replace every node, pre-order, with `fn(node)`.
 *
 * Children of the container `fn` returns are visited next (as returned, not
 * re-normalized) and replaced in place. Returning or throwing {@link STOP}
 * ends the walk; the tree transformed so far is returned. Other errors
 * propagate.
 */
export function transform(value: unknown, fn: TransformFn): CanonicalValue {
  return visit(normalize(value), fn, { stopped: false });
}
