import { isPlainObject, setOwn } from "@arbor/treematch-core";

import type { PathSegment } from "../path/paths.js";
import { TimeValue } from "../value/timeValue.js";
import type { CanonicalValue } from "../value/types.js";
import { NormalizeError } from "./errors.js";
import { RawJson } from "./rawJson.js";
import {
  DEFAULT_NORMALIZE_OPTIONS,
  type CanonicalNormalizeOptions,
  type NormalizeOptions,
  type NormalizeResult,
  type ResolvedNormalizeOptions,
} from "./types.js";

/** Walk state for one normalize call. */
interface Walk {
  readonly opts: ResolvedNormalizeOptions;
  readonly path: PathSegment[];
  readonly ancestors: Set<object>;
}

function describeType(value: unknown): string {
  if (typeof value !== "object" || value === null) return typeof value;
  const ctor = (value as { constructor?: { name?: unknown } }).constructor;
  return typeof ctor?.name === "string" && ctor.name.length > 0 ? ctor.name : "Object";
}

function hasToJson(value: object): boolean {
  return "toJSON" in value && typeof value.toJSON === "function";
}

function isSequenceLike(value: object): value is Iterable<unknown> {
  if (value instanceof Set) return true;
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

function stringKeyedEntries(value: Map<unknown, unknown>): Array<[string, unknown]> | undefined {
  const out: Array<[string, unknown]> = [];
  for (const [k, v] of value) {
    if (typeof k !== "string") return undefined;
    out.push([k, v]);
  }
  return out;
}

// Widen numbers nested in a class instance the same way direct input is widened.
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? Number(value) : value;
}

function marshal(value: object, walk: Walk): unknown {
  let text: string | undefined;

  if (value instanceof RawJson) {
    text = value.text;
  } else {
    try {
      text = JSON.stringify(value, jsonReplacer);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new NormalizeError(`json: ${message}`, walk.path, value, { cause: err });
    }
  }

  if (text === undefined) {
    throw new NormalizeError(`json: unsupported type: ${describeType(value)}`, walk.path, value);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new NormalizeError(`json: ${message}`, walk.path, value, { cause: err });
  }

  if (!walk.opts.normalizeTime) return parsed;

  // The parsed tree is ours; promote timestamps in place.
  return normalizeNode(parsed, {
    opts: { copy: false, deep: true, marshal: false, normalizeTime: true },
    path: walk.path,
    ancestors: new Set(),
  });
}

// JSON drops these record entries the way it drops `undefined` ones.
function isDroppedEntry(value: unknown, walk: Walk): boolean {
  if (value === undefined) return true;
  return walk.opts.marshal && (typeof value === "function" || typeof value === "symbol");
}

function enter(container: object, walk: Walk): void {
  if (walk.ancestors.has(container)) {
    throw new NormalizeError("circular structure", walk.path, container);
  }
  walk.ancestors.add(container);
}

function normalizeElements(source: readonly unknown[], target: unknown[], walk: Walk): void {
  enter(source, walk);
  for (let i = 0; i < source.length; i++) {
    walk.path.push(i);
    target[i] = normalizeNode(source[i], walk);
    walk.path.pop();
  }
  walk.ancestors.delete(source);
}

function normalizeEntries(source: Record<string, unknown>, target: Record<string, unknown>, walk: Walk): void {
  enter(source, walk);
  for (const key of Object.keys(source)) {
    const raw = source[key];
    if (isDroppedEntry(raw, walk)) {
      delete target[key];
      continue;
    }
    walk.path.push(key);
    setOwn(target, key, normalizeNode(raw, walk));
    walk.path.pop();
  }
  walk.ancestors.delete(source);
}

function normalizeArray(value: unknown[], fresh: boolean, walk: Walk): unknown[] {
  const { copy, deep } = walk.opts;
  const target = copy && !fresh ? [] : value;

  if (deep) {
    normalizeElements(value, target, walk);
  } else if (target !== value) {
    target.push(...value);
  }
  return target;
}

function normalizeRecord(value: Record<string, unknown>, fresh: boolean, walk: Walk): Record<string, unknown> {
  const { copy, deep } = walk.opts;
  const target = copy && !fresh ? {} : value;

  if (deep) {
    normalizeEntries(value, target, walk);
  } else if (target !== value) {
    for (const key of Object.keys(value)) setOwn(target, key, value[key]);
  }
  return target;
}

function normalizeNode(value: unknown, walk: Walk): unknown {
  const { opts } = walk;

  switch (typeof value) {
    case "boolean":
    case "number":
      return value;
    case "string":
      return opts.normalizeTime ? TimeValue.parse(value) ?? value : value;
    case "undefined":
      return null;
    case "bigint":
      return Number(value);
    case "function":
    case "symbol":
      if (!opts.marshal) return value;
      throw new NormalizeError(`json: unsupported type: ${typeof value}`, walk.path, value);
    case "object":
      break;
  }

  if (value === null || typeof value !== "object") return null;

  if (opts.normalizeTime) {
    if (value instanceof TimeValue) return value;
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : TimeValue.fromDate(value);
    }
  }

  if (opts.marshal && (value instanceof RawJson || hasToJson(value))) {
    return marshal(value, walk);
  }

  if (Array.isArray(value)) {
    if (!opts.copy && !opts.deep) return value;
    return normalizeArray(value, false, walk);
  }

  if (isPlainObject(value)) {
    if (!opts.copy && !opts.deep) return value;
    return normalizeRecord(value, false, walk);
  }

  if (value instanceof Map) {
    const entries = stringKeyedEntries(value);
    if (!entries) {
      if (!opts.marshal) return value;
      throw new NormalizeError("json: unsupported map key type", walk.path, value);
    }
    enter(value, walk);
    const record = normalizeRecord(Object.fromEntries(entries), true, walk);
    walk.ancestors.delete(value);
    return record;
  }

  if (isSequenceLike(value)) {
    enter(value, walk);
    const items = normalizeArray(Array.from(value), true, walk);
    walk.ancestors.delete(value);
    return items;
  }

  return opts.marshal ? marshal(value, walk) : value;
}

function resolveOptions(options: NormalizeOptions): ResolvedNormalizeOptions {
  return {
    copy: options.copy ?? DEFAULT_NORMALIZE_OPTIONS.copy,
    deep: options.deep ?? DEFAULT_NORMALIZE_OPTIONS.deep,
    marshal: options.marshal ?? DEFAULT_NORMALIZE_OPTIONS.marshal,
    normalizeTime: options.normalizeTime ?? DEFAULT_NORMALIZE_OPTIONS.normalizeTime,
  };
}

/**
 * Convert any value into the canonical model: primitives, plain objects,
 * arrays (and {@link TimeValue}s with `normalizeTime`).
 *
 * Numbers of every kind widen to `number`; integers beyond
 * `Number.MAX_SAFE_INTEGER` lose precision. `Map`s with string keys become
 * objects; `Set`s and typed arrays become arrays; {@link RawJson} payloads,
 * objects with `toJSON()` and class instances go through a JSON round trip.
 * As in JSON, object entries holding `undefined`, a function or a symbol are
 * dropped.
 *
 * Throws {@link NormalizeError} when the round trip rejects a value or the
 * input is circular.
 */
export function normalize(value: unknown, options?: CanonicalNormalizeOptions): CanonicalValue;
export function normalize(value: unknown, options: NormalizeOptions): unknown;
export function normalize(value: unknown, options: NormalizeOptions = {}): unknown {
  return normalizeNode(value, {
    opts: resolveOptions(options),
    path: [],
    ancestors: new Set(),
  });
}

/**
 * Like {@link normalize} with canonical options, but reports failure as a
 * result instead of throwing.
 */
export function tryNormalize(value: unknown, options: CanonicalNormalizeOptions = {}): NormalizeResult {
  try {
    return { ok: true, value: normalize(value, options) };
  } catch (err) {
    if (err instanceof NormalizeError) return { ok: false, error: err };
    throw err;
  }
}
