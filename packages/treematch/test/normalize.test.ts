import { describe, expect, it } from "vitest";

import { NormalizeError } from "../src/normalize/errors.js";
import { normalize, tryNormalize } from "../src/normalize/normalize.js";
import { rawJson } from "../src/normalize/rawJson.js";
import { TimeValue } from "../src/value/timeValue.js";
import { isCanonicalObject } from "../src/value/types.js";

describe("normalize", () => {
  it("passes JSON-shaped values through as copies", () => {
    const input = { a: [1, "x", null, true], b: { c: 1.5 } };
    const out = normalize(input);
    expect(out).toEqual(input);
    expect(out).not.toBe(input);
  });

  it("returns containers as-is in borrow mode", () => {
    const input = { a: [1] };
    expect(normalize(input, { copy: false, deep: false, marshal: false })).toBe(input);
  });

  it("converts maps, sets, typed arrays and bigints", () => {
    const input = { a: undefined, b: 1n, c: new Map([["k", new Set([1, 2])]]), d: new Uint8Array([3, 4]) };
    expect(normalize(input)).toEqual({ b: 1, c: { k: [1, 2] }, d: [3, 4] });
  });

  it("turns undefined into null", () => {
    expect(normalize(undefined)).toBeNull();
    expect(normalize([undefined])).toEqual([null]);
  });

  it("parses raw JSON", () => {
    expect(normalize(rawJson('{"a":[1,2]}'))).toEqual({ a: [1, 2] });
  });

  it("marshals class instances and Dates through JSON", () => {
    class Point {
      constructor(
        readonly x: number,
        readonly y: number,
      ) {}
    }
    expect(normalize(new Point(1, 2))).toEqual({ x: 1, y: 2 });
    expect(normalize(new Date("2020-01-01T00:00:00.000Z"))).toBe("2020-01-01T00:00:00.000Z");
  });

  it("promotes timestamps with normalizeTime", () => {
    const out = normalize({ at: "2020-01-01T00:00:00Z", name: "x" }, { normalizeTime: true });
    expect(out).toEqual({ at: TimeValue.parse("2020-01-01T00:00:00Z"), name: "x" });

    const date = normalize(new Date("2020-01-01T00:00:00.000Z"), { normalizeTime: true });
    expect(date).toBeInstanceOf(TimeValue);
    expect(String(date)).toBe("2020-01-01T00:00:00Z");
  });

  it("maps invalid Dates to null", () => {
    expect(normalize(new Date("nope"), { normalizeTime: true })).toBeNull();
    expect(normalize(new Date("nope"))).toBeNull();
  });

  it("is idempotent", () => {
    const input = { a: new Map([["b", [1n, "2"]]]), c: new Set(["x"]) };
    const once = normalize(input);
    expect(normalize(once)).toEqual(once);
  });

  it("drops function and symbol entries like JSON does", () => {
    const input = { a: 1, f() {}, s: Symbol("s"), u: undefined };
    expect(normalize(input)).toEqual({ a: 1 });
    expect(normalize(input)).toEqual(JSON.parse(JSON.stringify(input)));
  });

  it("keeps function entries when not marshaling", () => {
    const f = () => 1;
    expect(normalize({ f }, { marshal: false })).toEqual({ f });
  });

  it("marshals plain objects that define toJSON", () => {
    expect(normalize({ secret: "x", toJSON: () => ({ x: 1 }) })).toEqual({ x: 1 });
    expect(normalize({ at: { toJSON: () => "now" } })).toEqual({ at: "now" });
  });

  it("keeps __proto__ keys as own properties", () => {
    const input: unknown = JSON.parse('{"__proto__":{"a":1},"b":2}');
    const out = normalize(input);

    expect(isCanonicalObject(out)).toBe(true);
    if (!isCanonicalObject(out)) return;
    expect(Object.keys(out)).toEqual(["__proto__", "b"]);
    expect(Object.getPrototypeOf(out)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(out, "__proto__")?.value).toEqual({ a: 1 });

    const shallow = normalize(input, { deep: false, marshal: false });
    expect(Object.getPrototypeOf(shallow)).toBe(Object.prototype);
    expect(isCanonicalObject(shallow) && Object.keys(shallow)).toEqual(["__proto__", "b"]);
  });

  it("rejects functions in arrays with the failing path", () => {
    let caught: unknown;
    try {
      normalize({ a: { b: [() => 1] } });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(NormalizeError);
    if (!(caught instanceof NormalizeError)) return;
    expect(caught.message).toBe("json: unsupported type: function (at a.b[0])");
    expect(caught.path).toEqual(["a", "b", 0]);
  });

  it("rejects maps with non-string keys", () => {
    expect(() => normalize(new Map([[1, "a"]]))).toThrow("json: unsupported map key type");
  });

  it("rejects circular structures", () => {
    const list: unknown[] = [];
    list.push(list);
    expect(() => normalize(list)).toThrow("circular structure (at [0])");
  });

  it("rejects maps and sets that contain themselves", () => {
    const map = new Map<string, unknown>();
    map.set("self", map);
    expect(() => normalize(map)).toThrow("circular structure (at self)");

    const set = new Set<unknown>();
    set.add(set);
    expect(() => normalize(set)).toThrow("circular structure (at [0])");
  });

  it("allows the same map in sibling positions", () => {
    const shared = new Map([["x", 1]]);
    expect(normalize([shared, shared])).toEqual([{ x: 1 }, { x: 1 }]);
  });

  it("allows shared, non-circular references", () => {
    const shared = { x: 1 };
    expect(normalize({ a: shared, b: shared })).toEqual({ a: { x: 1 }, b: { x: 1 } });
  });
});

describe("tryNormalize", () => {
  it("reports failures as a result", () => {
    const res = tryNormalize({ f: [Symbol("s")] });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.path).toEqual(["f", 0]);
  });

  it("wraps successful values", () => {
    expect(tryNormalize([1n])).toEqual({ ok: true, value: [1] });
  });
});
