import { describe, expect, it } from "vitest";

import {
  IndexOutOfBoundsError,
  PathNotFoundError,
  PathNotMapError,
  PathNotSequenceError,
} from "../src/path/errors.js";
import { get, lookup } from "../src/path/get.js";
import { formatPath, parsePath, PathSyntaxError } from "../src/path/paths.js";

describe("parsePath", () => {
  it("parses dotted keys and indexes", () => {
    expect(parsePath("response.things[2].color")).toEqual(["response", "things", 2, "color"]);
    expect(parsePath("[0][1]")).toEqual([0, 1]);
  });

  it("parses quoted keys", () => {
    expect(parsePath("labels['app.io/name']")).toEqual(["labels", "app.io/name"]);
    expect(parsePath('labels["it\\"s"]')).toEqual(["labels", 'it"s']);
  });

  it("addresses the root with an empty path", () => {
    expect(parsePath("")).toEqual([]);
    expect(parsePath(".")).toEqual([]);
    expect(parsePath(" a . b ")).toEqual(["a", "b"]);
  });

  it("rejects malformed paths", () => {
    expect(() => parsePath("a[x]")).toThrow(PathSyntaxError);
    expect(() => parsePath("a[1")).toThrow("unterminated index in path: a[1");
    expect(() => parsePath("a['b")).toThrow(PathSyntaxError);
  });
});

describe("formatPath", () => {
  it("renders identifiers, indexes and quoted keys", () => {
    expect(formatPath(["a", 0, "odd key"], "v1")).toBe("v1.a[0]['odd key']");
    expect(formatPath(["a", "b"], "")).toBe("a.b");
    expect(formatPath([], "v2")).toBe("v2");
    expect(formatPath(["it's"])).toBe("$['it\\'s']");
  });

  it("round-trips through parsePath", () => {
    const segments = ["labels", "app.io/name", 3];
    expect(parsePath(formatPath(segments, ""))).toEqual(segments);
  });
});

describe("get", () => {
  const doc = { resource: { things: [{ color: "red" }, { color: "blue" }] }, tags: ["red", "green"] };

  it("returns the value at a path", () => {
    expect(get(doc, "resource.things[1].color")).toBe("blue");
    expect(get(doc, "")).toBe(doc);
    expect(get(doc, ["tags", 0])).toBe("red");
  });

  it("reads through maps and sets", () => {
    const input = new Map([["a", { b: new Set([1, 2]) }]]);
    expect(get(input, "a.b[1]")).toBe(2);
  });

  it("reports missing keys", () => {
    expect(() => get({}, "color")).toThrow(new PathNotFoundError("color not found"));
  });

  it("reports non-maps", () => {
    expect(() => get(["red", "green"], "tags[2]")).toThrow(new PathNotMapError("v is not a map"));
    expect(() => get({ tags: "red" }, "tags.x")).toThrow(new PathNotMapError("tags is not a map"));
  });

  it("reports non-sequences", () => {
    expect(() => get({ tags: "red" }, "[2]")).toThrow(new PathNotSequenceError("v is not a sequence"));
    expect(() => get({ tags: "red" }, "tags[0]")).toThrow(new PathNotSequenceError("tags is not a sequence"));
  });

  it("reports out-of-range indexes", () => {
    expect(() => get({ tags: ["red", "green"] }, "tags[2]")).toThrow(
      new IndexOutOfBoundsError("Index out of bounds at tags[2] (len = 2)"),
    );
  });

  it("exposes the error kind", () => {
    try {
      get({}, "a");
    } catch (err) {
      expect(err).toBeInstanceOf(PathNotFoundError);
      if (err instanceof PathNotFoundError) expect(err.kind).toBe("notFound");
    }
  });
});

describe("lookup", () => {
  it("returns undefined instead of throwing path errors", () => {
    expect(lookup({ a: 1 }, "b")).toBeUndefined();
    expect(lookup({ a: [1] }, "a[0]")).toBe(1);
  });

  it("still throws syntax errors", () => {
    expect(() => lookup({}, "a[")).toThrow(PathSyntaxError);
  });
});
