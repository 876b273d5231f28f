import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";

import { describe, expect, it } from "vitest";

import { main } from "../src/cli.js";

function sink(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });
  return { stream, text: () => chunks.join("") };
}

async function workspace(files: Record<string, string>): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "treematch-cli-"));
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content, "utf8");
  }
  return dir;
}

async function run(cwd: string, argv: string[]): Promise<{ code: number; stdout: string; stderr: string }> {
  const stdout = sink();
  const stderr = sink();
  const code = await main(argv, { cwd, stdout: stdout.stream, stderr: stderr.stream });
  return { code, stdout: stdout.text(), stderr: stderr.text() };
}

describe("main", () => {
  it("exits 0 when v1 contains v2", async () => {
    const cwd = await workspace({ "v1.json": '{"a": 1, "b": 2}', "v2.yml": "a: 1\n" });
    expect(await run(cwd, ["contains", "v1.json", "v2.yml"])).toEqual({
      code: 0,
      stdout: "v1 contains v2\n",
      stderr: ""
    });
  });

  it("exits 1 with the trace when it does not", async () => {
    const cwd = await workspace({ "v1.json": '{"a": 1}', "v2.json": '{"a": 2}' });
    const res = await run(cwd, ["contains", "v1.json", "v2.json"]);
    expect(res.code).toBe(1);
    expect(res.stdout).toBe("v1 does not contain v2\n\nvalues are not equal\nv1.a -> 1\nv2.a -> 2\n");
  });

  it("reports equivalence as JSON", async () => {
    const cwd = await workspace({ "v1.json": '{"a": 1, "b": 2}', "v2.json": '{"a": 1}' });
    const res = await run(cwd, ["equivalent", "v1.json", "v2.json", "--format", "json"]);
    expect(res.code).toBe(1);
    expect(JSON.parse(res.stdout)).toEqual({
      command: "equivalent",
      holds: false,
      path: "",
      message: 'v1 contains extra keys: [b]\nv1 -> {"a":1,"b":2}\nv2 -> {"a":1}'
    });
  });

  it("detects conflicts", async () => {
    const cwd = await workspace({ "v1.json": '{"a": 1}', "v2.json": '{"a": 2}', "v3.json": '{"b": 2}' });

    const conflicting = await run(cwd, ["conflicts", "v1.json", "v2.json"]);
    expect(conflicting.code).toBe(0);
    expect(conflicting.stdout).toBe("v2 conflicts with v1\n\nvalues are not equal\nv1.a -> 2\nv2.a -> 1\n");

    const clean = await run(cwd, ["conflicts", "v1.json", "v3.json"]);
    expect(clean).toEqual({ code: 1, stdout: "no conflicts\n", stderr: "" });
  });

  it("applies flags to conflicts", async () => {
    const cwd = await workspace({
      "v1.json": '{"at": "2020-01-01T00:00:00Z"}',
      "v2.json": '{"at": "2020-01-01T00:00:20Z"}'
    });
    expect((await run(cwd, ["conflicts", "v1.json", "v2.json"])).code).toBe(0);
    expect(await run(cwd, ["conflicts", "v1.json", "v2.json", "--allow-time-delta", "30s"])).toEqual({
      code: 1,
      stdout: "no conflicts\n",
      stderr: ""
    });
  });

  it("prints the merged document", async () => {
    const cwd = await workspace({ "v1.json": '{"a": 1, "tags": ["x"]}', "v2.yml": "tags:\n  - y\n" });
    const res = await run(cwd, ["merge", "v1.json", "v2.yml", "--format", "json"]);
    expect(res.code).toBe(0);
    expect(JSON.parse(res.stdout)).toEqual({ a: 1, tags: ["x", "y"] });
  });

  it("applies flags", async () => {
    const cwd = await workspace({
      "v1.json": '{"at": "2020-01-01T00:00:00Z"}',
      "v2.json": '{"at": "2020-01-01T00:00:20Z"}'
    });
    expect((await run(cwd, ["contains", "v1.json", "v2.json"])).code).toBe(1);
    expect((await run(cwd, ["contains", "v1.json", "v2.json", "--allow-time-delta", "30s"])).code).toBe(0);
  });

  it("applies time truncation flags", async () => {
    const cwd = await workspace({
      "v1.json": '{"at": "2020-01-01T00:00:00.250Z"}',
      "v2.json": '{"at": "2020-01-01T00:00:00.750Z"}'
    });
    expect((await run(cwd, ["contains", "v1.json", "v2.json"])).code).toBe(1);
    expect((await run(cwd, ["contains", "v1.json", "v2.json", "--truncate-times", "1s"])).code).toBe(0);
    expect((await run(cwd, ["contains", "v1.json", "v2.json", "--round-times", "1s"])).code).toBe(1);
  });

  it("applies the default profile, with flags on top", async () => {
    const cwd = await workspace({
      "treematch.yml": [
        "schemaVersion: 1",
        "defaultProfile: lenient",
        "profiles:",
        "  lenient:",
        "    empty-values-match-any: true",
        "  exact: {}"
      ].join("\n"),
      "v1.json": '{"name": "ann"}',
      "v2.json": '{"name": ""}'
    });

    expect((await run(cwd, ["contains", "v1.json", "v2.json", "--config", "treematch.yml"])).code).toBe(0);
    expect(
      (await run(cwd, ["contains", "v1.json", "v2.json", "--config", "treematch.yml", "--profile", "exact"])).code
    ).toBe(1);
    expect(
      (
        await run(cwd, [
          "contains",
          "v1.json",
          "v2.json",
          "--config",
          "treematch.yml",
          "--profile",
          "exact",
          "--empty-values-match-any"
        ])
      ).code
    ).toBe(0);
  });

  it("exits 2 on missing input", async () => {
    const cwd = await workspace({ "v1.json": "{}" });
    expect(await run(cwd, ["contains", "v1.json", "missing.json"])).toEqual({
      code: 2,
      stdout: "",
      stderr: "error: file not found: missing.json\n"
    });
  });

  it("exits 2 without usage on a missing config", async () => {
    const cwd = await workspace({ "v1.json": "{}", "v2.json": "{}" });
    expect(await run(cwd, ["contains", "v1.json", "v2.json", "--config", "missing.yml"])).toEqual({
      code: 2,
      stdout: "",
      stderr: "error: config not found: missing.yml\n"
    });
  });

  it("exits 2 on unparseable input", async () => {
    const cwd = await workspace({ "v1.json": "{", "v2.json": "{}" });
    const res = await run(cwd, ["contains", "v1.json", "v2.json"]);
    expect(res.code).toBe(2);
    expect(res.stderr.startsWith("error: invalid document v1.json: ")).toBe(true);
  });

  it("exits 2 with usage on bad arguments", async () => {
    const cwd = await workspace({});
    const res = await run(cwd, ["compare", "a", "b"]);
    expect(res.code).toBe(2);
    expect(res.stderr.startsWith("error: unknown command: compare (known: contains, equivalent, conflicts, merge)\n\n")).toBe(
      true
    );
  });

  it("prints help", async () => {
    const res = await run(await workspace({}), ["--help"]);
    expect(res.code).toBe(0);
    expect(res.stdout.startsWith("Compare two JSON/YAML documents\n")).toBe(true);
  });
});
