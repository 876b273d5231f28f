import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";

import { describe, expect, it } from "vitest";

import { loadProfiles, selectProfile } from "../src/config/loadProfiles.js";

async function writeConfig(lines: string[]): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "treematch-"));
  await fs.writeFile(path.join(dir, "treematch.yml"), lines.join("\n"), "utf8");
  return dir;
}

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

describe("loadProfiles", () => {
  it("accepts kebab- and camel-case option keys", async () => {
    const dir = await writeConfig([
      "schemaVersion: 1",
      "defaultProfile: lenient",
      "profiles:",
      "  lenient:",
      "    empty-values-match-any: true",
      "    allowTimeDelta: 1s",
      "    truncate-times: 1000",
      "  exact:"
    ]);

    const config = await loadProfiles({ cwd: dir, configPath: "treematch.yml" });

    expect(config).toEqual({
      schemaVersion: 1,
      defaultProfile: "lenient",
      profiles: {
        lenient: { emptyValuesMatchAny: true, allowTimeDelta: "1s", truncateTimes: 1000 },
        exact: {}
      }
    });
  });

  it("warns about unknown option keys", async () => {
    const dir = await writeConfig(["schemaVersion: 1", "profiles:", "  p:", "    colour: true", "    parse-times: true"]);
    const stderr = sink();

    const config = await loadProfiles({ cwd: dir, configPath: "treematch.yml", stderr: stderr.stream });

    expect(config.profiles["p"]).toEqual({ parseTimes: true });
    expect(stderr.text()).toBe("warning: unknown option(s) in treematch.yml: profiles.p.colour (ignoring)\n");
  });

  it("rejects other schema versions", async () => {
    const dir = await writeConfig(["schemaVersion: 2", "profiles: {}"]);
    await expect(loadProfiles({ cwd: dir, configPath: "treematch.yml" })).rejects.toThrow(
      "schemaVersion must be 1 (got 2)"
    );
  });

  it("validates option values", async () => {
    const badBool = await writeConfig(["schemaVersion: 1", "profiles:", "  p:", "    parse-times: yes please"]);
    await expect(loadProfiles({ cwd: badBool, configPath: "treematch.yml" })).rejects.toThrow(
      "profiles.p.parse-times must be a boolean"
    );

    const badDuration = await writeConfig(["schemaVersion: 1", "profiles:", "  p:", "    allow-time-delta: soon"]);
    await expect(loadProfiles({ cwd: badDuration, configPath: "treematch.yml" })).rejects.toThrow(
      'profiles.p.allow-time-delta: invalid duration: "soon"'
    );
  });

  it("rejects an unknown default profile", async () => {
    const dir = await writeConfig(["schemaVersion: 1", "defaultProfile: missing", "profiles: {}"]);
    await expect(loadProfiles({ cwd: dir, configPath: "treematch.yml" })).rejects.toThrow(
      "defaultProfile names an unknown profile: missing"
    );
  });

  it("reports a missing file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "treematch-"));
    await expect(loadProfiles({ cwd: dir, configPath: "nope.yml" })).rejects.toThrow("config not found: nope.yml");
  });
});

describe("selectProfile", () => {
  const config = {
    schemaVersion: 1 as const,
    profiles: { a: { parseTimes: true }, b: {} },
    defaultProfile: "a"
  };

  it("falls back to the default profile", () => {
    expect(selectProfile(config)).toEqual({ parseTimes: true });
    expect(selectProfile(config, "b")).toEqual({});
    expect(selectProfile({ schemaVersion: 1, profiles: {} })).toEqual({});
  });

  it("rejects unknown names", () => {
    expect(() => selectProfile(config, "x")).toThrow("unknown profile: x (known: a, b)");
  });
});
