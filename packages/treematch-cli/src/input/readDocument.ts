import fs from "node:fs/promises";
import path from "node:path";

import YAML from "yaml";

import { InputError } from "../util/errors.js";

/** Read a JSON or YAML document (JSON is YAML). An empty file reads as `null`. */
export async function readDocument(cwd: string, filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(path.resolve(cwd, filePath), "utf8");
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "ENOENT") {
      throw new InputError(`file not found: ${filePath}`);
    }
    const msg = err instanceof Error ? err.message : String(err);
    throw new InputError(`failed to read ${filePath}: ${msg}`);
  }

  try {
    return YAML.parse(raw) ?? null;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new InputError(`invalid document ${filePath}: ${msg}`);
  }
}
