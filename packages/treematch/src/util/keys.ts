import { isPlainObject } from "@arbor/treematch-core";

import { normalize } from "../normalize/normalize.js";

/** Keys of an object or string-keyed `Map`; `[]` for anything else. */
export function keys(value: unknown): string[] {
  const node = normalize(value, { copy: false, deep: false, marshal: false });
  return isPlainObject(node) ? Object.keys(node) : [];
}
