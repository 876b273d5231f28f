export type { AssertOptions } from "./assert.js";
export { assertContains, assertEquivalent, assertNotContains, assertNotEquivalent } from "./assert.js";
export type { AssertOperator } from "./errors.js";
export { TreeAssertionError } from "./errors.js";
