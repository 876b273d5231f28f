export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
* Assert that a condition is truthy.
*
* Throws {@link InvariantError} when the assertion fails.
*/
export function invariant(condition: unknown, message = "Invariant violation"): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

/**
* Exhaustiveness helper for `switch` statements.
*
* Throws an {@link InvariantError} if called.
*/
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new InvariantError(`${message}: ${describeUnexpected(value)}`);
}

function describeUnexpected(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return Object.prototype.toString.call(value);
  }
  return String(value);
}

/** Type guard for plain object records (non-null, non-array). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
* Type guard for records created by `{}` literals, `JSON.parse` or
* `Object.create(null)`; class instances are excluded.
*/
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** `Object.prototype.hasOwnProperty.call(...)` with key narrowing. */
export function hasOwn<K extends string>(
  value: Record<string, unknown>,
  key: K,
): value is Record<K, unknown> {
  return Object.prototype.hasOwnProperty.call(value, key);
}

/**
* Define an enumerable own data property. Unlike assignment, a `"__proto__"`
* key becomes a property instead of replacing the prototype.
*/
export function setOwn(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
