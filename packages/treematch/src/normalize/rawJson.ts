const textDecoder = new TextDecoder();

/**
 * An already-serialized JSON payload.
 *
 * Normalizing a `RawJson` parses it instead of treating the text as a string
 * value.
 */
export class RawJson {
  constructor(readonly text: string) {}

  /** Wrap UTF-8 encoded JSON bytes. */
  static fromBytes(bytes: Uint8Array): RawJson {
    return new RawJson(textDecoder.decode(bytes));
  }

  toJSON(): unknown {
    return JSON.parse(this.text);
  }
}

/** Shorthand for `new RawJson(text)`. */
export function rawJson(text: string): RawJson {
  return new RawJson(text);
}
