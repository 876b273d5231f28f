export type PathErrorKind = "notFound" | "notMap" | "notSequence" | "indexOutOfBounds";

/** Base class for {@link get} failures; branch on `kind` or `instanceof`. */
export abstract class PathError extends Error {
  abstract readonly kind: PathErrorKind;
}

export class PathNotFoundError extends PathError {
  override name = "PathNotFoundError";
  readonly kind = "notFound";
}

export class PathNotMapError extends PathError {
  override name = "PathNotMapError";
  readonly kind = "notMap";
}

export class PathNotSequenceError extends PathError {
  override name = "PathNotSequenceError";
  readonly kind = "notSequence";
}

export class IndexOutOfBoundsError extends PathError {
  override name = "IndexOutOfBoundsError";
  readonly kind = "indexOutOfBounds";
}
