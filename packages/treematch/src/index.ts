export type { CanonicalArray, CanonicalObject, CanonicalValue, ValueKind } from "./value/types.js";
export { isCanonicalObject, kindOf, zeroValueOf } from "./value/types.js";
export { TimeValue } from "./value/timeValue.js";
export type { DurationInput } from "./value/duration.js";
export { DurationParseError, formatDuration, parseDuration } from "./value/duration.js";

export type { CanonicalNormalizeOptions, NormalizeOptions, NormalizeResult } from "./normalize/types.js";
export { NormalizeError } from "./normalize/errors.js";
export { RawJson, rawJson } from "./normalize/rawJson.js";
export { normalize, tryNormalize } from "./normalize/normalize.js";

export type { ContainsOptions, Match, ResolvedContainsOptions, TraceSink } from "./compare/types.js";
export { resolveContainsOptions } from "./compare/options.js";
export { contains, containsMatch, equivalent, equivalentMatch } from "./compare/compare.js";

export { deepEqual } from "./merge/deepEqual.js";
export { merge } from "./merge/merge.js";
export type { TransformFn } from "./merge/transform.js";
export { STOP, transform } from "./merge/transform.js";
export { conflicts, conflictsMatch } from "./merge/conflicts.js";

export type { PathSegment } from "./path/paths.js";
export { formatPath, parsePath, PathSyntaxError } from "./path/paths.js";
export type { PathErrorKind } from "./path/errors.js";
export {
  IndexOutOfBoundsError,
  PathError,
  PathNotFoundError,
  PathNotMapError,
  PathNotSequenceError,
} from "./path/errors.js";
export { get, lookup } from "./path/get.js";

export { isEmpty } from "./util/isEmpty.js";
export { keys } from "./util/keys.js";
export { safeStringify } from "./util/safeStringify.js";
