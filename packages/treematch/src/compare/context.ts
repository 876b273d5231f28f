import type { PathSegment } from "../path/paths.js";
import type { Mismatch, ResolvedContainsOptions } from "./types.js";

type Reason = string | (() => string);

/**
 * State threaded through one comparison: options, the current path, and the
 * first mismatch (when recording).
 */
export class MatchContext {
  readonly path: PathSegment[] = [];
  mismatch: Mismatch | undefined;
  private silentContext: MatchContext | undefined;

  constructor(
    readonly opts: ResolvedContainsOptions,
    readonly equivalence: boolean,
    readonly recording: boolean,
  ) {}

  /** Record the mismatch (first one wins) and return `false`. */
  fail(v1: unknown, v2: unknown, reason: Reason): false {
    if (this.recording && this.mismatch === undefined) {
      this.mismatch = {
        path: [...this.path],
        v1,
        v2,
        message: typeof reason === "string" ? reason : reason(),
      };
    }
    return false;
  }

  /** A context that records nothing, for existential searches. */
  silent(): MatchContext {
    if (!this.recording) return this;
    this.silentContext ??= new MatchContext(this.opts, this.equivalence, false);
    return this.silentContext;
  }

  /** Run `fn` one level deeper. */
  at<T>(segment: PathSegment, fn: () => T): T {
    this.path.push(segment);
    try {
      return fn();
    } finally {
      this.path.pop();
    }
  }
}
