// ============================================================================
// @structpack/core — Coding Path Tracker
// ============================================================================
//
// Records where in the value tree the current operation is nested. A segment
// is pushed before recursive work and popped only when that work returns
// normally, so a segment left on the stack marks a branch that failed.
// ============================================================================

/** Marker segment for a super-type link that was opened without a key. */
export const SUPER: unique symbol = Symbol('super');

/** One step of a coding path: a mapping key, a sequence index, or the super marker. */
export type PathSegment = string | number | typeof SUPER;

/**
 * Render a path the way error messages print it.
 *
 * @example
 * ```ts
 * formatPath(['employees', 2, SUPER]); // → '$.employees[2].super'
 * ```
 */
export function formatPath(segments: readonly PathSegment[]): string {
  let out = '$';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else if (segment === SUPER) {
      out += '.super';
    } else {
      out += `.${segment}`;
    }
  }
  return out;
}

/**
 * Mutable stack of path segments owned by one encoder node.
 *
 * `base` is the full path of the encoder this one was detached from. It only
 * feeds diagnostics and depth accounting; failure detection looks at the
 * segments pushed on this tracker.
 */
export class CodingPath {
  private readonly base: readonly PathSegment[];
  private readonly own: PathSegment[] = [];

  constructor(base: readonly PathSegment[] = [], seed?: PathSegment) {
    this.base = base;
    if (seed !== undefined) this.own.push(seed);
  }

  /** Full path from the root of the encode call. */
  get segments(): PathSegment[] {
    return [...this.base, ...this.own];
  }

  /** Length of the full path. */
  get depth(): number {
    return this.base.length + this.own.length;
  }

  /** Number of segments pushed on this tracker (including a seed). */
  get ownDepth(): number {
    return this.own.length;
  }

  /** Full path with one more segment appended, without pushing it. */
  extended(segment: PathSegment): PathSegment[] {
    return [...this.base, ...this.own, segment];
  }

  /**
   * Run `work` with `segment` pushed. The segment is popped only if `work`
   * returns; a thrown error leaves it in place.
   */
  withPushed<T>(segment: PathSegment, work: () => T): T {
    this.own.push(segment);
    const result = work();
    this.own.pop();
    return result;
  }

  toString(): string {
    return formatPath(this.segments);
  }
}
