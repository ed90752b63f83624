/**
 * @lumberline/core - Span Identifiers
 *
 * @module domain/spans/SpanId
 */

/**
 * Opaque span identifier. Strictly increasing within an allocator.
 */
export type SpanId = number;

/**
 * Issues span identifiers.
 *
 * Node.js runs producers on a single event loop, so a plain counter is
 * already race-free: `next()` is never interleaved with another call.
 */
export class SpanIdAllocator {
  private last = 0;

  /**
   * Allocate the next identifier. The first one is `1`.
   */
  next(): SpanId {
    this.last += 1;
    return this.last;
  }

  /**
   * Most recently issued identifier, `0` if none was issued.
   */
  get lastIssued(): SpanId {
    return this.last;
  }
}

/**
 * Process-wide allocator used when a registry is not given its own.
 */
export const globalSpanIds = new SpanIdAllocator();
