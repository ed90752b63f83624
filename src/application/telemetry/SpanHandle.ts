/**
 * @lumberline/core - Span Handle
 */

import type { SpanId } from '../../domain/spans/SpanId';
import type { SpanRecord } from '../../domain/spans/SpanRegistry';

/**
 * Operations a span handle delegates to its owner.
 */
export interface SpanOwner {
  addSpanField(id: SpanId, key: string, value: unknown): void;
  closeSpan(id: SpanId): SpanRecord;
  spanState(id: SpanId): SpanRecord['state'] | undefined;
}

/**
 * SpanHandle - caller-side reference to an open span.
 *
 * @example
 * ```typescript
 * const span = telemetry.openSpan('load-user', { userId });
 * try {
 *   const user = await repo.find(userId);
 *   span.addField('found', user !== undefined);
 * } finally {
 *   span.close();
 * }
 * ```
 */
export class SpanHandle {
  constructor(
    readonly id: SpanId,
    readonly name: string,
    private readonly owner: SpanOwner,
  ) {}

  /**
   * Attach a field to the span.
   *
   * @throws SpanNotOpenException once the span is closed
   */
  addField(key: string, value: unknown): this {
    this.owner.addSpanField(this.id, key, value);
    return this;
  }

  /**
   * Close the span. Must be called from the context that has the span on
   * top of its stack.
   *
   * @throws SpanNotOpenException if already closed
   * @throws ContextMismatchException if the span is not the current span
   */
  close(): SpanRecord {
    return this.owner.closeSpan(this.id);
  }

  get isOpen(): boolean {
    return this.owner.spanState(this.id) === 'open';
  }
}
