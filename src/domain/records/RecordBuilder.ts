/**
 * @lumberline/core - Record Builder
 *
 * @module domain/records/RecordBuilder
 */

import { ContextStack } from '../context/ContextStack';
import type { IContextStack } from '../context/IContextStack';
import { systemClock, type Clock } from '../metadata/clock';
import type { FieldSet } from '../metadata/fields';
import type { Metadata } from '../metadata/Metadata';
import type { SpanRecord } from '../spans/SpanRegistry';
import type {
  EventRecord,
  SpanClosedRecord,
  SpanOpenedRecord,
} from './DispatchRecord';

/**
 * Assembles immutable dispatch records.
 *
 * Building only reads the context stack and the clock: it is synchronous,
 * performs no I/O and has no other side effect.
 */
export class RecordBuilder {
  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Build an event attributed to the top of `stack`.
   */
  event(
    metadata: Metadata,
    fields: FieldSet,
    stack: IContextStack = ContextStack.current(),
  ): EventRecord {
    const parentId = stack.current();
    return Object.freeze({
      kind: 'event' as const,
      metadata,
      ...(parentId !== undefined && { parentId }),
      fields,
      timestamp: this.clock.now(),
    });
  }

  /**
   * Build the record announcing that `span` was entered.
   */
  spanOpened(span: SpanRecord): SpanOpenedRecord {
    return Object.freeze({
      kind: 'span.opened' as const,
      spanId: span.id,
      metadata: span.metadata,
      ...(span.parentId !== undefined && { parentId: span.parentId }),
      fields: span.fields,
      timestamp: span.startTime,
    });
  }

  /**
   * Build the record announcing that `span` exited.
   *
   * A span without an end time (still open) is stamped with the current
   * time.
   */
  spanClosed(span: SpanRecord): SpanClosedRecord {
    const end = span.endTime ?? this.clock.now();
    return Object.freeze({
      kind: 'span.closed' as const,
      spanId: span.id,
      metadata: span.metadata,
      ...(span.parentId !== undefined && { parentId: span.parentId }),
      fields: span.fields,
      startTime: span.startTime,
      timestamp: end,
      durationMs: Math.max(0, end.monotonicMs - span.startTime.monotonicMs),
    });
  }
}
