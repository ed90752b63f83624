/**
 * @lumberline/core - Dispatch Records
 *
 * The tagged union passed down the subscriber chain. Events and the two
 * span transitions share one type so that stages handle them uniformly.
 *
 * @module domain/records/DispatchRecord
 */

import type { Timestamp } from '../metadata/clock';
import type { FieldSet } from '../metadata/fields';
import type { Metadata } from '../metadata/Metadata';
import type { SpanId } from '../spans/SpanId';

/**
 * A point-in-time record attributed to the enclosing span, if any.
 */
export interface EventRecord {
  readonly kind: 'event';
  readonly metadata: Metadata;
  readonly parentId?: SpanId;
  readonly fields: FieldSet;
  readonly timestamp: Timestamp;
}

/**
 * Emitted when a span is entered.
 */
export interface SpanOpenedRecord {
  readonly kind: 'span.opened';
  readonly spanId: SpanId;
  readonly metadata: Metadata;
  readonly parentId?: SpanId;
  readonly fields: FieldSet;
  readonly timestamp: Timestamp;
}

/**
 * Emitted when a span exits. Carries the span's final field set.
 */
export interface SpanClosedRecord {
  readonly kind: 'span.closed';
  readonly spanId: SpanId;
  readonly metadata: Metadata;
  readonly parentId?: SpanId;
  readonly fields: FieldSet;
  readonly startTime: Timestamp;
  readonly timestamp: Timestamp;
  /** Monotonic duration in milliseconds */
  readonly durationMs: number;
}

/**
 * Any record flowing through dispatch.
 */
export type DispatchRecord = EventRecord | SpanOpenedRecord | SpanClosedRecord;

/**
 * Discriminant values of {@link DispatchRecord}.
 */
export type DispatchRecordKind = DispatchRecord['kind'];

/**
 * Type guard for span transition records.
 */
export function isSpanRecord(
  record: DispatchRecord,
): record is SpanOpenedRecord | SpanClosedRecord {
  return record.kind !== 'event';
}
