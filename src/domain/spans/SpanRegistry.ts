/**
 * @lumberline/core - Span Registry
 *
 * Owns span lifecycle state. Spans form a forest: each entry stores its
 * parent's identifier only, and the registry is the lookup table that
 * resolves identifiers to entries.
 *
 * @module domain/spans/SpanRegistry
 */

import { ContextStack } from '../context/ContextStack';
import type { IContextStack } from '../context/IContextStack';
import { SpanNotOpenException } from '../exceptions/exceptions';
import { systemClock, type Clock, type Timestamp } from '../metadata/clock';
import { appendField, type FieldSet } from '../metadata/fields';
import type { Metadata } from '../metadata/Metadata';
import { globalSpanIds, type SpanId, type SpanIdAllocator } from './SpanId';

/**
 * Lifecycle state of a span entry.
 */
export type SpanState = 'open' | 'closed';

/**
 * Read-only view of a span.
 */
export interface SpanRecord {
  readonly id: SpanId;
  readonly metadata: Metadata;
  readonly parentId?: SpanId;
  readonly fields: FieldSet;
  readonly startTime: Timestamp;
  readonly endTime?: Timestamp;
  readonly state: SpanState;
}

/**
 * Registry construction options.
 */
export interface SpanRegistryOptions {
  /** Identifier source; defaults to the process-wide allocator */
  ids?: SpanIdAllocator;

  /** Timestamp source; defaults to the system clock */
  clock?: Clock;
}

interface SpanEntry {
  readonly id: SpanId;
  readonly metadata: Metadata;
  readonly parentId?: SpanId;
  readonly startTime: Timestamp;
  fields: FieldSet;
  endTime?: Timestamp;
  state: SpanState;
}

/**
 * SpanRegistry - open/close bookkeeping keyed by span id.
 *
 * @remarks
 * Entries stay in the registry after closing, read-only, until
 * {@link SpanRegistry.reclaim} is called once every subscriber has observed
 * the close. Closing is first-wins: a second close of the same id fails
 * with `SpanNotOpenException` no matter which context issues it.
 *
 * @example
 * ```typescript
 * const registry = new SpanRegistry();
 * const request = registry.open(requestSite, EMPTY_FIELDS);
 * const query = registry.open(querySite, EMPTY_FIELDS);
 * query.parentId === request.id; // true
 *
 * registry.close(query.id);
 * registry.close(request.id);
 * ```
 */
export class SpanRegistry {
  private readonly spans = new Map<SpanId, SpanEntry>();
  private readonly ids: SpanIdAllocator;
  private readonly clock: Clock;

  constructor(options: SpanRegistryOptions = {}) {
    this.ids = options.ids ?? globalSpanIds;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Open a span and enter it on `stack`, or on the current execution
   * context when no stack is given.
   *
   * The parent is the top of the stack at the time of the call, which is
   * necessarily an already-open span, so the parent relation can never
   * form a cycle.
   */
  open(metadata: Metadata, fields: FieldSet, stack?: IContextStack): SpanRecord {
    const parentId = (stack ?? ContextStack.current()).current();
    const entry: SpanEntry = {
      id: this.ids.next(),
      metadata,
      ...(parentId !== undefined && { parentId }),
      startTime: this.clock.now(),
      fields,
      state: 'open',
    };

    if (stack) {
      stack.enter(entry.id);
    } else {
      ContextStack.push(entry.id);
    }
    this.spans.set(entry.id, entry);
    return toRecord(entry);
  }

  /**
   * Append a field to an open span.
   *
   * @throws SpanNotOpenException if the span is closed or unknown
   */
  addField(id: SpanId, key: string, value: unknown): SpanRecord {
    const entry = this.spans.get(id);
    if (!entry || entry.state !== 'open') {
      throw new SpanNotOpenException(id, 'addField');
    }
    entry.fields = appendField(entry.fields, key, value);
    return toRecord(entry);
  }

  /**
   * Close a span and pop it from `stack` (by default the current
   * execution context's).
   *
   * @throws SpanNotOpenException if the span is already closed or unknown
   * @throws ContextMismatchException if the span is not the top of `stack`;
   *   the span stays open and the stack is unchanged
   */
  close(id: SpanId, stack?: IContextStack): SpanRecord {
    const entry = this.spans.get(id);
    if (!entry || entry.state !== 'open') {
      throw new SpanNotOpenException(id, 'close');
    }

    if (stack) {
      stack.exit(id);
    } else {
      ContextStack.pop(id);
    }
    entry.state = 'closed';
    entry.endTime = this.clock.now();
    return toRecord(entry);
  }

  /**
   * Look up a span.
   */
  get(id: SpanId): SpanRecord | undefined {
    const entry = this.spans.get(id);
    return entry ? toRecord(entry) : undefined;
  }

  /**
   * Drop a closed entry.
   *
   * @returns True if the entry was closed and has been removed
   */
  reclaim(id: SpanId): boolean {
    const entry = this.spans.get(id);
    if (!entry || entry.state !== 'closed') {
      return false;
    }
    return this.spans.delete(id);
  }

  /**
   * Number of entries held, open or awaiting reclamation.
   */
  get size(): number {
    return this.spans.size;
  }

  /**
   * Number of open spans.
   */
  get openCount(): number {
    let count = 0;
    for (const entry of this.spans.values()) {
      if (entry.state === 'open') count++;
    }
    return count;
  }
}

function toRecord(entry: SpanEntry): SpanRecord {
  return Object.freeze({
    id: entry.id,
    metadata: entry.metadata,
    ...(entry.parentId !== undefined && { parentId: entry.parentId }),
    fields: entry.fields,
    startTime: entry.startTime,
    ...(entry.endTime !== undefined && { endTime: entry.endTime }),
    state: entry.state,
  });
}
