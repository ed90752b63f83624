/**
 * @fileoverview Subscriber Chain - ordered record dispatch
 *
 * @packageDocumentation
 * @module @lumberline/core/application/dispatch
 *
 * ## Chain of Responsibility
 *
 * Every finished record travels through the registered stages in
 * registration order. Inside one stage the capabilities run as
 * filter → enrich → format → export:
 *
 * ```
 * record ─▶ [level filter] ─▶ [enricher] ─▶ [formatter + exporter] ─▶ queue
 *                │
 *                └─ false: chain ends, nothing after it sees the record
 * ```
 *
 * Filtering, enriching and formatting run synchronously within the
 * emitting call. Export is a hand-off: the chain starts it and the returned
 * promise settles once every exporter accepted or dropped the record.
 *
 * ## Failure containment
 *
 * A throwing stage drops the record and is reported to the diagnostic
 * sink. `dispatch()` itself never throws and its promise never rejects,
 * so instrumented code cannot be broken by a faulty stage.
 */

import {
  DispatchStageFailureException,
  SpanStateViolationException,
} from '../../domain/exceptions/exceptions';
import type { DispatchRecord } from '../../domain/records/DispatchRecord';
import type { SpanId } from '../../domain/spans/SpanId';
import { reportDiagnostic } from '../diagnostics/DiagnosticSink';
import { TelemetryCounters } from '../diagnostics/TelemetryCounters';
import type {
  IFormatCapability,
  ISubscriberStage,
  RenderedRecord,
  StageCapability,
} from './ISubscriberStage';

/**
 * Chain construction options.
 */
export interface SubscriberChainOptions {
  /**
   * Formatter used when an export stage is reached before any stage
   * has formatted the record.
   */
  defaultFormatter: IFormatCapability;

  /** Counters to update; a private set is created when omitted */
  counters?: TelemetryCounters;
}

/**
 * Per-span state as observed by dispatch.
 * `Unopened` is represented by absence from the map and `Closed` is
 * terminal, so closed spans are removed as well.
 */
type ObservedSpanState = 'open';

/**
 * SubscriberChain - routes records through an ordered list of stages.
 *
 * @example
 * ```typescript
 * const chain = new SubscriberChain(
 *   [levelFilter(Level.Info), exporter],
 *   { defaultFormatter: new TextFormatter() },
 * );
 *
 * await chain.dispatch(builder.event(site, fields));
 * ```
 */
export class SubscriberChain {
  private readonly stages: readonly ISubscriberStage[];
  private readonly defaultFormatter: IFormatCapability;
  private readonly spanStates = new Map<SpanId, ObservedSpanState>();
  readonly counters: TelemetryCounters;

  constructor(
    stages: readonly ISubscriberStage[],
    options: SubscriberChainOptions,
  ) {
    this.stages = Object.freeze([...stages]);
    this.defaultFormatter = options.defaultFormatter;
    this.counters = options.counters ?? new TelemetryCounters();
  }

  /**
   * Dispatch a record.
   *
   * @returns Promise that settles when every export hand-off settled.
   *   It never rejects.
   */
  dispatch(record: DispatchRecord): Promise<void> {
    this.counters.recordEmitted();

    if (!this.observeSpanTransition(record)) {
      return Promise.resolve();
    }

    let current = record;
    let rendered: RenderedRecord | undefined;
    const handoffs: Promise<void>[] = [];

    for (const stage of this.stages) {
      if (stage.filter) {
        const keep = this.runStage(stage, 'filter', () =>
          stage.filter?.(current),
        );
        if (keep === undefined) return settle(handoffs);
        if (!keep) {
          this.counters.recordDropped('filtered');
          return settle(handoffs);
        }
      }

      if (stage.enrich) {
        const enriched = this.runStage(stage, 'enrich', () =>
          stage.enrich?.(current),
        );
        if (enriched === undefined) return settle(handoffs);
        current = enriched;
        // an enrich invalidates anything formatted from the previous record
        rendered = undefined;
      }

      if (stage.format) {
        const text = this.runStage(stage, 'format', () =>
          stage.format?.(current),
        );
        if (text === undefined) return settle(handoffs);
        rendered = render(current, text);
      }

      if (stage.export) {
        if (!rendered) {
          const formatter = this.defaultFormatter;
          const text = this.runStage(stage, 'format', () =>
            formatter.format(current),
          );
          if (text === undefined) return settle(handoffs);
          rendered = render(current, text);
        }
        handoffs.push(this.handOff(stage, rendered));
      }
    }

    return settle(handoffs);
  }

  /**
   * Number of spans dispatch currently considers open.
   */
  get openSpanCount(): number {
    return this.spanStates.size;
  }

  /**
   * Stages in dispatch order.
   */
  getStages(): readonly ISubscriberStage[] {
    return this.stages;
  }

  // ==================== Internals ====================

  /**
   * Apply the span state machine `Unopened → Open → Closed`.
   *
   * @returns False if the record violates it and must be dropped
   */
  private observeSpanTransition(record: DispatchRecord): boolean {
    if (record.kind === 'span.opened') {
      if (this.spanStates.has(record.spanId)) {
        reportDiagnostic(
          new SpanStateViolationException(
            record.spanId,
            `Span ${record.spanId} opened twice`,
          ),
        );
        return false;
      }
      this.spanStates.set(record.spanId, 'open');
      return true;
    }

    if (record.kind === 'span.closed') {
      if (!this.spanStates.delete(record.spanId)) {
        reportDiagnostic(
          new SpanStateViolationException(
            record.spanId,
            `Span ${record.spanId} closed but not open`,
          ),
        );
        return false;
      }
    }

    return true;
  }

  /**
   * Run one capability, containing any exception it throws.
   *
   * @returns The capability's result, or undefined if it threw
   */
  private runStage<R>(
    stage: ISubscriberStage,
    capability: StageCapability,
    fn: () => R | undefined,
  ): R | undefined {
    try {
      return fn();
    } catch (error) {
      reportDiagnostic(
        new DispatchStageFailureException(stage.name, capability, error),
      );
      return undefined;
    }
  }

  private handOff(
    stage: ISubscriberStage,
    rendered: RenderedRecord,
  ): Promise<void> {
    let pending: Promise<void>;
    try {
      pending = stage.export ? stage.export(rendered) : Promise.resolve();
    } catch (error) {
      pending = Promise.reject(error);
    }

    return pending.catch((error: unknown) => {
      reportDiagnostic(
        new DispatchStageFailureException(stage.name, 'export', error),
      );
    });
  }
}

function render(record: DispatchRecord, text: string): RenderedRecord {
  return Object.freeze({
    text,
    level: record.metadata.level,
    kind: record.kind,
  });
}

function settle(handoffs: Promise<void>[]): Promise<void> {
  if (handoffs.length === 0) {
    return Promise.resolve();
  }
  return Promise.all(handoffs).then(() => undefined);
}
