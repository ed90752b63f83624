/**
 * @fileoverview Telemetry - the instrumentation facade
 *
 * @packageDocumentation
 * @module @lumberline/core/application/telemetry
 *
 * ## Overview
 *
 * `Telemetry` wires the core components together and is what instrumented
 * code talks to:
 *
 * ```
 * telemetry.info() ──┐
 * openSpan()/close() ┼─▶ RecordBuilder ─▶ SubscriberChain ─▶ BufferedExporter ─▶ ISink
 *                    │        ▲                 │
 *                    │   ContextStack      level filter (always first)
 *                    └─ SpanRegistry
 * ```
 *
 * Emitting is synchronous up to the export hand-off. The returned promises
 * of dispatch are tracked, so `flush()` and `shutdown()` can wait for
 * records that are still on their way to the exporter.
 *
 * Emitting never waits. Under the `block` overflow policy a producer that
 * must not lose records awaits `ready()` before emitting; records offered
 * while `queueCapacity` producers are already parked are dropped as
 * overflow.
 *
 * ## Usage
 *
 * ```typescript
 * const telemetry = createTelemetry({ minLevel: 'debug' }, { target: 'api' });
 *
 * await telemetry.withSpan('handle-request', async (span) => {
 *   telemetry.info('loading user', { userId: 42 });
 *   span.addField('status', 200);
 * });
 *
 * await telemetry.shutdown();
 * ```
 */

import { ContextStack } from '../../domain/context/ContextStack';
import { systemClock, type Clock } from '../../domain/metadata/clock';
import { createFieldSet, type FieldInput } from '../../domain/metadata/fields';
import {
  Level,
  isLevelEnabled,
  type RecordLevel,
} from '../../domain/metadata/Level';
import type { Metadata } from '../../domain/metadata/Metadata';
import type { DispatchRecord } from '../../domain/records/DispatchRecord';
import { RecordBuilder } from '../../domain/records/RecordBuilder';
import type { SpanId, SpanIdAllocator } from '../../domain/spans/SpanId';
import { SpanRegistry, type SpanRecord } from '../../domain/spans/SpanRegistry';
import { CallsiteCache } from '../../infrastructure/cache/CallsiteCache';
import {
  resolveConfig,
  type TelemetryConfig,
  type TelemetryConfigInput,
} from '../../infrastructure/config/TelemetryConfig';
import { BufferedExporter } from '../../infrastructure/exporter/BufferedExporter';
import { settlesWithin } from '../../infrastructure/exporter/RetryPolicy';
import { TextFormatter } from '../../infrastructure/formatting/TextFormatter';
import { ConsoleSink } from '../../infrastructure/sinks/ConsoleSink';
import type { ISink } from '../../infrastructure/sinks/ISink';
import { reportDiagnostic } from '../diagnostics/DiagnosticSink';
import { consoleLogger, type ILogger } from '../diagnostics/logger';
import { TelemetryCounters } from '../diagnostics/TelemetryCounters';
import type {
  IFormatCapability,
  ISubscriberStage,
} from '../dispatch/ISubscriberStage';
import { levelFilter } from '../dispatch/stages';
import type { SubscriberChain } from '../dispatch/SubscriberChain';
import { createSubscriberChain } from '../dispatch/SubscriberChainBuilder';
import { SpanHandle, type SpanOwner } from './SpanHandle';

/**
 * Collaborators of a telemetry instance.
 */
export interface TelemetryOptions {
  /** Destination of exported batches. @defaultValue ConsoleSink */
  sink?: ISink;

  /** Stages run after the level filter and before the exporter */
  stages?: readonly ISubscriberStage[];

  /** Formatter for records no stage formatted. @defaultValue TextFormatter */
  formatter?: IFormatCapability;

  clock?: Clock;

  /** Logger for the core's own messages. @defaultValue consoleLogger */
  logger?: ILogger;

  /** Target of records that name none. @defaultValue 'app' */
  target?: string;

  /** Span id source. @defaultValue the process-wide allocator */
  spanIds?: SpanIdAllocator;

  /** Number of call sites kept interned. @defaultValue 1000 */
  callsiteCapacity?: number;
}

/**
 * Call-site information of a single emission.
 */
export interface EmitOptions {
  target?: string;
  file?: string;
  line?: number;
}

/**
 * Options of {@link Telemetry.openSpan}.
 */
export interface SpanOptions extends EmitOptions {
  /** @defaultValue Level.Info */
  level?: RecordLevel;
}

/**
 * Telemetry - events, spans and their pipeline.
 */
export class Telemetry implements SpanOwner {
  readonly config: TelemetryConfig;
  readonly counters: TelemetryCounters;

  private readonly registry: SpanRegistry;
  private readonly builder: RecordBuilder;
  private readonly chain: SubscriberChain;
  private readonly exporter: BufferedExporter;
  private readonly sites: CallsiteCache;
  private readonly defaultTarget: string;
  private readonly inFlight = new Set<Promise<void>>();
  private threshold: Level;

  constructor(config: TelemetryConfig, options: TelemetryOptions = {}) {
    const clock = options.clock ?? systemClock;
    const logger = options.logger ?? consoleLogger;

    this.config = config;
    this.threshold = config.minLevel;
    this.defaultTarget = options.target ?? 'app';
    this.counters = new TelemetryCounters();
    this.sites = new CallsiteCache(options.callsiteCapacity);
    this.builder = new RecordBuilder(clock);
    this.registry = new SpanRegistry({ ids: options.spanIds, clock });

    this.exporter = new BufferedExporter(options.sink ?? new ConsoleSink(), {
      ...config,
      counters: this.counters,
      logger,
    });

    const builder = createSubscriberChain().use(
      levelFilter({ get: () => this.threshold }),
    );
    for (const stage of options.stages ?? []) {
      builder.use(stage);
    }
    this.chain = builder.use(this.exporter).compose({
      defaultFormatter: options.formatter ?? new TextFormatter(),
      counters: this.counters,
    });

    this.exporter.start().catch(reportDiagnostic);
  }

  // ==================== Events ====================

  trace(message: string, fields?: FieldInput, options?: EmitOptions): void {
    this.event(Level.Trace, message, fields, options);
  }

  debug(message: string, fields?: FieldInput, options?: EmitOptions): void {
    this.event(Level.Debug, message, fields, options);
  }

  info(message: string, fields?: FieldInput, options?: EmitOptions): void {
    this.event(Level.Info, message, fields, options);
  }

  warn(message: string, fields?: FieldInput, options?: EmitOptions): void {
    this.event(Level.Warn, message, fields, options);
  }

  error(message: string, fields?: FieldInput, options?: EmitOptions): void {
    this.event(Level.Error, message, fields, options);
  }

  /**
   * Emit an event attributed to the current span.
   */
  event(
    level: RecordLevel,
    name: string,
    fields?: FieldInput,
    options?: EmitOptions,
  ): void {
    const site = this.site(level, name, options);
    this.dispatch(this.builder.event(site, createFieldSet(fields)));
  }

  /**
   * Whether records of `level` currently pass the level filter.
   */
  enabled(level: RecordLevel): boolean {
    return isLevelEnabled(level, this.threshold);
  }

  get minLevel(): Level {
    return this.threshold;
  }

  /**
   * Change the minimum level at run time. `Level.Off` silences everything.
   */
  setMinLevel(level: Level): void {
    this.threshold = level;
  }

  // ==================== Spans ====================

  /**
   * Open a span as a child of the current span and make it current.
   *
   * The span must be closed from the same execution context.
   */
  openSpan(name: string, fields?: FieldInput, options?: SpanOptions): SpanHandle {
    const site = this.site(options?.level ?? Level.Info, name, options);
    const span = this.registry.open(site, createFieldSet(fields));
    this.dispatch(this.builder.spanOpened(span));
    return new SpanHandle(span.id, name, this);
  }

  /**
   * Run `fn` inside a new span on a forked context stack.
   *
   * The span is closed when `fn` settles, whether it returns or throws.
   * Concurrent `withSpan` calls never see each other's spans.
   */
  withSpan<R>(
    name: string,
    fn: (span: SpanHandle) => R | Promise<R>,
    fields?: FieldInput,
    options?: SpanOptions,
  ): Promise<R> {
    return ContextStack.fork(async (): Promise<R> => {
      const span = this.openSpan(name, fields, options);
      let result: R;
      try {
        result = await fn(span);
      } catch (error) {
        // keep the callback's error; a failed close only gets reported
        try {
          if (span.isOpen) span.close();
        } catch (closeError) {
          reportDiagnostic(closeError);
        }
        throw error;
      }
      if (span.isOpen) {
        span.close();
      }
      return result;
    });
  }

  /**
   * Run `fn` as a separate task: it starts with the caller's current span
   * as parent but gets its own context stack.
   */
  task<R>(fn: () => R): R {
    return ContextStack.fork(fn);
  }

  addSpanField(id: SpanId, key: string, value: unknown): void {
    this.registry.addField(id, key, value);
  }

  closeSpan(id: SpanId): SpanRecord {
    const closed = this.registry.close(id);
    const record = this.builder.spanClosed(closed);
    this.track(
      this.chain.dispatch(record).then(() => {
        this.registry.reclaim(id);
      }),
    );
    return closed;
  }

  spanState(id: SpanId): SpanRecord['state'] | undefined {
    return this.registry.get(id)?.state;
  }

  /**
   * Number of spans not yet closed.
   */
  get openSpans(): number {
    return this.registry.openCount;
  }

  // ==================== Lifecycle ====================

  /**
   * Wait until every record emitted so far was handed to the sink, for at
   * most `shutdownTimeoutMs`.
   *
   * @returns False if the time ran out first
   */
  flush(): Promise<boolean> {
    const flushed = this.settleInFlight().then(() => this.exporter.flush());
    return settlesWithin(flushed, this.config.shutdownTimeoutMs);
  }

  /**
   * Drain and stop the pipeline within `shutdownTimeoutMs`. Records
   * emitted afterwards are dropped and counted under `shutdown`.
   */
  async shutdown(): Promise<void> {
    // offers happen at emit time, so everything emitted is queued or parked
    await this.exporter.shutdown();
    await this.settleInFlight();
  }

  /**
   * Resolve once the exporter can take a record without parking or
   * dropping it, or once it is shut down.
   *
   * @example
   * ```typescript
   * for (const row of rows) {
   *   await telemetry.ready();
   *   telemetry.info('imported', { id: row.id });
   * }
   * ```
   */
  ready(): Promise<void> {
    return this.exporter.ready();
  }

  /**
   * Producers parked on a full queue under `block`.
   */
  get waitingProducers(): number {
    return this.exporter.waitingProducers;
  }

  /**
   * Records currently buffered by the exporter, oldest first.
   */
  pending(): string[] {
    return this.exporter.pending().map((rendered) => rendered.text);
  }

  // ==================== Internals ====================

  private site(level: RecordLevel, name: string, options?: EmitOptions): Metadata {
    return this.sites.intern({
      level,
      name,
      target: options?.target ?? this.defaultTarget,
      file: options?.file,
      line: options?.line,
    });
  }

  private dispatch(record: DispatchRecord): void {
    this.track(this.chain.dispatch(record));
  }

  private track(pending: Promise<void>): void {
    this.inFlight.add(pending);
    void pending
      .catch(reportDiagnostic)
      .finally(() => this.inFlight.delete(pending));
  }

  private async settleInFlight(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }
}

/**
 * Create a telemetry instance from (partial) configuration.
 *
 * @throws ConfigValidationException when `config` is invalid
 *
 * @example
 * ```typescript
 * const telemetry = createTelemetry(loadConfigFromEnv(), {
 *   sink: new FileSink('/var/log/api.log'),
 *   stages: [staticFieldsEnricher({ service: 'api' })],
 * });
 * ```
 */
export function createTelemetry(
  config: TelemetryConfigInput = {},
  options: TelemetryOptions = {},
): Telemetry {
  return new Telemetry(resolveConfig(config), options);
}
