/**
 * @fileoverview Buffered Exporter - decouples dispatch from sink latency
 *
 * @packageDocumentation
 * @module @lumberline/core/infrastructure/exporter
 *
 * ## Data flow
 *
 * ```
 * dispatch ─▶ export() ─▶ BoundedQueue ─▶ drain loop ─▶ RetryPolicy ─▶ sink.write(batch)
 *   (many producers)       (capacity N)    (one consumer)
 * ```
 *
 * Producers only ever wait at the queue boundary, and only under the
 * `block` overflow policy. The drain loop is the single owner of sink I/O:
 * it takes records in FIFO order, groups them into batches of up to
 * `batchSize` records (or whatever arrived within `batchWindowMs` of the
 * first one), and hands each batch to the sink.
 *
 * ## Failure handling
 *
 * A rejected write is retried with capped exponential backoff. A batch that
 * still fails is dropped, counted under `exportFailure` and reported to the
 * diagnostic sink. Nothing here throws into application code.
 *
 * ## Shutdown
 *
 * `shutdown()` stops accepting records, drains what is queued (parked
 * `block` producers included), flushes the sink and stops the loop. It is
 * bounded by `shutdownTimeoutMs`; records still queued when it expires are
 * discarded and counted under `shutdown`.
 */

import {
  ExportFailureException,
  QueueClosedException,
  QueueOverflowException,
} from '../../domain/exceptions/exceptions';
import { reportDiagnostic } from '../../application/diagnostics/DiagnosticSink';
import { TelemetryCounters } from '../../application/diagnostics/TelemetryCounters';
import type { ILogger } from '../../application/diagnostics/logger';
import { BackgroundServiceBase } from '../../application/host/BackgroundService';
import type {
  ISubscriberStage,
  RenderedRecord,
} from '../../application/dispatch/ISubscriberStage';
import type { ISink } from '../sinks/ISink';
import { BoundedQueue, type OverflowPolicy } from './BoundedQueue';
import { RetryPolicy, settlesWithin, sleep } from './RetryPolicy';

/**
 * Buffered exporter options.
 */
export interface BufferedExporterOptions {
  /** @defaultValue 1024 */
  queueCapacity?: number;

  /** @defaultValue 'dropNewest' */
  overflowPolicy?: OverflowPolicy;

  /**
   * Producers that may wait on a full queue under `block`; records offered
   * beyond that are dropped as overflow. @defaultValue queueCapacity
   */
  maxWaitingProducers?: number;

  /** Maximum records per sink write. @defaultValue 64 */
  batchSize?: number;

  /** Longest wait for a batch to fill, in milliseconds. @defaultValue 100 */
  batchWindowMs?: number;

  /** Retries after the first failed write. @defaultValue 3 */
  retryAttempts?: number;

  /** @defaultValue 50 */
  retryBackoffMs?: number;

  /** @defaultValue 2000 */
  retryBackoffMaxMs?: number;

  /** @defaultValue 5000 */
  shutdownTimeoutMs?: number;

  /** Counters to update; a private set is created when omitted */
  counters?: TelemetryCounters;

  /** Logger for lifecycle messages */
  logger?: ILogger;

  /** Stage name. @defaultValue 'buffered-exporter' */
  name?: string;
}

/**
 * BufferedExporter - export stage backed by a bounded queue and a drain
 * loop.
 *
 * @example
 * ```typescript
 * const exporter = new BufferedExporter(new ConsoleSink(), {
 *   queueCapacity: 256,
 *   overflowPolicy: 'dropOldest',
 * });
 * await exporter.start();
 *
 * const chain = createSubscriberChain()
 *   .use(levelFilter(Level.Info))
 *   .use(exporter)
 *   .compose({ defaultFormatter: new TextFormatter() });
 *
 * // ... later
 * await exporter.shutdown();
 * ```
 */
export class BufferedExporter
  extends BackgroundServiceBase
  implements ISubscriberStage
{
  readonly name: string;
  readonly counters: TelemetryCounters;

  private readonly queue: BoundedQueue<RenderedRecord>;
  private readonly batchSize: number;
  private readonly batchWindowMs: number;
  private readonly retryAttempts: number;
  private readonly retryBackoffMs: number;
  private readonly retryBackoffMaxMs: number;
  private readonly shutdownTimeoutMs: number;

  private flushWaiters: Array<() => void> = [];
  private batchWindow: AbortController | null = null;
  private overflowing = false;
  private writing = false;
  private shuttingDown: Promise<void> | null = null;

  constructor(
    private readonly sink: ISink,
    options: BufferedExporterOptions = {},
  ) {
    super(options.logger);
    this.name = options.name ?? 'buffered-exporter';
    this.counters = options.counters ?? new TelemetryCounters();
    const capacity = options.queueCapacity ?? 1024;
    this.queue = new BoundedQueue<RenderedRecord>(
      capacity,
      options.overflowPolicy ?? 'dropNewest',
      options.maxWaitingProducers ?? capacity,
    );
    this.batchSize = Math.max(1, options.batchSize ?? 64);
    this.batchWindowMs = Math.max(0, options.batchWindowMs ?? 100);
    this.retryAttempts = options.retryAttempts ?? 3;
    this.retryBackoffMs = options.retryBackoffMs ?? 50;
    this.retryBackoffMaxMs = options.retryBackoffMaxMs ?? 2000;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 5000;
  }

  /**
   * Enqueue a rendered record.
   *
   * Settles once the record is queued or dropped. Under `block` that may be
   * after the drain loop freed space.
   */
  async export(rendered: RenderedRecord): Promise<void> {
    const result = await this.queue.offer(rendered);

    switch (result) {
      case 'accepted':
        return;

      case 'dropped':
      case 'evicted':
        this.counters.recordDropped('overflow');
        if (!this.overflowing) {
          this.overflowing = true;
          reportDiagnostic(
            new QueueOverflowException(this.queue.capacity, this.queue.policy),
          );
        }
        return;

      case 'closed':
        this.counters.recordDropped('shutdown');
        reportDiagnostic(new QueueClosedException());
        return;
    }
  }

  /**
   * Resolve once everything queued so far has been handed to the sink.
   *
   * A pending batch window is cut short.
   */
  flush(): Promise<void> {
    if (!this.running || (this.queue.size === 0 && !this.writing)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.flushWaiters.push(resolve);
      this.batchWindow?.abort();
    });
  }

  /**
   * Stop accepting, drain, flush the sink, stop the loop.
   *
   * Safe to call more than once; later calls share the first one's
   * completion.
   */
  shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      this.shuttingDown = this.runShutdown();
    }
    return this.shuttingDown;
  }

  override stop(): Promise<void> {
    return this.shutdown();
  }

  /**
   * Resolve once the queue has room for a record that would neither wait
   * nor be dropped, or once it no longer accepts records.
   */
  ready(): Promise<void> {
    return this.queue.whenWritable();
  }

  /**
   * Records currently queued, oldest first.
   */
  pending(): RenderedRecord[] {
    return this.queue.snapshot();
  }

  /**
   * Producers parked on a full queue under `block`.
   */
  get waitingProducers(): number {
    return this.queue.waiting;
  }

  get policy(): OverflowPolicy {
    return this.queue.policy;
  }

  // ==================== Drain loop ====================

  protected async executeAsync(signal: AbortSignal): Promise<void> {
    const retry = new RetryPolicy({
      maxRetries: this.retryAttempts,
      delay: this.retryBackoffMs,
      maxDelay: this.retryBackoffMaxMs,
      signal,
      onRetry: (error, retryNumber, delay) => {
        this.counters.exportRetried();
        this.logger.debug(
          `[${this.name}] write failed, retry ${retryNumber} in ${delay}ms`,
          error,
        );
      },
    });

    try {
      while (!signal.aborted) {
        await this.queue.whenAtLeast(1, signal);
        if (signal.aborted || this.queue.isDrained()) break;

        await this.collectBatch(signal);
        const batch = this.queue.take(this.batchSize);
        this.overflowing = false;

        if (batch.length > 0) {
          this.writing = true;
          try {
            await this.writeBatch(batch, retry);
          } finally {
            this.writing = false;
          }
        }

        if (this.queue.size === 0) {
          this.resolveFlushWaiters();
        }
      }
    } finally {
      this.resolveFlushWaiters();
    }
  }

  /**
   * Wait until a full batch is queued or the batch window elapses.
   */
  private async collectBatch(signal: AbortSignal): Promise<void> {
    if (
      this.queue.size >= this.batchSize ||
      this.queue.closed ||
      this.flushWaiters.length > 0
    ) {
      return;
    }

    const window = new AbortController();
    const onAbort = () => window.abort();
    signal.addEventListener('abort', onAbort, { once: true });
    this.batchWindow = window;

    try {
      await Promise.race([
        this.queue.whenAtLeast(this.batchSize, window.signal),
        sleep(this.batchWindowMs, window.signal),
      ]);
    } finally {
      window.abort();
      signal.removeEventListener('abort', onAbort);
      this.batchWindow = null;
    }
  }

  private async writeBatch(
    batch: readonly RenderedRecord[],
    retry: RetryPolicy,
  ): Promise<void> {
    const outcome = await retry.execute(() => this.sink.write(batch));

    if (outcome.ok) {
      this.counters.batchSent();
      return;
    }

    this.counters.recordDropped('exportFailure', batch.length);
    reportDiagnostic(
      new ExportFailureException(batch.length, outcome.attempts, outcome.error),
    );
  }

  private resolveFlushWaiters(): void {
    for (const resolve of this.flushWaiters.splice(0)) {
      resolve();
    }
  }

  // ==================== Shutdown ====================

  private async runShutdown(): Promise<void> {
    this.queue.close();

    if (!this.running && this.queue.size > 0) {
      await this.start();
    }

    const deadline = Date.now() + this.shutdownTimeoutMs;
    const drained = await settlesWithin(
      this.loop ?? Promise.resolve(),
      this.shutdownTimeoutMs,
    );

    if (!drained) {
      // the loop may be stuck in a write; it is abandoned
      this.abortController?.abort();
      const discarded = this.queue.discard();
      if (discarded > 0) {
        this.counters.recordDropped('shutdown', discarded);
      }
      this.logger.warn(
        `[${this.name}] shutdown timed out after ${this.shutdownTimeoutMs}ms; ${discarded} record(s) discarded`,
      );
    }

    this.abortController = null;

    try {
      const flushed = await settlesWithin(
        this.sink.flush(),
        Math.max(0, deadline - Date.now()),
      );
      if (!flushed) {
        this.logger.warn(`[${this.name}] sink flush did not complete in time`);
      }
    } catch (error) {
      reportDiagnostic(error);
    }
  }
}
