/**
 * @fileoverview Unit tests for BufferedExporter
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  BufferedExporter,
  ExportFailureException,
  Level,
  MemorySink,
  QueueClosedException,
  QueueOverflowException,
  resetDiagnosticSink,
  setDiagnosticSink,
  silentLogger,
  type ISink,
  type RenderedRecord,
} from '../../../src';

const rendered = (text: string): RenderedRecord => ({
  text,
  level: Level.Info,
  kind: 'event',
});

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * Sink whose first `failures` writes reject.
 */
class FlakySink extends MemorySink {
  writeCalls = 0;

  constructor(private readonly failures: number) {
    super();
  }

  override async write(batch: readonly RenderedRecord[]): Promise<void> {
    this.writeCalls++;
    if (this.writeCalls <= this.failures) {
      throw new Error(`write ${this.writeCalls} refused`);
    }
    await super.write(batch);
  }
}

/**
 * Sink whose writes never complete.
 */
class HangingSink implements ISink {
  writes = 0;

  write(): Promise<void> {
    this.writes++;
    return new Promise<void>(() => undefined);
  }

  async flush(): Promise<void> {}
}

describe('BufferedExporter', () => {
  let diagnostics: unknown[];

  beforeEach(() => {
    diagnostics = [];
    setDiagnosticSink((error) => diagnostics.push(error));
  });

  afterEach(() => {
    resetDiagnosticSink();
  });

  describe('batching', () => {
    it('should write full batches first and the remainder after the window', async () => {
      const sink = new MemorySink();
      const exporter = new BufferedExporter(sink, {
        batchSize: 3,
        batchWindowMs: 20,
        logger: silentLogger,
      });
      await exporter.start();

      await Promise.all(
        ['r1', 'r2', 'r3', 'r4', 'r5'].map((t) => exporter.export(rendered(t))),
      );
      await exporter.shutdown();

      expect(sink.batchSizes).toEqual([3, 2]);
      expect(sink.lines()).toEqual(['r1', 'r2', 'r3', 'r4', 'r5']);
      expect(exporter.counters.batchesSent).toBe(2);
    });

    it('should hand queued records to the sink on flush', async () => {
      const sink = new MemorySink();
      const exporter = new BufferedExporter(sink, {
        batchWindowMs: 10_000,
        logger: silentLogger,
      });
      await exporter.start();

      await exporter.export(rendered('a'));
      await exporter.export(rendered('b'));
      await exporter.flush();

      expect(sink.lines()).toEqual(['a', 'b']);
      await exporter.shutdown();
    });

    it('should resolve flush at once when nothing is running', async () => {
      const exporter = new BufferedExporter(new MemorySink(), {
        logger: silentLogger,
      });

      await expect(exporter.flush()).resolves.toBeUndefined();
    });
  });

  describe('retries', () => {
    it('should retry a failed write and count the retries', async () => {
      const sink = new FlakySink(2);
      const exporter = new BufferedExporter(sink, {
        batchWindowMs: 5,
        retryAttempts: 3,
        retryBackoffMs: 1,
        logger: silentLogger,
      });
      await exporter.start();

      await exporter.export(rendered('payload'));
      await exporter.shutdown();

      expect(sink.lines()).toEqual(['payload']);
      expect(exporter.counters.exportRetries).toBe(2);
      expect(exporter.counters.batchesSent).toBe(1);
      expect(exporter.counters.dropped('exportFailure')).toBe(0);
      expect(diagnostics).toEqual([]);
    });

    it('should drop and count a batch that keeps failing', async () => {
      const sink = new FlakySink(100);
      const exporter = new BufferedExporter(sink, {
        batchWindowMs: 5,
        retryAttempts: 1,
        retryBackoffMs: 1,
        logger: silentLogger,
      });
      await exporter.start();

      await exporter.export(rendered('x'));
      await exporter.export(rendered('y'));
      await exporter.shutdown();

      expect(sink.writeCalls).toBe(2);
      expect(exporter.counters.dropped('exportFailure')).toBe(2);
      expect(exporter.counters.exportRetries).toBe(1);
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toBeInstanceOf(ExportFailureException);
      if (diagnostics[0] instanceof ExportFailureException) {
        expect(diagnostics[0].batchSize).toBe(2);
        expect(diagnostics[0].attempts).toBe(2);
      }
    });
  });

  describe('overflow', () => {
    it('should evict the oldest record under dropOldest', async () => {
      const exporter = new BufferedExporter(new MemorySink(), {
        queueCapacity: 3,
        overflowPolicy: 'dropOldest',
        logger: silentLogger,
      });

      for (const text of ['r1', 'r2', 'r3', 'r4']) {
        await exporter.export(rendered(text));
      }

      expect(exporter.pending().map((r) => r.text)).toEqual(['r2', 'r3', 'r4']);
      expect(exporter.counters.dropped('overflow')).toBe(1);
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toBeInstanceOf(QueueOverflowException);
    });

    it('should report an overflow episode once', async () => {
      const exporter = new BufferedExporter(new MemorySink(), {
        queueCapacity: 1,
        overflowPolicy: 'dropNewest',
        logger: silentLogger,
      });

      for (const text of ['a', 'b', 'c', 'd']) {
        await exporter.export(rendered(text));
      }

      expect(exporter.pending().map((r) => r.text)).toEqual(['a']);
      expect(exporter.counters.dropped('overflow')).toBe(3);
      expect(diagnostics).toHaveLength(1);
    });

    it('should hold producers under block until the drain frees space', async () => {
      const sink = new MemorySink();
      const exporter = new BufferedExporter(sink, {
        queueCapacity: 1,
        overflowPolicy: 'block',
        batchWindowMs: 5,
        logger: silentLogger,
      });

      await exporter.export(rendered('r1'));
      let admitted = false;
      const second = exporter.export(rendered('r2')).then(() => {
        admitted = true;
      });
      await tick();

      expect(admitted).toBe(false);
      expect(exporter.waitingProducers).toBe(1);

      await exporter.start();
      await second;
      await exporter.shutdown();

      expect(admitted).toBe(true);
      expect(sink.lines()).toEqual(['r1', 'r2']);
      expect(exporter.counters.dropped('overflow')).toBe(0);
    });

    it('should drop as overflow once too many producers are parked', async () => {
      const exporter = new BufferedExporter(new MemorySink(), {
        queueCapacity: 1,
        overflowPolicy: 'block',
        maxWaitingProducers: 1,
        logger: silentLogger,
      });

      await exporter.export(rendered('r1'));
      exporter.export(rendered('r2')).catch(() => undefined);
      await exporter.export(rendered('r3'));

      expect(exporter.waitingProducers).toBe(1);
      expect(exporter.counters.dropped('overflow')).toBe(1);
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toBeInstanceOf(QueueOverflowException);
      if (diagnostics[0] instanceof QueueOverflowException) {
        expect(diagnostics[0].policy).toBe('block');
      }

      await exporter.shutdown();
    });
  });

  describe('shutdown', () => {
    it('should drain everything queued and flush the sink', async () => {
      const sink = new MemorySink();
      const exporter = new BufferedExporter(sink, {
        batchWindowMs: 10_000,
        logger: silentLogger,
      });
      await exporter.start();

      await exporter.export(rendered('one'));
      await exporter.export(rendered('two'));
      await exporter.export(rendered('three'));
      await exporter.shutdown();

      expect(sink.lines()).toEqual(['one', 'two', 'three']);
      expect(sink.flushCount).toBe(1);
      expect(exporter.isRunning()).toBe(false);
    });

    it('should drain a queue that was never started', async () => {
      const sink = new MemorySink();
      const exporter = new BufferedExporter(sink, { logger: silentLogger });

      await exporter.export(rendered('queued'));
      await exporter.shutdown();

      expect(sink.lines()).toEqual(['queued']);
    });

    it('should refuse records after shutdown', async () => {
      const exporter = new BufferedExporter(new MemorySink(), {
        logger: silentLogger,
      });
      await exporter.start();
      await exporter.shutdown();

      await exporter.export(rendered('late'));

      expect(exporter.counters.dropped('shutdown')).toBe(1);
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toBeInstanceOf(QueueClosedException);
    });

    it('should share one completion between repeated calls', async () => {
      const exporter = new BufferedExporter(new MemorySink(), {
        logger: silentLogger,
      });
      await exporter.start();

      expect(exporter.shutdown()).toBe(exporter.shutdown());
      await exporter.stop();
    });

    it('should discard what remains when the timeout expires', async () => {
      const sink = new HangingSink();
      const exporter = new BufferedExporter(sink, {
        batchSize: 1,
        shutdownTimeoutMs: 30,
        logger: silentLogger,
      });
      await exporter.start();

      exporter.export(rendered('stuck')).catch(() => undefined);
      exporter.export(rendered('left-1')).catch(() => undefined);
      exporter.export(rendered('left-2')).catch(() => undefined);
      await tick();
      await exporter.shutdown();

      expect(sink.writes).toBe(1);
      expect(exporter.counters.dropped('shutdown')).toBe(2);
      expect(exporter.pending()).toEqual([]);
    });
  });
});
