/**
 * @lumberline/core - Memory Sink
 */

import type { RenderedRecord } from '../../application/dispatch/ISubscriberStage';
import { stripAnsi } from '../formatting/ansi';
import type { ISink } from './ISink';

/**
 * MemorySink - keeps written output in memory, ANSI codes removed.
 *
 * Intended for tests and for inspecting output in-process.
 *
 * @example
 * ```typescript
 * const sink = new MemorySink();
 * const telemetry = createTelemetry({}, { sink });
 * telemetry.info('ready');
 * await telemetry.shutdown();
 * sink.lines(); // ['12:00:00.000 INFO  app: ready']
 * ```
 */
export class MemorySink implements ISink {
  private buffer = '';
  private readonly sizes: number[] = [];
  private flushes = 0;

  async write(batch: readonly RenderedRecord[]): Promise<void> {
    this.sizes.push(batch.length);
    for (const record of batch) {
      this.buffer += `${stripAnsi(record.text)}\n`;
    }
  }

  async flush(): Promise<void> {
    this.flushes++;
  }

  /**
   * Everything written so far.
   */
  contents(): string {
    return this.buffer;
  }

  /**
   * Written records, one entry per line.
   */
  lines(): string[] {
    return this.buffer === '' ? [] : this.buffer.replace(/\n$/, '').split('\n');
  }

  /**
   * Size of each batch received, in write order.
   */
  get batchSizes(): readonly number[] {
    return this.sizes;
  }

  get flushCount(): number {
    return this.flushes;
  }

  clear(): void {
    this.buffer = '';
    this.sizes.length = 0;
    this.flushes = 0;
  }
}
