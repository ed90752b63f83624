/**
 * @lumberline/core - Sink Interface
 *
 * Destination consumed by the buffered exporter. Only the exporter's drain
 * loop calls a sink, one call at a time, so implementations need no
 * locking of their own.
 */

import type { RenderedRecord } from '../../application/dispatch/ISubscriberStage';

/**
 * ISink - where exported batches end up.
 *
 * A rejected promise signals failure; the exporter retries the same batch.
 *
 * @example
 * ```typescript
 * class HttpSink implements ISink {
 *   async write(batch: readonly RenderedRecord[]): Promise<void> {
 *     const res = await fetch(url, {
 *       method: 'POST',
 *       body: batch.map((r) => r.text).join('\n'),
 *     });
 *     if (!res.ok) throw new Error(`collector answered ${res.status}`);
 *   }
 *
 *   async flush(): Promise<void> {}
 * }
 * ```
 */
export interface ISink {
  /**
   * Write a batch, records in FIFO order.
   */
  write(batch: readonly RenderedRecord[]): Promise<void>;

  /**
   * Push out anything the sink buffers itself.
   */
  flush(): Promise<void>;
}
