/**
 * @lumberline/core - Diagnostic Counters
 *
 * Operational counters of the pipeline. These describe the pipeline's own
 * health; they are not an application metrics facility.
 */

/**
 * Reasons a record can be dropped.
 *
 * - `filtered`: a filter stage (including the level filter) rejected it
 * - `overflow`: the export queue was full under a dropping policy
 * - `exportFailure`: the sink kept failing after every retry
 * - `shutdown`: the shutdown deadline passed before the record was written
 */
export const DROP_REASONS = [
  'filtered',
  'overflow',
  'exportFailure',
  'shutdown',
] as const;

export type DropReason = (typeof DROP_REASONS)[number];

/**
 * Point-in-time copy of the counters.
 */
export interface CountersSnapshot {
  readonly recordsEmitted: number;
  readonly dropped: Readonly<Record<DropReason, number>>;
  readonly batchesSent: number;
  readonly exportRetries: number;
}

/**
 * Mutable counter set shared by dispatch and the exporters.
 */
export class TelemetryCounters {
  private emitted = 0;
  private batches = 0;
  private retries = 0;
  private readonly drops: Record<DropReason, number> = {
    filtered: 0,
    overflow: 0,
    exportFailure: 0,
    shutdown: 0,
  };

  recordEmitted(): void {
    this.emitted++;
  }

  recordDropped(reason: DropReason, count = 1): void {
    this.drops[reason] += count;
  }

  batchSent(): void {
    this.batches++;
  }

  exportRetried(): void {
    this.retries++;
  }

  get recordsEmitted(): number {
    return this.emitted;
  }

  get batchesSent(): number {
    return this.batches;
  }

  get exportRetries(): number {
    return this.retries;
  }

  dropped(reason: DropReason): number {
    return this.drops[reason];
  }

  snapshot(): CountersSnapshot {
    return Object.freeze({
      recordsEmitted: this.emitted,
      dropped: Object.freeze({ ...this.drops }),
      batchesSent: this.batches,
      exportRetries: this.retries,
    });
  }

  reset(): void {
    this.emitted = 0;
    this.batches = 0;
    this.retries = 0;
    for (const reason of DROP_REASONS) {
      this.drops[reason] = 0;
    }
  }
}
