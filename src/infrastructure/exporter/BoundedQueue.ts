/**
 * @lumberline/core - Bounded Queue
 *
 * The single synchronisation point between producers and the drain loop.
 * Many producers offer; one consumer takes.
 */

import { RingBuffer } from './RingBuffer';

/**
 * Behaviour when a producer offers to a full queue.
 *
 * - `block`: the offer settles only once space frees up (or the queue is
 *   discarded). Once `maxWaiting` producers are parked, further offers are
 *   dropped
 * - `dropNewest`: the incoming item is discarded
 * - `dropOldest`: the queue head is evicted to make room
 */
export type OverflowPolicy = 'block' | 'dropNewest' | 'dropOldest';

/**
 * Outcome of an offer.
 *
 * - `accepted`: stored (possibly after waiting, under `block`)
 * - `dropped`: the offered item was discarded (`dropNewest`, or `block`
 *   with too many producers parked)
 * - `evicted`: stored, and the oldest item was discarded (`dropOldest`)
 * - `closed`: the queue no longer accepts items
 */
export type OfferResult = 'accepted' | 'dropped' | 'evicted' | 'closed';

interface SizeWaiter {
  min: number;
  resolve: () => void;
}

interface OfferWaiter<T> {
  item: T;
  resolve: (result: OfferResult) => void;
}

/**
 * BoundedQueue - fixed-capacity FIFO with a configurable overflow policy.
 *
 * @remarks
 * Producers parked under `block` are admitted strictly in arrival order,
 * so items from one producer keep their emission order. Closing stops new
 * offers but still admits producers that were already parked: their items
 * were submitted before the close.
 *
 * @example
 * ```typescript
 * const queue = new BoundedQueue<string>(2, 'dropOldest');
 * await queue.offer('a'); // 'accepted'
 * await queue.offer('b'); // 'accepted'
 * await queue.offer('c'); // 'evicted' - queue now holds b, c
 * ```
 */
export class BoundedQueue<T> {
  private readonly items: RingBuffer<T>;
  private readonly offerWaiters: OfferWaiter<T>[] = [];
  private sizeWaiters: SizeWaiter[] = [];
  private roomWaiters: Array<() => void> = [];
  private closedFlag = false;

  /**
   * @param maxWaiting - Producers that may be parked at once under `block`;
   *   defaults to `capacity`
   */
  constructor(
    readonly capacity: number,
    readonly policy: OverflowPolicy,
    readonly maxWaiting: number = capacity,
  ) {
    this.items = new RingBuffer<T>(capacity);
  }

  /**
   * Offer an item.
   *
   * The item is stored synchronously when there is room, so items offered
   * back to back from synchronous code are queued in call order.
   */
  offer(item: T): Promise<OfferResult> {
    if (this.closedFlag) {
      return Promise.resolve('closed');
    }

    // parked producers go first
    if (this.offerWaiters.length === 0 && this.items.push(item)) {
      this.notifySizeWaiters();
      return Promise.resolve('accepted');
    }

    switch (this.policy) {
      case 'dropNewest':
        return Promise.resolve('dropped');

      case 'dropOldest':
        this.items.shift();
        this.items.push(item);
        this.notifySizeWaiters();
        return Promise.resolve('evicted');

      case 'block':
        if (this.offerWaiters.length >= this.maxWaiting) {
          return Promise.resolve('dropped');
        }
        return new Promise<OfferResult>((resolve) => {
          this.offerWaiters.push({ item, resolve });
        });
    }
  }

  /**
   * Remove up to `max` items, oldest first, then admit parked producers
   * into the freed space.
   */
  take(max: number): T[] {
    const out: T[] = [];
    while (out.length < max) {
      const item = this.items.shift();
      if (item === undefined) break;
      out.push(item);
    }
    this.admitWaiters();
    this.notifyRoomWaiters();
    return out;
  }

  /**
   * Resolve once an offer would be stored without waiting or dropping:
   * nobody is parked and there is a free slot. Also resolves when the
   * queue is closed.
   */
  whenWritable(): Promise<void> {
    if (this.writable()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.roomWaiters.push(resolve);
    });
  }

  /**
   * Resolve once at least `min` items are queued, or the queue is closed
   * (nothing more may arrive), or `signal` aborts.
   */
  whenAtLeast(min: number, signal?: AbortSignal): Promise<void> {
    if (this.items.length >= min || this.closedFlag || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const waiter: SizeWaiter = { min, resolve };
      this.sizeWaiters.push(waiter);
      signal?.addEventListener(
        'abort',
        () => {
          this.sizeWaiters = this.sizeWaiters.filter((w) => w !== waiter);
          resolve();
        },
        { once: true },
      );
    });
  }

  /**
   * Stop accepting new offers.
   */
  close(): void {
    if (this.closedFlag) return;
    this.closedFlag = true;
    this.notifySizeWaiters();
    this.notifyRoomWaiters();
  }

  /**
   * Drop everything still queued. Parked producers are released with
   * `closed`.
   *
   * @returns Number of queued items discarded
   */
  discard(): number {
    const discarded = this.items.length;
    this.items.clear();
    for (const waiter of this.offerWaiters.splice(0)) {
      waiter.resolve('closed');
    }
    this.notifySizeWaiters();
    this.notifyRoomWaiters();
    return discarded;
  }

  /**
   * Items currently queued, oldest first (parked offers excluded).
   */
  snapshot(): T[] {
    return this.items.toArray();
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Producers currently parked under `block`.
   */
  get waiting(): number {
    return this.offerWaiters.length;
  }

  get closed(): boolean {
    return this.closedFlag;
  }

  /**
   * Closed with nothing queued and nobody parked.
   */
  isDrained(): boolean {
    return (
      this.closedFlag && this.items.isEmpty() && this.offerWaiters.length === 0
    );
  }

  private admitWaiters(): void {
    while (this.offerWaiters.length > 0 && !this.items.isFull()) {
      const waiter = this.offerWaiters.shift();
      if (!waiter) break;
      this.items.push(waiter.item);
      waiter.resolve('accepted');
    }
    if (!this.items.isEmpty()) {
      this.notifySizeWaiters();
    }
  }

  private writable(): boolean {
    return (
      this.closedFlag ||
      (this.offerWaiters.length === 0 && !this.items.isFull())
    );
  }

  private notifyRoomWaiters(): void {
    if (this.roomWaiters.length === 0 || !this.writable()) return;
    for (const resolve of this.roomWaiters.splice(0)) {
      resolve();
    }
  }

  private notifySizeWaiters(): void {
    if (this.sizeWaiters.length === 0) return;
    const ready = this.sizeWaiters.filter(
      (w) => this.closedFlag || this.items.length >= w.min,
    );
    if (ready.length === 0) return;
    this.sizeWaiters = this.sizeWaiters.filter((w) => !ready.includes(w));
    for (const waiter of ready) {
      waiter.resolve();
    }
  }
}
