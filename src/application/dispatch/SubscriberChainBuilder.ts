/**
 * @lumberline/core - Subscriber Chain Builder
 *
 * Fluent composition of dispatch stages.
 */

import { TelemetryCounters } from '../diagnostics/TelemetryCounters';
import type { IFormatCapability, ISubscriberStage } from './ISubscriberStage';
import { SubscriberChain } from './SubscriberChain';

/**
 * Builder for composing subscriber chains
 *
 * @example
 * ```typescript
 * const chain = createSubscriberChain()
 *   .use(levelFilter(Level.Debug))
 *   .useIf(process.env.NODE_ENV !== 'production', debugEnricher)
 *   .use(exporter)
 *   .compose({ defaultFormatter: new TextFormatter() });
 * ```
 */
export class SubscriberChainBuilder {
  private stages: ISubscriberStage[] = [];

  /**
   * Add a stage at the end of the chain
   */
  use(stage: ISubscriberStage): this {
    this.stages.push(stage);
    return this;
  }

  /**
   * Add a stage conditionally
   */
  useIf(condition: boolean | (() => boolean), stage: ISubscriberStage): this {
    const shouldUse = typeof condition === 'function' ? condition() : condition;
    if (shouldUse) {
      this.use(stage);
    }
    return this;
  }

  /**
   * Add a stage at the beginning of the chain
   */
  prepend(stage: ISubscriberStage): this {
    this.stages.unshift(stage);
    return this;
  }

  /**
   * Add a stage at a specific position
   */
  insertAt(index: number, stage: ISubscriberStage): this {
    this.stages.splice(index, 0, stage);
    return this;
  }

  /**
   * Build the chain as an array
   */
  build(): ISubscriberStage[] {
    return [...this.stages];
  }

  /**
   * Build the dispatching chain
   */
  compose(options: {
    defaultFormatter: IFormatCapability;
    counters?: TelemetryCounters;
  }): SubscriberChain {
    return new SubscriberChain(this.build(), options);
  }

  /**
   * Get the number of stages
   */
  get length(): number {
    return this.stages.length;
  }

  /**
   * Clear all stages
   */
  clear(): this {
    this.stages = [];
    return this;
  }
}

/**
 * Create a new chain builder
 */
export function createSubscriberChain(): SubscriberChainBuilder {
  return new SubscriberChainBuilder();
}
