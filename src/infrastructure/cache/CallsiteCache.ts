/**
 * @lumberline/core - Call-site Interning
 */

import { callsiteKey, createMetadata, type Metadata } from '../../domain/metadata/Metadata';
import { LruCache, type CacheStats } from './LruCache';

/**
 * CallsiteCache - one shared, frozen Metadata per call site.
 *
 * Records emitted from the same `(level, target, name, file, line)` carry
 * the identical Metadata object, so subscribers may compare sites by
 * reference.
 */
export class CallsiteCache {
  private readonly cache: LruCache<string, Metadata>;

  constructor(capacity = 1000) {
    this.cache = new LruCache(capacity);
  }

  intern(site: Metadata): Metadata {
    return this.cache.getOrSet(callsiteKey(site), () => createMetadata(site));
  }

  stats(): CacheStats {
    return this.cache.stats();
  }

  clear(): void {
    this.cache.clear();
  }
}
