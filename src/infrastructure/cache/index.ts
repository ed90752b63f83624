/**
 * Cache module
 */

export * from './LruCache';
export * from './CallsiteCache';
