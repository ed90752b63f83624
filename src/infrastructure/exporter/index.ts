/**
 * Exporter module
 */

export * from './RingBuffer';
export * from './BoundedQueue';
export * from './RetryPolicy';
export * from './BufferedExporter';
