/**
 * @lumberline/core - Span Module
 */

export { SpanIdAllocator, globalSpanIds } from './SpanId';
export type { SpanId } from './SpanId';

export { SpanRegistry } from './SpanRegistry';
export type { SpanRecord, SpanState, SpanRegistryOptions } from './SpanRegistry';
