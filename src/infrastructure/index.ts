/**
 * @module @lumberline/core/infrastructure
 * @description Infrastructure layer exports
 */

// ============================================================================
// Buffered Export (queue, retry, drain loop)
// ============================================================================

export * from './exporter';

// ============================================================================
// Formatting
// ============================================================================

export * from './formatting';

// ============================================================================
// Sinks
// ============================================================================

export * from './sinks';

// ============================================================================
// Configuration
// ============================================================================

export * from './config';

// ============================================================================
// Caching
// ============================================================================

export * from './cache';
