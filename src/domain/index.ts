/**
 * @module @lumberline/core/domain
 * @description Domain layer exports
 */

// ============================================================================
// Metadata, Levels & Fields
// ============================================================================

export * from './metadata';

// ============================================================================
// Context Stack
// ============================================================================

export * from './context';

// ============================================================================
// Spans
// ============================================================================

export * from './spans';

// ============================================================================
// Dispatch Records
// ============================================================================

export * from './records';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
