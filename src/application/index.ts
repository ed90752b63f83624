/**
 * @module @lumberline/core/application
 * @description Application layer exports
 */

// ============================================================================
// Diagnostics (logger, diagnostic sink, counters)
// ============================================================================

export * from './diagnostics';

// ============================================================================
// Subscriber Dispatch
// ============================================================================

export * from './dispatch';

// ============================================================================
// Background Services
// ============================================================================

export * from './host';

// ============================================================================
// Telemetry Facade
// ============================================================================

export * from './telemetry';
