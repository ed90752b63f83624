/**
 * @fileoverview @lumberline/core - Structured telemetry core
 * @description
 * Captures application events and nested execution spans, attaches
 * contextual metadata and routes the resulting records through a pipeline
 * of filters, enrichers, formatters and exporters with bounded memory.
 *
 * ## Architecture Layers
 *
 * - **domain**: levels, metadata, field sets, the per-task context stack,
 *   the span registry and immutable dispatch records
 * - **application**: the subscriber chain, diagnostics and the
 *   `Telemetry` facade
 * - **infrastructure**: the buffered exporter, formatters, sinks,
 *   configuration and call-site caching
 *
 * @packageDocumentation
 * @module @lumberline/core
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
