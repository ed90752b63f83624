/**
 * Telemetry facade module
 */

export { SpanHandle } from './SpanHandle';
export type { SpanOwner } from './SpanHandle';
export { Telemetry, createTelemetry } from './Telemetry';
export type { TelemetryOptions, EmitOptions, SpanOptions } from './Telemetry';
