/**
 * Configuration module
 */

export * from './TelemetryConfig';
