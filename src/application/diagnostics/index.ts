/**
 * @lumberline/core - Diagnostics Module
 */

export { consoleLogger, silentLogger } from './logger';
export type { ILogger } from './logger';

export {
  setDiagnosticSink,
  resetDiagnosticSink,
  reportDiagnostic,
} from './DiagnosticSink';
export type { DiagnosticSink } from './DiagnosticSink';

export { TelemetryCounters, DROP_REASONS } from './TelemetryCounters';
export type { DropReason, CountersSnapshot } from './TelemetryCounters';
