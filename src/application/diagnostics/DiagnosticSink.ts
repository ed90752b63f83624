/**
 * @lumberline/core - Diagnostic Sink
 *
 * Process-wide destination for failures that happen inside the telemetry
 * pipeline. Anything reported here has already been contained: the record
 * was dropped or retried and application code never sees the error.
 */

import { describeError } from '../../domain/exceptions/exceptions';
import { consoleLogger } from './logger';

/**
 * Receives contained pipeline errors.
 */
export type DiagnosticSink = (error: unknown) => void;

const defaultSink: DiagnosticSink = (error) => {
  consoleLogger.error(`telemetry pipeline: ${describeError(error)}`);
};

let activeSink: DiagnosticSink = defaultSink;

/**
 * Replace the process-wide diagnostic sink.
 *
 * @returns The previously installed sink
 *
 * @example
 * ```typescript
 * const seen: unknown[] = [];
 * setDiagnosticSink((error) => seen.push(error));
 * ```
 */
export function setDiagnosticSink(sink: DiagnosticSink): DiagnosticSink {
  const previous = activeSink;
  activeSink = sink;
  return previous;
}

/**
 * Restore the console-backed default sink.
 */
export function resetDiagnosticSink(): void {
  activeSink = defaultSink;
}

/**
 * Report a contained pipeline error.
 *
 * A sink that throws is itself contained; its failure goes to stderr
 * through the console logger.
 */
export function reportDiagnostic(error: unknown): void {
  try {
    activeSink(error);
  } catch (sinkError) {
    consoleLogger.error(
      `diagnostic sink failed: ${describeError(sinkError)}`,
      error,
    );
  }
}
