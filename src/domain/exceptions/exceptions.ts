/**
 * @lumberline/core - Telemetry Exceptions
 *
 * Two families of errors exist:
 *
 * - **Instrumentation misuse** (`ContextMismatchException`,
 *   `SpanNotOpenException`) is thrown back to the instrumenting call site,
 *   because it points at a bug in the instrumented code.
 * - **Pipeline failures** (`DispatchStageFailureException`,
 *   `ExportFailureException`, `QueueOverflowException`, ...) never reach
 *   application code. They are handed to the diagnostic sink and counted.
 */

import type { SpanId } from '../spans/SpanId';

/**
 * Machine-readable exception codes.
 */
export type TelemetryErrorCode =
  | 'CONTEXT_MISMATCH'
  | 'SPAN_NOT_OPEN'
  | 'SPAN_STATE_VIOLATION'
  | 'DISPATCH_STAGE_FAILURE'
  | 'EXPORT_FAILURE'
  | 'QUEUE_OVERFLOW'
  | 'QUEUE_CLOSED'
  | 'CONFIG_VALIDATION';

/**
 * Base class of every exception raised by the telemetry core.
 */
export class TelemetryException extends Error {
  constructor(
    public readonly code: TelemetryErrorCode,
    message: string,
    public readonly details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = 'TelemetryException';
    Error.captureStackTrace(this, this.constructor);
  }
}

// ==================== Instrumentation Misuse ====================

/**
 * A span exit or close did not reference the top of the caller's
 * context stack.
 */
export class ContextMismatchException extends TelemetryException {
  constructor(
    public readonly expected: SpanId | undefined,
    public readonly actual: SpanId,
  ) {
    super(
      'CONTEXT_MISMATCH',
      expected === undefined
        ? `Cannot exit span ${actual}: the context stack is empty`
        : `Cannot exit span ${actual}: span ${expected} is the current span`,
      { expected, actual },
    );
    this.name = 'ContextMismatchException';
  }
}

/**
 * A field was added to, or a close was requested for, a span that is
 * not open.
 */
export class SpanNotOpenException extends TelemetryException {
  constructor(
    public readonly spanId: SpanId,
    operation: 'addField' | 'close',
  ) {
    super('SPAN_NOT_OPEN', `Span ${spanId} is not open (${operation})`, {
      spanId,
      operation,
    });
    this.name = 'SpanNotOpenException';
  }
}

// ==================== Pipeline Failures ====================

/**
 * Dispatch observed a span transition that its state machine forbids,
 * e.g. a close for a span it never saw open.
 */
export class SpanStateViolationException extends TelemetryException {
  constructor(
    public readonly spanId: SpanId,
    message: string,
  ) {
    super('SPAN_STATE_VIOLATION', message, { spanId });
    this.name = 'SpanStateViolationException';
  }
}

/**
 * A filter, enrich or format stage threw.
 */
export class DispatchStageFailureException extends TelemetryException {
  constructor(
    public readonly stage: string,
    public readonly capability: 'filter' | 'enrich' | 'format' | 'export',
    public readonly reason: unknown,
  ) {
    super(
      'DISPATCH_STAGE_FAILURE',
      `Stage "${stage}" failed in ${capability}: ${describeError(reason)}`,
      { stage, capability },
    );
    this.name = 'DispatchStageFailureException';
  }
}

/**
 * A sink rejected a batch after every retry.
 */
export class ExportFailureException extends TelemetryException {
  constructor(
    public readonly batchSize: number,
    public readonly attempts: number,
    public readonly reason: unknown,
  ) {
    super(
      'EXPORT_FAILURE',
      `Dropped batch of ${batchSize} record(s) after ${attempts} attempt(s): ${describeError(reason)}`,
      { batchSize, attempts },
    );
    this.name = 'ExportFailureException';
  }
}

/**
 * A producer hit a full queue under a non-blocking overflow policy.
 */
export class QueueOverflowException extends TelemetryException {
  constructor(
    public readonly capacity: number,
    public readonly policy: 'block' | 'dropNewest' | 'dropOldest',
  ) {
    super(
      'QUEUE_OVERFLOW',
      policy === 'dropOldest'
        ? `Export queue full (capacity ${capacity}); oldest record evicted`
        : policy === 'block'
          ? `Export queue full (capacity ${capacity}) with too many producers waiting; incoming record dropped`
          : `Export queue full (capacity ${capacity}); incoming record dropped`,
      { capacity, policy },
    );
    this.name = 'QueueOverflowException';
  }
}

/**
 * A record was offered after the exporter stopped accepting.
 */
export class QueueClosedException extends TelemetryException {
  constructor() {
    super('QUEUE_CLOSED', 'Export queue is closed; record not accepted');
    this.name = 'QueueClosedException';
  }
}

/**
 * Configuration did not pass validation.
 */
export class ConfigValidationException extends TelemetryException {
  constructor(public readonly errors: readonly string[]) {
    super(
      'CONFIG_VALIDATION',
      `Invalid telemetry configuration: ${errors.join('; ')}`,
      { errors },
    );
    this.name = 'ConfigValidationException';
  }
}

/**
 * Short description of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
