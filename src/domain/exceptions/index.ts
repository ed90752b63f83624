/**
 * @lumberline/core - Exception Module
 */

export {
  TelemetryException,
  ContextMismatchException,
  SpanNotOpenException,
  SpanStateViolationException,
  DispatchStageFailureException,
  ExportFailureException,
  QueueOverflowException,
  QueueClosedException,
  ConfigValidationException,
  describeError,
} from './exceptions';

export type { TelemetryErrorCode } from './exceptions';
