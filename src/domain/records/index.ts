/**
 * @lumberline/core - Record Module
 */

export { isSpanRecord } from './DispatchRecord';
export type {
  DispatchRecord,
  DispatchRecordKind,
  EventRecord,
  SpanOpenedRecord,
  SpanClosedRecord,
} from './DispatchRecord';

export { RecordBuilder } from './RecordBuilder';
