/**
 * @lumberline/core - Metadata Module
 *
 * Levels, call-site descriptors, field sets and timestamps
 */

export {
  Level,
  ANSI_RESET,
  levelName,
  levelColor,
  parseLevel,
  isLevelEnabled,
} from './Level';
export type { RecordLevel } from './Level';

export { createMetadata, callsiteKey } from './Metadata';
export type { Metadata } from './Metadata';

export {
  EMPTY_FIELDS,
  debugValue,
  isDebugValue,
  toFieldValue,
  createFieldSet,
  appendField,
  concatFields,
  renderFieldValue,
  fieldValueToJson,
} from './fields';
export type {
  DebugValue,
  FieldValue,
  Field,
  FieldSet,
  FieldInput,
} from './fields';

export { systemClock, fixedClock } from './clock';
export type { Clock, Timestamp } from './clock';
