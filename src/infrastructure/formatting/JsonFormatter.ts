/**
 * @lumberline/core - JSON Formatter
 *
 * One JSON object per record, for log shippers.
 *
 * @module infrastructure/formatting/JsonFormatter
 */

import type { IFormatCapability } from '../../application/dispatch/ISubscriberStage';
import { fieldValueToJson, type FieldSet } from '../../domain/metadata/fields';
import { levelName } from '../../domain/metadata/Level';
import type { DispatchRecord } from '../../domain/records/DispatchRecord';

/**
 * Shape of a rendered JSON line.
 */
export interface JsonRecord {
  timestamp: string;
  level: string;
  kind: DispatchRecord['kind'];
  target: string;
  name: string;
  spanId?: number;
  parentId?: number;
  durationMs?: number;
  file?: string;
  line?: number;
  fields: Record<string, unknown>;
}

/**
 * JsonFormatter - structured single-line output.
 *
 * @example
 * ```typescript
 * new JsonFormatter().format(record);
 * // {"timestamp":"2024-01-01T00:00:00.000Z","level":"INFO","kind":"event",...}
 * ```
 */
export class JsonFormatter implements IFormatCapability {
  format(record: DispatchRecord): string {
    return JSON.stringify(toJsonRecord(record));
  }
}

export function toJsonRecord(record: DispatchRecord): JsonRecord {
  const { metadata } = record;
  const json: JsonRecord = {
    timestamp: new Date(record.timestamp.epochMs).toISOString(),
    level: levelName(metadata.level),
    kind: record.kind,
    target: metadata.target,
    name: metadata.name,
    fields: fieldsToObject(record.fields),
  };

  if (record.kind !== 'event') json.spanId = record.spanId;
  if (record.parentId !== undefined) json.parentId = record.parentId;
  if (record.kind === 'span.closed') json.durationMs = record.durationMs;
  if (metadata.file !== undefined) json.file = metadata.file;
  if (metadata.line !== undefined) json.line = metadata.line;

  return json;
}

// later duplicates of a key win
function fieldsToObject(fields: FieldSet): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const field of fields) {
    out[field.key] = fieldValueToJson(field.value);
  }
  return out;
}
