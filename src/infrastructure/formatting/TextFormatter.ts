/**
 * @lumberline/core - Text Formatter
 *
 * Renders one human-readable line per record:
 *
 * ```
 * 14:03:07.125 INFO  http.server [#4]: request handled status=200 src/server.ts:42
 * 14:03:07.126 DEBUG db: span.open query#5 table=users
 * 14:03:07.131 DEBUG db: span.close query#5 (5ms) table=users
 * ```
 *
 * @module infrastructure/formatting/TextFormatter
 */

import type { IFormatCapability } from '../../application/dispatch/ISubscriberStage';
import { renderFieldValue, type FieldSet } from '../../domain/metadata/fields';
import { ANSI_RESET, levelColor, levelName } from '../../domain/metadata/Level';
import type { Metadata } from '../../domain/metadata/Metadata';
import type { DispatchRecord } from '../../domain/records/DispatchRecord';

/**
 * Text formatter options.
 */
export interface TextFormatterOptions {
  /**
   * Wrap the level in its ANSI colour.
   * @defaultValue false
   */
  color?: boolean;

  /**
   * Append `file:line` when the call site is known.
   * @defaultValue true
   */
  location?: boolean;
}

/**
 * TextFormatter - `HH:MM:SS.mmm LEVEL target: message key=value`.
 *
 * Clock time is UTC. The level column is padded to five characters so
 * messages line up.
 */
export class TextFormatter implements IFormatCapability {
  private readonly color: boolean;
  private readonly location: boolean;

  constructor(options: TextFormatterOptions = {}) {
    this.color = options.color ?? false;
    this.location = options.location ?? true;
  }

  format(record: DispatchRecord): string {
    const { metadata } = record;
    const parts = [
      formatClockTime(record.timestamp.epochMs),
      this.formatLevel(metadata),
      `${metadata.target}${record.parentId !== undefined ? ` [#${record.parentId}]` : ''}:`,
      messageOf(record),
    ];

    const fields = formatFields(record.fields);
    if (fields) parts.push(fields);

    if (this.location && metadata.file !== undefined) {
      parts.push(
        metadata.line !== undefined
          ? `${metadata.file}:${metadata.line}`
          : metadata.file,
      );
    }

    return parts.join(' ');
  }

  private formatLevel(metadata: Metadata): string {
    const label = levelName(metadata.level).padEnd(5);
    return this.color
      ? `${levelColor(metadata.level)}${label}${ANSI_RESET}`
      : label;
  }
}

function messageOf(record: DispatchRecord): string {
  switch (record.kind) {
    case 'event':
      return record.metadata.name;
    case 'span.opened':
      return `span.open ${record.metadata.name}#${record.spanId}`;
    case 'span.closed':
      return `span.close ${record.metadata.name}#${record.spanId} (${Math.round(record.durationMs)}ms)`;
  }
}

/**
 * `key=value` pairs separated by spaces, in field order.
 */
export function formatFields(fields: FieldSet): string {
  return fields
    .map((field) => `${field.key}=${renderFieldValue(field.value)}`)
    .join(' ');
}

/**
 * `HH:MM:SS.mmm` in UTC.
 */
export function formatClockTime(epochMs: number): string {
  const date = new Date(epochMs);
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return (
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:` +
    `${pad(date.getUTCSeconds())}.${pad(date.getUTCMilliseconds(), 3)}`
  );
}
