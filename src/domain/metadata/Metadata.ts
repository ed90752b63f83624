/**
 * @lumberline/core - Call-Site Metadata
 *
 * @module domain/metadata/Metadata
 */

import type { RecordLevel } from './Level';

/**
 * Immutable descriptor of a call site.
 *
 * One Metadata value exists per call site and is shared, read-only, by
 * every record produced there. Events use `name` as their message; spans
 * use it as the span name.
 *
 * @example
 * ```typescript
 * const site = createMetadata({
 *   level: Level.Info,
 *   name: 'request',
 *   target: 'http.server',
 *   file: 'src/server.ts',
 *   line: 42,
 * });
 * ```
 */
export interface Metadata {
  /** Severity of records produced at this site */
  readonly level: RecordLevel;

  /** Event message or span name */
  readonly name: string;

  /** Logical component that emits the record (module path, subsystem) */
  readonly target: string;

  /** Source file, if known */
  readonly file?: string;

  /** Source line, if known */
  readonly line?: number;
}

/**
 * Create a frozen Metadata value.
 */
export function createMetadata(init: Metadata): Metadata {
  const metadata: Metadata = {
    level: init.level,
    name: init.name,
    target: init.target,
    ...(init.file !== undefined && { file: init.file }),
    ...(init.line !== undefined && { line: init.line }),
  };
  return Object.freeze(metadata);
}

/**
 * Key identifying a call site, used to intern Metadata values.
 */
export function callsiteKey(metadata: Metadata): string {
  return [
    metadata.level,
    metadata.target,
    metadata.name,
    metadata.file ?? '',
    metadata.line ?? '',
  ].join('\u0000');
}
