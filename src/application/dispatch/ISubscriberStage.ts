/**
 * @lumberline/core - Subscriber Stage Interface
 *
 * A stage is any object implementing a subset of four capabilities.
 * The capability set is closed: dispatch only ever calls these four
 * methods, in this order.
 *
 * ```
 * record → filter → enrich → format → export
 * ```
 *
 * @module application/dispatch/ISubscriberStage
 */

import type { RecordLevel } from '../../domain/metadata/Level';
import type {
  DispatchRecord,
  DispatchRecordKind,
} from '../../domain/records/DispatchRecord';

/**
 * Output of a format stage, handed to export stages.
 */
export interface RenderedRecord {
  /** Rendered text, one record per value */
  readonly text: string;

  /** Level of the source record (sinks route on it) */
  readonly level: RecordLevel;

  /** Kind of the source record */
  readonly kind: DispatchRecordKind;
}

/**
 * Decides whether a record continues down the chain.
 */
export interface IFilterCapability {
  /**
   * @returns False to drop the record; no later stage sees it
   */
  filter(record: DispatchRecord): boolean;
}

/**
 * Derives an augmented record. The input must not be mutated.
 */
export interface IEnrichCapability {
  enrich(record: DispatchRecord): DispatchRecord;
}

/**
 * Renders a record to text.
 */
export interface IFormatCapability {
  format(record: DispatchRecord): string;
}

/**
 * Accepts rendered output for delivery.
 *
 * The returned promise settles once the record was accepted (queued) or
 * dropped, not once it reached its destination.
 */
export interface IExportCapability {
  export(rendered: RenderedRecord): Promise<void>;
}

/**
 * ISubscriberStage - a pipeline component.
 *
 * @example
 * ```typescript
 * const redact: ISubscriberStage = {
 *   name: 'redact-passwords',
 *   enrich: (record) => ({
 *     ...record,
 *     fields: record.fields.filter((f) => f.key !== 'password'),
 *   }),
 * };
 * ```
 */
export interface ISubscriberStage
  extends Partial<IFilterCapability>,
    Partial<IEnrichCapability>,
    Partial<IFormatCapability>,
    Partial<IExportCapability> {
  /** Name used in diagnostics */
  readonly name: string;
}

/**
 * Capability names in the order dispatch applies them.
 */
export type StageCapability = 'filter' | 'enrich' | 'format' | 'export';

/**
 * Type guard for stage objects.
 */
export function isSubscriberStage(value: unknown): value is ISubscriberStage {
  if (typeof value !== 'object' || value === null) return false;
  if (!('name' in value) || typeof value.name !== 'string') return false;
  return (
    ('filter' in value && typeof value.filter === 'function') ||
    ('enrich' in value && typeof value.enrich === 'function') ||
    ('format' in value && typeof value.format === 'function') ||
    ('export' in value && typeof value.export === 'function')
  );
}

/**
 * Create a filter-only stage.
 */
export function filterStage(
  name: string,
  filter: (record: DispatchRecord) => boolean,
): ISubscriberStage {
  return { name, filter };
}

/**
 * Create an enrich-only stage.
 */
export function enrichStage(
  name: string,
  enrich: (record: DispatchRecord) => DispatchRecord,
): ISubscriberStage {
  return { name, enrich };
}

/**
 * Create a format-only stage.
 */
export function formatStage(
  name: string,
  format: (record: DispatchRecord) => string,
): ISubscriberStage {
  return { name, format };
}

/**
 * Create an export-only stage.
 */
export function exportStage(
  name: string,
  exportFn: (rendered: RenderedRecord) => Promise<void>,
): ISubscriberStage {
  return { name, export: exportFn };
}
