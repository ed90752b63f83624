/**
 * @lumberline/core - Built-in Stages
 */

import { Level, isLevelEnabled } from '../../domain/metadata/Level';
import { concatFields, createFieldSet } from '../../domain/metadata/fields';
import type { FieldInput } from '../../domain/metadata/fields';
import type { DispatchRecord } from '../../domain/records/DispatchRecord';
import type { ISubscriberStage } from './ISubscriberStage';

/**
 * Threshold holder shared between the level filter and whoever adjusts it
 * at run time.
 */
export interface LevelThreshold {
  get(): Level;
}

/**
 * Filter dropping records below a minimum level.
 *
 * @param threshold - Fixed level, or a holder read on every record
 */
export function levelFilter(threshold: Level | LevelThreshold): ISubscriberStage {
  const read =
    typeof threshold === 'object' ? () => threshold.get() : () => threshold;

  return {
    name: 'level-filter',
    filter: (record) => isLevelEnabled(record.metadata.level, read()),
  };
}

/**
 * Filter keeping records whose target starts with one of `prefixes`.
 */
export function targetFilter(prefixes: readonly string[]): ISubscriberStage {
  return {
    name: 'target-filter',
    filter: (record) =>
      prefixes.some((prefix) => record.metadata.target.startsWith(prefix)),
  };
}

/**
 * Enricher appending static fields (service name, host, ...) to every
 * record. Appended fields follow the record's own fields.
 */
export function staticFieldsEnricher(fields: FieldInput): ISubscriberStage {
  const extra = createFieldSet(fields);

  return {
    name: 'static-fields',
    enrich: (record): DispatchRecord =>
      Object.freeze({ ...record, fields: concatFields(record.fields, extra) }),
  };
}
