/**
 * @lumberline/core - Field Sets
 *
 * Ordered key/value pairs attached to events and spans. Insertion order
 * is kept so that rendered output is deterministic.
 *
 * @module domain/metadata/fields
 */

import { inspect } from 'util';

/**
 * Value rendered through `util.inspect` rather than as a scalar.
 */
export interface DebugValue {
  readonly kind: 'debug';
  readonly value: unknown;
}

/**
 * Values a field can hold.
 */
export type FieldValue = string | number | bigint | boolean | DebugValue;

/**
 * A single field.
 */
export interface Field {
  readonly key: string;
  readonly value: FieldValue;
}

/**
 * Frozen, ordered field list owned by one record.
 */
export type FieldSet = readonly Field[];

/**
 * Caller-supplied fields. Object insertion order becomes field order.
 * `null` and `undefined` values are skipped.
 */
export type FieldInput = Readonly<Record<string, unknown>>;

/**
 * Empty field set shared by records without fields.
 */
export const EMPTY_FIELDS: FieldSet = Object.freeze([]);

/**
 * Wrap a value so it is rendered with `util.inspect`.
 */
export function debugValue(value: unknown): DebugValue {
  return Object.freeze({ kind: 'debug' as const, value });
}

/**
 * Type guard for {@link DebugValue}.
 */
export function isDebugValue(value: unknown): value is DebugValue {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'debug' &&
    'value' in value
  );
}

/**
 * Normalise an arbitrary value into a field value.
 *
 * Scalars pass through; anything else (objects, arrays, errors, symbols,
 * functions) becomes a debug value.
 */
export function toFieldValue(value: unknown): FieldValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return value;
    default:
      return isDebugValue(value) ? value : debugValue(value);
  }
}

/**
 * Build a frozen field set from caller input.
 */
export function createFieldSet(input?: FieldInput): FieldSet {
  if (!input) {
    return EMPTY_FIELDS;
  }

  const fields: Field[] = [];
  for (const [key, raw] of Object.entries(input)) {
    if (raw === null || raw === undefined) continue;
    fields.push(Object.freeze({ key, value: toFieldValue(raw) }));
  }

  return fields.length === 0 ? EMPTY_FIELDS : Object.freeze(fields);
}

/**
 * Return a new field set with one field appended.
 */
export function appendField(
  fields: FieldSet,
  key: string,
  value: unknown,
): FieldSet {
  return Object.freeze([
    ...fields,
    Object.freeze({ key, value: toFieldValue(value) }),
  ]);
}

/**
 * Merge two field sets; later keys are appended, never replacing earlier ones.
 */
export function concatFields(first: FieldSet, second: FieldSet): FieldSet {
  if (second.length === 0) return first;
  if (first.length === 0) return second;
  return Object.freeze([...first, ...second]);
}

/**
 * Render a field value as text.
 *
 * Integers print without a fractional part, floats as JavaScript prints
 * them, bigints without the `n` suffix, strings containing whitespace or
 * `=` are quoted.
 */
export function renderFieldValue(value: FieldValue): string {
  if (isDebugValue(value)) {
    return inspect(value.value, { breakLength: Infinity, depth: 4 });
  }
  if (typeof value === 'string') {
    return /[\s="]/.test(value) || value.length === 0
      ? JSON.stringify(value)
      : value;
  }
  return String(value);
}

/**
 * Convert a field value into a JSON-safe value.
 */
export function fieldValueToJson(value: FieldValue): unknown {
  if (isDebugValue(value)) {
    return inspect(value.value, { breakLength: Infinity, depth: 4 });
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}
