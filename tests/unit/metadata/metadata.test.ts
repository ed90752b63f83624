/**
 * @fileoverview Unit tests for levels, metadata, field sets and clocks
 */

import { describe, it, expect } from '@jest/globals';
import {
  Level,
  levelName,
  levelColor,
  parseLevel,
  isLevelEnabled,
  createMetadata,
  callsiteKey,
  EMPTY_FIELDS,
  createFieldSet,
  appendField,
  concatFields,
  debugValue,
  isDebugValue,
  toFieldValue,
  renderFieldValue,
  fieldValueToJson,
  fixedClock,
} from '../../../src';

describe('Level', () => {
  it('should order severities from Trace to Error', () => {
    expect(Level.Trace < Level.Debug).toBe(true);
    expect(Level.Debug < Level.Info).toBe(true);
    expect(Level.Info < Level.Warn).toBe(true);
    expect(Level.Warn < Level.Error).toBe(true);
  });

  it('should parse names case-insensitively', () => {
    expect(parseLevel('debug')).toBe(Level.Debug);
    expect(parseLevel(' Info ')).toBe(Level.Info);
    expect(parseLevel('WARNING')).toBe(Level.Warn);
    expect(parseLevel('off')).toBe(Level.Off);
  });

  it('should return undefined for unknown names', () => {
    expect(parseLevel('verbose')).toBeUndefined();
    expect(parseLevel('')).toBeUndefined();
  });

  it('should compare a level against a threshold', () => {
    expect(isLevelEnabled(Level.Debug, Level.Info)).toBe(false);
    expect(isLevelEnabled(Level.Info, Level.Info)).toBe(true);
    expect(isLevelEnabled(Level.Error, Level.Info)).toBe(true);
    expect(isLevelEnabled(Level.Error, Level.Off)).toBe(false);
  });

  it('should expose names and colours', () => {
    expect(levelName(Level.Warn)).toBe('WARN');
    expect(levelName(Level.Off)).toBe('OFF');
    expect(levelColor(Level.Error)).toBe('\x1b[31m');
    expect(levelColor(Level.Info)).toBe('\x1b[32m');
    expect(levelColor(Level.Off)).toBe('');
  });
});

describe('Metadata', () => {
  it('should freeze and omit absent location', () => {
    const metadata = createMetadata({
      level: Level.Info,
      name: 'started',
      target: 'app',
    });

    expect(Object.isFrozen(metadata)).toBe(true);
    expect('file' in metadata).toBe(false);
    expect('line' in metadata).toBe(false);
  });

  it('should key call sites by every identifying attribute', () => {
    const base = { level: Level.Info, name: 'started', target: 'app' } as const;

    expect(callsiteKey(createMetadata(base))).toBe(
      callsiteKey(createMetadata(base)),
    );
    expect(callsiteKey(createMetadata({ ...base, line: 1 }))).not.toBe(
      callsiteKey(createMetadata({ ...base, line: 2 })),
    );
    expect(callsiteKey(createMetadata(base))).not.toBe(
      callsiteKey(createMetadata({ ...base, level: Level.Warn })),
    );
  });
});

describe('Field sets', () => {
  it('should keep insertion order and skip null and undefined', () => {
    const fields = createFieldSet({ a: 1, b: undefined, c: null, d: 'x' });

    expect(fields).toEqual([
      { key: 'a', value: 1 },
      { key: 'd', value: 'x' },
    ]);
    expect(Object.isFrozen(fields)).toBe(true);
  });

  it('should share the empty set', () => {
    expect(createFieldSet({})).toBe(EMPTY_FIELDS);
    expect(createFieldSet()).toBe(EMPTY_FIELDS);
  });

  it('should wrap non-primitive values as debug values', () => {
    const value = toFieldValue({ retries: 2 });

    expect(isDebugValue(value)).toBe(true);
    expect(value).toEqual({ kind: 'debug', value: { retries: 2 } });
    expect(toFieldValue(7n)).toBe(7n);
  });

  it('should not re-wrap a debug value', () => {
    const wrapped = debugValue([1, 2]);
    expect(toFieldValue(wrapped)).toBe(wrapped);
  });

  it('should append without mutating the original set', () => {
    const original = createFieldSet({ a: 1 });
    const extended = appendField(original, 'b', true);

    expect(original).toHaveLength(1);
    expect(extended).toEqual([
      { key: 'a', value: 1 },
      { key: 'b', value: true },
    ]);
  });

  it('should concatenate and reuse sides that are empty', () => {
    const left = createFieldSet({ a: 1 });
    const right = createFieldSet({ b: 2 });

    expect(concatFields(left, EMPTY_FIELDS)).toBe(left);
    expect(concatFields(EMPTY_FIELDS, right)).toBe(right);
    expect(concatFields(left, right)).toEqual([
      { key: 'a', value: 1 },
      { key: 'b', value: 2 },
    ]);
  });

  it('should render values for text output', () => {
    expect(renderFieldValue('plain')).toBe('plain');
    expect(renderFieldValue('hello world')).toBe('"hello world"');
    expect(renderFieldValue('a=b')).toBe('"a=b"');
    expect(renderFieldValue('')).toBe('""');
    expect(renderFieldValue(42)).toBe('42');
    expect(renderFieldValue(1.5)).toBe('1.5');
    expect(renderFieldValue(10n)).toBe('10');
    expect(renderFieldValue(false)).toBe('false');
    expect(renderFieldValue(debugValue({ a: 1 }))).toBe('{ a: 1 }');
  });

  it('should convert values for JSON output', () => {
    expect(fieldValueToJson(5n)).toBe('5');
    expect(fieldValueToJson('x')).toBe('x');
    expect(fieldValueToJson(debugValue(['a']))).toBe("[ 'a' ]");
  });
});

describe('fixedClock', () => {
  it('should return a fixed wall time and a ticking monotonic time', () => {
    const clock = fixedClock(1_000);

    expect(clock.now()).toEqual({ epochMs: 1_000, monotonicMs: 0 });
    expect(clock.now()).toEqual({ epochMs: 1_000, monotonicMs: 1 });
  });
});
