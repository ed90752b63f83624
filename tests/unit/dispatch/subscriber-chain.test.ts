/**
 * @fileoverview Unit tests for the subscriber chain, its builder and the
 * built-in stages
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  ContextStack,
  DispatchStageFailureException,
  EMPTY_FIELDS,
  Level,
  RecordBuilder,
  SpanIdAllocator,
  SpanRegistry,
  SpanStateViolationException,
  SubscriberChain,
  createFieldSet,
  createMetadata,
  createSubscriberChain,
  enrichStage,
  exportStage,
  filterStage,
  fixedClock,
  formatStage,
  levelFilter,
  resetDiagnosticSink,
  setDiagnosticSink,
  staticFieldsEnricher,
  targetFilter,
  type DispatchRecord,
  type ISubscriberStage,
  type RenderedRecord,
} from '../../../src';

const infoSite = createMetadata({ level: Level.Info, name: 'ready', target: 'app' });
const debugSite = createMetadata({ level: Level.Debug, name: 'tick', target: 'app.timer' });

const defaultFormatter = {
  format: (record: DispatchRecord) => `default:${record.metadata.name}`,
};

describe('SubscriberChain', () => {
  let builder: RecordBuilder;
  let diagnostics: unknown[];

  beforeEach(() => {
    builder = new RecordBuilder(fixedClock(0));
    diagnostics = [];
    setDiagnosticSink((error) => diagnostics.push(error));
  });

  afterEach(() => {
    resetDiagnosticSink();
  });

  const event = (site = infoSite) =>
    builder.event(site, EMPTY_FIELDS, new ContextStack());

  describe('ordering', () => {
    it('should run stages in order and capabilities as filter, enrich, format, export', async () => {
      const calls: string[] = [];
      const exported: string[] = [];

      const full: ISubscriberStage = {
        name: 'a',
        filter: () => {
          calls.push('a.filter');
          return true;
        },
        enrich: (record) => {
          calls.push('a.enrich');
          return record;
        },
        format: () => {
          calls.push('a.format');
          return 'a-text';
        },
        export: async (rendered) => {
          calls.push('a.export');
          exported.push(rendered.text);
        },
      };
      const partial: ISubscriberStage = {
        name: 'b',
        filter: () => {
          calls.push('b.filter');
          return true;
        },
        export: async (rendered) => {
          calls.push('b.export');
          exported.push(rendered.text);
        },
      };

      const chain = new SubscriberChain([full, partial], { defaultFormatter });
      await chain.dispatch(event());

      expect(calls).toEqual([
        'a.filter',
        'a.enrich',
        'a.format',
        'a.export',
        'b.filter',
        'b.export',
      ]);
      expect(exported).toEqual(['a-text', 'a-text']);
    });

    it('should use the default formatter when nothing formatted yet', async () => {
      const exported: RenderedRecord[] = [];
      const chain = new SubscriberChain(
        [exportStage('out', async (rendered) => void exported.push(rendered))],
        { defaultFormatter },
      );

      await chain.dispatch(event());

      expect(exported).toEqual([
        { text: 'default:ready', level: Level.Info, kind: 'event' },
      ]);
    });

    it('should re-render after an enrich replaced the record', async () => {
      const exported: string[] = [];
      const chain = new SubscriberChain(
        [
          formatStage('early', () => 'stale'),
          enrichStage('rename', (record) => ({
            ...record,
            metadata: createMetadata({ ...record.metadata, name: 'renamed' }),
          })),
          exportStage('out', async (rendered) => void exported.push(rendered.text)),
        ],
        { defaultFormatter },
      );

      await chain.dispatch(event());

      expect(exported).toEqual(['default:renamed']);
    });
  });

  describe('filtering', () => {
    it('should end the chain when a filter returns false', async () => {
      const exported: string[] = [];
      const chain = new SubscriberChain(
        [
          filterStage('none', () => false),
          exportStage('out', async (rendered) => void exported.push(rendered.text)),
        ],
        { defaultFormatter },
      );

      await chain.dispatch(event());

      expect(exported).toEqual([]);
      expect(chain.counters.snapshot()).toEqual({
        recordsEmitted: 1,
        dropped: { filtered: 1, overflow: 0, exportFailure: 0, shutdown: 0 },
        batchesSent: 0,
        exportRetries: 0,
      });
    });
  });

  describe('failure containment', () => {
    it('should drop the record and report a throwing stage', async () => {
      const exported: string[] = [];
      const chain = new SubscriberChain(
        [
          enrichStage('broken', () => {
            throw new Error('enricher exploded');
          }),
          exportStage('out', async (rendered) => void exported.push(rendered.text)),
        ],
        { defaultFormatter },
      );

      await expect(chain.dispatch(event())).resolves.toBeUndefined();

      expect(exported).toEqual([]);
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toBeInstanceOf(DispatchStageFailureException);
      if (diagnostics[0] instanceof DispatchStageFailureException) {
        expect(diagnostics[0].stage).toBe('broken');
        expect(diagnostics[0].capability).toBe('enrich');
        expect(diagnostics[0].message).toBe(
          'Stage "broken" failed in enrich: enricher exploded',
        );
      }
    });

    it('should report a rejected export and still resolve', async () => {
      const chain = new SubscriberChain(
        [
          exportStage('out', async () => {
            throw new Error('sink offline');
          }),
        ],
        { defaultFormatter },
      );

      await expect(chain.dispatch(event())).resolves.toBeUndefined();

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toBeInstanceOf(DispatchStageFailureException);
    });

    it('should keep later exporters running when one fails', async () => {
      const exported: string[] = [];
      const chain = new SubscriberChain(
        [
          exportStage('bad', () => Promise.reject(new Error('nope'))),
          exportStage('good', async (rendered) => void exported.push(rendered.text)),
        ],
        { defaultFormatter },
      );

      await chain.dispatch(event());

      expect(exported).toEqual(['default:ready']);
    });
  });

  describe('span state machine', () => {
    const spanRecords = () => {
      const registry = new SpanRegistry({
        ids: new SpanIdAllocator(),
        clock: fixedClock(0),
      });
      const stack = new ContextStack();
      const opened = registry.open(infoSite, EMPTY_FIELDS, stack);
      const closed = registry.close(opened.id, stack);
      return {
        opened: builder.spanOpened(opened),
        closed: builder.spanClosed(closed),
      };
    };

    it('should accept open then close', async () => {
      const { opened, closed } = spanRecords();
      const chain = new SubscriberChain([], { defaultFormatter });

      await chain.dispatch(opened);
      expect(chain.openSpanCount).toBe(1);
      await chain.dispatch(closed);
      expect(chain.openSpanCount).toBe(0);
      expect(diagnostics).toEqual([]);
    });

    it('should report and drop a close for a span never opened', async () => {
      const { closed } = spanRecords();
      const exported: string[] = [];
      const chain = new SubscriberChain(
        [exportStage('out', async (rendered) => void exported.push(rendered.text))],
        { defaultFormatter },
      );

      await chain.dispatch(closed);

      expect(exported).toEqual([]);
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toBeInstanceOf(SpanStateViolationException);
    });

    it('should report a span opened twice', async () => {
      const { opened } = spanRecords();
      const chain = new SubscriberChain([], { defaultFormatter });

      await chain.dispatch(opened);
      await chain.dispatch(opened);

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]).toBeInstanceOf(SpanStateViolationException);
    });

    it('should report a second close', async () => {
      const { opened, closed } = spanRecords();
      const chain = new SubscriberChain([], { defaultFormatter });

      await chain.dispatch(opened);
      await chain.dispatch(closed);
      await chain.dispatch(closed);

      expect(diagnostics).toHaveLength(1);
    });
  });

  describe('built-in stages', () => {
    it('should filter by level, reading a threshold holder on every record', async () => {
      let threshold = Level.Info;
      const exported: string[] = [];
      const chain = new SubscriberChain(
        [
          levelFilter({ get: () => threshold }),
          exportStage('out', async (rendered) => void exported.push(rendered.text)),
        ],
        { defaultFormatter },
      );

      await chain.dispatch(event(debugSite));
      threshold = Level.Debug;
      await chain.dispatch(event(debugSite));

      expect(exported).toEqual(['default:tick']);
      expect(chain.counters.dropped('filtered')).toBe(1);
    });

    it('should filter by target prefix', async () => {
      const exported: string[] = [];
      const chain = new SubscriberChain(
        [
          targetFilter(['app.timer']),
          exportStage('out', async (rendered) => void exported.push(rendered.text)),
        ],
        { defaultFormatter },
      );

      await chain.dispatch(event(infoSite));
      await chain.dispatch(event(debugSite));

      expect(exported).toEqual(['default:tick']);
    });

    it('should append static fields after the record fields', async () => {
      const seen: DispatchRecord[] = [];
      const chain = new SubscriberChain(
        [
          staticFieldsEnricher({ service: 'billing' }),
          filterStage('capture', (record) => {
            seen.push(record);
            return true;
          }),
        ],
        { defaultFormatter },
      );

      await chain.dispatch(
        builder.event(infoSite, createFieldSet({ id: 7 }), new ContextStack()),
      );

      expect(seen[0]?.fields).toEqual([
        { key: 'id', value: 7 },
        { key: 'service', value: 'billing' },
      ]);
    });
  });
});

describe('SubscriberChainBuilder', () => {
  const stage = (name: string): ISubscriberStage => ({ name, filter: () => true });

  it('should place stages with use, prepend and insertAt', () => {
    const names = createSubscriberChain()
      .use(stage('b'))
      .use(stage('d'))
      .prepend(stage('a'))
      .insertAt(2, stage('c'))
      .build()
      .map((s) => s.name);

    expect(names).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should add conditional stages only when the condition holds', () => {
    const builder = createSubscriberChain()
      .useIf(true, stage('yes'))
      .useIf(() => false, stage('no'));

    expect(builder.length).toBe(1);
    expect(builder.clear().length).toBe(0);
  });

  it('should compose a chain with the given stages', () => {
    const chain = createSubscriberChain()
      .use(stage('only'))
      .compose({ defaultFormatter });

    expect(chain.getStages().map((s) => s.name)).toEqual(['only']);
  });
});
