/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import { SymbolInterner } from '../SymbolInterner.js';
import { collectTraceEvents, saturatingSub } from '../TraceEventCollector.js';
import type { AbsoluteTimestamp, RawTraceRecord } from '../types.js';

const EPOCH = 1_700_000_000_000_000_000n;

function createRecord(
  start: AbsoluteTimestamp,
  end: AbsoluteTimestamp,
  overrides: Partial<RawTraceRecord> = {},
): RawTraceRecord {
  return {
    threadId: 1,
    label: 'work',
    kind: 'Task',
    extraLabels: [],
    payload: null,
    interval: { start, end },
    ...overrides,
  };
}

describe('saturatingSub', () => {
  it('should subtract without going below zero', () => {
    expect(saturatingSub(10n, 4n)).toBe(6n);
    expect(saturatingSub(4n, 10n)).toBe(0n);
    expect(saturatingSub(4, 4)).toBe(0n);
  });

  it('should accept mixed bigint and number operands', () => {
    expect(saturatingSub(EPOCH + 25n, EPOCH)).toBe(25n);
    expect(saturatingSub(1_000, 250n)).toBe(750n);
  });

  it('should truncate fractional nanoseconds', () => {
    expect(saturatingSub(10.9, 2)).toBe(8n);
  });
});

describe('collectTraceEvents', () => {
  it('should make times relative to the epoch', () => {
    const interner = new SymbolInterner();

    const result = collectTraceEvents(
      [createRecord(EPOCH + 100n, EPOCH + 250n)],
      interner,
      EPOCH,
    );

    expect(result.events).toHaveLength(1);
    expect(result.events[0]?.startNs).toBe(100);
    expect(result.events[0]?.durationNs).toBe(150);
    expect(result.maxNs).toBe(250);
    expect(result.eventCount).toBe(1);
  });

  it('should clamp timestamps before the epoch to zero', () => {
    const interner = new SymbolInterner();

    const result = collectTraceEvents(
      [createRecord(EPOCH - 50n, EPOCH + 30n), createRecord(EPOCH - 90n, EPOCH - 10n)],
      interner,
      EPOCH,
    );

    expect(result.events.map((event) => [event.startNs, event.durationNs])).toEqual([
      [0, 30],
      [0, 0],
    ]);
    expect(result.maxNs).toBe(30);
  });

  it('should give inverted intervals zero duration', () => {
    const result = collectTraceEvents([createRecord(500, 200)], new SymbolInterner(), 0);

    expect(result.events[0]?.startNs).toBe(500);
    expect(result.events[0]?.durationNs).toBe(0);
  });

  it('should drop records without an interval', () => {
    const interner = new SymbolInterner();
    const records = [
      createRecord(0, 10),
      createRecord(0, 0, { interval: null, label: 'counter', payload: 42 }),
      createRecord(20, 30),
    ];

    const result = collectTraceEvents(records, interner, 0);

    expect(result.eventCount).toBe(2);
    expect(result.events.map((event) => event.startNs)).toEqual([0, 20]);
    expect(interner.has('counter')).toBe(false);
  });

  it('should intern label, kind and extra labels in reading order', () => {
    const interner = new SymbolInterner();
    const records = [
      createRecord(0, 10, { label: 'foo', kind: 'Task', extraLabels: ['src/a.ts'] }),
      createRecord(5, 8, { label: 'bar', kind: 'Task', extraLabels: ['src/a.ts', 'line 3'] }),
    ];

    const { events } = collectTraceEvents(records, interner, 0);

    expect(interner.resolve(0)).toBe('foo');
    expect(interner.resolve(1)).toBe('Task');
    expect(interner.resolve(2)).toBe('src/a.ts');
    expect(events[1]?.label).toBe(interner.intern('bar'));
    expect(events[1]?.extraData.map((symbol) => interner.resolve(symbol))).toEqual([
      'src/a.ts',
      'line 3',
    ]);
    expect(interner.size).toBe(5);
  });

  it('should carry thread id and payload through unchanged', () => {
    const result = collectTraceEvents(
      [createRecord(0, 1, { threadId: 7, payload: 3.5 })],
      new SymbolInterner(),
      0,
    );

    expect(result.events[0]?.threadId).toBe(7);
    expect(result.events[0]?.payload).toBe(3.5);
  });

  it('should return an empty result for no records', () => {
    const result = collectTraceEvents([], new SymbolInterner(), EPOCH);

    expect(result).toEqual({ events: [], eventCount: 0, maxNs: 0 });
  });
});
