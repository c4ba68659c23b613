/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import { buildKindColorMap, resolveKindColor } from '../KindColorResolver.js';
import { SymbolInterner } from '../SymbolInterner.js';
import { TRACE_INDEX_CONSTANTS, type IngestedEvent } from '../types.js';

function createEvents(interner: SymbolInterner, kinds: string[]): IngestedEvent[] {
  return kinds.map((kind, index) => ({
    label: interner.intern(`event ${index}`),
    kind: interner.intern(kind),
    extraData: [],
    payload: null,
    threadId: 1,
    startNs: index,
    durationNs: 1,
  }));
}

describe('KindColorResolver', () => {
  it('should spread kinds around the wheel starting at green', () => {
    const interner = new SymbolInterner();
    const events = createEvents(interner, ['Task', 'IO', 'Render', 'IO']);

    const colors = buildKindColorMap(events, interner);

    expect(colors.size).toBe(3);
    expect(colors.get(interner.intern('IO'))).toBe(0xbadeba);
    expect(colors.get(interner.intern('Render'))).toBe(0xbabade);
    expect(colors.get(interner.intern('Task'))).toBe(0xdebaba);
  });

  it('should not depend on intern order', () => {
    const first = new SymbolInterner();
    const second = new SymbolInterner();
    second.intern('Render');
    second.intern('Task');

    const a = buildKindColorMap(createEvents(first, ['Task', 'IO', 'Render']), first);
    const b = buildKindColorMap(createEvents(second, ['IO', 'Render', 'Task']), second);

    for (const kind of ['IO', 'Render', 'Task']) {
      expect(a.get(first.intern(kind))).toBe(b.get(second.intern(kind)));
    }
  });

  it('should give a single kind the base hue', () => {
    const interner = new SymbolInterner();

    const colors = buildKindColorMap(createEvents(interner, ['Task']), interner);

    expect(colors.get(interner.intern('Task'))).toBe(0xbadeba);
  });

  it('should fall back to neutral gray for an unmapped kind', () => {
    const interner = new SymbolInterner();
    const colors = buildKindColorMap(createEvents(interner, ['Task']), interner);

    expect(resolveKindColor(colors, interner.intern('Unknown'))).toBe(
      TRACE_INDEX_CONSTANTS.UNKNOWN_KIND_COLOR,
    );
    expect(resolveKindColor(colors, interner.intern('Task'))).toBe(0xbadeba);
  });

  it('should return an empty map for no events', () => {
    expect(buildKindColorMap([], new SymbolInterner()).size).toBe(0);
  });
});
