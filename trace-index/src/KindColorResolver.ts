/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import { hslToHex } from './ColorUtils.js';
import type { SymbolInterner } from './SymbolInterner.js';
import { TRACE_INDEX_CONSTANTS, type IngestedEvent, type SymbolId } from './types.js';

export type KindColorMap = ReadonlyMap<SymbolId, number>;

/**
 * Assign every distinct event kind an evenly spaced hue.
 *
 * Kinds are ordered by their resolved string, not by symbol id, so the same set of kind
 * names always produces the same colors whatever order they were interned in.
 */
export function buildKindColorMap(
  events: readonly IngestedEvent[],
  interner: SymbolInterner,
): KindColorMap {
  const kinds = [...new Set(events.map((event) => event.kind))];
  const names = new Map(kinds.map((kind) => [kind, interner.resolve(kind)]));
  kinds.sort((a, b) => compareStrings(names.get(a) ?? '', names.get(b) ?? ''));

  const { KIND_BASE_HUE, KIND_SATURATION, KIND_LIGHTNESS } = TRACE_INDEX_CONSTANTS;
  const step = 360 / Math.max(1, kinds.length);
  const colors = new Map<SymbolId, number>();
  kinds.forEach((kind, index) => {
    const hue = (KIND_BASE_HUE + index * step) % 360;
    colors.set(kind, hslToHex(hue, KIND_SATURATION, KIND_LIGHTNESS));
  });
  return colors;
}

export function resolveKindColor(colors: KindColorMap, kind: SymbolId): number {
  return colors.get(kind) ?? TRACE_INDEX_CONSTANTS.UNKNOWN_KIND_COLOR;
}

// Code-unit order, independent of the host locale.
function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
