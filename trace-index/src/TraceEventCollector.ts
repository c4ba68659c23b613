/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import type { SymbolInterner } from './SymbolInterner.js';
import type { AbsoluteTimestamp, IngestedEvent, RawTraceRecord } from './types.js';

export interface CollectedEvents {
  events: IngestedEvent[];
  /** Number of interval records retained. */
  eventCount: number;
  /** Largest relative end time seen. */
  maxNs: number;
}

/**
 * `a - b`, clamped at zero. Timestamps before the epoch (clock skew) land on 0 instead
 * of going negative.
 */
export function saturatingSub(a: AbsoluteTimestamp, b: AbsoluteTimestamp): bigint {
  const diff = toBigInt(a) - toBigInt(b);
  return diff > 0n ? diff : 0n;
}

// Fractional nanoseconds are truncated.
function toBigInt(value: AbsoluteTimestamp): bigint {
  return typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
}

/**
 * Normalize raw records into interval events relative to `epochNs`.
 *
 * Only interval-shaped records are kept; point events carry nothing the timeline can
 * draw. Strings are interned as they are read. Depth and color are left for later
 * stages because they need the whole event set.
 */
export function collectTraceEvents(
  records: Iterable<RawTraceRecord>,
  interner: SymbolInterner,
  epochNs: AbsoluteTimestamp,
): CollectedEvents {
  const events: IngestedEvent[] = [];
  let maxNs = 0;
  let eventCount = 0;

  for (const record of records) {
    const interval = record.interval;
    if (!interval) {
      continue;
    }

    ++eventCount;
    const start = saturatingSub(interval.start, epochNs);
    const end = saturatingSub(interval.end, epochNs);
    const startNs = Number(start);
    const endNs = Number(end);
    if (endNs > maxNs) {
      maxNs = endNs;
    }

    events.push({
      threadId: record.threadId,
      label: interner.intern(record.label),
      kind: interner.intern(record.kind),
      extraData: record.extraLabels.map((extra) => interner.intern(extra)),
      payload: record.payload,
      startNs,
      durationNs: Number(saturatingSub(end, start)),
    });
  }

  return { events, eventCount, maxNs };
}
