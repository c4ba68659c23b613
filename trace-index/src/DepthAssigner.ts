/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import type { EventId, IngestedEvent } from './types.js';

/**
 * Group event ids by thread, keeping ingestion order within each thread.
 */
export function buildThreadsIndex(events: readonly IngestedEvent[]): Map<number, EventId[]> {
  const threads = new Map<number, EventId[]>();
  events.forEach((event, id) => {
    let ids = threads.get(event.threadId);
    if (!ids) {
      ids = [];
      threads.set(event.threadId, ids);
    }
    ids.push(id);
  });
  return threads;
}

/**
 * Reconstruct call-stack depth from interval overlap, one thread at a time.
 *
 * Each thread's ids are sorted by start time in place. The sort is stable, so events
 * that start together keep their ingestion order; that order carries no meaning beyond
 * making the result reproducible.
 *
 * An event's depth is the number of earlier intervals still open when it starts. A
 * partial overlap is therefore stacked as if it were nested; downstream layout relies on
 * that, so it is not corrected here.
 *
 * @returns depth per event id
 */
export function assignEventDepths(
  events: readonly IngestedEvent[],
  threads: Map<number, EventId[]>,
): Uint32Array {
  const depths = new Uint32Array(events.length);
  const openEnds: number[] = [];

  for (const ids of threads.values()) {
    ids.sort((a, b) => startOf(events, a) - startOf(events, b));
    openEnds.length = 0;

    for (const id of ids) {
      const event = events[id];
      if (!event) {
        continue;
      }
      const { startNs } = event;
      while (openEnds.length && (openEnds[openEnds.length - 1] ?? 0) <= startNs) {
        openEnds.pop();
      }
      depths[id] = openEnds.length;
      openEnds.push(startNs + event.durationNs);
    }
  }

  return depths;
}

function startOf(events: readonly IngestedEvent[], id: EventId): number {
  return events[id]?.startNs ?? 0;
}
