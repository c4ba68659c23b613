/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

/**
 * Thread Lane Packer
 *
 * Turns per-thread event lists into display lanes:
 * - synthesizes one root event per non-empty thread;
 * - builds one lane per thread;
 * - packs threads whose active extents do not overlap into shared lanes.
 *
 * Packing is a greedy first-fit over threads sorted by extent length, then extent start.
 * It is deterministic and O(threads x lanes); it does not promise the minimum lane count.
 */

import type { MipmapOptions } from './config.js';
import type { EventArena } from './EventArena.js';
import { buildLaneMipmaps } from './MipmapBuilder.js';
import type { SymbolInterner } from './SymbolInterner.js';
import {
  TRACE_INDEX_CONSTANTS,
  type EventId,
  type Extent,
  type Lane,
  type ThreadData,
  type TraceEvent,
} from './types.js';

type PlacedThread = { index: number; thread: ThreadData };

/**
 * Depth at which an event is drawn. Lanes that show thread roots push every real event
 * down one row to make room for the root band.
 */
export function displayDepth(showThreadRoots: boolean, event: TraceEvent): number {
  return showThreadRoots && !event.isThreadRoot ? event.depth + 1 : event.depth;
}

export function computeThreadExtent(arena: EventArena, eventIds: readonly EventId[]): Extent {
  let startNs = Infinity;
  let endNs = 0;
  for (const id of eventIds) {
    const event = arena.get(id);
    startNs = Math.min(startNs, event.startNs);
    endNs = Math.max(endNs, event.startNs + event.durationNs);
  }
  return startNs === Infinity ? { startNs: 0, endNs: 0 } : { startNs, endNs };
}

/**
 * Create the thread list, ordered by thread id, appending a synthetic root event for
 * every thread that has at least one event.
 *
 * Must run before the arena and interner are frozen.
 */
export function buildThreadData(
  arena: EventArena,
  threads: ReadonlyMap<number, readonly EventId[]>,
  interner: SymbolInterner,
): ThreadData[] {
  const threadIds = [...threads.keys()].sort((a, b) => a - b);

  return threadIds.map((threadId) => {
    const events = threads.get(threadId) ?? [];
    return { threadId, events, root: buildThreadRoot(arena, threadId, events, interner) };
  });
}

function buildThreadRoot(
  arena: EventArena,
  threadId: number,
  events: readonly EventId[],
  interner: SymbolInterner,
): EventId | null {
  if (events.length === 0) {
    return null;
  }

  const { startNs, endNs } = computeThreadExtent(arena, events);
  return arena.push({
    label: interner.intern(`Thread ${threadId}`),
    kind: interner.intern(TRACE_INDEX_CONSTANTS.THREAD_ROOT_KIND),
    extraData: [],
    payload: null,
    threadId,
    startNs,
    durationNs: endNs - startNs,
    depth: 0,
    color: TRACE_INDEX_CONSTANTS.THREAD_ROOT_COLOR,
    isThreadRoot: true,
  });
}

/**
 * One lane per thread, in thread order. Roots are not shown in single-thread lanes.
 */
export function buildThreadLanes(
  arena: EventArena,
  threads: readonly ThreadData[],
  options: MipmapOptions,
): Lane[] {
  return threads.map((thread) => createLane(arena, [thread], false, options));
}

/**
 * Pack threads into as few lanes as the greedy heuristic finds.
 *
 * Two threads share a lane only if their extents do not overlap
 * (`start < laneEnd && end > laneStart` is an overlap). Lanes are then ordered by the
 * lowest thread index they contain and threads within a lane by index, so output stays
 * close to the input order.
 */
export function buildMergedLanes(
  arena: EventArena,
  threads: readonly ThreadData[],
  options: MipmapOptions,
): Lane[] {
  return packThreads(arena, threads).map((group) =>
    createLane(
      arena,
      group.map(({ thread }) => thread),
      group.length > 1,
      options,
    ),
  );
}

/**
 * Greedy first-fit packing. Exposed for callers that only need the grouping.
 */
export function packThreads(arena: EventArena, threads: readonly ThreadData[]): PlacedThread[][] {
  const intervals = threads.map((thread, index) => ({
    index,
    thread,
    ...computeThreadExtent(arena, thread.events),
  }));

  intervals.sort((a, b) => a.endNs - a.startNs - (b.endNs - b.startNs) || a.startNs - b.startNs);

  const groups: PlacedThread[][] = [];
  const groupRanges: Extent[] = [];

  for (const { index, thread, startNs, endNs } of intervals) {
    const slot = groupRanges.findIndex(
      (range) => !(startNs < range.endNs && endNs > range.startNs),
    );
    const range = groupRanges[slot];
    const group = groups[slot];
    if (range && group) {
      range.startNs = Math.min(range.startNs, startNs);
      range.endNs = Math.max(range.endNs, endNs);
      group.push({ index, thread });
    } else {
      groups.push([{ index, thread }]);
      groupRanges.push({ startNs, endNs });
    }
  }

  for (const group of groups) {
    group.sort((a, b) => a.index - b.index);
  }
  groups.sort((a, b) => (a[0]?.index ?? Infinity) - (b[0]?.index ?? Infinity));
  return groups;
}

function createLane(
  arena: EventArena,
  threads: readonly ThreadData[],
  showThreadRoots: boolean,
  options: MipmapOptions,
): Lane {
  const eventIds: EventId[] = [];
  for (const thread of threads) {
    if (showThreadRoots && thread.root !== null) {
      eventIds.push(thread.root);
    }
    eventIds.push(...thread.events);
  }

  const depthOf = (id: EventId) => displayDepth(showThreadRoots, arena.get(id));
  eventIds.sort((a, b) => {
    const ea = arena.get(a);
    const eb = arena.get(b);
    return ea.startNs - eb.startNs || ea.threadId - eb.threadId || depthOf(a) - depthOf(b);
  });

  let maxDepth = 0;
  for (const id of eventIds) {
    maxDepth = Math.max(maxDepth, depthOf(id));
  }
  const { startNs, endNs } = computeThreadExtent(arena, eventIds);

  return {
    key: threads.map((thread) => thread.threadId).join('+'),
    threads,
    maxDepth,
    showThreadRoots,
    startNs,
    endNs,
    mipmaps: buildLaneMipmaps(arena, eventIds, depthOf, options),
  };
}
