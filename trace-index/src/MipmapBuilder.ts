/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

/**
 * Mipmap Builder
 *
 * Pre-computes levels of detail per lane so a redraw never has to scan every event.
 *
 * - Level 0 is authoritative: one span per lane event, nothing merged.
 * - Level k coalesces runs from level k-1 using a threshold T (ns) that grows by
 *   `levelScale` per attempt. A run is a sequence of spans at the same display depth with
 *   the same color, each narrower than T, separated by gaps narrower than T. Thread roots
 *   are never merged.
 * - A merged span covers the union interval and lists the events it stands for, so every
 *   level covers exactly the events of level 0, each once.
 * - A threshold that merges nothing does not produce a level; building stops once T
 *   reaches the lane duration or `maxLevels` levels exist.
 *
 * Every level keeps its own start and end orderings as index arrays for binary search.
 */

import type { MipmapOptions } from './config.js';
import type { EventArena } from './EventArena.js';
import type { EventId, LodSpan, MipmapLevel } from './types.js';

/** A span in the making; `sources` are the spans of the previous level it absorbs. */
type PendingRun = {
  startNs: number;
  endNs: number;
  color: number;
  mergeable: boolean;
  sources: LodSpan[];
};

/**
 * Build all levels for one lane.
 *
 * @param arena - Frozen event arena
 * @param eventIds - Lane events, sorted by start time
 * @param depthOf - Display depth of an event within this lane
 */
export function buildLaneMipmaps(
  arena: EventArena,
  eventIds: readonly EventId[],
  depthOf: (id: EventId) => number,
  options: MipmapOptions,
): MipmapLevel[] {
  if (eventIds.length === 0) {
    return [];
  }

  const baseSpans = eventIds.map((id): LodSpan => {
    const event = arena.get(id);
    return {
      startNs: event.startNs,
      endNs: event.startNs + event.durationNs,
      depth: depthOf(id),
      color: event.color,
      isThreadRoot: event.isThreadRoot,
      eventIds: [id],
    };
  });

  let laneStart = Infinity;
  let laneEnd = 0;
  for (const span of baseSpans) {
    laneStart = Math.min(laneStart, span.startNs);
    laneEnd = Math.max(laneEnd, span.endNs);
  }
  const laneDuration = laneEnd - laneStart;

  const levels: MipmapLevel[] = [createLevel(0, 0, baseSpans)];
  const { baseFeatureNs, levelScale, maxLevels } = options;

  let threshold = baseFeatureNs;
  let previous = baseSpans;
  while (levels.length < maxLevels && previous.length > 1) {
    const coalesced = coalesceSpans(previous, threshold);
    if (coalesced.length < previous.length) {
      levels.push(createLevel(levels.length, threshold, coalesced));
      previous = coalesced;
    }
    if (threshold >= laneDuration) {
      break;
    }
    threshold *= levelScale;
  }

  return levels;
}

/**
 * Merge runs of small, same-colored, nearly adjacent spans at each depth.
 * Output is ordered by start time, then depth.
 */
export function coalesceSpans(spans: readonly LodSpan[], thresholdNs: number): LodSpan[] {
  const byDepth = new Map<number, LodSpan[]>();
  for (const span of spans) {
    let row = byDepth.get(span.depth);
    if (!row) {
      row = [];
      byDepth.set(span.depth, row);
    }
    row.push(span);
  }

  const result: LodSpan[] = [];
  for (const [depth, row] of byDepth) {
    row.sort((a, b) => a.startNs - b.startNs);

    let run: PendingRun | null = null;
    for (const span of row) {
      const mergeable = !span.isThreadRoot && span.endNs - span.startNs < thresholdNs;
      if (
        run &&
        run.mergeable &&
        mergeable &&
        span.color === run.color &&
        span.startNs - run.endNs < thresholdNs
      ) {
        run.endNs = Math.max(run.endNs, span.endNs);
        run.sources.push(span);
        continue;
      }

      if (run) {
        result.push(finishRun(run, depth));
      }
      run = {
        startNs: span.startNs,
        endNs: span.endNs,
        color: span.color,
        mergeable,
        sources: [span],
      };
    }
    if (run) {
      result.push(finishRun(run, depth));
    }
  }

  result.sort((a, b) => a.startNs - b.startNs || a.depth - b.depth);
  return result;
}

function finishRun(run: PendingRun, depth: number): LodSpan {
  const [only] = run.sources;
  if (only && run.sources.length === 1) {
    return only;
  }

  return {
    startNs: run.startNs,
    endNs: run.endNs,
    depth,
    color: run.color,
    isThreadRoot: false,
    eventIds: run.sources.flatMap((source) => source.eventIds),
  };
}

function createLevel(level: number, minFeatureNs: number, spans: readonly LodSpan[]): MipmapLevel {
  const count = spans.length;
  const startOf = (i: number) => spans[i]?.startNs ?? 0;
  const endOf = (i: number) => spans[i]?.endNs ?? 0;
  const depthOf = (i: number) => spans[i]?.depth ?? 0;

  const byStart = Uint32Array.from({ length: count }, (_, i) => i).sort(
    (a, b) => startOf(a) - startOf(b) || endOf(a) - endOf(b) || depthOf(a) - depthOf(b) || a - b,
  );
  const byEnd = Uint32Array.from({ length: count }, (_, i) => i).sort(
    (a, b) => endOf(a) - endOf(b) || startOf(a) - startOf(b) || a - b,
  );

  const startRank = new Uint32Array(count);
  byStart.forEach((spanIndex, rank) => {
    startRank[spanIndex] = rank;
  });

  return { level, minFeatureNs, spans, byStart, byEnd, startRank };
}
