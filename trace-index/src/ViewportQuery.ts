/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

/**
 * ViewportQuery
 *
 * Maps scroll/zoom state to a time window and finds the spans that overlap it, using the
 * start/end orderings each mipmap level carries. All functions are pure reads over a
 * built index and can be called from any caller without coordination.
 */

import { TRACE_INDEX_CONSTANTS } from './types.js';
import type {
  EventId,
  Lane,
  LaneQueryOptions,
  LodSpan,
  MipmapLevel,
  TimeRange,
  ViewportWindow,
} from './types.js';

/**
 * Visible window in absolute timeline nanoseconds:
 * `[max(0, offset) + minNs, max(0, offset + width / zoom) + minNs]`.
 */
export function viewportNsRange(viewport: ViewportWindow): TimeRange {
  const zoom = Math.max(viewport.zoom, TRACE_INDEX_CONSTANTS.MIN_ZOOM);
  const width = Math.max(0, viewport.viewportWidth);
  return {
    nsMin: Math.max(0, viewport.scrollOffsetNs) + viewport.minNs,
    nsMax: Math.max(0, viewport.scrollOffsetNs + width / zoom) + viewport.minNs,
  };
}

export function totalNs(minNs: number, maxNs: number): number {
  return Math.max(0, maxNs - minNs);
}

/**
 * Keep the scroll offset inside `[0, total - visible]`.
 */
export function clampScrollOffsetNs(
  scrollOffsetNs: number,
  total: number,
  viewportWidth: number,
  zoom: number,
): number {
  const visibleNs = Math.max(0, viewportWidth / Math.max(zoom, TRACE_INDEX_CONSTANTS.MIN_ZOOM));
  const maxStartNs = Math.max(0, total - visibleNs);
  return Math.min(Math.max(scrollOffsetNs, 0), maxStartNs);
}

/**
 * Pick the coarsest level whose coalesced features are still no wider than
 * `minVisiblePx` at this zoom. Level 0 always qualifies.
 */
export function selectLevel(
  levels: readonly MipmapLevel[],
  zoom: number,
  minVisiblePx: number = TRACE_INDEX_CONSTANTS.MIN_VISIBLE_PX,
): MipmapLevel | null {
  let selected: MipmapLevel | null = null;
  for (const level of levels) {
    if (level.minFeatureNs * zoom <= minVisiblePx) {
      selected = level;
    }
  }
  return selected;
}

/**
 * Span indices of `level` overlapping `[nsMin, nsMax)`, i.e. `start < nsMax && end > nsMin`,
 * in ascending start order.
 *
 * The result is lazy and can be iterated any number of times. An empty or inverted
 * window yields nothing.
 */
export function queryLevel(level: MipmapLevel, nsMin: number, nsMax: number): Iterable<number> {
  return {
    [Symbol.iterator]: () => overlappingSpans(level, nsMin, nsMax),
  };
}

function* overlappingSpans(level: MipmapLevel, nsMin: number, nsMax: number): Generator<number> {
  const { spans, byStart, byEnd, startRank } = level;
  if (!(nsMax > nsMin) || spans.length === 0) {
    return;
  }

  const startOf = (i: number) => spans[i]?.startNs ?? 0;
  const endOf = (i: number) => spans[i]?.endNs ?? 0;

  // byStart[0, startedCount) all start before nsMax; byEnd[firstEnding, n) all end after nsMin
  const startedCount = partitionPoint(byStart, (i) => startOf(i) < nsMax);
  const firstEnding = partitionPoint(byEnd, (i) => endOf(i) <= nsMin);
  const endingCount = byEnd.length - firstEnding;

  if (startedCount <= endingCount) {
    for (let rank = 0; rank < startedCount; rank++) {
      const index = byStart[rank] ?? 0;
      if (endOf(index) > nsMin) {
        yield index;
      }
    }
    return;
  }

  const matches: number[] = [];
  for (let position = firstEnding; position < byEnd.length; position++) {
    const index = byEnd[position] ?? 0;
    if (startOf(index) < nsMax) {
      matches.push(index);
    }
  }
  matches.sort((a, b) => (startRank[a] ?? 0) - (startRank[b] ?? 0));
  yield* matches;
}

/**
 * Number of leading elements for which `predicate` holds. The predicate must be true
 * for a prefix and false for the rest.
 */
export function partitionPoint(
  indices: Uint32Array,
  predicate: (index: number) => boolean,
): number {
  let low = 0;
  let high = indices.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (predicate(indices[mid] ?? 0)) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * Spans of `lane` to draw for `range` at `zoom`.
 *
 * Collapsed lanes keep only top-level events and drop thread roots. `fullDetail`
 * forces level 0.
 */
export function queryLaneSpans(
  lane: Lane,
  range: TimeRange,
  zoom: number,
  options: LaneQueryOptions & { minVisiblePx?: number } = {},
): Iterable<LodSpan> {
  const level = options.fullDetail
    ? lane.mipmaps[0]
    : selectLevel(lane.mipmaps, zoom, options.minVisiblePx);
  if (!level) {
    return [];
  }

  const topDepth = lane.showThreadRoots ? 1 : 0;
  const collapsed = options.collapsed ?? false;
  const indices = queryLevel(level, range.nsMin, range.nsMax);

  return {
    *[Symbol.iterator]() {
      for (const index of indices) {
        const span = level.spans[index];
        if (!span) {
          continue;
        }
        if (collapsed && (span.isThreadRoot || span.depth !== topDepth)) {
          continue;
        }
        yield span;
      }
    },
  };
}

/**
 * Event under the point `(ns, depth)` of a lane, using level 0.
 * `depth` is a display depth; collapsed lanes only answer for their single row.
 */
export function hitTestLane(
  lane: Lane,
  ns: number,
  depth: number,
  options: Pick<LaneQueryOptions, 'collapsed'> = {},
): EventId | null {
  const level = lane.mipmaps[0];
  if (!level) {
    return null;
  }

  const collapsed = options.collapsed ?? false;
  const targetDepth = collapsed ? (lane.showThreadRoots ? 1 : 0) : depth;
  if (collapsed && depth !== 0) {
    return null;
  }

  for (const index of queryLevel(level, ns, ns + 1)) {
    const span = level.spans[index];
    if (!span || span.depth !== targetDepth || span.startNs > ns || span.endNs <= ns) {
      continue;
    }
    if (collapsed && span.isThreadRoot) {
      continue;
    }
    const [eventId] = span.eventIds;
    if (eventId !== undefined) {
      return eventId;
    }
  }
  return null;
}

/** Vertical space a lane occupies, in pixels. */
export function laneTotalHeight(lane: Lane, collapsed = false): number {
  const { LANE_HEIGHT } = TRACE_INDEX_CONSTANTS;
  return collapsed ? LANE_HEIGHT : (lane.maxDepth + 1) * LANE_HEIGHT;
}

export function totalTimelineHeight(
  lanes: readonly Lane[],
  isCollapsed: (lane: Lane) => boolean = () => false,
): number {
  let height = 0;
  for (const lane of lanes) {
    height += laneTotalHeight(lane, isCollapsed(lane)) + TRACE_INDEX_CONSTANTS.LANE_SPACING;
  }
  return height;
}
