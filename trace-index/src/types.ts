/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

/**
 * Trace Index Type Definitions
 *
 * Shared types for the ingestion, layout and query stages. Everything downstream of
 * the build references events by {@link EventId} into the shared arena and strings by
 * {@link SymbolId} into the interner; no stage copies event payloads.
 */

// ============================================================================
// IDENTIFIERS
// ============================================================================

/** Compact handle for an interned string. Only meaningful to the interner that issued it. */
export type SymbolId = number;

/** Index of an event in the shared {@link EventArena}. */
export type EventId = number;

/** Absolute nanosecond timestamp as delivered by a trace reader. */
export type AbsoluteTimestamp = bigint | number;

// ============================================================================
// INPUT
// ============================================================================

/** Half-open absolute interval `[start, end)`. */
export interface RawInterval {
  start: AbsoluteTimestamp;
  end: AbsoluteTimestamp;
}

/**
 * One normalized record from an external trace reader.
 * Records without an interval (instant or integer-only payloads) are dropped at ingestion.
 */
export interface RawTraceRecord {
  threadId: number;
  label: string;
  kind: string;
  extraLabels: readonly string[];
  payload: number | null;
  interval: RawInterval | null;
}

/** Metadata passed through to the index unchanged. */
export interface TraceMetadata {
  /** Reference timestamp all event times are made relative to. */
  epochNs: AbsoluteTimestamp;
  commandLine: string;
  processId: number;
}

/** A closed, finite batch of trace records plus its metadata. */
export interface TraceSource {
  readonly metadata: TraceMetadata;
  records(): Iterable<RawTraceRecord>;
}

// ============================================================================
// EVENTS
// ============================================================================

/**
 * An interval event straight out of ingestion.
 * Depth and color are resolved by later stages and do not exist on this type.
 */
export interface IngestedEvent {
  readonly label: SymbolId;
  readonly kind: SymbolId;
  readonly extraData: readonly SymbolId[];
  readonly payload: number | null;
  readonly threadId: number;
  /** Start relative to the epoch, never negative. */
  readonly startNs: number;
  readonly durationNs: number;
}

/** A fully resolved, immutable event stored in the arena. */
export interface TraceEvent extends IngestedEvent {
  /** Call-stack nesting level within its thread. */
  readonly depth: number;
  /** PixiJS-style color value (0xRRGGBB). */
  readonly color: number;
  readonly isThreadRoot: boolean;
}

/** How a renderer picks event fill colors. */
export enum ColorMode {
  Kind = 'Kind',
  Event = 'Event',
}

// ============================================================================
// LAYOUT
// ============================================================================

export interface ThreadData {
  readonly threadId: number;
  /** Event ids sorted by start time. */
  readonly events: readonly EventId[];
  /** Synthetic root spanning the thread's extent, null when the thread is empty. */
  readonly root: EventId | null;
}

/** `[startNs, endNs]` covering all of a thread's events. `[0, 0]` for an empty thread. */
export interface Extent {
  startNs: number;
  endNs: number;
}

/**
 * A contiguous time range at one display depth of a mipmap level.
 * At level 0 every span covers exactly one event; coarser levels coalesce runs.
 */
export interface LodSpan {
  readonly startNs: number;
  readonly endNs: number;
  readonly depth: number;
  readonly color: number;
  readonly isThreadRoot: boolean;
  /** Arena ids of the events this span stands for, in start order. */
  readonly eventIds: readonly EventId[];
}

export interface MipmapLevel {
  readonly level: number;
  /** Spans narrower than this were coalesced. Zero for level 0. */
  readonly minFeatureNs: number;
  readonly spans: readonly LodSpan[];
  /** Span indices ordered by start, then end. */
  readonly byStart: Uint32Array;
  /** Span indices ordered by end, then start. */
  readonly byEnd: Uint32Array;
  /** Position of each span in {@link byStart}. */
  readonly startRank: Uint32Array;
}

/** One or more non-overlapping threads rendered together (a thread group). */
export interface Lane {
  readonly key: string;
  readonly threads: readonly ThreadData[];
  readonly maxDepth: number;
  readonly showThreadRoots: boolean;
  readonly startNs: number;
  readonly endNs: number;
  readonly mipmaps: readonly MipmapLevel[];
}

// ============================================================================
// QUERY
// ============================================================================

/** Scroll/zoom state owned by the UI. */
export interface ViewportWindow {
  /** Horizontal scroll offset in nanoseconds, relative to `minNs`. */
  scrollOffsetNs: number;
  /** Pixels per nanosecond. */
  zoom: number;
  /** Viewport width in pixels. */
  viewportWidth: number;
  /** Baseline the scroll offset is measured from. */
  minNs: number;
}

export interface TimeRange {
  nsMin: number;
  nsMax: number;
}

export interface LaneQueryOptions {
  /** Collapsed lanes show only top-level events, without thread roots. */
  collapsed?: boolean;
  /** Force per-event fidelity (selection, hover). */
  fullDetail?: boolean;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const TRACE_INDEX_CONSTANTS = {
  /** Hue of the first kind on the color wheel, in degrees. */
  KIND_BASE_HUE: 120,
  KIND_SATURATION: 0.35,
  KIND_LIGHTNESS: 0.8,

  /** Neutral gray hsl(0, 0, 0.85) for kinds missing from the color map. */
  UNKNOWN_KIND_COLOR: 0xd9d9d9,

  /** rgb(0.85, 0.87, 0.9) */
  THREAD_ROOT_COLOR: 0xd9dee6,

  THREAD_ROOT_KIND: 'Thread',

  MIPMAP: {
    /** Coalescing threshold of level 1 in nanoseconds. */
    BASE_FEATURE_NS: 16,
    /** Threshold multiplier between consecutive levels. */
    LEVEL_SCALE: 4,
    MAX_LEVELS: 16,
  },

  /** A level is usable while its coalesced features stay within this many pixels. */
  MIN_VISIBLE_PX: 1,

  /** Lowest zoom accepted by window math, to avoid division by zero. */
  MIN_ZOOM: 1e-9,

  /** Target pixel spacing between time ticks. */
  TICK_SPACING_PX: 100,

  LANE_HEIGHT: 20,
  LANE_SPACING: 5,
} as const;
