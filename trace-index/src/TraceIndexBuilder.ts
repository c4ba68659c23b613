/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

/**
 * TraceIndexBuilder
 *
 * Runs the full ingestion pipeline in one synchronous pass:
 * records → interned events → kind colors → depths → thread roots → frozen arena →
 * per-thread and merged lanes with their mipmaps.
 *
 * The result is an immutable {@link TraceIndex}. Any failure leaves nothing behind; there
 * is no partially built index.
 */

import { colorFromLabel } from './ColorUtils.js';
import {
  resolveOptions,
  type ResolvedTraceIndexOptions,
  type TraceIndexOptions,
} from './config.js';
import { assignEventDepths, buildThreadsIndex } from './DepthAssigner.js';
import { BuildAbortedError, SourceUnreadableError, TraceIndexError } from './errors.js';
import { EventArena } from './EventArena.js';
import { buildKindColorMap, resolveKindColor } from './KindColorResolver.js';
import { SymbolInterner } from './SymbolInterner.js';
import { buildMergedLanes, buildThreadData, buildThreadLanes } from './ThreadLanePacker.js';
import { generateTicks, type TimeTick } from './TimeGridCalculator.js';
import { collectTraceEvents, type CollectedEvents } from './TraceEventCollector.js';
import {
  ColorMode,
  type EventId,
  type Lane,
  type LaneQueryOptions,
  type LodSpan,
  type ThreadData,
  type TimeRange,
  type TraceEvent,
  type TraceSource,
} from './types.js';
import { hitTestLane, queryLaneSpans } from './ViewportQuery.js';

export interface BuildContext {
  /** Name used in error messages, usually the file the source was read from. */
  key?: string;
  signal?: AbortSignal;
}

interface TraceIndexInit {
  eventCount: number;
  commandLine: string;
  processId: number;
  symbols: SymbolInterner;
  events: EventArena;
  threads: readonly ThreadData[];
  lanes: readonly Lane[];
  mergedLanes: readonly Lane[];
  maxNs: number;
  options: ResolvedTraceIndexOptions;
}

/**
 * Read-only snapshot of a built trace. Safe to share between any number of readers.
 */
export class TraceIndex {
  readonly eventCount: number;
  readonly commandLine: string;
  readonly processId: number;
  readonly symbols: SymbolInterner;
  readonly events: EventArena;
  /** Threads ordered by thread id. */
  readonly threads: readonly ThreadData[];
  /** One lane per thread. */
  readonly lanes: readonly Lane[];
  /** Threads packed into shared lanes where their extents allow it. */
  readonly mergedLanes: readonly Lane[];
  readonly minNs: number = 0;
  readonly maxNs: number;
  readonly options: ResolvedTraceIndexOptions;

  constructor(init: TraceIndexInit) {
    this.eventCount = init.eventCount;
    this.commandLine = init.commandLine;
    this.processId = init.processId;
    this.symbols = init.symbols;
    this.events = init.events;
    this.threads = init.threads;
    this.lanes = init.lanes;
    this.mergedLanes = init.mergedLanes;
    this.maxNs = init.maxNs;
    this.options = init.options;
  }

  get totalNs(): number {
    return Math.max(0, this.maxNs - this.minNs);
  }

  laneSet(merged: boolean): readonly Lane[] {
    return merged ? this.mergedLanes : this.lanes;
  }

  event(id: EventId): TraceEvent {
    return this.events.get(id);
  }

  label(event: TraceEvent): string {
    return this.symbols.resolve(event.label);
  }

  kind(event: TraceEvent): string {
    return this.symbols.resolve(event.kind);
  }

  extraData(event: TraceEvent): string[] {
    return event.extraData.map((symbol) => this.symbols.resolve(symbol));
  }

  /**
   * Fill color for an event. Thread roots keep their own color in every mode.
   */
  eventColor(event: TraceEvent, mode: ColorMode): number {
    if (mode === ColorMode.Kind || event.isThreadRoot) {
      return event.color;
    }
    return colorFromLabel(this.label(event));
  }

  /** {@link queryLaneSpans} with this index's `query.minVisiblePx`. */
  queryLane(
    lane: Lane,
    range: TimeRange,
    zoom: number,
    options: LaneQueryOptions = {},
  ): Iterable<LodSpan> {
    return queryLaneSpans(lane, range, zoom, {
      ...options,
      minVisiblePx: this.options.query.minVisiblePx,
    });
  }

  hitTest(lane: Lane, ns: number, depth: number, collapsed = false): TraceEvent | null {
    const id = hitTestLane(lane, ns, depth, { collapsed });
    return id === null ? null : this.events.get(id);
  }

  /** Axis ticks for `range`, spaced per this index's `ticks.spacingPx`. */
  ticks(range: TimeRange, zoom: number): TimeTick[] {
    return generateTicks(range.nsMin, range.nsMax, zoom, this.options.ticks.spacingPx);
  }
}

/**
 * Build a {@link TraceIndex} from a trace source.
 *
 * @throws SourceUnreadableError when reading records fails
 * @throws BuildAbortedError when `context.signal` is aborted between stages
 * @throws TraceIndexError with code `INVALID_OPTIONS` for bad options
 */
export function buildTraceIndex(
  source: TraceSource,
  options: TraceIndexOptions = {},
  context: BuildContext = {},
): TraceIndex {
  const resolved = resolveOptions(options);
  const { metadata } = source;
  const key = context.key ?? `process ${metadata.processId}`;
  const checkpoint = () => {
    if (context.signal?.aborted) {
      throw new BuildAbortedError(key);
    }
  };

  const startTime = performance.now();
  checkpoint();

  const symbols = new SymbolInterner();
  const collected = readRecords(source, symbols, key);
  checkpoint();

  const kindColors = buildKindColorMap(collected.events, symbols);
  const threadIndex = buildThreadsIndex(collected.events);
  const depths = assignEventDepths(collected.events, threadIndex);

  const events = new EventArena();
  collected.events.forEach((event, id) => {
    events.push({
      ...event,
      depth: depths[id] ?? 0,
      color: resolveKindColor(kindColors, event.kind),
      isThreadRoot: false,
    });
  });
  const threads = buildThreadData(events, threadIndex, symbols);
  symbols.freeze();
  events.freeze();
  checkpoint();

  const lanes = buildThreadLanes(events, threads, resolved.mipmap);
  checkpoint();
  const mergedLanes = buildMergedLanes(events, threads, resolved.mipmap);
  checkpoint();

  const buildTime = performance.now() - startTime;
  resolved.logger.log(
    `Indexed ${collected.eventCount} events on ${threads.length} threads ` +
      `into ${mergedLanes.length} lanes in ${buildTime.toFixed(2)}ms`,
  );

  return new TraceIndex({
    eventCount: collected.eventCount,
    commandLine: metadata.commandLine,
    processId: metadata.processId,
    symbols,
    events,
    threads,
    lanes,
    mergedLanes,
    maxNs: collected.maxNs,
    options: resolved,
  });
}

function readRecords(source: TraceSource, symbols: SymbolInterner, key: string): CollectedEvents {
  try {
    return collectTraceEvents(source.records(), symbols, source.metadata.epochNs);
  } catch (error) {
    if (error instanceof TraceIndexError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new SourceUnreadableError(key, reason, error);
  }
}
