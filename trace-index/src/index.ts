/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

// Build
export { buildTraceIndex, TraceIndex } from './TraceIndexBuilder.js';
export type { BuildContext } from './TraceIndexBuilder.js';
export { TraceIndexLoader } from './TraceIndexLoader.js';
export type { LoadState, SourceOpener } from './TraceIndexLoader.js';
export { JsonTraceSource } from './JsonTraceSource.js';

// Stages
export { SymbolInterner } from './SymbolInterner.js';
export { EventArena } from './EventArena.js';
export { collectTraceEvents, saturatingSub } from './TraceEventCollector.js';
export type { CollectedEvents } from './TraceEventCollector.js';
export { buildKindColorMap, resolveKindColor } from './KindColorResolver.js';
export type { KindColorMap } from './KindColorResolver.js';
export { assignEventDepths, buildThreadsIndex } from './DepthAssigner.js';
export {
  buildMergedLanes,
  buildThreadData,
  buildThreadLanes,
  computeThreadExtent,
  displayDepth,
  packThreads,
} from './ThreadLanePacker.js';
export { buildLaneMipmaps, coalesceSpans } from './MipmapBuilder.js';

// Queries
export {
  clampScrollOffsetNs,
  hitTestLane,
  laneTotalHeight,
  partitionPoint,
  queryLaneSpans,
  queryLevel,
  selectLevel,
  totalNs,
  totalTimelineHeight,
  viewportNsRange,
} from './ViewportQuery.js';
export {
  durationToWidth,
  formatDuration,
  formatTimeLabel,
  generateTicks,
  niceInterval,
  nsToX,
} from './TimeGridCalculator.js';
export type { TimeTick } from './TimeGridCalculator.js';
export { colorFromLabel, hexToCss, hslToHex, rgbToHex } from './ColorUtils.js';

// Configuration & errors
export { resolveOptions } from './config.js';
export type {
  MipmapOptions,
  QueryOptions,
  ResolvedTraceIndexOptions,
  TraceIndexOptions,
  TraceLogger,
} from './config.js';
export {
  ArenaFrozenError,
  BuildAbortedError,
  InternerFrozenError,
  SourceUnreadableError,
  TraceIndexError,
  UnknownSymbolError,
} from './errors.js';
export type { TraceIndexErrorCode } from './errors.js';

// Types
export type {
  AbsoluteTimestamp,
  EventId,
  Extent,
  IngestedEvent,
  Lane,
  LaneQueryOptions,
  LodSpan,
  MipmapLevel,
  RawInterval,
  RawTraceRecord,
  SymbolId,
  ThreadData,
  TimeRange,
  TraceEvent,
  TraceMetadata,
  TraceSource,
  ViewportWindow,
} from './types.js';
export { ColorMode, TRACE_INDEX_CONSTANTS } from './types.js';
