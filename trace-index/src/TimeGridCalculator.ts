/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

/**
 * TimeGridCalculator
 *
 * Pure coordinate and tick helpers shared by any presentation layer. Tick spacing
 * follows the 1-2-5 sequence so labels land on readable values at every zoom.
 */

import { TRACE_INDEX_CONSTANTS } from './types.js';

const NS_PER_US = 1_000;
const NS_PER_MS = 1_000_000;
const NS_PER_S = 1_000_000_000;

export interface TimeTick {
  /** Tick time, in the same timebase as the range it was generated for. */
  ns: number;
  label: string;
}

/**
 * Horizontal pixel position of `ns`. Times before `minNs` pin to 0.
 */
export function nsToX(ns: number, minNs: number, zoom: number): number {
  return Math.max(0, ns - minNs) * zoom;
}

export function durationToWidth(durationNs: number, zoom: number): number {
  return durationNs * zoom;
}

/**
 * Round a target spacing up to the next {1, 2, 5, 10} x 10^k nanoseconds.
 *
 * @returns 0 for a non-finite or non-positive target
 */
export function niceInterval(targetNs: number): number {
  if (!Number.isFinite(targetNs) || targetNs <= 0) {
    return 0;
  }

  const base = 10 ** Math.floor(Math.log10(targetNs));
  const ratio = targetNs / base;
  if (ratio <= 1) {
    return base;
  }
  if (ratio <= 2) {
    return base * 2;
  }
  if (ratio <= 5) {
    return base * 5;
  }
  return base * 10;
}

/**
 * Label for a tick at `relativeNs`, in the unit that suits the tick spacing.
 */
export function formatTimeLabel(relativeNs: number, intervalNs: number): string {
  if (intervalNs >= NS_PER_S) {
    return `${(relativeNs / NS_PER_S).toFixed(2)} s`;
  }
  if (intervalNs >= NS_PER_MS) {
    return `${(relativeNs / NS_PER_MS).toFixed(2)} ms`;
  }
  if (intervalNs >= NS_PER_US) {
    return `${(relativeNs / NS_PER_US).toFixed(2)} µs`;
  }
  return `${relativeNs.toFixed(0)} ns`;
}

/** Human-readable duration for tooltips and summaries. */
export function formatDuration(durationNs: number): string {
  if (durationNs >= NS_PER_S) {
    return `${(durationNs / NS_PER_S).toFixed(2)} s`;
  }
  if (durationNs >= NS_PER_MS) {
    return `${(durationNs / NS_PER_MS).toFixed(2)} ms`;
  }
  if (durationNs >= NS_PER_US) {
    return `${(durationNs / NS_PER_US).toFixed(2)} µs`;
  }
  return `${Math.trunc(durationNs)} ns`;
}

/**
 * Ticks at every multiple of the nice interval inside `[nsMin, nsMax]`.
 *
 * @param zoom - Pixels per nanosecond
 * @param spacingPx - Target distance between ticks
 */
export function generateTicks(
  nsMin: number,
  nsMax: number,
  zoom: number,
  spacingPx: number = TRACE_INDEX_CONSTANTS.TICK_SPACING_PX,
): TimeTick[] {
  const interval = niceInterval(spacingPx / Math.max(zoom, TRACE_INDEX_CONSTANTS.MIN_ZOOM));
  if (interval === 0 || !(nsMax >= nsMin)) {
    return [];
  }

  const ticks: TimeTick[] = [];
  // index * interval, not a running sum
  const last = Math.floor(nsMax / interval);
  for (let index = Math.ceil(nsMin / interval); index <= last; index++) {
    const ns = index * interval;
    ticks.push({ ns, label: formatTimeLabel(ns, interval) });
  }
  return ticks;
}
