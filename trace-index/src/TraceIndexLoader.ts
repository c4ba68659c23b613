/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import {
  resolveOptions,
  type ResolvedTraceIndexOptions,
  type TraceIndexOptions,
} from './config.js';
import { BuildAbortedError, SourceUnreadableError, TraceIndexError } from './errors.js';
import { JsonTraceSource } from './JsonTraceSource.js';
import { buildTraceIndex, type TraceIndex } from './TraceIndexBuilder.js';
import type { TraceSource } from './types.js';

export type LoadState =
  | { status: 'loading' }
  | { status: 'ready'; index: TraceIndex; loadDurationNs: number }
  | { status: 'error'; error: TraceIndexError };

/** Produces the source for a key. The signal fires when the load is cancelled or superseded. */
export type SourceOpener = (signal: AbortSignal) => TraceSource | Promise<TraceSource>;

/**
 * Builds and caches trace indexes by key (normally a file path).
 *
 * At most one build per key is in flight. {@link getOrLoad} joins a running build;
 * {@link load} supersedes it, and the earlier build then rejects with
 * {@link BuildAbortedError} and never publishes its result. Callers only ever observe a
 * complete index or a terminal error.
 */
export class TraceIndexLoader {
  private readonly states = new Map<string, LoadState>();
  private readonly inFlight = new Map<string, AbortController>();
  private readonly pending = new Map<string, Promise<TraceIndex>>();
  private readonly options: ResolvedTraceIndexOptions;

  constructor(options: TraceIndexOptions = {}) {
    this.options = resolveOptions(options);
  }

  state(key: string): LoadState | undefined {
    return this.states.get(key);
  }

  /** The ready index for `key`, or null while loading, after a failure, or if never loaded. */
  get(key: string): TraceIndex | null {
    const state = this.states.get(key);
    return state?.status === 'ready' ? state.index : null;
  }

  isLoading(key: string): boolean {
    return this.inFlight.has(key);
  }

  /**
   * The cached index if there is one, else the build already running for `key`, otherwise
   * a fresh {@link load}. `open` and `signal` only apply when this call starts the build.
   */
  async getOrLoad(key: string, open?: SourceOpener, signal?: AbortSignal): Promise<TraceIndex> {
    return this.get(key) ?? this.pending.get(key) ?? this.load(key, open, signal);
  }

  /**
   * (Re)build the index for `key`.
   *
   * @param open - Source for the key; defaults to reading `key` as a JSON trace file
   * @param signal - Cancels this load
   */
  load(key: string, open?: SourceOpener, signal?: AbortSignal): Promise<TraceIndex> {
    this.inFlight.get(key)?.abort();

    const controller = new AbortController();
    this.inFlight.set(key, controller);
    this.states.set(key, { status: 'loading' });

    const build = this.build(key, controller, open, signal);
    // A build that failed before its first await has already settled its state
    if (this.inFlight.get(key) === controller) {
      this.pending.set(key, build);
    }
    return build;
  }

  private async build(
    key: string,
    controller: AbortController,
    open?: SourceOpener,
    signal?: AbortSignal,
  ): Promise<TraceIndex> {
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const startTime = performance.now();

    try {
      const checkpoint = () => {
        if (controller.signal.aborted) {
          throw new BuildAbortedError(key);
        }
      };

      checkpoint();
      const source = await (open ?? openJsonFile(key))(controller.signal);
      checkpoint();
      const index = buildTraceIndex(source, this.options, { key, signal: controller.signal });
      checkpoint();

      const loadDurationNs = Math.round((performance.now() - startTime) * 1e6);
      this.inFlight.delete(key);
      this.pending.delete(key);
      this.states.set(key, { status: 'ready', index, loadDurationNs });
      return index;
    } catch (error) {
      throw this.fail(key, controller, error);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /** Abort the in-flight load for `key`, if any. */
  cancel(key: string): void {
    this.inFlight.get(key)?.abort();
  }

  /** Cancel any load and forget the cached state for `key`. */
  clear(key: string): void {
    this.cancel(key);
    this.inFlight.delete(key);
    this.pending.delete(key);
    this.states.delete(key);
  }

  clearAll(): void {
    for (const key of [...this.inFlight.keys(), ...this.states.keys()]) {
      this.clear(key);
    }
  }

  private fail(key: string, controller: AbortController, error: unknown): TraceIndexError {
    const failure =
      error instanceof TraceIndexError
        ? error
        : new SourceUnreadableError(key, describe(error), error);

    // Superseded or cleared: a newer load owns the key's state now
    if (this.inFlight.get(key) !== controller) {
      return controller.signal.aborted ? new BuildAbortedError(key) : failure;
    }

    this.inFlight.delete(key);
    this.pending.delete(key);
    this.states.set(key, { status: 'error', error: failure });
    if (failure.code !== 'BUILD_ABORTED') {
      this.options.logger.warn(`Failed to load trace ${key}: ${failure.message}`);
    }
    return failure;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function openJsonFile(filePath: string): SourceOpener {
  return () => JsonTraceSource.fromFile(filePath);
}
