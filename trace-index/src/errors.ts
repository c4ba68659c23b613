/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import type { SymbolId } from './types.js';

export type TraceIndexErrorCode =
  | 'SOURCE_UNREADABLE'
  | 'UNKNOWN_SYMBOL'
  | 'FROZEN'
  | 'BUILD_ABORTED'
  | 'INVALID_OPTIONS';

export class TraceIndexError extends Error {
  readonly code: TraceIndexErrorCode;

  constructor(code: TraceIndexErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TraceIndexError';
    this.code = code;
  }
}

/**
 * The trace could not be opened, read or validated. Fatal for the build; retrying means
 * starting a new build.
 */
export class SourceUnreadableError extends TraceIndexError {
  readonly origin: string;

  constructor(origin: string, reason: string, cause?: unknown) {
    super('SOURCE_UNREADABLE', `Failed to load trace data from ${origin}: ${reason}`, { cause });
    this.name = 'SourceUnreadableError';
    this.origin = origin;
  }
}

/** A symbol that this interner never issued was resolved. */
export class UnknownSymbolError extends TraceIndexError {
  readonly symbol: SymbolId;

  constructor(symbol: SymbolId) {
    super('UNKNOWN_SYMBOL', `Unknown symbol #${symbol}`);
    this.name = 'UnknownSymbolError';
    this.symbol = symbol;
  }
}

export class InternerFrozenError extends TraceIndexError {
  constructor(value: string) {
    super('FROZEN', `Cannot intern "${value}": the symbol table is frozen`);
    this.name = 'InternerFrozenError';
  }
}

export class ArenaFrozenError extends TraceIndexError {
  constructor() {
    super('FROZEN', 'Cannot append to a frozen event arena');
    this.name = 'ArenaFrozenError';
  }
}

export class BuildAbortedError extends TraceIndexError {
  constructor(key: string) {
    super('BUILD_ABORTED', `Build for ${key} was aborted`);
    this.name = 'BuildAbortedError';
  }
}
