/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import { InternerFrozenError, UnknownSymbolError } from './errors.js';
import type { SymbolId } from './types.js';

/**
 * Deduplicates event strings into compact ids.
 *
 * Ids are handed out in first-seen order and never reused. The build pass owns the
 * interner exclusively until {@link freeze}, after which it is a read-only table that can
 * be shared freely.
 */
export class SymbolInterner {
  private readonly ids = new Map<string, SymbolId>();
  private readonly strings: string[] = [];
  private frozen = false;

  public get size(): number {
    return this.strings.length;
  }

  public get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Return the symbol for `value`, allocating the next id on first sight.
   * A frozen interner still answers for strings it already holds.
   */
  public intern(value: string): SymbolId {
    const existing = this.ids.get(value);
    if (existing !== undefined) {
      return existing;
    }
    if (this.frozen) {
      throw new InternerFrozenError(value);
    }

    const id = this.strings.length;
    this.strings.push(value);
    this.ids.set(value, id);
    return id;
  }

  /**
   * Look up the string behind `symbol`.
   * @throws UnknownSymbolError when the symbol was not issued by this interner
   */
  public resolve(symbol: SymbolId): string {
    const value = Number.isInteger(symbol) ? this.strings[symbol] : undefined;
    if (value === undefined) {
      throw new UnknownSymbolError(symbol);
    }
    return value;
  }

  public has(value: string): boolean {
    return this.ids.has(value);
  }

  public freeze(): this {
    this.frozen = true;
    return this;
  }
}
