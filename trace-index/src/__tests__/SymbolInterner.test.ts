/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import { InternerFrozenError, UnknownSymbolError } from '../errors.js';
import { SymbolInterner } from '../SymbolInterner.js';

describe('SymbolInterner', () => {
  it('should issue ids in first-seen order and reuse them for repeats', () => {
    const interner = new SymbolInterner();

    const foo = interner.intern('foo');
    const bar = interner.intern('bar');

    expect(foo).toBe(0);
    expect(bar).toBe(1);
    expect(interner.intern('foo')).toBe(foo);
    expect(interner.size).toBe(2);
  });

  it('should resolve every issued symbol back to its string', () => {
    const interner = new SymbolInterner();
    const values = ['main', 'worker', '', 'main.render', 'ünïcode'];

    const symbols = values.map((value) => interner.intern(value));

    expect(symbols.map((symbol) => interner.resolve(symbol))).toEqual(values);
  });

  it('should throw for a symbol it never issued', () => {
    const interner = new SymbolInterner();
    interner.intern('foo');

    expect(() => interner.resolve(1)).toThrow(UnknownSymbolError);
    expect(() => interner.resolve(-1)).toThrow('Unknown symbol #-1');
    expect(() => interner.resolve(0.5)).toThrow(UnknownSymbolError);
  });

  it('should report membership without allocating', () => {
    const interner = new SymbolInterner();
    interner.intern('foo');

    expect(interner.has('foo')).toBe(true);
    expect(interner.has('bar')).toBe(false);
    expect(interner.size).toBe(1);
  });

  describe('freeze', () => {
    it('should still answer for known strings', () => {
      const interner = new SymbolInterner();
      const foo = interner.intern('foo');

      interner.freeze();

      expect(interner.isFrozen).toBe(true);
      expect(interner.intern('foo')).toBe(foo);
      expect(interner.resolve(foo)).toBe('foo');
    });

    it('should reject new strings', () => {
      const interner = new SymbolInterner().freeze();

      expect(() => interner.intern('late')).toThrow(InternerFrozenError);
      expect(() => interner.intern('late')).toThrow(
        'Cannot intern "late": the symbol table is frozen',
      );
      expect(interner.size).toBe(0);
    });
  });
});
