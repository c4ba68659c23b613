/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import { resolveOptions } from '../config.js';
import { TraceIndexError } from '../errors.js';

describe('resolveOptions', () => {
  it('should fill in defaults', () => {
    const options = resolveOptions();

    expect(options.mipmap).toEqual({ baseFeatureNs: 16, levelScale: 4, maxLevels: 16 });
    expect(options.query).toEqual({ minVisiblePx: 1 });
    expect(options.ticks).toEqual({ spacingPx: 100 });
    expect(options.logger).toBe(console);
  });

  it('should merge partial sections with defaults', () => {
    const logger = { log: jest.fn(), warn: jest.fn() };

    const options = resolveOptions({ mipmap: { maxLevels: 3 }, logger });

    expect(options.mipmap).toEqual({ baseFeatureNs: 16, levelScale: 4, maxLevels: 3 });
    expect(options.logger).toBe(logger);
  });

  it('should reject invalid values with INVALID_OPTIONS', () => {
    let thrown: unknown;
    try {
      resolveOptions({ mipmap: { levelScale: 1 } });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(TraceIndexError);
    expect(thrown).toMatchObject({
      code: 'INVALID_OPTIONS',
      message: 'Invalid trace index options: mipmap.levelScale: levelScale must be greater than 1',
    });
  });

  it('should reject non-integer level counts', () => {
    expect(() => resolveOptions({ mipmap: { maxLevels: 2.5 } })).toThrow(TraceIndexError);
  });

  it('should reject non-positive spacing', () => {
    expect(() => resolveOptions({ ticks: { spacingPx: 0 } })).toThrow(
      /^Invalid trace index options: ticks\.spacingPx: /,
    );
  });
});
