/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import { z } from 'zod';

import { TraceIndexError } from './errors.js';
import { TRACE_INDEX_CONSTANTS } from './types.js';

/** Console-shaped sink for build timings and load failures. */
export type TraceLogger = Pick<Console, 'log' | 'warn'>;

const positive = z.number().finite().positive();

const optionsSchema = z
  .object({
    mipmap: z
      .object({
        baseFeatureNs: positive.default(TRACE_INDEX_CONSTANTS.MIPMAP.BASE_FEATURE_NS),
        levelScale: z
          .number()
          .finite()
          .gt(1, 'levelScale must be greater than 1')
          .default(TRACE_INDEX_CONSTANTS.MIPMAP.LEVEL_SCALE),
        maxLevels: z.number().int().min(1).default(TRACE_INDEX_CONSTANTS.MIPMAP.MAX_LEVELS),
      })
      .strict()
      .default({}),
    query: z
      .object({
        minVisiblePx: positive.default(TRACE_INDEX_CONSTANTS.MIN_VISIBLE_PX),
      })
      .strict()
      .default({}),
    ticks: z
      .object({
        spacingPx: positive.default(TRACE_INDEX_CONSTANTS.TICK_SPACING_PX),
      })
      .strict()
      .default({}),
  })
  .strict();

export type MipmapOptions = z.output<typeof optionsSchema>['mipmap'];
export type QueryOptions = z.output<typeof optionsSchema>['query'];

export interface ResolvedTraceIndexOptions extends z.output<typeof optionsSchema> {
  logger: TraceLogger;
}

export interface TraceIndexOptions extends z.input<typeof optionsSchema> {
  logger?: TraceLogger;
}

/**
 * Fill in defaults and validate user-supplied options.
 * @throws TraceIndexError with code `INVALID_OPTIONS`
 */
export function resolveOptions(options: TraceIndexOptions = {}): ResolvedTraceIndexOptions {
  const { logger, ...rest } = options;
  const parsed = optionsSchema.safeParse(rest);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new TraceIndexError('INVALID_OPTIONS', `Invalid trace index options: ${detail}`, {
      cause: parsed.error,
    });
  }
  return { ...parsed.data, logger: logger ?? console };
}
