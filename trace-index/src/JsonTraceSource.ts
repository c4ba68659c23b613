/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';

import { SourceUnreadableError } from './errors.js';
import type { RawTraceRecord, TraceMetadata, TraceSource } from './types.js';

// Decimal strings keep full 64-bit precision; plain numbers are accepted for small traces.
const timestampSchema = z.union([
  z
    .string()
    .regex(/^\d+$/, 'expected a non-negative integer string')
    .transform((value) => BigInt(value)),
  z.number().int().nonnegative().safe('numbers above 2^53 lose precision, use a decimal string'),
]);

const recordSchema = z
  .object({
    threadId: z.number().int().nonnegative(),
    label: z.string(),
    kind: z.string(),
    extraLabels: z.array(z.string()).default([]),
    payload: z.number().nullable().default(null),
    interval: z.object({ start: timestampSchema, end: timestampSchema }).nullable().default(null),
  })
  .strict();

const traceDocumentSchema = z.object({
  metadata: z.object({
    epochNs: timestampSchema,
    commandLine: z.string().default(''),
    processId: z.number().int().nonnegative(),
  }),
  records: z.array(recordSchema),
});

/**
 * Trace source backed by a JSON document:
 *
 * ```json
 * {
 *   "metadata": { "epochNs": "1700000000000000000", "commandLine": "app --run", "processId": 42 },
 *   "records": [
 *     { "threadId": 1, "label": "main", "kind": "Task",
 *       "interval": { "start": "1700000000000000100", "end": "1700000000000000900" } }
 *   ]
 * }
 * ```
 */
export class JsonTraceSource implements TraceSource {
  readonly metadata: TraceMetadata;
  private readonly rawRecords: readonly RawTraceRecord[];

  private constructor(metadata: TraceMetadata, records: readonly RawTraceRecord[]) {
    this.metadata = metadata;
    this.rawRecords = records;
  }

  static async fromFile(filePath: string): Promise<JsonTraceSource> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new SourceUnreadableError(filePath, describe(error), error);
    }
    return JsonTraceSource.fromText(content, filePath);
  }

  /**
   * @param origin - Where the text came from, for error messages
   * @throws SourceUnreadableError for malformed JSON or a document that fails validation
   */
  static fromText(text: string, origin: string): JsonTraceSource {
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new SourceUnreadableError(origin, `invalid JSON (${describe(error)})`, error);
    }

    const parsed = traceDocumentSchema.safeParse(document);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new SourceUnreadableError(origin, detail, parsed.error);
    }

    return new JsonTraceSource(parsed.data.metadata, parsed.data.records);
  }

  records(): Iterable<RawTraceRecord> {
    return this.rawRecords;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
