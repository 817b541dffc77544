/**
 * Parser for pre-extracted event documents: either a JSON array of event
 * objects or newline-delimited JSON (one object per line).
 *
 * Keys other than the known event properties are kept as fields when they
 * hold scalar values.
 */

import { extname } from 'node:path';
import { z } from 'zod';
import type { EvidenceParser, ParseResult } from '../../types/collaborators.js';
import type { FieldValue, LogEvent } from '../../types/log-event.js';
import { throwIfCancelled } from '../../orchestration/errors.js';
import { FieldValueSchema } from '../../orchestration/serialization.js';

const EXTENSIONS = new Set(['.json', '.jsonl', '.ndjson']);

const KNOWN_KEYS = new Set(['timestamp', 'level', 'source', 'message', 'lineNumber', 'fields']);

const EventRecordSchema = z
  .object({
    timestamp: z.union([z.string(), z.number()]),
    level: z.string().optional(),
    source: z.string().optional(),
    message: z.string().optional(),
    lineNumber: z.number().int().nullable().optional(),
    fields: z.record(z.string(), FieldValueSchema).optional(),
  })
  .passthrough();

interface RawRecord {
  value: unknown;
  raw: string;
  lineNumber: number;
}

export class JsonEventsParser implements EvidenceParser {
  readonly id = 'json-events';
  readonly name = 'JSON Events';

  matches(fileName: string, content: string): boolean {
    if (!EXTENSIONS.has(extname(fileName).toLowerCase())) return false;
    const start = content.trimStart()[0];
    return start === '[' || start === '{';
  }

  async parse(fileName: string, content: string, signal?: AbortSignal): Promise<ParseResult> {
    let records: RawRecord[];
    try {
      records = splitRecords(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, errorMessage: `Invalid JSON in ${fileName}: ${message}` };
    }

    const events: LogEvent[] = [];
    for (const record of records) {
      throwIfCancelled(signal);

      const result = EventRecordSchema.safeParse(record.value);
      if (!result.success) {
        const issue = result.error.issues[0];
        const detail = issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'invalid record';
        return {
          success: false,
          errorMessage: `Invalid event at line ${record.lineNumber} of ${fileName}: ${detail}`,
        };
      }

      const timestamp = toIsoTimestamp(result.data.timestamp);
      if (timestamp === null) {
        return {
          success: false,
          errorMessage: `Invalid timestamp at line ${record.lineNumber} of ${fileName}`,
        };
      }

      const fields: Record<string, FieldValue> = { ...result.data.fields };
      for (const [key, value] of Object.entries(result.data)) {
        if (KNOWN_KEYS.has(key)) continue;
        if (isFieldValue(value)) fields[key] = value;
      }

      events.push({
        timestamp,
        level: result.data.level ?? 'INFO',
        source: result.data.source ?? '',
        message: result.data.message ?? '',
        lineNumber: result.data.lineNumber ?? record.lineNumber,
        raw: record.raw,
        fields,
      });
    }

    return { success: true, events };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function splitRecords(content: string): RawRecord[] {
  const trimmed = content.trim();

  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    if (!Array.isArray(parsed)) throw new Error('expected an array of events');
    return parsed.map((value: unknown, index) => ({
      value,
      raw: JSON.stringify(value),
      lineNumber: index + 1,
    }));
  }

  const records: RawRecord[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim().length === 0) return;
    try {
      records.push({ value: JSON.parse(line), raw: line, lineNumber: index + 1 });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`line ${index + 1}: ${message}`);
    }
  });
  return records;
}

function toIsoTimestamp(value: string | number): string | null {
  const ms = typeof value === 'number' ? value : Date.parse(value);
  return Number.isFinite(ms) ? new Date(ms).toISOString() : null;
}

function isFieldValue(value: unknown): value is FieldValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}
