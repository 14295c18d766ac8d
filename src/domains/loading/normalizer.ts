// ──────────────────────────────────────────
// Loading: Row normalizer
// ──────────────────────────────────────────
// Turns raw table rows into Event Records. Rows that fail validation are
// dropped, with one warning per batch.

import { InvalidTimestampError, ValidationError } from '../../shared/errors';
import {
  EmptyAttributes,
  EventRecord,
  HighlightAttributes,
  SourceRow,
  SourceTable,
  StreamAttributes,
  UrlAttributes,
} from '../../shared/types';
import { TableBatch } from './raw-data-cache';

const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Accepts `Date` instances (as returned by pg for timestamptz) and ISO-8601
 * strings carrying an explicit offset. Zone-less strings are rejected.
 */
export function parseTimestamp(value: unknown): Date {
  if (value instanceof Date) {
    if (isNaN(value.getTime())) throw new InvalidTimestampError(String(value), 'not a valid instant');
    return value;
  }
  if (typeof value !== 'string') {
    throw new InvalidTimestampError(value, 'expected an ISO-8601 string');
  }

  const trimmed = value.trim();
  if (!ZONE_DESIGNATOR.test(trimmed)) {
    throw new InvalidTimestampError(value, 'no UTC offset');
  }
  const iso = trimmed
    .replace(' ', 'T')
    .replace(/(\.\d{3})\d+/, '$1')
    .replace(/([+-]\d{2})$/, '$1:00');
  const date = new Date(iso);
  if (isNaN(date.getTime())) {
    throw new InvalidTimestampError(value, 'unparseable');
  }
  return date;
}

// ── Field readers ──

function requireId(row: SourceRow, field: string): string {
  const value = row[field];
  if ((typeof value === 'string' && value.length > 0) || typeof value === 'number') {
    return String(value);
  }
  throw new ValidationError(`Row missing ${field}`);
}

function optionalId(row: SourceRow, field: string): string | null {
  const value = row[field];
  if (value === null || value === undefined || value === '') return null;
  return String(value);
}

function flag(row: SourceRow, field: string, fallback: boolean): boolean {
  const value = row[field];
  return typeof value === 'boolean' ? value : fallback;
}

function nullableFlag(row: SourceRow, field: string): boolean | null {
  const value = row[field];
  return typeof value === 'boolean' ? value : null;
}

function count(row: SourceRow, field: string): number {
  const value = Number(row[field] ?? 0);
  return Number.isFinite(value) ? value : 0;
}

function base(row: SourceRow): Omit<EventRecord, 'attributes'> {
  return {
    entity_id: requireId(row, 'id'),
    user_id: requireId(row, 'user_id'),
    timestamp: parseTimestamp(row.created_at),
  };
}

// ── Per-table transformers ──

export function toStream(row: SourceRow): EventRecord<StreamAttributes> {
  // Older rows predate the `converted` column; they were all converted
  return { ...base(row), attributes: { converted: flag(row, 'converted', true) } };
}

export function toHighlight(row: SourceRow): EventRecord<HighlightAttributes> {
  return {
    ...base(row),
    attributes: {
      liked: nullableFlag(row, 'liked'),
      downloaded: flag(row, 'downloaded', false),
      link_copied: flag(row, 'link_copied', false),
      stream_id: optionalId(row, 'stream_id'),
      livestream_id: optionalId(row, 'livestream_id'),
    },
  };
}

export function toPlain(row: SourceRow): EventRecord<EmptyAttributes> {
  return { ...base(row), attributes: {} };
}

export function toUrl(row: SourceRow): EventRecord<UrlAttributes> {
  return { ...base(row), attributes: { view_count: count(row, 'view_count') } };
}

function normalizeAll<R>(table: SourceTable, rows: SourceRow[], transform: (row: SourceRow) => R): R[] {
  const records: R[] = [];
  let firstError: ValidationError | null = null;
  let dropped = 0;

  for (const row of rows) {
    try {
      records.push(transform(row));
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      dropped++;
      firstError ??= err;
    }
  }

  if (firstError) {
    console.warn(`[Loader] Dropped ${dropped} of ${rows.length} ${table} row(s): ${firstError.message}`);
  }
  return records;
}

export function normalizeBatch(table: SourceTable, rows: SourceRow[]): TableBatch {
  switch (table) {
    case 'streams':
      return { table, records: normalizeAll(table, rows, toStream) };
    case 'highlights':
      return { table, records: normalizeAll(table, rows, toHighlight) };
    case 'livestreams':
      return { table, records: normalizeAll(table, rows, toPlain) };
    case 'bots':
      return { table, records: normalizeAll(table, rows, toPlain) };
    case 'urls':
      return { table, records: normalizeAll(table, rows, toUrl) };
  }
}
