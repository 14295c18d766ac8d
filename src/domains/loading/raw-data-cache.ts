// ──────────────────────────────────────────
// Loading: Raw data cache
// ──────────────────────────────────────────
// An immutable snapshot of fetched rows plus the newest timestamp seen per
// table. Every operation returns a new value; the owner decides when to swap.

import { RawDataCache, RawTables, SourceTable } from '../../shared/types';

export type TableBatch = { [T in SourceTable]: { table: T; records: RawTables[T] } }[SourceTable];

export function emptyCache(): RawDataCache {
  return {
    tables: { streams: [], highlights: [], livestreams: [], bots: [], urls: [] },
    lastSeen: { streams: null, highlights: null, livestreams: null, bots: null, urls: null },
    loadedAt: null,
  };
}

export function invalidate(_cache: RawDataCache): RawDataCache {
  return emptyCache();
}

/**
 * Appends rows not yet cached (by `entity_id`) to one table and advances its
 * last-seen timestamp.
 */
export function mergeIncremental(cache: RawDataCache, batch: TableBatch): RawDataCache {
  const tables = mergeTable(cache.tables, batch);
  const records: { timestamp: Date }[] = batch.records;
  const newest = records.reduce<Date | null>(
    (latest, record) => (latest === null || record.timestamp > latest ? record.timestamp : latest),
    cache.lastSeen[batch.table]
  );
  return {
    tables,
    lastSeen: { ...cache.lastSeen, [batch.table]: newest },
    loadedAt: cache.loadedAt,
  };
}

/** The cached rows of one table, packaged as a batch. */
export function tableBatch(tables: RawTables, table: SourceTable): TableBatch {
  switch (table) {
    case 'streams':
      return { table, records: tables.streams };
    case 'highlights':
      return { table, records: tables.highlights };
    case 'livestreams':
      return { table, records: tables.livestreams };
    case 'bots':
      return { table, records: tables.bots };
    case 'urls':
      return { table, records: tables.urls };
  }
}

export function rowCounts(cache: RawDataCache): Record<SourceTable, number> {
  const { tables } = cache;
  return {
    streams: tables.streams.length,
    highlights: tables.highlights.length,
    livestreams: tables.livestreams.length,
    bots: tables.bots.length,
    urls: tables.urls.length,
  };
}

function mergeTable(tables: RawTables, batch: TableBatch): RawTables {
  switch (batch.table) {
    case 'streams':
      return { ...tables, streams: appendNew(tables.streams, batch.records) };
    case 'highlights':
      return { ...tables, highlights: appendNew(tables.highlights, batch.records) };
    case 'livestreams':
      return { ...tables, livestreams: appendNew(tables.livestreams, batch.records) };
    case 'bots':
      return { ...tables, bots: appendNew(tables.bots, batch.records) };
    case 'urls':
      return { ...tables, urls: appendNew(tables.urls, batch.records) };
  }
}

function appendNew<R extends { entity_id: string }>(existing: R[], incoming: R[]): R[] {
  const seen = new Set(existing.map((r) => r.entity_id));
  const merged = [...existing];
  for (const record of incoming) {
    if (seen.has(record.entity_id)) continue;
    seen.add(record.entity_id);
    merged.push(record);
  }
  return merged;
}
