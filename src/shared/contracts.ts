// ──────────────────────────────────────────
// Domain contracts: typed interfaces between domains
// ──────────────────────────────────────────

import { RawDataCache, SourceRow, SourceTable } from './types';

/**
 * Table store contract, implemented by the Knex reader, faked in tests.
 * Returns one page of rows ordered by `created_at` ascending.
 */
export interface SourceTableReader {
  fetchPage(params: { table: SourceTable; since: Date | null; offset: number; limit: number }): Promise<SourceRow[]>;
}

/**
 * Loading contract, exposed to the Analytics domain.
 * Analytics hands in its current snapshot and gets a new one back; it never
 * sees a partially refreshed cache.
 */
export interface LoadingContract {
  refresh(cache: RawDataCache, options?: { force?: boolean }): Promise<RefreshOutcome>;
}

export interface RefreshOutcome {
  cache: RawDataCache;
  /** Tables whose fetch failed; their previously cached rows were kept. */
  failedTables: SourceTable[];
}
