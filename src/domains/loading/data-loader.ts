// ──────────────────────────────────────────
// Loading: Data loader (refresh-triggered)
// ──────────────────────────────────────────

import { LoadingContract, RefreshOutcome, SourceTableReader } from '../../shared/contracts';
import { UpstreamFetchError } from '../../shared/errors';
import { RawDataCache, SOURCE_TABLES, SourceRow, SourceTable } from '../../shared/types';
import { normalizeBatch } from './normalizer';
import { invalidate, mergeIncremental, tableBatch } from './raw-data-cache';

export interface DataLoaderOptions {
  pageSize: number;
  now?: () => Date;
}

export class DataLoader implements LoadingContract {
  private now: () => Date;

  constructor(
    private reader: SourceTableReader,
    private options: DataLoaderOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Fetches rows newer than each table's last-seen timestamp (everything when
   * forced) and returns a new cache. A table whose fetch fails keeps the rows
   * it had in `cache`.
   */
  async refresh(cache: RawDataCache, options: { force?: boolean } = {}): Promise<RefreshOutcome> {
    const force = options.force ?? false;
    let next = force ? invalidate(cache) : cache;
    const failedTables: SourceTable[] = [];

    for (const table of SOURCE_TABLES) {
      try {
        const rows = await this.fetchAll(table, next.lastSeen[table]);
        next = mergeIncremental(next, normalizeBatch(table, rows));
      } catch (err) {
        const failure = err instanceof UpstreamFetchError ? err : new UpstreamFetchError(table, err);
        failedTables.push(table);
        if (force) {
          next = mergeIncremental(next, tableBatch(cache.tables, table));
        }
        console.warn(`[Loader] ${failure.message}; keeping ${cache.tables[table].length} cached row(s)`);
      }
    }

    console.log(
      `[Loader] Refresh complete (${force ? 'full' : 'incremental'}): ` +
        SOURCE_TABLES.map((t) => `${t}=${next.tables[t].length}`).join(', ')
    );
    return { cache: { ...next, loadedAt: this.now() }, failedTables };
  }

  private async fetchAll(table: SourceTable, since: Date | null): Promise<SourceRow[]> {
    const rows: SourceRow[] = [];
    const limit = this.options.pageSize;
    let offset = 0;

    for (;;) {
      let page: SourceRow[];
      try {
        page = await this.reader.fetchPage({ table, since, offset, limit });
      } catch (err) {
        throw new UpstreamFetchError(table, err);
      }
      rows.push(...page);
      if (page.length < limit) return rows;
      offset += limit;
    }
  }
}
