// ──────────────────────────────────────────
// Loading: Source table repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { SourceTableReader } from '../../shared/contracts';
import { SourceRow, SourceTable, TABLE_NAMES } from '../../shared/types';

export interface PageParams {
  table: SourceTable;
  since: Date | null;
  offset: number;
  limit: number;
}

export class SourceTableRepo implements SourceTableReader {
  constructor(private db: Knex) {}

  /**
   * `since` is inclusive: rows sharing the last-seen timestamp are fetched
   * again and dropped by the cache's id check.
   */
  pageQuery(params: PageParams): Knex.QueryBuilder {
    let query = this.db(TABLE_NAMES[params.table])
      .select('*')
      .orderBy('created_at', 'asc')
      .orderBy('id', 'asc')
      .limit(params.limit)
      .offset(params.offset);

    if (params.since) {
      query = query.where('created_at', '>=', params.since);
    }
    return query;
  }

  async fetchPage(params: PageParams): Promise<SourceRow[]> {
    return this.pageQuery(params);
  }
}
