import { afterAll, describe, it, expect } from 'vitest';
import knex from 'knex';
import { SourceTableRepo } from './source-table.repo';

// Query building only; no connection is opened
const db = knex({ client: 'pg' });
const repo = new SourceTableRepo(db);

afterAll(async () => {
  await db.destroy();
});

describe('SourceTableRepo.pageQuery', () => {
  it('reads rows at or after the last-seen timestamp in order', () => {
    const since = new Date('2024-10-07T10:00:00Z');
    const { sql, bindings } = repo.pageQuery({ table: 'streams', since, offset: 2000, limit: 1000 }).toSQL();

    expect(sql).toBe('select * from "Streams" where "created_at" >= ? order by "created_at" asc, "id" asc limit ? offset ?');
    expect(bindings).toEqual([since, 1000, 2000]);
  });

  it('reads the whole table without a last-seen timestamp', () => {
    const { sql, bindings } = repo.pageQuery({ table: 'highlights', since: null, offset: 500, limit: 500 }).toSQL();

    expect(sql).toBe('select * from "Highlights" order by "created_at" asc, "id" asc limit ? offset ?');
    expect(bindings).toEqual([500, 500]);
  });
});
