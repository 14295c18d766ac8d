// ──────────────────────────────────────────
// Database connection: Knex instance
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';

let db: Knex | undefined;

export function getDb(connection: string | undefined = process.env.DATABASE_URL): Knex {
  if (!db) {
    if (!connection) {
      throw new Error('DATABASE_URL is not set');
    }
    db = knex({
      client: 'pg',
      connection,
      pool: { min: 0, max: 4 },
    });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = undefined;
  }
}
