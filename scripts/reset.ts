// ──────────────────────────────────────────
// Script: Reset: drop the source tables and re-run migrations
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { getDb, closeDb } from '../src/db/connection';
import { migrations } from '../src/db/knexfile';

async function reset() {
  const db = getDb();
  console.log('[Reset] Dropping all tables...');

  // Drop in reverse FK order
  await db.raw('DROP TABLE IF EXISTS "Highlights" CASCADE');
  await db.raw('DROP TABLE IF EXISTS "Urls" CASCADE');
  await db.raw('DROP TABLE IF EXISTS "Bots" CASCADE');
  await db.raw('DROP TABLE IF EXISTS "Livestreams" CASCADE');
  await db.raw('DROP TABLE IF EXISTS "Streams" CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations_lock CASCADE');

  console.log('[Reset] Running migrations...');
  await db.migrate.latest(migrations);

  console.log('[Reset] Done, all tables recreated');

  if (process.argv.includes('--seed')) {
    console.log('[Reset] Running seed...');
    await closeDb();
    await import('./seed');
    return; // seed.ts handles exit
  }

  await closeDb();
  process.exit(0);
}

reset().catch((err) => {
  console.error('[Reset] Error:', err);
  process.exit(1);
});
