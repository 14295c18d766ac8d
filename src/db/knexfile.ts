// ──────────────────────────────────────────
// Knex configuration (CLI + scripts)
// ──────────────────────────────────────────

import dotenv from 'dotenv';
import path from 'path';
import { Knex } from 'knex';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

/** Where the source-table migrations live; shared by the CLI, seed and reset. */
export const migrations: Knex.MigratorConfig = {
  directory: path.resolve(__dirname, 'migrations'),
  extension: 'ts',
  tableName: 'knex_migrations',
};

const config: Knex.Config = {
  client: 'pg',
  connection: process.env.DATABASE_URL,
  pool: { min: 0, max: 4 },
  migrations,
};

export default config;
