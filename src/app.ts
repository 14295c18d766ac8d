// ──────────────────────────────────────────
// App entry point: bootstrap + Express server
// ──────────────────────────────────────────
// 1. Validate configuration
// 2. Connect to Postgres
// 3. Instantiate loading + analytics with contract injection
// 4. Mount routes with auth middleware
// 5. Initial refresh, then listen

import dotenv from 'dotenv';
dotenv.config();

import { getEnv } from './config/env';
import { getDb, closeDb } from './db/connection';
import { createApp, metricsOptionsFromEnv } from './server';

// Loading
import { DataLoader, SourceTableRepo } from './domains/loading';

// Analytics
import { MetricsService } from './domains/analytics';

async function main() {
  const env = getEnv();
  const db = getDb(env.DATABASE_URL);

  // ── Loading ──
  const tableRepo = new SourceTableRepo(db);
  const loader = new DataLoader(tableRepo, { pageSize: env.FETCH_PAGE_SIZE });

  // ── Analytics ──
  const metricsService = new MetricsService(loader, metricsOptionsFromEnv(env));

  const initial = await metricsService.refresh();
  if (initial.failed_tables.length > 0) {
    console.warn(`[App] Started with unavailable tables: ${initial.failed_tables.join(', ')}`);
  }

  const app = createApp(metricsService, env.DASHBOARD_API_KEY);
  const server = app.listen(env.PORT, () => {
    console.log(`[App] Stream metrics listening on port ${env.PORT}`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('[App] Shutting down...');
    server.close();
    closeDb()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('[App] Error while closing the database:', err);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch((err) => {
    console.error('[App] Fatal error:', err);
    process.exit(1);
  });
}
