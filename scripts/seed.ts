// ──────────────────────────────────────────
// Script: Seed: 120 days of demo activity across the five source tables
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { v4 as uuidv4 } from 'uuid';
import { getDb, closeDb } from '../src/db/connection';
import { migrations } from '../src/db/knexfile';
import { TABLE_NAMES } from '../src/shared/types';

const DAYS = 120;
const USERS = 60;

function pick<T>(items: readonly T[]): T {
  return items[Math.floor(Math.random() * items.length)];
}

function chance(p: number): boolean {
  return Math.random() < p;
}

interface SeedRow {
  id: string;
  user_id: string;
  created_at: Date;
  [column: string]: unknown;
}

async function seed() {
  const db = getDb();
  console.log('[Seed] Starting...');

  // Run migrations
  console.log('[Seed] Running migrations...');
  await db.migrate.latest(migrations);

  // Clean slate: truncate all source tables
  console.log('[Seed] Clearing existing data...');
  const tables = Object.values(TABLE_NAMES).map((name) => `"${name}"`);
  await db.raw(`TRUNCATE TABLE ${tables.join(', ')} CASCADE`);

  const now = new Date();
  const users: { id: string; joined: number }[] = [];
  for (let i = 0; i < USERS; i++) {
    // Users join gradually over the window so new_users and retention move
    users.push({ id: `user-${String(i + 1).padStart(3, '0')}`, joined: Math.floor(Math.random() * DAYS) });
  }

  const streams: SeedRow[] = [];
  const livestreams: SeedRow[] = [];
  const highlights: SeedRow[] = [];
  const bots: SeedRow[] = [];
  const urls: SeedRow[] = [];

  for (let d = DAYS; d >= 0; d--) {
    const day = new Date(now);
    day.setUTCDate(day.getUTCDate() - d);
    const dayIndex = DAYS - d;

    for (const user of users) {
      if (dayIndex < user.joined || !chance(0.35)) continue;

      const at = new Date(day);
      at.setUTCHours(Math.floor(Math.random() * 24), Math.floor(Math.random() * 60), 0, 0);
      if (at > now) continue;

      if (chance(0.7)) {
        const streamId = uuidv4();
        streams.push({ id: streamId, user_id: user.id, converted: chance(0.9), created_at: at });
        for (let h = 0; h < 1 + Math.floor(Math.random() * 3); h++) {
          highlights.push({
            id: uuidv4(),
            user_id: user.id,
            stream_id: streamId,
            livestream_id: null,
            liked: chance(0.2) ? null : chance(0.6),
            downloaded: chance(0.3),
            link_copied: chance(0.15),
            created_at: at,
          });
        }
      } else {
        const livestreamId = uuidv4();
        livestreams.push({ id: livestreamId, user_id: user.id, created_at: at });
        highlights.push({
          id: uuidv4(),
          user_id: user.id,
          stream_id: null,
          livestream_id: livestreamId,
          liked: chance(0.2) ? null : chance(0.5),
          downloaded: chance(0.25),
          link_copied: chance(0.1),
          created_at: at,
        });
      }

      if (chance(0.2)) {
        urls.push({ id: uuidv4(), user_id: user.id, view_count: pick([0, 0, 1, 3, 8, 20]), created_at: at });
      }
      if (chance(0.05)) {
        bots.push({ id: uuidv4(), user_id: user.id, created_at: at });
      }
    }
  }

  // Insert in batches of 200 to avoid query size limits; parents before highlights
  const inserts: [string, SeedRow[]][] = [
    [TABLE_NAMES.streams, streams],
    [TABLE_NAMES.livestreams, livestreams],
    [TABLE_NAMES.highlights, highlights],
    [TABLE_NAMES.bots, bots],
    [TABLE_NAMES.urls, urls],
  ];
  for (const [table, rows] of inserts) {
    console.log(`[Seed] Inserting ${rows.length} ${table} rows...`);
    for (let i = 0; i < rows.length; i += 200) {
      await db(table).insert(rows.slice(i, i + 200));
    }
  }

  console.log(`\n[Seed] Done!`);
  console.log(`  Users:        ${USERS}`);
  console.log(`  Streams:      ${streams.length}`);
  console.log(`  Livestreams:  ${livestreams.length}`);
  console.log(`  Highlights:   ${highlights.length}`);
  console.log(`  Bots:         ${bots.length}`);
  console.log(`  Urls:         ${urls.length}`);
  console.log(`\n  Test with:`);
  console.log(`  curl -H "x-api-key: $DASHBOARD_API_KEY" "localhost:3000/api/v1/metrics/summary?granularity=weekly"\n`);

  await closeDb();
  process.exit(0);
}

seed().catch((err) => {
  console.error('[Seed] Error:', err);
  process.exit(1);
});
