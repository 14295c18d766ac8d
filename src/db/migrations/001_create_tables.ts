// ──────────────────────────────────────────
// Migration: create the source tables
// ──────────────────────────────────────────
// The hosted store owns these tables in production; this migration
// reproduces their shape for local development and seeding.

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('Streams', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.string('user_id', 255).notNullable();
    t.boolean('converted').notNullable().defaultTo(true);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('Livestreams', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.string('user_id', 255).notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('Highlights', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.string('user_id', 255).notNullable();
    t.uuid('stream_id').references('id').inTable('Streams').onDelete('SET NULL');
    t.uuid('livestream_id').references('id').inTable('Livestreams').onDelete('SET NULL');
    t.boolean('liked');
    t.boolean('downloaded').notNullable().defaultTo(false);
    t.boolean('link_copied').notNullable().defaultTo(false);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('Bots', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.string('user_id', 255).notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('Urls', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.string('user_id', 255).notNullable();
    t.integer('view_count').notNullable().defaultTo(0);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.raw(`
    CREATE INDEX idx_streams_created_at ON "Streams" (created_at);
    CREATE INDEX idx_highlights_created_at ON "Highlights" (created_at);
    CREATE INDEX idx_livestreams_created_at ON "Livestreams" (created_at);
    CREATE INDEX idx_bots_created_at ON "Bots" (created_at);
    CREATE INDEX idx_urls_created_at ON "Urls" (created_at);
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('Highlights');
  await knex.schema.dropTableIfExists('Urls');
  await knex.schema.dropTableIfExists('Bots');
  await knex.schema.dropTableIfExists('Livestreams');
  await knex.schema.dropTableIfExists('Streams');
}
