import { describe, it, expect } from 'vitest';
import { EmptyAttributes, EventRecord, RawTables } from '../../shared/types';
import { firstAppearances, selectActivity, unifyActivity } from './activity';
import { createAssigner } from './periods';

function event<A>(id: string, user_id: string, iso: string, attributes: A): EventRecord<A> {
  return { entity_id: id, user_id, timestamp: new Date(iso), attributes };
}

const none: EmptyAttributes = {};

const tables: RawTables = {
  streams: [
    event('s1', 'alice', '2024-10-07T09:00:00Z', { converted: true }),
    event('s2', 'alice', '2024-10-07T10:00:00Z', { converted: true }),
    event('s3', 'bob', '2024-10-07T11:00:00Z', { converted: false }),
  ],
  highlights: [],
  livestreams: [event('l1', 'dana', '2024-10-06T08:00:00Z', none)],
  bots: [],
  urls: [
    event('u1', 'bob', '2024-10-08T09:00:00Z', { view_count: 0 }),
    event('u2', 'carol', '2024-10-08T09:00:00Z', { view_count: 2 }),
    event('u3', 'alice', '2024-10-08T12:00:00Z', { view_count: 5 }),
  ],
};

const users = (records: { user_id: string }[]) => records.map((r) => r.user_id);

describe('selectActivity', () => {
  it('keeps converted streams and viewed urls', () => {
    const [streams, urls] = selectActivity(tables, { sources: ['streams', 'urls'], minUrlViews: 1 });
    expect(users(streams)).toEqual(['alice', 'alice']);
    expect(users(urls)).toEqual(['carol', 'alice']);
  });

  it('applies the view threshold', () => {
    const [urls] = selectActivity(tables, { sources: ['urls'], minUrlViews: 3 });
    expect(users(urls)).toEqual(['alice']);
  });

  it('includes livestreams when configured', () => {
    const sources = selectActivity(tables, { sources: ['streams', 'livestreams'], minUrlViews: 1 });
    expect(users(sources[1])).toEqual(['dana']);
  });
});

describe('unifyActivity', () => {
  it('emits one entry per user and period', () => {
    const sources = selectActivity(tables, { sources: ['streams', 'urls'], minUrlViews: 1 });
    const entries = unifyActivity(sources, createAssigner('day'));
    expect(entries.map((e) => `${e.user_id}@${e.period_start.toISOString().slice(0, 10)}`)).toEqual([
      'alice@2024-10-07',
      'alice@2024-10-08',
      'carol@2024-10-08',
    ]);
  });

  it('merges sources within a week', () => {
    const sources = selectActivity(tables, { sources: ['streams', 'urls'], minUrlViews: 1 });
    const entries = unifyActivity(sources, createAssigner('week'));
    expect(users(entries)).toEqual(['alice', 'carol']);
    expect(entries.every((e) => e.period_start.toISOString() === '2024-10-06T00:00:00.000Z')).toBe(true);
  });
});

describe('firstAppearances', () => {
  it('finds each user earliest activity across sources', () => {
    const sources = selectActivity(tables, { sources: ['streams', 'urls', 'livestreams'], minUrlViews: 1 });
    const first = firstAppearances(sources);
    const byUser = Object.fromEntries(first.map((r) => [r.user_id, r.timestamp.toISOString()]));
    expect(byUser).toEqual({
      alice: '2024-10-07T09:00:00.000Z',
      carol: '2024-10-08T09:00:00.000Z',
      dana: '2024-10-06T08:00:00.000Z',
    });
  });
});
