import { afterEach, describe, it, expect, vi } from 'vitest';
import { InvalidTimestampError } from '../../shared/errors';
import { normalizeBatch, parseTimestamp, toHighlight, toStream, toUrl } from './normalizer';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseTimestamp', () => {
  it('parses ISO strings with a zone designator', () => {
    expect(parseTimestamp('2024-10-07T10:00:00Z').toISOString()).toBe('2024-10-07T10:00:00.000Z');
    expect(parseTimestamp('2024-10-07T12:00:00+02:00').toISOString()).toBe('2024-10-07T10:00:00.000Z');
  });

  it('accepts the database text format with microseconds', () => {
    expect(parseTimestamp('2024-10-07 10:00:00.123456+00').toISOString()).toBe('2024-10-07T10:00:00.123Z');
  });

  it('passes Date values through', () => {
    const date = new Date('2024-10-07T10:00:00Z');
    expect(parseTimestamp(date)).toBe(date);
  });

  it('rejects zone-less timestamps', () => {
    expect(() => parseTimestamp('2024-10-07T10:00:00')).toThrow(
      new InvalidTimestampError('2024-10-07T10:00:00', 'no UTC offset')
    );
  });

  it('rejects unparseable and non-string values', () => {
    expect(() => parseTimestamp('yesterdayZ')).toThrow('Invalid timestamp "yesterdayZ": unparseable');
    expect(() => parseTimestamp(1728295200000)).toThrow('Invalid timestamp 1728295200000: expected an ISO-8601 string');
    expect(() => parseTimestamp(new Date('nope'))).toThrow(InvalidTimestampError);
  });
});

describe('row transformers', () => {
  it('defaults streams to converted', () => {
    const record = toStream({ id: 's1', user_id: 'u1', created_at: '2024-10-07T10:00:00Z' });
    expect(record).toEqual({
      entity_id: 's1',
      user_id: 'u1',
      timestamp: new Date('2024-10-07T10:00:00Z'),
      attributes: { converted: true },
    });
    expect(toStream({ id: 's2', user_id: 'u1', created_at: '2024-10-07T10:00:00Z', converted: false }).attributes).toEqual({
      converted: false,
    });
  });

  it('keeps a missing like as unrated', () => {
    const record = toHighlight({
      id: 'h1',
      user_id: 'u1',
      created_at: '2024-10-07T10:00:00Z',
      livestream_id: 'l1',
      downloaded: true,
    });
    expect(record.attributes).toEqual({
      liked: null,
      downloaded: true,
      link_copied: false,
      stream_id: null,
      livestream_id: 'l1',
    });
  });

  it('reads view counts from numeric strings', () => {
    expect(toUrl({ id: 7, user_id: 'u1', created_at: '2024-10-07T10:00:00Z', view_count: '12' }).attributes).toEqual({
      view_count: 12,
    });
  });
});

describe('normalizeBatch', () => {
  it('drops invalid rows with one warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const batch = normalizeBatch('streams', [
      { id: 's1', user_id: 'u1', created_at: '2024-10-07T10:00:00Z' },
      { id: 's2', created_at: '2024-10-07T11:00:00Z' },
      { id: 's3', user_id: 'u2', created_at: '2024-10-07 12:00:00' },
    ]);

    const records: { entity_id: string }[] = batch.records;
    expect(batch.table).toBe('streams');
    expect(records.map((r) => r.entity_id)).toEqual(['s1']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[Loader] Dropped 2 of 3 streams row(s): Row missing user_id');
  });
});
