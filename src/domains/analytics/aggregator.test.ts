import { afterEach, describe, it, expect, vi } from 'vitest';
import { aggregate, cohortRate, groupByPeriod, reduceRows } from './aggregator';
import { createAssigner } from './periods';

interface Row {
  user_id: string;
  timestamp: Date;
  liked?: boolean | null;
  downloaded?: boolean;
  link_copied?: boolean;
  views?: number;
}

const row = (user_id: string, iso: string, extra: Partial<Row> = {}): Row => ({
  user_id,
  timestamp: new Date(iso),
  ...extra,
});

const daily = createAssigner('day');
const byUser = (r: Row) => r.user_id;

afterEach(() => {
  vi.restoreAllMocks();
});

describe('groupByPeriod', () => {
  it('returns periods in ascending order', () => {
    const groups = groupByPeriod(
      [row('a', '2024-10-08T09:00:00Z'), row('b', '2024-10-07T09:00:00Z'), row('c', '2024-10-08T20:00:00Z')],
      daily
    );
    expect(groups.map((g) => g.start.toISOString())).toEqual(['2024-10-07T00:00:00.000Z', '2024-10-08T00:00:00.000Z']);
    expect(groups[1].rows.map(byUser)).toEqual(['a', 'c']);
  });

  it('drops unassignable rows with one warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const groups = groupByPeriod(
      [row('a', '2024-09-01T00:00:00Z'), row('b', '2024-09-02T00:00:00Z'), row('c', '2024-10-01T00:00:00Z')],
      createAssigner('week')
    );
    expect(groups).toHaveLength(1);
    expect(groups[0].start.toISOString()).toBe('2024-09-29T00:00:00.000Z');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain('[Aggregator] Dropped 2 record(s)');
  });
});

describe('reduceRows', () => {
  const rows = [row('a', '2024-10-07T01:00:00Z'), row('a', '2024-10-07T02:00:00Z'), row('b', '2024-10-07T03:00:00Z')];

  it('counts rows and distinct keys', () => {
    expect(reduceRows(rows, { kind: 'count' })).toBe(3);
    expect(reduceRows(rows, { kind: 'unique_count', key: byUser })).toBe(2);
  });

  it('is unaffected by duplicate rows for unique counts', () => {
    expect(reduceRows([...rows, ...rows], { kind: 'unique_count', key: byUser })).toBe(2);
  });

  it('averages group sizes rather than a value column', () => {
    expect(reduceRows(rows, { kind: 'mean_group_size', key: byUser })).toBe(1.5);
    expect(reduceRows([], { kind: 'mean_group_size', key: byUser })).toBeNull();
  });

  it('leaves null flags out of boolean ratios', () => {
    const liked = [true, true, false, null, null].map((flag, i) => row(`u${i}`, '2024-10-07T00:00:00Z', { liked: flag }));
    const ratio = reduceRows(liked, { kind: 'boolean_ratio', field: (r) => r.liked ?? null });
    expect(ratio).toBeCloseTo(66.67, 2);
    expect(reduceRows(liked.slice(3), { kind: 'boolean_ratio', field: (r) => r.liked ?? null })).toBeNull();
  });

  it('computes or-ratios over every row', () => {
    const shares = [
      row('a', '2024-10-07T00:00:00Z', { downloaded: true, link_copied: false }),
      row('b', '2024-10-07T00:00:00Z', { downloaded: false, link_copied: true }),
      row('c', '2024-10-07T00:00:00Z', { downloaded: false, link_copied: false }),
      row('d', '2024-10-07T00:00:00Z', { downloaded: false, link_copied: false }),
    ];
    const ratio = reduceRows(shares, {
      kind: 'or_ratio',
      fields: [(r) => r.downloaded === true, (r) => r.link_copied === true],
    });
    expect(ratio).toBe(50);
  });

  it('sums and averages values', () => {
    const urls = [3, 0, 9].map((views, i) => row(`u${i}`, '2024-10-07T00:00:00Z', { views }));
    expect(reduceRows(urls, { kind: 'sum', value: (r) => r.views ?? 0 })).toBe(12);
    expect(reduceRows(urls, { kind: 'mean', value: (r) => r.views ?? 0 })).toBe(4);
    expect(reduceRows([], { kind: 'mean', value: (r: Row) => r.views ?? 0 })).toBeNull();
  });

  it('refuses cohort kinds', () => {
    expect(() => reduceRows(rows, { kind: 'retention', key: byUser })).toThrow('retention needs the previous period');
  });
});

describe('cohortRate', () => {
  it('is undefined for an empty previous cohort', () => {
    expect(cohortRate(new Set(), new Set(['a']), 'retention')).toBeNull();
  });
});

describe('aggregate', () => {
  const activity = [
    row('A', '2024-10-07T10:00:00Z'),
    row('B', '2024-10-07T11:00:00Z'),
    row('C', '2024-10-07T12:00:00Z'),
    row('B', '2024-10-08T10:00:00Z'),
    row('C', '2024-10-08T11:00:00Z'),
    row('D', '2024-10-08T12:00:00Z'),
  ];

  it('reports retention and churn against the previous period', () => {
    const until = new Date('2024-10-09T00:00:00Z');
    const retention = aggregate(activity, daily, { kind: 'retention', key: byUser }, until);
    const churn = aggregate(activity, daily, { kind: 'churn', key: byUser }, until);

    expect(retention).toHaveLength(1);
    expect(retention[0].start.toISOString()).toBe('2024-10-08T00:00:00.000Z');
    expect(retention[0].value).toBeCloseTo(66.67, 2);
    expect(churn[0].value).toBeCloseTo(33.33, 2);
  });

  it('omits periods whose previous period had no users', () => {
    const gap = [row('A', '2024-10-07T10:00:00Z'), row('A', '2024-10-09T10:00:00Z')];
    const until = new Date('2024-10-10T00:00:00Z');
    const retention = aggregate(gap, daily, { kind: 'retention', key: byUser }, until);

    expect(retention.map((p) => p.start.toISOString())).toEqual(['2024-10-08T00:00:00.000Z']);
  });

  it('reports full churn for a period where nobody came back', () => {
    const gap = [row('A', '2024-10-07T10:00:00Z'), row('A', '2024-10-09T10:00:00Z')];
    const until = new Date('2024-10-10T00:00:00Z');

    expect(aggregate(gap, daily, { kind: 'churn', key: byUser }, until)).toEqual([
      { start: new Date('2024-10-08T00:00:00Z'), value: 100 },
    ]);
    expect(aggregate(gap, daily, { kind: 'retention', key: byUser }, until)).toEqual([
      { start: new Date('2024-10-08T00:00:00Z'), value: 0 },
    ]);
  });

  it('reports the period after the last one with users when unbounded', () => {
    const single = [row('A', '2024-10-07T10:00:00Z'), row('B', '2024-10-07T11:00:00Z')];

    expect(aggregate(single, daily, { kind: 'churn', key: byUser })).toEqual([
      { start: new Date('2024-10-08T00:00:00Z'), value: 100 },
    ]);
  });

  it('emits one value per period with rows', () => {
    const counts = aggregate(activity, daily, { kind: 'count' });
    expect(counts.map((p) => p.value)).toEqual([3, 3]);
  });
});
