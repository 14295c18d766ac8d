// ──────────────────────────────────────────
// Analytics: Aggregator
// ──────────────────────────────────────────
// Groups timestamped rows into periods and reduces each period to one value.
// Ratio kinds return percentages; rounding is left to the metric catalog.

import { InvalidTimestampError } from '../../shared/errors';
import { MetricValue } from '../../shared/types';
import { nextPeriodStart, PeriodAssigner, previousPeriodStart } from './periods';

export interface Timestamped {
  timestamp: Date;
}

type KeyFn<R> = (row: R) => string;

export type Aggregation<R> =
  | { kind: 'count' }
  | { kind: 'unique_count'; key: KeyFn<R> }
  | { kind: 'mean_group_size'; key: KeyFn<R> }
  | { kind: 'boolean_ratio'; field: (row: R) => boolean | null }
  | { kind: 'or_ratio'; fields: [(row: R) => boolean, (row: R) => boolean] }
  | { kind: 'sum'; value: (row: R) => number }
  | { kind: 'mean'; value: (row: R) => number }
  | { kind: 'retention'; key: KeyFn<R> }
  | { kind: 'churn'; key: KeyFn<R> };

export interface PeriodValue {
  start: Date;
  value: MetricValue;
}

export interface PeriodGroup<R> {
  start: Date;
  rows: R[];
}

/**
 * Assigns every row to its period, ascending by period start. Rows whose
 * timestamp cannot be assigned are dropped with a single warning per call.
 */
export function groupByPeriod<R extends Timestamped>(rows: R[], assigner: PeriodAssigner): PeriodGroup<R>[] {
  const groups = new Map<number, R[]>();
  let dropped = 0;
  let firstError: InvalidTimestampError | null = null;

  for (const row of rows) {
    let start: Date;
    try {
      start = assigner.assign(row.timestamp);
    } catch (err) {
      if (!(err instanceof InvalidTimestampError)) throw err;
      dropped++;
      firstError ??= err;
      continue;
    }
    const key = start.getTime();
    const bucket = groups.get(key);
    if (bucket) bucket.push(row);
    else groups.set(key, [row]);
  }

  if (firstError) {
    console.warn(`[Aggregator] Dropped ${dropped} record(s) with unassignable timestamps (first: ${firstError.message})`);
  }

  return Array.from(groups.entries())
    .sort(([a], [b]) => a - b)
    .map(([key, bucket]) => ({ start: new Date(key), rows: bucket }));
}

/** Reduces the rows of a single period. Cohort kinds need two periods, see `cohortRate`. */
export function reduceRows<R>(rows: R[], aggregation: Aggregation<R>): MetricValue {
  switch (aggregation.kind) {
    case 'count':
      return rows.length;
    case 'unique_count':
      return new Set(rows.map(aggregation.key)).size;
    case 'mean_group_size': {
      const groups = new Set(rows.map(aggregation.key)).size;
      return groups > 0 ? rows.length / groups : null;
    }
    case 'boolean_ratio': {
      let rated = 0;
      let positive = 0;
      for (const row of rows) {
        const flag = aggregation.field(row);
        if (flag === null) continue;
        rated++;
        if (flag) positive++;
      }
      return rated > 0 ? (positive / rated) * 100 : null;
    }
    case 'or_ratio': {
      if (rows.length === 0) return null;
      const [a, b] = aggregation.fields;
      const hits = rows.filter((row) => a(row) || b(row)).length;
      return (hits / rows.length) * 100;
    }
    case 'sum':
      return rows.reduce((total, row) => total + aggregation.value(row), 0);
    case 'mean':
      return rows.length > 0 ? rows.reduce((total, row) => total + aggregation.value(row), 0) / rows.length : null;
    case 'retention':
    case 'churn':
      throw new Error(`${aggregation.kind} needs the previous period; use cohortRate`);
  }
}

/**
 * Retention: share of `previous` also present in `current`.
 * Churn: share of `previous` absent from `current`.
 * `null` when the previous cohort is empty.
 */
export function cohortRate(previous: Set<string>, current: Set<string>, kind: 'retention' | 'churn'): MetricValue {
  if (previous.size === 0) return null;
  let retained = 0;
  for (const user of previous) {
    if (current.has(user)) retained++;
  }
  const count = kind === 'retention' ? retained : previous.size - retained;
  return (count / previous.size) * 100;
}

/**
 * Reduces every period to one value, ascending by start. Retention and churn
 * are reported for every period whose calendar-previous period had users,
 * including periods with no rows of their own. `until` bounds those periods
 * (exclusive) so an in-progress period is not reported as complete.
 */
export function aggregate<R extends Timestamped>(
  rows: R[],
  assigner: PeriodAssigner,
  aggregation: Aggregation<R>,
  until?: Date
): PeriodValue[] {
  const groups = groupByPeriod(rows, assigner);

  if (aggregation.kind === 'retention' || aggregation.kind === 'churn') {
    const cohorts = new Map<number, Set<string>>();
    for (const group of groups) {
      cohorts.set(group.start.getTime(), new Set(group.rows.map(aggregation.key)));
    }

    const starts = new Set<number>();
    for (const group of groups) {
      starts.add(group.start.getTime());
      starts.add(nextPeriodStart(group.start, assigner.kind).getTime());
    }

    const values: PeriodValue[] = [];
    for (const key of Array.from(starts).sort((a, b) => a - b)) {
      const start = new Date(key);
      if (until && start >= until) continue;
      const previous = cohorts.get(previousPeriodStart(start, assigner.kind).getTime());
      // No prior cohort: the rate is undefined, not 0
      if (!previous || previous.size === 0) continue;
      values.push({ start, value: cohortRate(previous, cohorts.get(key) ?? new Set(), aggregation.kind) });
    }
    return values;
  }

  return groups.map((group) => ({ start: group.start, value: reduceRows(group.rows, aggregation) }));
}
