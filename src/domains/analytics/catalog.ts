// ──────────────────────────────────────────
// Analytics: Metric catalog
// ──────────────────────────────────────────
// Every metric the dashboard knows, each computed independently and merged
// into one table keyed by period start.

import {
  EventRecord,
  Granularity,
  GRANULARITY_PERIOD,
  HighlightAttributes,
  MetricName,
  METRIC_NAMES,
  MetricRow,
  MetricSeries,
  MetricSeriesTable,
  MetricTable,
  MetricValue,
  RawTables,
  SourceTable,
  Weekday,
} from '../../shared/types';
import { ActivityOptions, ActivityRecord, firstAppearances, selectActivity, unifyActivity } from './activity';
import { aggregate, Aggregation, cohortRate, groupByPeriod, reduceRows, Timestamped } from './aggregator';
import { projectCurrent, ProjectionPolicy } from './extrapolator';
import {
  createAssigner,
  DEFAULT_WEEK_EPOCH,
  elapsedDays,
  PeriodAssigner,
  periodKey,
  periodLengthDays,
  previousPeriodStart,
  WeekRegime,
} from './periods';

export interface CatalogOptions {
  now: Date;
  weekEpoch: Date;
  /**
   * Calendar week anchors for single-metric series. The wide weekly table keys
   * every column by epoch weeks, so anchors do not apply there.
   */
  weekAnchors: Partial<Record<MetricName, Weekday>>;
  activity: ActivityOptions;
  earlyFallbackDays: number;
  excludeUserIds: string[];
}

export const DEFAULT_CATALOG_OPTIONS: Omit<CatalogOptions, 'now'> = {
  weekEpoch: DEFAULT_WEEK_EPOCH,
  weekAnchors: {},
  activity: { sources: ['streams', 'urls'], minUrlViews: 1 },
  earlyFallbackDays: 1,
  excludeUserIds: [],
};

export interface MetricContext {
  tables: RawTables;
  assigner: PeriodAssigner;
  activity: ActivityOptions;
}

type ProjectionMode = ProjectionPolicy['mode'];

interface MetricDefinition<R extends Timestamped> {
  name: MetricName;
  /** Tables the metric reads; the metric is skipped when all of them are empty. */
  tables: (activity: ActivityOptions) => SourceTable[];
  select: (ctx: MetricContext) => R[];
  aggregation: Aggregation<R>;
  projection: ProjectionMode;
  /** Decimal places kept; omitted for whole-number metrics. */
  precision?: number;
}

export interface CatalogEntry {
  name: MetricName;
  projection: ProjectionMode;
  applicable(ctx: MetricContext): boolean;
  compute(ctx: MetricContext, now: Date, earlyFallbackDays: number): MetricSeries;
}

// ── Series computation ──

function computeSeries<R extends Timestamped>(
  def: MetricDefinition<R>,
  ctx: MetricContext,
  now: Date,
  earlyFallbackDays: number
): MetricSeries {
  const { assigner } = ctx;
  const rows = def.select(ctx);
  const currentStart = assigner.assign(now);
  const historical = rows.filter((r) => r.timestamp < currentStart);
  const current = rows.filter((r) => r.timestamp >= currentStart);

  const series: MetricSeries = aggregate(historical, assigner, def.aggregation, currentStart).map((point) => ({
    start: point.start,
    value: roundTo(point.value, def.precision),
    is_provisional: false,
  }));

  const { aggregation } = def;
  const cohort = aggregation.kind === 'retention' || aggregation.kind === 'churn';
  // A cohort rate exists for the current period as soon as the previous one had users
  if ((current.length === 0 && !cohort) || def.projection === 'omit') return series;

  let rawValue: MetricValue;
  if (aggregation.kind === 'retention' || aggregation.kind === 'churn') {
    // Partial cohort measured against the last complete period
    const previousStart = previousPeriodStart(currentStart, assigner.kind).getTime();
    const previousGroup = groupByPeriod(historical, assigner).find((g) => g.start.getTime() === previousStart);
    if (!previousGroup) return series;
    rawValue = cohortRate(
      new Set(previousGroup.rows.map(aggregation.key)),
      new Set(current.map(aggregation.key)),
      aggregation.kind
    );
    if (rawValue === null) return series;
  } else {
    rawValue = reduceRows(current, aggregation);
  }

  const projection = projectCurrent(
    rawValue,
    elapsedDays(currentStart, now),
    periodLengthDays(currentStart, assigner.kind),
    def.projection === 'extrapolate' ? { mode: 'extrapolate', earlyFallbackDays } : { mode: def.projection }
  );
  if (projection) {
    series.push({ start: currentStart, value: roundTo(projection.value, def.precision), is_provisional: true });
  }
  return series;
}

function defineMetric<R extends Timestamped>(def: MetricDefinition<R>): CatalogEntry {
  return {
    name: def.name,
    projection: def.projection,
    applicable: (ctx) => def.tables(ctx.activity).some((table) => ctx.tables[table].length > 0),
    compute: (ctx, now, earlyFallbackDays) => computeSeries(def, ctx, now, earlyFallbackDays),
  };
}

// ── Definitions ──

const byUser = (row: { user_id: string }): string => row.user_id;
const isVod = (row: EventRecord<HighlightAttributes>): boolean => row.attributes.stream_id !== null;
const isLive = (row: EventRecord<HighlightAttributes>): boolean => row.attributes.livestream_id !== null;
const activityTables = (activity: ActivityOptions): SourceTable[] => [...activity.sources];

function activeEntries(ctx: MetricContext): ActivityRecord[] {
  return unifyActivity(selectActivity(ctx.tables, ctx.activity), ctx.assigner).map((entry) => ({
    user_id: entry.user_id,
    timestamp: entry.period_start,
  }));
}

function likeRatio(name: MetricName, subtype: (row: EventRecord<HighlightAttributes>) => boolean): CatalogEntry {
  return defineMetric({
    name,
    tables: () => ['highlights'],
    select: (ctx: MetricContext) => ctx.tables.highlights.filter(subtype),
    aggregation: { kind: 'boolean_ratio', field: (row) => row.attributes.liked },
    projection: 'direct',
    precision: 2,
  });
}

function shareRate(name: MetricName, subtype: (row: EventRecord<HighlightAttributes>) => boolean): CatalogEntry {
  return defineMetric({
    name,
    tables: () => ['highlights'],
    select: (ctx: MetricContext) => ctx.tables.highlights.filter(subtype),
    aggregation: {
      kind: 'or_ratio',
      fields: [(row) => row.attributes.downloaded, (row) => row.attributes.link_copied],
    },
    projection: 'direct',
    precision: 2,
  });
}

function downloads(name: MetricName, subtype: (row: EventRecord<HighlightAttributes>) => boolean): CatalogEntry {
  return defineMetric({
    name,
    tables: () => ['highlights'],
    select: (ctx: MetricContext) => ctx.tables.highlights.filter((row) => subtype(row) && row.attributes.downloaded),
    aggregation: { kind: 'count' },
    projection: 'extrapolate',
  });
}

export const METRIC_CATALOG: readonly CatalogEntry[] = [
  defineMetric({
    name: 'active_users',
    tables: activityTables,
    select: activeEntries,
    aggregation: { kind: 'unique_count', key: byUser },
    projection: 'extrapolate',
  }),
  defineMetric({
    name: 'new_users',
    tables: activityTables,
    select: (ctx: MetricContext) => firstAppearances(selectActivity(ctx.tables, ctx.activity)),
    aggregation: { kind: 'count' },
    projection: 'extrapolate',
  }),
  defineMetric({
    name: 'total_streams',
    tables: () => ['streams'],
    select: (ctx: MetricContext) => ctx.tables.streams,
    aggregation: { kind: 'count' },
    projection: 'extrapolate',
  }),
  defineMetric({
    name: 'avg_streams_per_user',
    tables: () => ['streams'],
    select: (ctx: MetricContext) => ctx.tables.streams,
    aggregation: { kind: 'mean_group_size', key: byUser },
    projection: 'direct',
    precision: 2,
  }),
  defineMetric({
    name: 'total_livestreams',
    tables: () => ['livestreams'],
    select: (ctx: MetricContext) => ctx.tables.livestreams,
    aggregation: { kind: 'count' },
    projection: 'extrapolate',
  }),
  defineMetric({
    name: 'avg_livestreams_per_user',
    tables: () => ['livestreams'],
    select: (ctx: MetricContext) => ctx.tables.livestreams,
    aggregation: { kind: 'mean_group_size', key: byUser },
    projection: 'direct',
    precision: 2,
  }),
  likeRatio('vod_like_ratio', isVod),
  likeRatio('live_like_ratio', isLive),
  shareRate('vod_share_rate', isVod),
  shareRate('live_share_rate', isLive),
  downloads('vod_downloads', isVod),
  downloads('livestream_downloads', isLive),
  defineMetric({
    name: 'new_bots',
    tables: () => ['bots'],
    select: (ctx: MetricContext) => ctx.tables.bots,
    aggregation: { kind: 'count' },
    projection: 'extrapolate',
  }),
  defineMetric({
    name: 'total_url_views',
    tables: () => ['urls'],
    select: (ctx: MetricContext) => ctx.tables.urls,
    aggregation: { kind: 'sum', value: (row) => row.attributes.view_count },
    projection: 'extrapolate',
  }),
  defineMetric({
    name: 'avg_views_per_url',
    tables: () => ['urls'],
    select: (ctx: MetricContext) => ctx.tables.urls,
    aggregation: { kind: 'mean', value: (row) => row.attributes.view_count },
    projection: 'direct',
    precision: 2,
  }),
  defineMetric({
    name: 'urls_with_views_percent',
    tables: () => ['urls'],
    select: (ctx: MetricContext) => ctx.tables.urls,
    aggregation: { kind: 'boolean_ratio', field: (row) => row.attributes.view_count > 0 },
    projection: 'direct',
    precision: 2,
  }),
  defineMetric({
    name: 'churn_rate',
    tables: activityTables,
    select: activeEntries,
    aggregation: { kind: 'churn', key: byUser },
    projection: 'direct',
    precision: 2,
  }),
  defineMetric({
    name: 'retention_rate',
    tables: activityTables,
    select: activeEntries,
    aggregation: { kind: 'retention', key: byUser },
    projection: 'direct',
    precision: 2,
  }),
];

// ── Table assembly ──

function metricContext(
  tables: RawTables,
  granularity: Granularity,
  options: CatalogOptions,
  anchor?: Weekday
): MetricContext {
  const regime: WeekRegime =
    anchor === undefined ? { mode: 'epoch', epoch: options.weekEpoch } : { mode: 'calendar', anchor };
  return { tables, assigner: createAssigner(GRANULARITY_PERIOD[granularity], regime), activity: options.activity };
}

/** Runs one entry; a metric that throws is logged and yields no points. */
function computeEntry(
  entry: CatalogEntry,
  ctx: MetricContext,
  options: CatalogOptions,
  granularity: Granularity
): MetricSeries {
  if (!entry.applicable(ctx)) return [];
  try {
    return entry.compute(ctx, options.now, options.earlyFallbackDays);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Catalog] Failed to compute ${entry.name} (${granularity}):`, message);
    return [];
  }
}

/**
 * Computes every catalog metric for one granularity. A metric that throws
 * is logged and contributes an all-zero column; the others are unaffected.
 * Every column shares one period regime, so the provisional row is always
 * the single last row.
 */
export function computeAllMetrics(
  rawTables: RawTables,
  granularity: Granularity,
  options: CatalogOptions,
  catalog: readonly CatalogEntry[] = METRIC_CATALOG
): MetricTable {
  const { now } = options;
  const tables = prepareTables(rawTables, now, new Set(options.excludeUserIds));
  const ctx = metricContext(tables, granularity, options);

  const rows = new Map<number, { provisional: boolean; values: Partial<Record<MetricName, MetricValue>> }>();

  for (const entry of catalog) {
    for (const point of computeEntry(entry, ctx, options, granularity)) {
      const key = point.start.getTime();
      const row = rows.get(key) ?? { provisional: false, values: {} };
      row.values[entry.name] = point.value;
      row.provisional = row.provisional || point.is_provisional;
      rows.set(key, row);
    }
  }

  const ordered: MetricRow[] = Array.from(rows.entries())
    .sort(([a, rowA], [b, rowB]) => Number(rowA.provisional) - Number(rowB.provisional) || a - b)
    .map(([key, row]) => ({
      period_start: periodKey(new Date(key)),
      is_provisional: row.provisional,
      values: fillColumns(row.values),
    }));

  return {
    granularity,
    generated_at: now.toISOString(),
    columns: [...METRIC_NAMES],
    rows: ordered,
  };
}

/**
 * One metric on its own periods. Weekly series of a metric listed in
 * `weekAnchors` use calendar weeks starting on that weekday.
 */
export function computeMetricSeries(
  rawTables: RawTables,
  name: MetricName,
  granularity: Granularity,
  options: CatalogOptions,
  catalog: readonly CatalogEntry[] = METRIC_CATALOG
): MetricSeriesTable {
  const { now } = options;
  const anchor = granularity === 'weekly' ? options.weekAnchors[name] : undefined;
  const entry = catalog.find((candidate) => candidate.name === name);
  const tables = prepareTables(rawTables, now, new Set(options.excludeUserIds));
  const ctx = metricContext(tables, granularity, options, anchor);
  const series = entry ? computeEntry(entry, ctx, options, granularity) : [];

  return {
    metric: name,
    granularity,
    week_anchor: anchor ?? null,
    generated_at: now.toISOString(),
    points: series.map((point) => ({
      period_start: periodKey(point.start),
      is_provisional: point.is_provisional,
      value: point.value,
    })),
  };
}

/** Drops developer rows and rows dated after `now` from every table. */
function prepareTables(tables: RawTables, now: Date, excluded: Set<string>): RawTables {
  const keep = <R extends { user_id: string; timestamp: Date }>(rows: R[]): R[] =>
    rows.filter((r) => r.timestamp <= now && !excluded.has(r.user_id));
  return {
    streams: keep(tables.streams),
    highlights: keep(tables.highlights),
    livestreams: keep(tables.livestreams),
    bots: keep(tables.bots),
    urls: keep(tables.urls),
  };
}

export function fillColumns(values: Partial<Record<MetricName, MetricValue>>): Record<MetricName, MetricValue> {
  const pick = (name: MetricName): MetricValue => {
    const value = values[name];
    return value === undefined ? 0 : value;
  };
  return {
    active_users: pick('active_users'),
    new_users: pick('new_users'),
    total_streams: pick('total_streams'),
    avg_streams_per_user: pick('avg_streams_per_user'),
    total_livestreams: pick('total_livestreams'),
    avg_livestreams_per_user: pick('avg_livestreams_per_user'),
    vod_like_ratio: pick('vod_like_ratio'),
    live_like_ratio: pick('live_like_ratio'),
    vod_share_rate: pick('vod_share_rate'),
    live_share_rate: pick('live_share_rate'),
    vod_downloads: pick('vod_downloads'),
    livestream_downloads: pick('livestream_downloads'),
    new_bots: pick('new_bots'),
    total_url_views: pick('total_url_views'),
    avg_views_per_url: pick('avg_views_per_url'),
    urls_with_views_percent: pick('urls_with_views_percent'),
    churn_rate: pick('churn_rate'),
    retention_rate: pick('retention_rate'),
  };
}

export function roundTo(value: MetricValue, places = 0): MetricValue {
  if (value === null) return null;
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
