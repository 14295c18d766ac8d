// ──────────────────────────────────────────
// Shared type definitions for Stream Metrics
// ──────────────────────────────────────────

export type SourceTable = 'streams' | 'highlights' | 'livestreams' | 'bots' | 'urls';
export type Granularity = 'daily' | 'weekly' | 'monthly';
export type PeriodKind = 'day' | 'week' | 'month';
export type ActivitySource = 'streams' | 'urls' | 'livestreams';

/** Day of week as returned by `Date#getUTCDay`; 0 is Sunday. */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const SOURCE_TABLES: readonly SourceTable[] = ['streams', 'highlights', 'livestreams', 'bots', 'urls'];

/** Remote table name for each logical source. */
export const TABLE_NAMES: Record<SourceTable, string> = {
  streams: 'Streams',
  highlights: 'Highlights',
  livestreams: 'Livestreams',
  bots: 'Bots',
  urls: 'Urls',
};

export const GRANULARITY_PERIOD: Record<Granularity, PeriodKind> = {
  daily: 'day',
  weekly: 'week',
  monthly: 'month',
};

// ── Event records ──

export interface StreamAttributes {
  converted: boolean;
}

export interface HighlightAttributes {
  liked: boolean | null;
  downloaded: boolean;
  link_copied: boolean;
  stream_id: string | null;
  livestream_id: string | null;
}

export interface UrlAttributes {
  view_count: number;
}

export type EmptyAttributes = Record<string, never>;

export interface EventRecord<A = unknown> {
  entity_id: string;
  user_id: string;
  timestamp: Date;
  attributes: A;
}

export interface RawTables {
  streams: EventRecord<StreamAttributes>[];
  highlights: EventRecord<HighlightAttributes>[];
  livestreams: EventRecord<EmptyAttributes>[];
  bots: EventRecord<EmptyAttributes>[];
  urls: EventRecord<UrlAttributes>[];
}

/** Raw row as returned by the table store, before normalization. */
export type SourceRow = Record<string, unknown>;

// ── Cache ──

export interface RawDataCache {
  tables: RawTables;
  lastSeen: Record<SourceTable, Date | null>;
  loadedAt: Date | null;
}

// ── Metrics ──

export const METRIC_NAMES = [
  'active_users',
  'new_users',
  'total_streams',
  'avg_streams_per_user',
  'total_livestreams',
  'avg_livestreams_per_user',
  'vod_like_ratio',
  'live_like_ratio',
  'vod_share_rate',
  'live_share_rate',
  'vod_downloads',
  'livestream_downloads',
  'new_bots',
  'total_url_views',
  'avg_views_per_url',
  'urls_with_views_percent',
  'churn_rate',
  'retention_rate',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/** `null` marks a period whose value is undefined (e.g. a zero denominator). */
export type MetricValue = number | null;

export interface SeriesPoint {
  start: Date;
  value: MetricValue;
  is_provisional: boolean;
}

export type MetricSeries = SeriesPoint[];

export interface MetricRow {
  period_start: string;
  is_provisional: boolean;
  values: Record<MetricName, MetricValue>;
}

export interface MetricTable {
  granularity: Granularity;
  generated_at: string;
  columns: MetricName[];
  rows: MetricRow[];
}

export interface MetricSeriesPoint {
  period_start: string;
  is_provisional: boolean;
  value: MetricValue;
}

/** A single metric on its own periods; `week_anchor` is set for calendar weeks. */
export interface MetricSeriesTable {
  metric: MetricName;
  granularity: Granularity;
  week_anchor: Weekday | null;
  generated_at: string;
  points: MetricSeriesPoint[];
}

export interface MetricsSummary {
  granularity: Granularity;
  current_period: string | null;
  previous_period: string | null;
  current: Record<MetricName, MetricValue>;
  previous: Record<MetricName, MetricValue>;
  changes: Record<MetricName, number | null>;
}

export interface RefreshResult {
  forced: boolean;
  loaded_at: string;
  rows: Record<SourceTable, number>;
  failed_tables: SourceTable[];
}
