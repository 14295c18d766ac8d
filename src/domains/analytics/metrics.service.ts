// ──────────────────────────────────────────
// Analytics: Metrics service
// ──────────────────────────────────────────

import { LoadingContract } from '../../shared/contracts';
import {
  Granularity,
  GRANULARITY_PERIOD,
  MetricName,
  METRIC_NAMES,
  MetricRow,
  MetricSeriesTable,
  MetricsSummary,
  MetricTable,
  MetricValue,
  RawDataCache,
  RefreshResult,
} from '../../shared/types';
import { emptyCache, rowCounts } from '../loading/raw-data-cache';
import { CatalogOptions, computeAllMetrics, computeMetricSeries, fillColumns } from './catalog';
import { periodKey, previousPeriodStart } from './periods';

export interface MetricsServiceOptions extends Omit<CatalogOptions, 'now'> {
  /** Every refresh re-reads all tables instead of fetching new rows only. */
  forceFullReload: boolean;
  now?: () => Date;
}

export class MetricsService {
  private cache: RawDataCache = emptyCache();
  private inflight: Promise<RefreshResult> | null = null;
  private now: () => Date;

  constructor(
    private loading: LoadingContract,
    private options: MetricsServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Refreshes never overlap: a call made while one runs gets that run's result. */
  refresh(force = false): Promise<RefreshResult> {
    if (!this.inflight) {
      this.inflight = this.load(force).finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async load(force: boolean): Promise<RefreshResult> {
    const forced = force || this.options.forceFullReload;
    const { cache, failedTables } = await this.loading.refresh(this.cache, { force: forced });
    this.cache = cache;
    return {
      forced,
      loaded_at: (cache.loadedAt ?? this.now()).toISOString(),
      rows: rowCounts(cache),
      failed_tables: failedTables,
    };
  }

  async getTable(granularity: Granularity): Promise<MetricTable> {
    await this.ensureLoaded();
    return computeAllMetrics(this.cache.tables, granularity, this.catalogOptions());
  }

  async getSeries(name: MetricName, granularity: Granularity): Promise<MetricSeriesTable> {
    await this.ensureLoaded();
    return computeMetricSeries(this.cache.tables, name, granularity, this.catalogOptions());
  }

  /**
   * Latest complete period against the calendar period before it, for the
   * dashboard cards. A previous period without rows compares as zeros.
   */
  async getSummary(granularity: Granularity): Promise<MetricsSummary> {
    const table = await this.getTable(granularity);
    const complete = table.rows.filter((row) => !row.is_provisional);
    const current: MetricRow | undefined = complete[complete.length - 1];
    const previousKey = current
      ? periodKey(previousPeriodStart(new Date(current.period_start), GRANULARITY_PERIOD[granularity]))
      : null;
    const previous = complete.find((row) => row.period_start === previousKey);

    const currentValues = current?.values ?? fillColumns({});
    const previousValues = previous?.values ?? fillColumns({});
    const changes: Partial<Record<MetricName, number | null>> = {};
    for (const name of METRIC_NAMES) {
      changes[name] = pctChange(currentValues[name], previousValues[name]);
    }

    return {
      granularity,
      current_period: current?.period_start ?? null,
      previous_period: previousKey,
      current: currentValues,
      previous: previousValues,
      changes: fillColumns(changes),
    };
  }

  private async ensureLoaded(): Promise<void> {
    if (this.cache.loadedAt === null) {
      await this.refresh();
    }
  }

  private catalogOptions(): CatalogOptions {
    const { forceFullReload: _force, now: _now, ...catalog } = this.options;
    return { ...catalog, now: this.now() };
  }
}

// ── Helpers ──

export function pctChange(current: MetricValue, previous: MetricValue): number | null {
  if (current === null || previous === null) return null;
  if (previous === 0) return current > 0 ? 100 : 0;
  return Math.round(((current - previous) / previous) * 10000) / 100;
}
