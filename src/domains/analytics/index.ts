// ──────────────────────────────────────────
// Analytics domain: barrel export
// ──────────────────────────────────────────

export { MetricsService } from './metrics.service';
export type { MetricsServiceOptions } from './metrics.service';
export { createAnalyticsRoutes } from './routes';
export { DEFAULT_CATALOG_OPTIONS } from './catalog';
