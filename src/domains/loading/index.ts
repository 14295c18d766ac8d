// ──────────────────────────────────────────
// Loading domain: barrel export
// ──────────────────────────────────────────

export { SourceTableRepo } from './source-table.repo';
export { DataLoader } from './data-loader';
export { emptyCache, invalidate, mergeIncremental, rowCounts } from './raw-data-cache';
export { normalizeBatch, parseTimestamp } from './normalizer';
