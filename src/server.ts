// ──────────────────────────────────────────
// Express app: middleware and route mounting
// ──────────────────────────────────────────

import express from 'express';
import { Env } from './config/env';
import { apiKeyAuth } from './platform/auth';
import { createAnalyticsRoutes, MetricsService, MetricsServiceOptions } from './domains/analytics';

export function metricsOptionsFromEnv(env: Env): MetricsServiceOptions {
  return {
    weekEpoch: env.WEEK_EPOCH,
    weekAnchors: env.WEEK_ANCHORS,
    activity: { sources: env.ACTIVE_USER_SOURCES, minUrlViews: env.MIN_URL_VIEWS },
    earlyFallbackDays: env.EARLY_PERIOD_FALLBACK_DAYS,
    excludeUserIds: env.DEVELOPER_IDS,
    forceFullReload: env.FORCE_FULL_RELOAD,
  };
}

export function createApp(metricsService: MetricsService, apiKey: string | undefined): express.Express {
  const app = express();
  app.use(express.json());

  const auth = apiKeyAuth(apiKey);
  app.use('/api/v1/metrics', (req, res, next) => auth(req, res, next), createAnalyticsRoutes(metricsService));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return app;
}
