// ──────────────────────────────────────────
// Analytics: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { MetricsService } from './metrics.service';
import { ValidationError } from '../../shared/errors';
import { Granularity, MetricName, METRIC_NAMES } from '../../shared/types';

const granularityQuery = z.object({
  granularity: z.enum(['daily', 'weekly', 'monthly']).default('weekly'),
});

const metricParam = z.enum(METRIC_NAMES);

const refreshBody = z
  .object({ force: z.boolean().default(false) })
  .default({});

export function parseGranularity(query: unknown): Granularity {
  const result = granularityQuery.safeParse(query);
  if (!result.success) {
    throw new ValidationError('granularity must be one of daily, weekly, monthly');
  }
  return result.data.granularity;
}

export function parseMetric(value: unknown): MetricName {
  const result = metricParam.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Unknown metric: ${String(value)}`);
  }
  return result.data;
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof ValidationError) {
    res.status(400).json({ error: err.message });
    return;
  }
  console.error('[Metrics] Request failed:', err);
  const message = err instanceof Error ? err.message : 'Internal error';
  res.status(500).json({ error: message });
}

export function createAnalyticsRoutes(metricsService: MetricsService): Router {
  const router = Router();

  // GET /?granularity=weekly
  router.get('/', async (req: Request, res: Response) => {
    try {
      const table = await metricsService.getTable(parseGranularity(req.query));
      res.json(table);
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /summary?granularity=monthly (dashboard cards)
  router.get('/summary', async (req: Request, res: Response) => {
    try {
      const summary = await metricsService.getSummary(parseGranularity(req.query));
      res.json(summary);
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /series/churn_rate?granularity=weekly (one metric, on its anchored weeks)
  router.get('/series/:metric', async (req: Request, res: Response) => {
    try {
      const series = await metricsService.getSeries(parseMetric(req.params.metric), parseGranularity(req.query));
      res.json(series);
    } catch (err) {
      sendError(res, err);
    }
  });

  // POST /refresh { force?: boolean }
  router.post('/refresh', async (req: Request, res: Response) => {
    try {
      const body = refreshBody.safeParse(req.body ?? {});
      if (!body.success) {
        throw new ValidationError('force must be a boolean');
      }
      const result = await metricsService.refresh(body.data.force);
      res.json(result);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
