// ──────────────────────────────────────────
// Platform: Auth middleware
// ──────────────────────────────────────────

import crypto from 'crypto';
import { IncomingHttpHeaders } from 'http';

/** The parts of an Express request and response the middleware touches. */
export interface KeyedRequest {
  headers: IncomingHttpHeaders;
}

export interface JsonResponse {
  status(code: number): { json(body: unknown): unknown };
}

export type AuthMiddleware = (req: KeyedRequest, res: JsonResponse, next: () => void) => void;

export function hashApiKey(rawKey: string): string {
  return crypto.createHash('sha256').update(rawKey).digest('hex');
}

/** Compares digests so the check takes the same time for every wrong key. */
export function keysMatch(rawKey: string, expectedHash: string): boolean {
  const given = Buffer.from(hashApiKey(rawKey), 'hex');
  const expected = Buffer.from(expectedHash, 'hex');
  return given.length === expected.length && crypto.timingSafeEqual(given, expected);
}

/**
 * Guards the metrics routes with a single shared key sent as `x-api-key`.
 * Without a configured key the routes stay open.
 */
export function apiKeyAuth(expectedKey: string | undefined): AuthMiddleware {
  if (!expectedKey) {
    console.warn('[App] DASHBOARD_API_KEY is not set; metrics routes are unauthenticated');
    return (_req, _res, next) => next();
  }
  const expectedHash = hashApiKey(expectedKey);

  return (req, res, next) => {
    const rawKey = req.headers['x-api-key'];
    if (typeof rawKey !== 'string' || rawKey.length === 0) {
      res.status(401).json({ error: 'Missing x-api-key header' });
      return;
    }
    if (!keysMatch(rawKey, expectedHash)) {
      res.status(401).json({ error: 'Invalid API key' });
      return;
    }
    next();
  };
}
