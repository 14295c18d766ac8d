// ──────────────────────────────────────────
// Dashboard: lightweight UI server on DASHBOARD_PORT
// Proxies API calls to the metrics server at API_BASE
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import path from 'path';
import { getEnv } from '../src/config/env';

const env = getEnv();
const app = express();

if (!env.DASHBOARD_API_KEY) {
  console.warn('[Dashboard] DASHBOARD_API_KEY is not set; proxying without a key');
}

app.use(express.json());

// Proxy all /api requests to the backend with the API key injected
app.use('/api', async (req, res) => {
  try {
    const url = `${env.API_BASE}${req.originalUrl}`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (env.DASHBOARD_API_KEY) headers['x-api-key'] = env.DASHBOARD_API_KEY;

    const resp = await fetch(url, {
      method: req.method,
      headers,
      body: ['POST', 'PUT', 'PATCH'].includes(req.method) ? JSON.stringify(req.body) : undefined,
    });
    const data: unknown = await resp.json();
    res.status(resp.status).json(data);
  } catch (err) {
    console.error('[Dashboard] Proxy error:', err);
    res.status(502).json({ error: 'API proxy error', detail: String(err) });
  }
});

// Serve the dashboard HTML
app.get('/', (_req, res) => {
  res.sendFile(path.join(__dirname, 'index.html'));
});

app.listen(env.DASHBOARD_PORT, () => {
  console.log(`[Dashboard] UI running at http://localhost:${env.DASHBOARD_PORT}`);
});
