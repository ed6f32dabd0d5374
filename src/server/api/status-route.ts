import { Router } from 'express';
import { buildSessionHealthSummary } from '../metrics/health.js';
import type { SessionContext } from './types.js';

export function makeStatusRoute(ctx: SessionContext): Router {
  const router = Router();
  router.get('/status', (_req, res) => {
    const metrics = ctx.getMetrics();
    res.json(buildSessionHealthSummary(metrics, ctx.counters));
  });
  router.get('/healthz', (_req, res) => {
    res.json({ ok: true, port: ctx.port });
  });
  router.get('/status-bar', (_req, res) => {
    const bar = ctx.session.statusBar;
    res.json({ label: bar.getLabel(), text: bar.getText() });
  });
  return router;
}
