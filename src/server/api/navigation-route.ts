import { Router } from 'express';
import { z } from 'zod';
import { describeTab } from './tabs-route.js';
import { sendError, sendInvalid } from './errors.js';
import type { SessionContext } from './types.js';

const keyBody = z.object({ key: z.enum(['enter', 'escape', 'tab', 'backtab', 'other']) });
const navigateBody = z.object({ url: z.string().min(1) });
const pageBody = z.object({ direction: z.enum(['up', 'down']) });
const resizeBody = z.object({ width: z.number().int().positive(), height: z.number().int().positive() });

export function makeNavigationRoute(ctx: SessionContext): Router {
  const router = Router();
  const { session } = ctx;

  const activeView = () => {
    const tab = session.activeTab;
    return tab ? describeTab(tab, session.activeIndex, true) : null;
  };

  router.post('/keys', (req, res) => {
    const parsed = keyBody.safeParse(req.body);
    if (!parsed.success) return sendInvalid(res, parsed.error);
    if (!session.activeTab) return sendError(res, 404, 'no_active_tab', 'no tab is open');
    session.handleKey(parsed.data.key);
    res.json({ ok: true, tab: activeView() });
  });

  router.post('/navigate', (req, res) => {
    const parsed = navigateBody.safeParse(req.body);
    if (!parsed.success) return sendInvalid(res, parsed.error);
    if (!session.navigate(parsed.data.url)) return sendError(res, 404, 'no_active_tab', 'no tab is open');
    res.status(202).json({ ok: true });
  });

  router.post('/back', (_req, res) => {
    if (!session.activeTab) return sendError(res, 404, 'no_active_tab', 'no tab is open');
    if (!session.back()) return sendError(res, 409, 'no_history', 'no history available');
    res.json({ ok: true, tab: activeView() });
  });

  router.post('/forward', (_req, res) => {
    if (!session.activeTab) return sendError(res, 404, 'no_active_tab', 'no tab is open');
    if (!session.forward()) return sendError(res, 409, 'no_history', 'no history available');
    res.json({ ok: true, tab: activeView() });
  });

  router.post('/page', (req, res) => {
    const parsed = pageBody.safeParse(req.body);
    if (!parsed.success) return sendInvalid(res, parsed.error);
    if (!session.activeTab) return sendError(res, 404, 'no_active_tab', 'no tab is open');
    if (parsed.data.direction === 'up') session.pageUp();
    else session.pageDown();
    res.json({ ok: true, tab: activeView() });
  });

  router.post('/resize', async (req, res) => {
    const parsed = resizeBody.safeParse(req.body);
    if (!parsed.success) return sendInvalid(res, parsed.error);
    try {
      const outcomes = await session.resize(parsed.data.width, parsed.data.height);
      res.json({ ok: true, outcomes });
    } catch (error) {
      return sendError(res, 500, 'internal_error', error instanceof Error ? error.message : 'internal error');
    }
  });

  return router;
}
