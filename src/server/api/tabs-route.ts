import { Router } from 'express';
import { z } from 'zod';
import type { Tab } from '../session/tab.js';
import { sendError, sendInvalid } from './errors.js';
import type { SessionContext } from './types.js';

const indexParam = z.coerce.number().int().nonnegative();

export function describeTab(tab: Tab, index: number, active: boolean) {
  return {
    index,
    active,
    url: tab.document.url,
    mode: tab.mode,
    hasContent: tab.hasContent(),
    scroll: tab.viewport.getScrollOffset(),
    history: tab.history.exportState(),
    barLabel: tab.barLabel,
    barText: tab.barText
  };
}

export function makeTabsRoute(ctx: SessionContext): Router {
  const router = Router();
  const { session } = ctx;

  router.get('/tabs', (_req, res) => {
    res.json({ activeIndex: session.activeIndex, tabs: session.tabs.map((t, i) => describeTab(t, i, i === session.activeIndex)) });
  });

  router.post('/tabs', (_req, res) => {
    const tab = session.newTab();
    res.status(201).json({ ok: true, tab: describeTab(tab, session.activeIndex, true) });
  });

  router.post('/tabs/:index/activate', (req, res) => {
    const parsed = indexParam.safeParse(req.params.index);
    if (!parsed.success) return sendInvalid(res, parsed.error);
    const tab = session.tabs[parsed.data];
    if (!tab) return sendError(res, 404, 'tab_not_found', `tab not found: ${parsed.data}`);
    session.switchTab(parsed.data);
    res.json({ ok: true, tab: describeTab(tab, parsed.data, true) });
  });

  router.delete('/tabs/:index', (req, res) => {
    const parsed = indexParam.safeParse(req.params.index);
    if (!parsed.success) return sendInvalid(res, parsed.error);
    if (!session.closeTab(parsed.data)) return sendError(res, 404, 'tab_not_found', `tab not found: ${parsed.data}`);
    res.json({ ok: true, activeIndex: session.activeIndex });
  });

  return router;
}
