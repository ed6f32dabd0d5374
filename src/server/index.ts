import express from 'express';
import http from 'node:http';
import { config } from './config.js';
import { createLogger } from './log.js';
import { DocumentCache } from './cache/document-cache.js';
import { Counters } from './metrics/counters.js';
import { RendererLink } from './renderer/renderer-link.js';
import { BrowserSession } from './session/browser-session.js';
import { MemoryStatusBar, MemoryViewport } from './session/memory-widgets.js';
import { makeStatusRoute } from './api/status-route.js';
import { makeTabsRoute } from './api/tabs-route.js';
import { makeNavigationRoute } from './api/navigation-route.js';
import type { SessionContext } from './api/types.js';
import { mountWsServer } from './transport/ws-server.js';
import { SnapshotStore } from './persistence/snapshot-store.js';

const log = createLogger('session');

const app = express();
const server = http.createServer(app);

const counters = new Counters();
const cache = new DocumentCache({ ttlMs: config.cache.ttlMs, maxDocumentSize: config.cache.maxDocumentSize });
const rendererLink = new RendererLink(config.renderer.reflowTimeoutMs);
const snapshotStore = new SnapshotStore(config.snapshot.path, config.snapshot.flushMs);
const session: BrowserSession = new BrowserSession({
  createViewport: () => new MemoryViewport(),
  statusBar: new MemoryStatusBar(),
  navigator: rendererLink,
  renderer: rendererLink,
  cache,
  counters,
  termWidth: config.terminal.width,
  termHeight: config.terminal.height,
  onChange: () => snapshotStore.scheduleSave(() => session.exportSnapshot())
});

const getMetrics = () => ({
  tabsOpen: session.tabs.length,
  activeTab: session.activeIndex,
  cachedDocuments: cache.count(),
  cacheBytes: cache.totalSize(),
  rendererAttached: rendererLink.attached
});

const ctx: SessionContext = { port: config.port, session, rendererLink, counters, getMetrics };

const loaded = await snapshotStore.loadSnapshot();
if (loaded && loaded.tabs.length > 0) {
  session.importSnapshot(loaded);
  log.info('session restored', { tabs: loaded.tabs.length });
} else {
  session.newTab();
}

app.use(express.json({ limit: '1mb' }));
app.use('/api', makeStatusRoute(ctx));
app.use('/api', makeTabsRoute(ctx));
app.use('/api', makeNavigationRoute(ctx));

mountWsServer(server, ctx);

function shutdown(signal: string): void {
  log.info('shutting down', { signal });
  snapshotStore.cancel();
  snapshotStore
    .saveSnapshot(session.exportSnapshot())
    .catch((error: unknown) => {
      log.error('session snapshot not saved', { err: error instanceof Error ? error.message : String(error) });
    })
    .finally(() => process.exit(0));
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));

server.listen(config.port, () => {
  log.info(`listening on ${config.port}`);
});
