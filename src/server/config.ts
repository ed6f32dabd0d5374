import path from 'node:path';

const minute = 60 * 1000;

export const config = {
  port: Number(process.env.PORT ?? 8788),
  logLevel: process.env.LOG_LEVEL ?? 'info',
  terminal: {
    width: Number(process.env.SESSION_TERM_WIDTH ?? 80),
    height: Number(process.env.SESSION_TERM_HEIGHT ?? 24)
  },
  cache: {
    ttlMs: Number(process.env.SESSION_CACHE_TTL_MS ?? 30 * minute),
    maxDocumentSize: Number(process.env.SESSION_CACHE_MAX_DOC_BYTES ?? 5 * 1024 * 1024)
  },
  renderer: {
    reflowTimeoutMs: Number(process.env.SESSION_REFLOW_TIMEOUT_MS ?? 5_000)
  },
  snapshot: {
    path: process.env.SESSION_SNAPSHOT_PATH ?? path.resolve(process.cwd(), 'dist/session-snapshot.json'),
    flushMs: Number(process.env.SESSION_SNAPSHOT_FLUSH_MS ?? 2_000)
  }
};
