import { BrowserSession } from '../session/browser-session.js';
import { RendererLink } from '../renderer/renderer-link.js';
import { Counters } from '../metrics/counters.js';
import type { SessionMetrics } from '../types.js';

export interface SessionContext {
  port: number;
  session: BrowserSession;
  rendererLink: RendererLink;
  counters: Counters;
  getMetrics: () => SessionMetrics;
}
