import type { RendererIncomingMessage } from '../../shared/protocol.js';
import type { SessionContext } from '../api/types.js';
import type { Logger } from '../log.js';
import { toTextDocument } from '../transport/ws-protocol.js';

/** Applies one renderer message received after the hello handshake. Returns false when it was dropped. */
export function applyRendererMessage(ctx: SessionContext, msg: RendererIncomingMessage, now: number, log: Logger): boolean {
  if (msg.type === 'reflow_result') return ctx.rendererLink.resolveReflow(msg);
  if (msg.type === 'hello') {
    log.warn('repeated hello ignored', { rendererId: msg.rendererId });
    return false;
  }

  const nav = ctx.rendererLink.takeNavigation(msg.requestId);
  if (!nav) {
    log.warn('reply for unknown navigation', { requestId: msg.requestId });
    return false;
  }
  if (msg.type === 'document') {
    return ctx.session.completeNavigation(nav.tabIndex, toTextDocument(msg.document, now), nav);
  }
  log.info('navigation failed', { requestId: msg.requestId, reason: msg.reason });
  ctx.session.completeNavigation(nav.tabIndex, null, nav);
  return true;
}
