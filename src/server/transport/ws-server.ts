import { WebSocket, WebSocketServer } from 'ws';
import type { Server } from 'node:http';
import type { RendererOutgoingMessage } from '../../shared/protocol.js';
import type { SessionContext } from '../api/types.js';
import { createLogger } from '../log.js';
import { applyRendererMessage } from '../renderer/renderer-events.js';
import { parseRendererEvent, validateHello } from './ws-protocol.js';

const log = createLogger('ws');

export const RENDERER_PATH = '/renderer';

export function mountWsServer(server: Server, ctx: SessionContext): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  wss.on('connection', (ws) => {
    let rendererId = '';

    ws.on('message', (raw) => {
      const now = Date.now();
      const parsed = parseRendererEvent(raw.toString());
      if (!parsed.ok) {
        if (!rendererId) {
          ws.close(1008, parsed.reason.slice(0, 120));
          return;
        }
        log.warn('dropping invalid renderer message', { rendererId, reason: parsed.reason });
        return;
      }
      const msg = parsed.msg;

      if (!rendererId) {
        const valid = validateHello(msg);
        if (!valid.ok) {
          ws.close(1008, valid.reason);
          return;
        }
        rendererId = valid.hello.rendererId;
        ctx.rendererLink.attach(rendererId, (payload: RendererOutgoingMessage) => {
          if (ws.readyState !== WebSocket.OPEN) return false;
          ws.send(JSON.stringify(payload));
          return true;
        });
        log.info('renderer attached', { rendererId, version: valid.hello.version });
        ctx.session.reloadMissing();
        return;
      }

      applyRendererMessage(ctx, msg, now, log);
    });

    // ws closes the socket after a protocol error; detaching is left to 'close'.
    ws.on('error', (err) => {
      log.warn('renderer socket error', { rendererId, err: err.message });
    });

    ws.on('close', () => {
      if (rendererId) ctx.rendererLink.detach(rendererId);
    });
  });

  server.on('upgrade', (req, socket, head) => {
    const url = req.url || '';
    if (!url.startsWith(RENDERER_PATH)) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit('connection', ws, req);
    });
  });

  return wss;
}
