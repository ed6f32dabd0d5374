import { describe, expect, it } from 'vitest';
import { RendererLink } from '../../src/server/renderer/renderer-link.js';
import { createDocument } from '../../src/server/session/document.js';
import type { RendererOutgoingMessage } from '../../src/shared/protocol.js';
import { silentLogger } from '../helpers/fakes.js';

function makeLink(timeoutMs = 1_000) {
  let n = 0;
  const link = new RendererLink(timeoutMs, () => `req-${++n}`, silentLogger());
  const sent: RendererOutgoingMessage[] = [];
  return { link, sent };
}

const doc = createDocument({ url: 'gemini://host/', mediatype: 'structured-text', rawBytes: '# hi', renderedText: 'hi', lastRenderedWidth: 80 });

describe('renderer-link', () => {
  it('drops navigations while no renderer is attached', async () => {
    const { link } = makeLink();
    link.load(0, 'gemini://host/', { fromHistory: false });
    expect(link.pendingCount()).toBe(0);
    expect(await link.reflow(doc, 100)).toBeNull();
  });

  it('sends follow-link requests and remembers their tab', () => {
    const { link, sent } = makeLink();
    link.attach('r1', (msg) => { sent.push(msg); return true; });
    link.followLink(2, 'gemini://host/dir/', '../page');
    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({ type: 'follow_link', requestId: 'req-1', baseUrl: 'gemini://host/dir/', relativeUrl: '../page' });
    expect(link.takeNavigation('req-1')).toEqual({ tabIndex: 2, fromHistory: false });
    expect(link.takeNavigation('req-1')).toBeUndefined();
  });

  it('moves pending navigations when a tab closes', () => {
    const { link } = makeLink();
    link.attach('r1', () => true);
    link.load(0, 'gemini://a/', { fromHistory: false });
    link.load(1, 'gemini://b/', { fromHistory: true });
    link.load(2, 'gemini://c/', { fromHistory: false });
    link.tabClosed(1);
    expect(link.takeNavigation('req-1')).toEqual({ tabIndex: 0, fromHistory: false });
    expect(link.takeNavigation('req-2')).toBeUndefined();
    expect(link.takeNavigation('req-3')).toEqual({ tabIndex: 1, fromHistory: false });
  });

  it('forgets a navigation the connection could not send', () => {
    const { link } = makeLink();
    link.attach('r1', () => false);
    link.load(0, 'gemini://a/', { fromHistory: false });
    expect(link.pendingCount()).toBe(0);
  });

  it('resolves a reflow from the renderer reply', async () => {
    const { link, sent } = makeLink();
    link.attach('r1', (msg) => {
      sent.push(msg);
      link.resolveReflow({ type: 'reflow_result', requestId: msg.requestId, ok: true, renderedText: 'wide', maxPreformattedColumns: 40, ts: 0 });
      return true;
    });
    expect(await link.reflow(doc, 120)).toEqual({ renderedText: 'wide', maxPreformattedColumns: 40 });
    expect(sent[0]).toMatchObject({ type: 'reflow', url: 'gemini://host/', mediatype: 'structured-text', rawBytes: '# hi', width: 120 });
  });

  it('gives up on a reflow after the timeout', async () => {
    const { link } = makeLink(10);
    link.attach('r1', () => true);
    expect(await link.reflow(doc, 120)).toBeNull();
    expect(link.pendingCount()).toBe(0);
  });

  it('gives up on a reflow when the renderer detaches', async () => {
    const { link } = makeLink();
    link.attach('r1', () => true);
    const pending = link.reflow(doc, 120);
    link.detach('r1');
    expect(await pending).toBeNull();
    expect(link.attached).toBe(false);
  });

  it('ignores a detach from a replaced renderer', () => {
    const { link } = makeLink();
    link.attach('r1', () => true);
    link.attach('r2', () => true);
    link.detach('r1');
    expect(link.attachedId).toBe('r2');
  });

  it('treats a failed reflow reply as no result', async () => {
    const { link } = makeLink();
    link.attach('r1', (msg) => {
      link.resolveReflow({ type: 'reflow_result', requestId: msg.requestId, ok: false, error: 'unsupported', ts: 0 });
      return true;
    });
    expect(await link.reflow(doc, 120)).toBeNull();
  });

  it('keeps navigation and reflow replies apart', async () => {
    const { link, sent } = makeLink();
    link.attach('r1', (msg) => { sent.push(msg); return true; });
    link.load(0, 'gemini://a/', { fromHistory: false });
    const pending = link.reflow(doc, 120);
    expect(link.pendingCount()).toBe(2);

    expect(link.resolveReflow({ type: 'reflow_result', requestId: 'req-1', ok: true, renderedText: 'x', ts: 0 })).toBe(false);
    expect(link.takeNavigation('req-2')).toBeUndefined();
    expect(link.resolveReflow({ type: 'reflow_result', requestId: 'req-2', ok: true, renderedText: 'x', ts: 0 })).toBe(true);
    expect(await pending).toEqual({ renderedText: 'x', maxPreformattedColumns: -1 });
    expect(link.takeNavigation('req-1')).toEqual({ tabIndex: 0, fromHistory: false });
    expect(link.pendingCount()).toBe(0);
  });

  it('settles a reflow the connection could not send', async () => {
    const { link } = makeLink();
    link.attach('r1', () => false);
    expect(await link.reflow(doc, 120)).toBeNull();
    expect(link.pendingCount()).toBe(0);
  });
});
