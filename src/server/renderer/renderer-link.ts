import { randomUUID } from 'node:crypto';
import type { Navigator, NavigationOptions, ReflowResult, Renderer, TextDocument } from '../types.js';
import type { ReflowResultMessage, RendererOutgoingMessage } from '../../shared/protocol.js';
import { createLogger, type Logger } from '../log.js';

export interface PendingNavigation {
  tabIndex: number;
  fromHistory: boolean;
}

interface PendingReflow {
  url: string;
  width: number;
  settle: (result: ReflowResult | null) => void;
  timer: NodeJS.Timeout;
}

type PendingRequest =
  | { kind: 'navigation'; nav: PendingNavigation }
  | { kind: 'reflow'; reflow: PendingReflow };

type Send = (payload: RendererOutgoingMessage) => boolean;

/**
 * Navigator and Renderer backed by the one renderer process attached over the
 * WebSocket transport. Every request gets a requestId; navigation replies are
 * matched to their tab through it and reflow replies to their waiting caller.
 * A reflow never rejects: timeout, detach and error replies all settle as null.
 */
export class RendererLink implements Navigator, Renderer {
  private send?: Send;
  private rendererId?: string;
  private readonly pending = new Map<string, PendingRequest>();

  constructor(
    private readonly reflowTimeoutMs: number,
    private readonly newRequestId: () => string = randomUUID,
    private readonly log: Logger = createLogger('renderer')
  ) {}

  get attached(): boolean { return this.send !== undefined; }
  get attachedId(): string | undefined { return this.rendererId; }
  pendingCount(): number { return this.pending.size; }

  attach(rendererId: string, send: Send): void {
    if (this.rendererId && this.rendererId !== rendererId) {
      this.log.info('renderer replaced', { previous: this.rendererId, next: rendererId });
    }
    this.rendererId = rendererId;
    this.send = send;
  }

  detach(rendererId: string): void {
    if (this.rendererId !== rendererId) return;
    this.send = undefined;
    this.rendererId = undefined;
    let navigations = 0;
    for (const [requestId, entry] of this.pending) {
      if (entry.kind === 'reflow') this.settleReflow(requestId, entry.reflow, null);
      else navigations += 1;
    }
    this.pending.clear();
    if (navigations > 0) this.log.warn('renderer detached with navigations in flight', { pending: navigations });
  }

  followLink(tabIndex: number, baseUrl: string, relativeUrl: string): void {
    const requestId = this.newRequestId();
    this.dispatch({ type: 'follow_link', requestId, baseUrl, relativeUrl, ts: Date.now() }, { tabIndex, fromHistory: false });
  }

  load(tabIndex: number, url: string, options: NavigationOptions): void {
    const requestId = this.newRequestId();
    this.dispatch({ type: 'load', requestId, url, ts: Date.now() }, { tabIndex, fromHistory: options.fromHistory });
  }

  tabClosed(tabIndex: number): void {
    for (const [requestId, entry] of this.pending) {
      if (entry.kind !== 'navigation') continue;
      if (entry.nav.tabIndex === tabIndex) this.pending.delete(requestId);
      else if (entry.nav.tabIndex > tabIndex) entry.nav.tabIndex -= 1;
    }
  }

  /** Removes and returns the navigation a renderer reply belongs to. */
  takeNavigation(requestId: string): PendingNavigation | undefined {
    const entry = this.pending.get(requestId);
    if (!entry || entry.kind !== 'navigation') return undefined;
    this.pending.delete(requestId);
    return entry.nav;
  }

  reflow(doc: TextDocument, width: number): Promise<ReflowResult | null> {
    const send = this.send;
    if (!send) return Promise.resolve(null);
    const requestId = this.newRequestId();
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        this.log.warn('reflow timeout', { url: doc.url, width });
        resolve(null);
      }, this.reflowTimeoutMs);
      const reflow: PendingReflow = { url: doc.url, width, settle: resolve, timer };
      this.pending.set(requestId, { kind: 'reflow', reflow });
      const sent = send({ type: 'reflow', requestId, url: doc.url, mediatype: doc.mediatype, rawBytes: doc.rawBytes, width, ts: Date.now() });
      if (!sent && this.pending.has(requestId)) {
        this.log.warn('renderer connection unavailable, reflow dropped', { url: doc.url, width });
        this.settleReflow(requestId, reflow, null);
      }
    });
  }

  /** Settles the reflow a reply belongs to. False when no reflow waits on its requestId. */
  resolveReflow(msg: ReflowResultMessage): boolean {
    const entry = this.pending.get(msg.requestId);
    if (!entry || entry.kind !== 'reflow') return false;
    const { reflow } = entry;
    if (!msg.ok || msg.renderedText === undefined) {
      this.log.warn('renderer could not reflow', { url: reflow.url, width: reflow.width, error: msg.error });
      this.settleReflow(msg.requestId, reflow, null);
    } else {
      this.settleReflow(msg.requestId, reflow, { renderedText: msg.renderedText, maxPreformattedColumns: msg.maxPreformattedColumns ?? -1 });
    }
    return true;
  }

  private settleReflow(requestId: string, reflow: PendingReflow, result: ReflowResult | null): void {
    clearTimeout(reflow.timer);
    this.pending.delete(requestId);
    reflow.settle(result);
  }

  private dispatch(msg: RendererOutgoingMessage, nav: PendingNavigation): void {
    const send = this.send;
    if (!send) {
      this.log.warn('no renderer attached, navigation dropped', { type: msg.type });
      return;
    }
    this.pending.set(msg.requestId, { kind: 'navigation', nav });
    if (!send(msg)) {
      this.pending.delete(msg.requestId);
      this.log.warn('renderer connection unavailable, navigation dropped', { type: msg.type });
    }
  }
}
