import type { KeyEvent, NavigationMode, StatusBar, TextDocument, Viewport } from '../types.js';
import { createLogger, type Logger } from '../log.js';
import { parseLinkId } from './document.js';

export type LinkSelectState = { kind: 'off' } | { kind: 'selecting'; index: number };

export const LINK_LABEL = 'Link: ';

export interface LinkSelectContext {
  document: TextDocument;
  viewport: Viewport;
  statusBar: StatusBar;
  follow: (baseUrl: string, relativeUrl: string) => void;
}

export class LinkSelector {
  private current: LinkSelectState = { kind: 'off' };

  constructor(private readonly log: Logger = createLogger('link-select')) {}

  get state(): LinkSelectState { return this.current; }
  get mode(): NavigationMode { return this.current.kind === 'off' ? 'normal' : 'link-select'; }

  handleKey(key: KeyEvent, ctx: LinkSelectContext): void {
    if (key === 'escape') {
      this.stop(ctx);
      return;
    }

    const links = ctx.document.links;
    const state = this.current;
    if (state.kind === 'off') {
      if (key === 'enter' && links.length > 0) this.select(0, ctx);
      return;
    }

    if (key === 'enter') {
      const target = links[state.index];
      this.current = { kind: 'off' };
      ctx.viewport.highlight('');
      ctx.statusBar.setLabel('');
      ctx.document.navigationMode = 'normal';
      if (target !== undefined) ctx.follow(ctx.document.url, target);
      return;
    }
    if (key === 'tab') this.select((state.index + 1) % links.length, ctx);
    else if (key === 'backtab') this.select((state.index - 1 + links.length) % links.length, ctx);
  }

  /** Drops the selection without touching the view, e.g. when another document is adopted. */
  reset(): void {
    this.current = { kind: 'off' };
  }

  /** Re-enters link selection for a document that was left with a link highlighted. */
  resume(ctx: LinkSelectContext): void {
    const doc = ctx.document;
    if (doc.navigationMode !== 'link-select' || doc.links.length === 0) {
      this.reset();
      return;
    }
    let index = parseLinkId(doc.selectedId, doc.links.length);
    if (index === null) {
      this.log.warn('inconsistent highlight id, selecting first link', { url: doc.url, selectedId: doc.selectedId });
      index = 0;
    }
    this.select(index, ctx);
  }

  private select(index: number, ctx: LinkSelectContext): void {
    const doc = ctx.document;
    const target = doc.links[index] ?? '';
    this.current = { kind: 'selecting', index };
    ctx.viewport.highlight(String(index));
    ctx.viewport.scrollToHighlight();
    ctx.statusBar.setLabel(LINK_LABEL);
    ctx.statusBar.setText(target);
    doc.selectedText = target;
    doc.selectedId = String(index);
    doc.navigationMode = 'link-select';
  }

  private stop(ctx: LinkSelectContext): void {
    const doc = ctx.document;
    this.current = { kind: 'off' };
    ctx.viewport.highlight('');
    ctx.statusBar.setLabel('');
    ctx.statusBar.setText(doc.url);
    doc.selectedText = '';
    doc.selectedId = '';
    doc.navigationMode = 'normal';
  }
}
