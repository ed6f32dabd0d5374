import type { KeyEvent, NavigationMode, Renderer, StatusBar, TextDocument, Viewport } from '../types.js';
import { emptyDocument, isInternalUrl } from './document.js';
import { TabHistory } from './history.js';
import { LinkSelector, type LinkSelectContext } from './link-selector.js';
import { ReflowGuard, type ReflowOutcome } from './reflow.js';

/** Share of the terminal height moved by one page up/down. */
const PAGE_FRACTION = 0.75;

export class Tab {
  document: TextDocument = emptyDocument();
  readonly history = new TabHistory();
  readonly selector = new LinkSelector();
  readonly reflow = new ReflowGuard();
  barLabel = '';
  barText = '';

  constructor(readonly viewport: Viewport) {}

  get mode(): NavigationMode { return this.selector.mode; }

  /**
   * False for the placeholder a new tab starts with, internal pages and
   * documents without rendered content.
   */
  hasContent(): boolean {
    const doc = this.document;
    if (doc.url === '' || isInternalUrl(doc.url)) return false;
    return doc.renderedText !== '';
  }

  /** Stores the viewport offset on the document. Call before leaving it. */
  saveScroll(): void {
    const [row, column] = this.viewport.getScrollOffset();
    this.document.scrollRow = row;
    this.document.scrollColumn = column;
  }

  /** Only for documents shown again through back/forward. */
  applyScroll(): void {
    this.viewport.scrollTo(this.document.scrollRow, this.document.scrollColumn);
  }

  pageUp(termHeight: number): void {
    const [row, column] = this.viewport.getScrollOffset();
    this.viewport.scrollTo(row - Math.floor(termHeight * PAGE_FRACTION), column);
  }

  pageDown(termHeight: number): void {
    const [row, column] = this.viewport.getScrollOffset();
    this.viewport.scrollTo(row + Math.floor(termHeight * PAGE_FRACTION), column);
  }

  saveBottomBar(bar: StatusBar): void {
    this.barLabel = bar.getLabel();
    this.barText = bar.getText();
  }

  applyBottomBar(bar: StatusBar): void {
    bar.setLabel(this.barLabel);
    bar.setText(this.barText);
  }

  handleKey(key: KeyEvent, bar: StatusBar, follow: LinkSelectContext['follow']): void {
    try {
      this.selector.handleKey(key, this.selectContext(bar, follow));
    } finally {
      this.saveBottomBar(bar);
    }
  }

  adopt(doc: TextDocument, bar: StatusBar, restore: boolean): void {
    this.document = doc;
    this.viewport.highlight('');
    this.selector.reset();
    if (restore) this.selector.resume(this.selectContext(bar, () => undefined));
    else {
      doc.navigationMode = 'normal';
      doc.selectedText = '';
      doc.selectedId = '';
    }
  }

  reflowTo(width: number, renderer: Renderer): Promise<ReflowOutcome> {
    return this.reflow.run(this, width, renderer);
  }

  private selectContext(statusBar: StatusBar, follow: LinkSelectContext['follow']): LinkSelectContext {
    return { document: this.document, viewport: this.viewport, statusBar, follow };
  }
}
