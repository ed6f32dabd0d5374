import type { KeyEvent, Navigator, NavigationOptions, Renderer, SessionSnapshot, StatusBar, TextDocument, Viewport } from '../types.js';
import { DocumentCache } from '../cache/document-cache.js';
import { Counters } from '../metrics/counters.js';
import { createLogger, type Logger } from '../log.js';
import { needsReflow } from './document.js';
import { MemoryStatusBar } from './memory-widgets.js';
import type { ReflowOutcome } from './reflow.js';
import { Tab } from './tab.js';

export interface BrowserSessionOptions {
  createViewport: () => Viewport;
  statusBar: StatusBar;
  navigator: Navigator;
  renderer: Renderer;
  cache: DocumentCache;
  counters?: Counters;
  termWidth: number;
  termHeight: number;
  now?: () => number;
  log?: Logger;
  /** Called after any change to the tabs, the active index or a tab's history. */
  onChange?: () => void;
}

export const SNAPSHOT_VERSION = 1;

/**
 * Owns every tab of one browser window together with the state they share:
 * the active index, the status bar, the terminal size and the document cache.
 * All methods run on one event at a time; navigation results come back later
 * through completeNavigation().
 */
export class BrowserSession {
  readonly tabs: Tab[] = [];
  readonly statusBar: StatusBar;
  readonly cache: DocumentCache;
  readonly counters: Counters;
  private current = -1;
  private width: number;
  private height: number;
  private readonly navigator: Navigator;
  private readonly renderer: Renderer;
  private readonly createViewport: () => Viewport;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly onChange: () => void;

  constructor(options: BrowserSessionOptions) {
    this.statusBar = options.statusBar;
    this.cache = options.cache;
    this.counters = options.counters ?? new Counters();
    this.navigator = options.navigator;
    this.renderer = options.renderer;
    this.createViewport = options.createViewport;
    this.width = options.termWidth;
    this.height = options.termHeight;
    this.now = options.now ?? Date.now;
    this.log = options.log ?? createLogger('session');
    this.onChange = options.onChange ?? (() => {});
  }

  get activeIndex(): number { return this.current; }
  get activeTab(): Tab | undefined { return this.tabs[this.current]; }
  get termWidth(): number { return this.width; }
  get termHeight(): number { return this.height; }

  newTab(): Tab {
    const tab = new Tab(this.createViewport());
    this.tabs.push(tab);
    this.switchTab(this.tabs.length - 1);
    return tab;
  }

  switchTab(index: number): boolean {
    const incoming = this.tabs[index];
    if (!incoming || index === this.current) return false;
    const outgoing = this.activeTab;
    if (outgoing) {
      if (outgoing.hasContent()) outgoing.saveScroll();
      outgoing.saveBottomBar(this.statusBar);
    }
    this.current = index;
    incoming.applyBottomBar(this.statusBar);
    incoming.viewport.requestRedraw();
    this.scheduleReflow(incoming);
    this.onChange();
    return true;
  }

  closeTab(index: number): boolean {
    if (!this.tabs[index]) return false;
    const wasActive = index === this.current;
    this.tabs.splice(index, 1);
    this.navigator.tabClosed?.(index);
    if (this.tabs.length === 0) {
      this.current = -1;
      this.statusBar.setLabel('');
      this.statusBar.setText('');
      this.onChange();
      return true;
    }
    if (index < this.current) this.current -= 1;
    else if (wasActive) {
      this.current = Math.min(index, this.tabs.length - 1);
      const tab = this.tabs[this.current];
      tab.applyBottomBar(this.statusBar);
      tab.viewport.requestRedraw();
    }
    this.onChange();
    return true;
  }

  handleKey(key: KeyEvent): void {
    const tab = this.activeTab;
    if (!tab) return;
    const index = this.current;
    tab.handleKey(key, this.statusBar, (base, relative) => {
      this.counters.navigationsTotal += 1;
      this.navigator.followLink(index, base, relative);
    });
  }

  navigate(url: string): boolean {
    if (!this.activeTab) return false;
    this.counters.navigationsTotal += 1;
    this.navigator.load(this.current, url, { fromHistory: false });
    return true;
  }

  /**
   * Result of a navigation started earlier for tabIndex. A null document means
   * the fetch or render failed and the previous document stays displayed.
   */
  completeNavigation(tabIndex: number, doc: TextDocument | null, options: NavigationOptions): boolean {
    const tab = this.tabs[tabIndex];
    if (!tab) {
      this.log.warn('navigation finished for a closed tab', { tabIndex });
      return false;
    }
    if (!doc) {
      this.counters.navigationFailuresTotal += 1;
      return false;
    }
    if (tab.hasContent()) tab.saveScroll();
    this.show(tabIndex, tab, this.cache.add(doc), options.fromHistory);
    if (!options.fromHistory && tab.hasContent()) tab.history.push(tab.document.url);
    this.onChange();
    return true;
  }

  back(): boolean {
    return this.moveInHistory((tab) => tab.history.back());
  }

  forward(): boolean {
    return this.moveInHistory((tab) => tab.history.forward());
  }

  pageUp(): void { this.activeTab?.pageUp(this.height); }
  pageDown(): void { this.activeTab?.pageDown(this.height); }

  async resize(width: number, height: number): Promise<ReflowOutcome[]> {
    this.width = width;
    this.height = height;
    const outcomes = await Promise.all(this.tabs.map((tab) => this.reflowTab(tab)));
    this.activeTab?.viewport.requestRedraw();
    return outcomes;
  }

  exportSnapshot(): SessionSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      savedAt: this.now(),
      activeIndex: this.current,
      tabs: this.tabs.map((tab) => ({ history: tab.history.exportState() }))
    };
  }

  /** Replaces all tabs with the snapshot's and reloads each tab's current entry. */
  importSnapshot(snapshot: SessionSnapshot): void {
    this.tabs.length = 0;
    this.current = -1;
    for (const saved of snapshot.tabs) {
      const tab = new Tab(this.createViewport());
      tab.history.importState(saved.history);
      tab.barText = tab.history.current() ?? '';
      this.tabs.push(tab);
    }
    if (this.tabs.length === 0) return;
    const active = snapshot.activeIndex >= 0 && snapshot.activeIndex < this.tabs.length ? snapshot.activeIndex : 0;
    this.switchTab(active);
    this.reloadMissing();
  }

  /** Requests the current history entry of every tab that has nothing displayed. Returns the request count. */
  reloadMissing(): number {
    let n = 0;
    this.tabs.forEach((tab, i) => {
      const url = tab.history.current();
      if (!url || tab.hasContent()) return;
      this.navigator.load(i, url, { fromHistory: true });
      n += 1;
    });
    return n;
  }

  private moveInHistory(move: (tab: Tab) => string | undefined): boolean {
    const tab = this.activeTab;
    if (!tab) return false;
    if (tab.hasContent()) tab.saveScroll();
    const url = move(tab);
    if (url === undefined) {
      this.counters.historyMissTotal += 1;
      return false;
    }
    const cached = this.cache.get(url, this.now());
    if (cached) this.show(this.current, tab, cached, true);
    else this.navigator.load(this.current, url, { fromHistory: true });
    this.onChange();
    return true;
  }

  private show(tabIndex: number, tab: Tab, doc: TextDocument, fromHistory: boolean): void {
    const active = tabIndex === this.current;
    const bar = active ? this.statusBar : new MemoryStatusBar();
    tab.adopt(doc, bar, fromHistory);
    if (fromHistory) tab.applyScroll();
    else tab.viewport.scrollTo(0, 0);
    if (tab.mode === 'normal') {
      bar.setLabel('');
      bar.setText(doc.url);
    }
    tab.saveBottomBar(bar);
    if (active) tab.viewport.requestRedraw();
    this.scheduleReflow(tab);
  }

  private scheduleReflow(tab: Tab): void {
    if (!needsReflow(tab.document, this.width)) return;
    this.reflowTab(tab).catch((err: unknown) => {
      this.log.error('reflow failed', { url: tab.document.url, err: err instanceof Error ? err.message : String(err) });
    });
  }

  private async reflowTab(tab: Tab): Promise<ReflowOutcome> {
    const outcome = await tab.reflowTo(this.width, this.renderer);
    this.counters.markReflow(outcome);
    if (outcome === 'applied' && tab === this.activeTab) tab.viewport.requestRedraw();
    return outcome;
  }
}
