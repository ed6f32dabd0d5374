export type Mediatype = 'structured-text' | 'plain-text' | 'styled-terminal-text';
export type NavigationMode = 'normal' | 'link-select';
export type KeyEvent = 'enter' | 'escape' | 'tab' | 'backtab' | 'other';

export interface TextDocument {
  url: string;
  mediatype: Mediatype;
  rawMediatype: string;
  rawBytes: string;
  renderedText: string;
  /** Widest preformatted line in columns. -1 means lines are unbounded and always scroll. */
  maxPreformattedColumns: number;
  links: string[];
  scrollRow: number;
  /** Includes left margin changes, so it is not a literal terminal column. */
  scrollColumn: number;
  lastRenderedWidth: number;
  selectedText: string;
  selectedId: string;
  navigationMode: NavigationMode;
  /** Epoch ms. 0 keeps the document fresh forever. */
  createdAt: number;
}

export interface Viewport {
  getScrollOffset(): [row: number, column: number];
  scrollTo(row: number, column: number): void;
  /** An empty id clears the highlight. */
  highlight(id: string): void;
  getHighlights(): string[];
  scrollToHighlight(): void;
  requestRedraw(): void;
}

export interface StatusBar {
  getLabel(): string;
  setLabel(label: string): void;
  getText(): string;
  setText(text: string): void;
}

export interface NavigationOptions {
  fromHistory: boolean;
}

export interface Navigator {
  followLink(tabIndex: number, baseUrl: string, relativeUrl: string): void;
  load(tabIndex: number, url: string, options: NavigationOptions): void;
  /** Tabs after `tabIndex` move down by one; pending results must follow them. */
  tabClosed?(tabIndex: number): void;
}

export interface ReflowResult {
  renderedText: string;
  maxPreformattedColumns: number;
}

export interface Renderer {
  reflow(doc: TextDocument, width: number): Promise<ReflowResult | null>;
}

export interface SessionMetrics {
  tabsOpen: number;
  activeTab: number;
  cachedDocuments: number;
  cacheBytes: number;
  rendererAttached: boolean;
}

export interface TabHistoryState {
  urls: string[];
  position: number;
}

export interface SessionSnapshot {
  version: number;
  savedAt: number;
  activeIndex: number;
  tabs: Array<{ history: TabHistoryState }>;
}
