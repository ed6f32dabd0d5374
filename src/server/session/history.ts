import type { TabHistoryState } from '../types.js';

export class TabHistory {
  private urls: string[] = [];
  private pos = -1;

  get position(): number { return this.pos; }
  entries(): readonly string[] { return this.urls; }
  current(): string | undefined { return this.urls[this.pos]; }
  canGoBack(): boolean { return this.pos > 0; }
  canGoForward(): boolean { return this.pos < this.urls.length - 1; }

  /** Adds a newly displayed URL. Anything ahead of the cursor is dropped first. */
  push(url: string): void {
    if (this.pos < this.urls.length - 1) this.urls = this.urls.slice(0, this.pos + 1);
    this.urls.push(url);
    this.pos = this.urls.length - 1;
  }

  back(): string | undefined {
    if (!this.canGoBack()) return undefined;
    this.pos -= 1;
    return this.urls[this.pos];
  }

  forward(): string | undefined {
    if (!this.canGoForward()) return undefined;
    this.pos += 1;
    return this.urls[this.pos];
  }

  exportState(): TabHistoryState { return { urls: [...this.urls], position: this.pos }; }

  importState(state: TabHistoryState): void {
    this.urls = [...state.urls];
    this.pos = this.urls.length === 0 ? -1 : Math.min(Math.max(state.position, 0), this.urls.length - 1);
  }
}
