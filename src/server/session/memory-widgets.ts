import type { StatusBar, Viewport } from '../types.js';

export class MemoryViewport implements Viewport {
  private row = 0;
  private column = 0;
  private highlights: string[] = [];
  redraws = 0;
  highlightScrolls = 0;

  getScrollOffset(): [number, number] { return [this.row, this.column]; }

  scrollTo(row: number, column: number): void {
    this.row = Math.max(0, row);
    this.column = Math.max(0, column);
  }

  highlight(id: string): void { this.highlights = id ? [id] : []; }
  getHighlights(): string[] { return [...this.highlights]; }
  scrollToHighlight(): void { this.highlightScrolls += 1; }
  requestRedraw(): void { this.redraws += 1; }
}

export class MemoryStatusBar implements StatusBar {
  private label = '';
  private text = '';

  getLabel(): string { return this.label; }
  setLabel(label: string): void { this.label = label; }
  getText(): string { return this.text; }
  setText(text: string): void { this.text = text; }
}
