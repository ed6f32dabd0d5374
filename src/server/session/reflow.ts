import type { Renderer, TextDocument } from '../types.js';
import { needsReflow } from './document.js';

export type ReflowOutcome = 'applied' | 'skipped' | 'superseded' | 'failed';

export interface ReflowTarget {
  readonly document: TextDocument;
}

/**
 * Non-reentrant reflow lock for one tab. A request that arrives while a reflow
 * is running only moves the target width; the running loop re-renders until
 * its result matches both the latest width and the tab's current document.
 */
export class ReflowGuard {
  private held = false;
  private target = 0;

  get inProgress(): boolean { return this.held; }
  get targetWidth(): number { return this.target; }

  async run(holder: ReflowTarget, width: number, renderer: Renderer): Promise<ReflowOutcome> {
    this.target = width;
    if (this.held) return 'superseded';
    if (!needsReflow(holder.document, width)) return 'skipped';

    this.held = true;
    try {
      let outcome: ReflowOutcome = 'skipped';
      let retried = false;
      while (needsReflow(holder.document, this.target)) {
        const doc = holder.document;
        const wanted = this.target;
        const result = await renderer.reflow(doc, wanted);
        if (!result) {
          // A failure for a request already overtaken gets one more attempt at the new target.
          if (retried || (wanted === this.target && doc === holder.document)) return 'failed';
          retried = true;
          continue;
        }
        if (wanted !== this.target || doc !== holder.document) continue;
        doc.renderedText = result.renderedText;
        doc.maxPreformattedColumns = result.maxPreformattedColumns;
        doc.lastRenderedWidth = wanted;
        outcome = 'applied';
      }
      return outcome;
    } finally {
      this.held = false;
    }
  }
}
