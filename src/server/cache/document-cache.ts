import type { TextDocument } from '../types.js';
import { approximateSize, isInternalUrl, isStale } from '../session/document.js';

export interface DocumentCacheOptions {
  ttlMs: number;
  maxDocumentSize: number;
}

/**
 * Documents keyed by URL. The cache stores the same object the tab displays,
 * so scroll and selection written by the tab are the cached values too; a tab
 * must adopt the handle returned by add().
 */
export class DocumentCache {
  private readonly docs = new Map<string, TextDocument>();

  constructor(private readonly options: DocumentCacheOptions) {}

  add(doc: TextDocument): TextDocument {
    if (doc.url === '' || isInternalUrl(doc.url) || doc.renderedText === '') return doc;
    if (this.options.maxDocumentSize > 0 && approximateSize(doc) > this.options.maxDocumentSize) return doc;
    this.docs.set(doc.url, doc);
    return doc;
  }

  /** The cached handle, or undefined when missing or older than the TTL. */
  get(url: string, now: number): TextDocument | undefined {
    const doc = this.docs.get(url);
    if (!doc || isStale(doc, now, this.options.ttlMs)) return undefined;
    return doc;
  }

  has(url: string): boolean { return this.docs.has(url); }
  remove(url: string): boolean { return this.docs.delete(url); }
  count(): number { return this.docs.size; }
  urls(): string[] { return [...this.docs.keys()]; }

  totalSize(): number {
    let n = 0;
    for (const doc of this.docs.values()) n += approximateSize(doc);
    return n;
  }
}
