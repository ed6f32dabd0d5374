import type { TextDocument } from '../types.js';

export const INTERNAL_SCHEME = 'about:';

export function createDocument(init: Partial<TextDocument> & { url: string }): TextDocument {
  return {
    mediatype: 'structured-text',
    rawMediatype: '',
    rawBytes: '',
    renderedText: '',
    maxPreformattedColumns: -1,
    links: [],
    scrollRow: 0,
    scrollColumn: 0,
    lastRenderedWidth: 0,
    selectedText: '',
    selectedId: '',
    navigationMode: 'normal',
    createdAt: 0,
    ...init
  };
}

/** Placeholder shown by a freshly opened tab. */
export function emptyDocument(): TextDocument {
  return createDocument({ url: '' });
}

export function isInternalUrl(url: string): boolean {
  return url.startsWith(INTERNAL_SCHEME);
}

/**
 * Approximate size of a document in bytes, for cache accounting only.
 * Counts the text fields and links, not the actual memory footprint.
 */
export function approximateSize(doc: TextDocument): number {
  let n = Buffer.byteLength(doc.rawBytes) + Buffer.byteLength(doc.renderedText) + Buffer.byteLength(doc.url)
    + Buffer.byteLength(doc.selectedText) + Buffer.byteLength(doc.selectedId);
  for (const link of doc.links) n += Buffer.byteLength(link);
  return n;
}

export function isStale(doc: TextDocument, now: number, ttlMs: number): boolean {
  if (doc.createdAt === 0 || ttlMs <= 0) return false;
  return now - doc.createdAt > ttlMs;
}

export function needsReflow(doc: TextDocument, width: number): boolean {
  return doc.renderedText !== '' && doc.lastRenderedWidth !== width;
}

/** Link index for a highlight id, or null when the id is not a link id of this document. */
export function parseLinkId(id: string, linkCount: number): number | null {
  if (!/^\d+$/.test(id)) return null;
  const index = Number(id);
  return index < linkCount ? index : null;
}
