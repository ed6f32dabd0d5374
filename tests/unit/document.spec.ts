import { describe, expect, it } from 'vitest';
import { approximateSize, createDocument, isStale, needsReflow, parseLinkId } from '../../src/server/session/document.js';

describe('document', () => {
  it('sums the byte length of text fields and links', () => {
    const doc = createDocument({ url: 'u', rawBytes: 'abc', renderedText: 'defgh', links: ['x', 'yz'] });
    expect(approximateSize(doc)).toBe(12);
  });

  it('counts utf-8 bytes, not characters', () => {
    expect(approximateSize(createDocument({ url: 'é' }))).toBe(2);
  });

  it('fills defaults', () => {
    const doc = createDocument({ url: 'gemini://host/' });
    expect(doc.maxPreformattedColumns).toBe(-1);
    expect(doc.navigationMode).toBe('normal');
    expect(doc.createdAt).toBe(0);
    expect(doc.selectedId).toBe('');
  });

  it('treats a zero createdAt as never stale', () => {
    const doc = createDocument({ url: 'u' });
    expect(isStale(doc, 10_000_000, 1)).toBe(false);
    doc.createdAt = 1000;
    expect(isStale(doc, 5000, 3000)).toBe(true);
    expect(isStale(doc, 3500, 3000)).toBe(false);
    expect(isStale(doc, 5000, 0)).toBe(false);
  });

  it('needs a reflow only for rendered content at another width', () => {
    expect(needsReflow(createDocument({ url: 'u', lastRenderedWidth: 80 }), 100)).toBe(false);
    const doc = createDocument({ url: 'u', renderedText: 't', lastRenderedWidth: 80 });
    expect(needsReflow(doc, 80)).toBe(false);
    expect(needsReflow(doc, 100)).toBe(true);
  });

  it('parses link ids within range only', () => {
    expect(parseLinkId('2', 3)).toBe(2);
    expect(parseLinkId('3', 3)).toBeNull();
    expect(parseLinkId('-1', 3)).toBeNull();
    expect(parseLinkId('abc', 3)).toBeNull();
    expect(parseLinkId('', 3)).toBeNull();
  });
});
