import { z } from 'zod';
import type { HelloMessage, RendererIncomingMessage, WireDocument } from '../../shared/protocol.js';
import type { TextDocument } from '../types.js';
import { createDocument } from '../session/document.js';

const wireDocumentSchema = z.object({
  url: z.string().min(1),
  mediatype: z.enum(['structured-text', 'plain-text', 'styled-terminal-text']),
  rawMediatype: z.string(),
  rawBytes: z.string(),
  renderedText: z.string(),
  maxPreformattedColumns: z.number().int().min(-1),
  links: z.array(z.string()),
  lastRenderedWidth: z.number().int().nonnegative(),
  createdAt: z.number().nonnegative().optional()
});

export const rendererMessageSchema: z.ZodType<RendererIncomingMessage> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('hello'), rendererId: z.string().min(1), version: z.string(), ts: z.number() }),
  z.object({ type: z.literal('document'), requestId: z.string(), document: wireDocumentSchema, ts: z.number() }),
  z.object({ type: z.literal('navigation_failed'), requestId: z.string(), reason: z.string().optional(), ts: z.number() }),
  z.object({
    type: z.literal('reflow_result'),
    requestId: z.string(),
    ok: z.boolean(),
    renderedText: z.string().optional(),
    maxPreformattedColumns: z.number().int().min(-1).optional(),
    error: z.string().optional(),
    ts: z.number()
  })
]);

export type ParseResult = { ok: true; msg: RendererIncomingMessage } | { ok: false; reason: string };

export function parseRendererEvent(raw: string): ParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'invalid json' };
  }
  const parsed = rendererMessageSchema.safeParse(data);
  if (!parsed.success) return { ok: false, reason: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  return { ok: true, msg: parsed.data };
}

export function validateHello(msg: RendererIncomingMessage): { ok: true; hello: HelloMessage } | { ok: false; reason: string } {
  if (msg.type !== 'hello') return { ok: false, reason: 'first message must be hello' };
  return { ok: true, hello: msg };
}

/** A received document; an absent createdAt becomes the arrival time, an explicit 0 is kept. */
export function toTextDocument(wire: WireDocument, receivedAt: number): TextDocument {
  return createDocument({ ...wire, createdAt: wire.createdAt ?? receivedAt });
}
