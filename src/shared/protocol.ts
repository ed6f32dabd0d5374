import type { Mediatype } from '../server/types.js';

export interface HelloMessage { type: 'hello'; rendererId: string; version: string; ts: number; }

export interface WireDocument {
  url: string;
  mediatype: Mediatype;
  rawMediatype: string;
  rawBytes: string;
  renderedText: string;
  maxPreformattedColumns: number;
  links: string[];
  lastRenderedWidth: number;
  /** Fetch time in epoch ms. Absent means the arrival time; send 0 for a document that never goes stale. */
  createdAt?: number;
}

export interface DocumentMessage {
  type: 'document';
  requestId: string;
  document: WireDocument;
  ts: number;
}

export interface NavigationFailedMessage {
  type: 'navigation_failed';
  requestId: string;
  reason?: string;
  ts: number;
}

export interface ReflowResultMessage {
  type: 'reflow_result';
  requestId: string;
  ok: boolean;
  renderedText?: string;
  maxPreformattedColumns?: number;
  error?: string;
  ts: number;
}

export type RendererIncomingMessage = HelloMessage | DocumentMessage | NavigationFailedMessage | ReflowResultMessage;

export interface LoadRequest { type: 'load'; requestId: string; url: string; ts: number; }

export interface FollowLinkRequest {
  type: 'follow_link';
  requestId: string;
  baseUrl: string;
  relativeUrl: string;
  ts: number;
}

export interface ReflowRequest {
  type: 'reflow';
  requestId: string;
  url: string;
  mediatype: Mediatype;
  rawBytes: string;
  width: number;
  ts: number;
}

export type RendererOutgoingMessage = LoadRequest | FollowLinkRequest | ReflowRequest;
