/**
 * Maps a request onto the asset table and describes the response.
 * Pure: no I/O, nothing copied out of the table.
 */

import type { AssetTable } from '../assets/table.js';
import { cacheControlFor } from '../assets/web-assets.js';
import { contentRange, resolveRange } from './range.js';

export const ALLOWED_METHODS = ['GET', 'HEAD'] as const;

export interface RouteRequest {
  method: string;
  /** Raw request target, e.g. `/re_viewer_bg.wasm?v=2` */
  url: string;
  range?: string;
}

export type ResponseHeaders = Record<string, string | number>;

export interface RouteResponse {
  status: number;
  headers: ResponseHeaders;
  body?: Buffer;
}

export type NormalizedPath =
  | { ok: true; path: string }
  | { ok: false };

/**
 * Strip query and fragment, percent-decode, and collapse an all-slash
 * path to the root.
 */
export function normalizePath(url: string): NormalizedPath {
  const rawPath = url.split(/[?#]/, 1)[0] ?? '';

  let path: string;
  try {
    path = decodeURIComponent(rawPath);
  } catch {
    return { ok: false };
  }

  if (/^\/*$/.test(path)) {
    path = '/';
  }

  return { ok: true, path };
}

export function textResponse(status: number, text: string, isHead: boolean, extra: ResponseHeaders = {}): RouteResponse {
  const body = Buffer.from(text, 'utf-8');
  return {
    status,
    headers: {
      'Content-Type': 'text/plain; charset=utf-8',
      'Content-Length': body.length,
      ...extra,
    },
    body: isHead ? undefined : body,
  };
}

export function handleRequest(table: AssetTable, request: RouteRequest): RouteResponse {
  const method = request.method.toUpperCase();
  const isHead = method === 'HEAD';

  const normalized = normalizePath(request.url);
  if (!normalized.ok) {
    return textResponse(400, 'Bad Request', isHead);
  }

  const asset = table.lookup(normalized.path);
  if (!asset) {
    return textResponse(404, 'Not Found', isHead);
  }

  if (method !== 'GET' && !isHead) {
    return textResponse(405, 'Method Not Allowed', false, { 'Allow': ALLOWED_METHODS.join(', ') });
  }

  const total = asset.content.length;
  const headers: ResponseHeaders = {
    'Content-Type': asset.contentType,
    'Accept-Ranges': 'bytes',
    'Cache-Control': cacheControlFor(asset.cachePolicy),
  };

  const outcome = resolveRange(request.range, total);
  const range = contentRange(outcome, total);
  if (range !== undefined) {
    headers['Content-Range'] = range;
  }

  switch (outcome.kind) {
    case 'full':
      headers['Content-Length'] = total;
      return { status: 200, headers, body: isHead ? undefined : asset.content };

    case 'partial': {
      const body = asset.content.subarray(outcome.start, outcome.end + 1);
      headers['Content-Length'] = body.length;
      return { status: 206, headers, body: isHead ? undefined : body };
    }

    case 'unsatisfiable':
      headers['Content-Length'] = 0;
      return { status: 416, headers };
  }
}
