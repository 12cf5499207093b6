import http from 'http';
import { AssetTable, type AssetEntry } from '../src/index.js';

export const INDEX_HTML = '<!DOCTYPE html><html><head><title>Viewer</title></head><body></body></html>';
export const SW_JS = "self.addEventListener('fetch', () => {});";
export const VIEWER_JS = 'export default function init() {}';
export const DEBUG_JS = 'export default function init() { console.debug("debug"); }';
export const FAVICON_SVG = '<svg xmlns="http://www.w3.org/2000/svg"></svg>';

/** Deterministic bytes that differ at every offset within a 251-byte cycle */
export function patternBytes(length: number, seed = 0): Buffer {
  const bytes = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    bytes[i] = (i + seed) % 251;
  }
  return bytes;
}

export const WASM = patternBytes(1000);
export const DEBUG_WASM = patternBytes(1500, 17);

export function viewerEntries(overrides: Partial<Record<string, Uint8Array | string>> = {}): AssetEntry[] {
  const content = (path: string, fallback: Uint8Array | string) => overrides[path] ?? fallback;
  return [
    { path: '/', content: content('/', INDEX_HTML), contentType: 'text/html; charset=utf-8' },
    { path: '/favicon.svg', content: content('/favicon.svg', FAVICON_SVG), cachePolicy: 'cacheable' },
    { path: '/sw.js', content: content('/sw.js', SW_JS) },
    { path: '/re_viewer.js', content: content('/re_viewer.js', VIEWER_JS) },
    { path: '/re_viewer_bg.wasm', content: content('/re_viewer_bg.wasm', WASM) },
    { path: '/re_viewer_debug.js', content: content('/re_viewer_debug.js', DEBUG_JS) },
    { path: '/re_viewer_debug_bg.wasm', content: content('/re_viewer_debug_bg.wasm', DEBUG_WASM) },
  ];
}

export function viewerTable(overrides: Partial<Record<string, Uint8Array | string>> = {}): AssetTable {
  return new AssetTable(viewerEntries(overrides));
}

export interface FetchResult {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
}

/**
 * One request on a fresh connection (no keep-alive agent)
 */
export function fetchFrom(
  port: number,
  path: string,
  options: { method?: string; headers?: http.OutgoingHttpHeaders } = {}
): Promise<FetchResult> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { host: '127.0.0.1', port, path, method: options.method ?? 'GET', headers: options.headers, agent: false },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () => {
          resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks) });
        });
        res.on('error', reject);
      }
    );
    req.on('error', reject);
    req.end();
  });
}
