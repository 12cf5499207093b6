/**
 * The fixed set of files produced by the web viewer build
 */

export type CachePolicy = 'cacheable' | 'revalidate';

export interface AssetSpec {
  /** URL path the asset is served under */
  path: string;
  /** File name inside the assets directory */
  file: string;
  cachePolicy: CachePolicy;
}

export const WEB_VIEWER_ASSETS: readonly AssetSpec[] = [
  { path: '/', file: 'index.html', cachePolicy: 'revalidate' },
  { path: '/favicon.svg', file: 'favicon.svg', cachePolicy: 'cacheable' },
  { path: '/sw.js', file: 'sw.js', cachePolicy: 'revalidate' },
  { path: '/re_viewer.js', file: 're_viewer.js', cachePolicy: 'revalidate' },
  { path: '/re_viewer_bg.wasm', file: 're_viewer_bg.wasm', cachePolicy: 'revalidate' },
  { path: '/re_viewer_debug.js', file: 're_viewer_debug.js', cachePolicy: 'revalidate' },
  { path: '/re_viewer_debug_bg.wasm', file: 're_viewer_debug_bg.wasm', cachePolicy: 'revalidate' },
];

// MIME type lookup
export function getMimeType(path: string): string {
  const ext = path.split('.').pop()?.toLowerCase() || '';
  const mimeTypes: Record<string, string> = {
    'html': 'text/html; charset=utf-8',
    'js': 'text/javascript; charset=utf-8',
    'wasm': 'application/wasm',
    'svg': 'image/svg+xml',
  };
  return mimeTypes[ext] || 'application/octet-stream';
}

export function cacheControlFor(policy: CachePolicy): string {
  return policy === 'cacheable' ? 'public, max-age=3600' : 'no-cache';
}
