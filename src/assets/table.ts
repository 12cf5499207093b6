import { readFile } from 'fs/promises';
import { join } from 'path';
import { StartupError } from '../errors.js';
import { WEB_VIEWER_ASSETS, getMimeType, type AssetSpec, type CachePolicy } from './web-assets.js';

export interface Asset {
  readonly path: string;
  readonly content: Buffer;
  readonly contentType: string;
  readonly cachePolicy: CachePolicy;
}

export interface AssetEntry {
  path: string;
  content: Uint8Array | string;
  /** Defaults to a lookup on the path's extension */
  contentType?: string;
  cachePolicy?: CachePolicy;
}

/**
 * True if any segment of the path is `..`
 */
export function hasParentSegment(path: string): boolean {
  return path.split(/[/\\]/).includes('..');
}

/**
 * Immutable URL path -> asset mapping, shared by every request handler.
 * Entries are copied on construction so callers keep no handle on the bytes.
 */
export class AssetTable {
  private readonly assets: ReadonlyMap<string, Asset>;

  constructor(entries: Iterable<AssetEntry>) {
    const assets = new Map<string, Asset>();
    for (const entry of entries) {
      if (assets.has(entry.path)) {
        throw new Error(`Duplicate asset path: ${entry.path}`);
      }
      assets.set(entry.path, Object.freeze({
        path: entry.path,
        content: typeof entry.content === 'string'
          ? Buffer.from(entry.content, 'utf-8')
          : Buffer.from(entry.content),
        contentType: entry.contentType ?? getMimeType(entry.path),
        cachePolicy: entry.cachePolicy ?? 'revalidate',
      }));
    }
    this.assets = assets;
  }

  /**
   * Exact-match lookup on a normalized path. Paths with parent segments
   * never match.
   */
  lookup(path: string): Asset | undefined {
    if (hasParentSegment(path)) {
      return undefined;
    }
    return this.assets.get(path);
  }

  get paths(): string[] {
    return [...this.assets.keys()];
  }

  get size(): number {
    return this.assets.size;
  }
}

/**
 * Read every asset of the manifest from `dir`. Any missing or unreadable
 * file is fatal.
 */
export async function loadAssetTable(
  dir: string,
  specs: readonly AssetSpec[] = WEB_VIEWER_ASSETS
): Promise<AssetTable> {
  const entries = await Promise.all(specs.map(async (spec): Promise<AssetEntry> => {
    const file = join(dir, spec.file);
    let content: Buffer;
    try {
      content = await readFile(file);
    } catch (error) {
      throw new StartupError('ASSET_MISSING', `Web viewer asset not found: ${file}`, { cause: error });
    }
    return {
      path: spec.path,
      content,
      contentType: getMimeType(spec.file),
      cachePolicy: spec.cachePolicy,
    };
  }));
  return new AssetTable(entries);
}
