/**
 * CLI Serve Command - host the web viewer assets over HTTP
 */

import { resolve } from 'path';
import { loadAssetTable } from '../src/assets/table.js';
import { ConfigError, errorMessage } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import { DEFAULT_GRACE_PERIOD_MS, DEFAULT_PORT, WebViewerServer } from '../src/server/server.js';

export const DEFAULT_ASSETS_DIR = 'web_viewer';

export interface ServeOptions {
  port?: string;
  host?: string;
  assetsDir?: string;
  portAttempts?: string;
  grace?: string;
  quiet?: boolean;
}

export interface ServeConfig {
  port: number;
  host: string | undefined;
  assetsDir: string;
  portAttempts: number;
  gracePeriodMs: number;
  quiet: boolean;
}

type Env = Record<string, string | undefined>;

function parseInteger(value: string, name: string, min: number, max: number): number {
  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(`Invalid ${name}: ${value} (expected an integer from ${min} to ${max})`);
  }
  return parsed;
}

/**
 * Merge command-line flags, environment variables and defaults, in that
 * order of precedence.
 */
export function resolveServeConfig(options: ServeOptions, env: Env = process.env): ServeConfig {
  const port = options.port ?? env.WEB_VIEWER_PORT;
  const grace = options.grace ?? env.WEB_VIEWER_GRACE_MS;
  const host = options.host ?? env.WEB_VIEWER_HOST;

  return {
    port: port === undefined ? DEFAULT_PORT : parseInteger(port, 'port', 0, 65535),
    host: host === undefined || host === '' ? undefined : host,
    assetsDir: resolve(options.assetsDir ?? env.WEB_VIEWER_ASSETS_DIR ?? DEFAULT_ASSETS_DIR),
    portAttempts: options.portAttempts === undefined ? 1 : parseInteger(options.portAttempts, 'port attempts', 1, 100),
    gracePeriodMs: grace === undefined ? DEFAULT_GRACE_PERIOD_MS : parseInteger(grace, 'grace period', 0, 600_000),
    quiet: options.quiet ?? false,
  };
}

/**
 * Serve command handler
 */
export async function serveCommand(options: ServeOptions): Promise<void> {
  try {
    const config = resolveServeConfig(options);
    const log = createLogger({ quiet: config.quiet });

    const assets = await loadAssetTable(config.assetsDir);
    log.info(`Loaded ${assets.size} assets from ${config.assetsDir}`);

    const shutdown = new AbortController();
    const onSignal = () => shutdown.abort();
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    const server = new WebViewerServer(assets, {
      port: config.port,
      host: config.host,
      portAttempts: config.portAttempts,
      gracePeriodMs: config.gracePeriodMs,
      signal: shutdown.signal,
      logger: log,
    });

    try {
      await server.start();

      if (!config.quiet) {
        console.log(`
Hosting web viewer at:

  ${server.url}

Press Ctrl+C to stop the server.
`);
      } else {
        console.log(server.url);
      }

      await server.stopped;
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
  } catch (error) {
    console.error('Error:', errorMessage(error));
    process.exit(1);
  }
}
