export { AssetTable, loadAssetTable, hasParentSegment, type Asset, type AssetEntry } from './assets/table.js';
export { WEB_VIEWER_ASSETS, getMimeType, cacheControlFor, type AssetSpec, type CachePolicy } from './assets/web-assets.js';
export { resolveRange, contentRange, type RangeOutcome } from './http/range.js';
export {
  handleRequest,
  normalizePath,
  ALLOWED_METHODS,
  type RouteRequest,
  type RouteResponse,
  type ResponseHeaders,
} from './http/router.js';
export {
  WebViewerServer,
  DEFAULT_PORT,
  DEFAULT_GRACE_PERIOD_MS,
  type ServerOptions,
  type ServerState,
} from './server/server.js';
export { noopTelemetry, notifyStarted, type TelemetrySink } from './telemetry.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';
export { StartupError, ConfigError, ServerStateError, type StartupErrorCode } from './errors.js';
