/**
 * Error types for the web viewer server
 */

export type StartupErrorCode = 'ADDRESS_IN_USE' | 'BIND_FAILED' | 'ASSET_MISSING';

/**
 * Fatal error raised before any connection is accepted.
 * The server never reaches the listening state after one of these.
 */
export class StartupError extends Error {
  readonly code: StartupErrorCode;

  constructor(code: StartupErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
    this.code = code;
  }
}

/** Invalid command-line or environment configuration. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Lifecycle misuse, e.g. starting a server twice. */
export class ServerStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServerStateError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
