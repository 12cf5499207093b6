/**
 * Console logging, stderr only so stdout stays free for the URL
 */

export interface Logger {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface LoggerOptions {
  quiet?: boolean;
}

const noop = () => {};

export function createLogger(options: LoggerOptions = {}): Logger {
  return {
    info: options.quiet ? noop : console.error.bind(console),
    warn: console.error.bind(console, 'Warning:'),
    error: console.error.bind(console, 'Error:'),
  };
}

export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
};
