import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';

/**
 * Outward notification that the server is up. Implementations may send
 * the event anywhere; serving never depends on the outcome.
 */
export interface TelemetrySink {
  notifyStarted(port: number): void | Promise<void>;
}

export const noopTelemetry: TelemetrySink = {
  notifyStarted() {},
};

/**
 * Fire the started notification without waiting on it.
 * Both thrown errors and rejected promises end up as warnings.
 */
export function notifyStarted(sink: TelemetrySink, port: number, log: Logger): void {
  const report = (error: unknown) => log.warn(`telemetry notification failed: ${errorMessage(error)}`);
  try {
    const result = sink.notifyStarted(port);
    if (result instanceof Promise) {
      void result.catch(report);
    }
  } catch (error) {
    report(error);
  }
}
