/**
 * HTTP server lifecycle: created -> listening -> draining -> stopped
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { Socket } from 'net';
import type { Duplex } from 'stream';
import type { AssetTable } from '../assets/table.js';
import { ServerStateError, StartupError, errorMessage } from '../errors.js';
import { handleRequest, textResponse, type RouteResponse } from '../http/router.js';
import { silentLogger, type Logger } from '../logger.js';
import { noopTelemetry, notifyStarted, type TelemetrySink } from '../telemetry.js';

export const DEFAULT_PORT = 9090;
export const DEFAULT_GRACE_PERIOD_MS = 5000;

export type ServerState = 'created' | 'listening' | 'draining' | 'stopped';

export interface ServerOptions {
  /** 0 binds any free port */
  port?: number;
  /** Interface to bind; all interfaces when omitted */
  host?: string;
  /** Consecutive ports to try when the requested one is busy */
  portAttempts?: number;
  gracePeriodMs?: number;
  /** Aborting this starts a graceful shutdown */
  signal?: AbortSignal;
  telemetry?: TelemetrySink;
  logger?: Logger;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class WebViewerServer {
  /** Resolves once the server reaches `stopped`, whatever the cause */
  readonly stopped: Promise<void>;

  private currentState: ServerState = 'created';
  private starting = false;
  private boundPort: number | undefined;
  private markStopped: () => void = () => {};
  private readonly server: Server;
  private readonly sockets = new Set<Socket>();
  private readonly requestedPort: number;
  private readonly host: string | undefined;
  private readonly portAttempts: number;
  private readonly gracePeriodMs: number;
  private readonly signal: AbortSignal | undefined;
  private readonly telemetry: TelemetrySink;
  private readonly log: Logger;

  constructor(private readonly assets: AssetTable, options: ServerOptions = {}) {
    this.requestedPort = options.port ?? DEFAULT_PORT;
    this.host = options.host;
    this.portAttempts = Math.max(1, options.portAttempts ?? 1);
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.signal = options.signal;
    this.telemetry = options.telemetry ?? noopTelemetry;
    this.log = options.logger ?? silentLogger;

    this.stopped = new Promise((resolve) => {
      this.markStopped = resolve;
    });

    this.server = createServer((req, res) => this.handle(req, res));
    this.server.on('connection', (socket: Socket) => {
      this.sockets.add(socket);
      socket.once('close', () => this.sockets.delete(socket));
    });
    this.server.on('clientError', (error: Error, socket: Duplex) => {
      this.handleClientError(error, socket);
    });
  }

  get state(): ServerState {
    return this.currentState;
  }

  /** The bound port, once listening */
  get port(): number | undefined {
    return this.boundPort;
  }

  get url(): string | undefined {
    return this.boundPort === undefined ? undefined : `http://localhost:${this.boundPort}`;
  }

  /**
   * Bind and start accepting connections. Resolves with the bound port.
   */
  async start(): Promise<number> {
    if (this.currentState !== 'created') {
      throw new ServerStateError(`Cannot start a server that is ${this.currentState}`);
    }
    if (this.starting) {
      throw new ServerStateError('Server is already starting');
    }
    if (this.signal?.aborted) {
      this.finish();
      throw new ServerStateError('Shutdown was requested before the server started');
    }

    // Port 0 never collides, so there is nothing to fall back from
    const attempts = this.requestedPort === 0 ? 1 : this.portAttempts;
    let port = this.requestedPort;

    this.starting = true;
    try {
      for (let attempt = 1; ; attempt++) {
        try {
          await this.listen(port);
          break;
        } catch (error) {
          const inUse = isErrnoException(error) && error.code === 'EADDRINUSE';
          if (inUse && attempt < attempts && port < 65535) {
            this.log.info(`Port ${port} is busy, trying ${port + 1}...`);
            port++;
            continue;
          }
          this.finish();
          throw inUse
            ? new StartupError('ADDRESS_IN_USE', `Port ${port} is already in use`, { cause: error })
            : new StartupError('BIND_FAILED', `Could not listen on port ${port}: ${errorMessage(error)}`, { cause: error });
        }
      }
    } finally {
      this.starting = false;
    }

    if (this.currentState !== 'created') {
      // stop() was called while binding
      this.server.close();
      throw new ServerStateError('Server was stopped while starting');
    }

    const address = this.server.address();
    this.boundPort = address !== null && typeof address === 'object' ? address.port : port;
    this.currentState = 'listening';
    this.server.on('error', (error: Error) => this.log.error(`Server error: ${error.message}`));

    if (this.signal) {
      this.signal.addEventListener('abort', this.onAbort, { once: true });
      if (this.signal.aborted) {
        this.onAbort();
      }
    }

    notifyStarted(this.telemetry, this.boundPort, this.log);
    return this.boundPort;
  }

  /**
   * Stop accepting connections and wait for in-flight responses, up to the
   * grace period. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (this.currentState === 'created') {
      this.finish();
    }
    if (this.currentState !== 'listening') {
      return this.stopped;
    }

    this.currentState = 'draining';
    this.signal?.removeEventListener('abort', this.onAbort);

    const timer = setTimeout(() => {
      if (this.sockets.size === 0) return;
      this.log.warn(`Grace period of ${this.gracePeriodMs}ms elapsed, closing ${this.sockets.size} open connection(s)`);
      for (const socket of this.sockets) {
        socket.destroy();
      }
    }, this.gracePeriodMs);

    this.server.close(() => {
      clearTimeout(timer);
      this.finish();
    });
    this.server.closeIdleConnections();

    return this.stopped;
  }

  private readonly onAbort = (): void => {
    this.log.info('Shutting down...');
    void this.stop();
  };

  private finish(): void {
    this.currentState = 'stopped';
    this.markStopped();
  }

  private listen(port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        this.server.off('listening', onListening);
        reject(error);
      };
      const onListening = () => {
        this.server.off('error', onError);
        resolve();
      };
      this.server.once('error', onError);
      this.server.once('listening', onListening);
      this.server.listen(port, this.host);
    });
  }

  private handle(req: IncomingMessage, res: ServerResponse): void {
    let response: RouteResponse;
    try {
      response = handleRequest(this.assets, {
        method: req.method ?? 'GET',
        url: req.url ?? '/',
        range: req.headers.range,
      });
    } catch (error) {
      this.log.error(`Failed to handle ${req.method} ${req.url}: ${errorMessage(error)}`);
      response = textResponse(500, 'Internal Server Error', req.method === 'HEAD');
    }

    res.once('close', () => {
      if (!res.writableFinished) {
        this.log.info(`Client closed connection before ${req.url} was fully sent`);
      }
      if (this.currentState === 'draining') {
        // Let the socket settle back to idle before closing it
        setImmediate(() => this.server.closeIdleConnections());
      }
    });

    if (this.currentState !== 'listening') {
      res.setHeader('Connection', 'close');
    }

    try {
      res.writeHead(response.status, response.headers);
      res.end(response.body);
    } catch (error) {
      this.log.error(`Failed to write response for ${req.url}: ${errorMessage(error)}`);
      res.destroy();
    }
  }

  private handleClientError(error: Error, socket: Duplex): void {
    if ((isErrnoException(error) && error.code === 'ECONNRESET') || !socket.writable) {
      this.log.info(`Connection closed: ${error.message}`);
      socket.destroy();
      return;
    }
    this.log.error(`Malformed request: ${error.message}`);
    socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\nContent-Length: 0\r\n\r\n');
  }
}
