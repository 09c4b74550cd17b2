import { createServer, IncomingMessage, ServerResponse } from 'http';
import type { Receptionist } from './Receptionist.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { InvalidEnvelopeError } from '../domain/errors/InvalidEnvelopeError.js';
import { UnknownIntentError } from '../domain/errors/UnknownIntentError.js';

export interface HttpServerConfig {
  port: number;
  host?: string;
}

class InvalidJsonError extends Error {
  readonly name = 'InvalidJsonError';
}

/**
 * HTTP surface the hosting platform posts turns to
 */
export class HttpServer {
  private server: ReturnType<typeof createServer> | null = null;
  private readonly startTime: number = Date.now();

  constructor(
    private readonly receptionist: Receptionist,
    private readonly logger: ILogger,
    private readonly config: HttpServerConfig
  ) {}

  /**
   * Port actually bound (useful when configured with port 0)
   */
  get port(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  /**
   * Start the HTTP server
   */
  start(): Promise<void> {
    return new Promise((resolve) => {
      this.server = createServer((req, res) => {
        this.handleRequest(req, res).catch((error) => {
          this.logger.error('Unhandled HTTP error', error);
        });
      });

      this.server.listen(this.config.port, this.config.host ?? '0.0.0.0', () => {
        this.logger.info('HTTP Server started', {
          port: this.port,
          host: this.config.host ?? '0.0.0.0',
        });
        resolve();
      });
    });
  }

  /**
   * Stop the HTTP server
   */
  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.server) {
        this.server.close(() => {
          this.logger.info('HTTP Server stopped');
          this.server = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;
    const method = req.method ?? 'GET';

    this.logger.debug('HTTP Request', { method, path });

    try {
      if (path === '/health' && method === 'GET') {
        return this.handleHealth(res);
      }

      if (path === '/api/turn' && method === 'POST') {
        return await this.handleTurn(req, res);
      }

      return this.sendJson(res, 404, { error: 'Not Found', path });
    } catch (error) {
      if (
        error instanceof UnknownIntentError ||
        error instanceof InvalidEnvelopeError ||
        error instanceof InvalidJsonError
      ) {
        this.logger.warn('Rejected turn', { error: error.name, message: error.message });
        return this.sendJson(res, 400, { error: error.name, message: error.message });
      }

      this.logger.error('HTTP Request error', error);
      return this.sendJson(res, 500, {
        error: 'Internal Server Error',
        message: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  private handleHealth(res: ServerResponse): void {
    this.sendJson(res, 200, {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      activeSessions: this.receptionist.activeSessions,
      directoryNames: this.receptionist.directoryNames,
    });
  }

  private async handleTurn(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.parseBody(req);
    const output = this.receptionist.handle(body);
    this.sendJson(res, 200, { output });
  }

  private parseBody(req: IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
      let body = '';
      req.on('data', (chunk) => {
        body += chunk.toString();
      });
      req.on('end', () => {
        try {
          resolve(body ? JSON.parse(body) : {});
        } catch {
          reject(new InvalidJsonError('Invalid JSON body'));
        }
      });
      req.on('error', reject);
    });
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }
}
