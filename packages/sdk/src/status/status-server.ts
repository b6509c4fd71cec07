/**
 * Receiver Status API
 *
 * Read-only HTTP view of a running receiver:
 *   GET /health  -> { status: 'ok' }
 *   GET /status  -> ReceiverStatus
 */

import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import express, { Router, type Express, type NextFunction, type Request, type Response } from 'express';
import { FilewireError, createLogger, type Logger } from '@filewire/core';
import type { ReceiverStatus } from '../receiver/receiver-server.js';

export interface StatusSource {
  getStatus(): ReceiverStatus;
}

export interface StatusServerConfig {
  port?: number;
  host?: string;
  logger?: Logger;
}

/**
 * Router serving the status endpoints; mount it on an existing app to
 * expose a receiver under a prefix.
 *
 * @example
 * ```typescript
 * app.use('/filewire', statusRouter(receiver));
 * ```
 */
export function statusRouter(source: StatusSource): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  router.get('/status', (_req, res) => {
    res.json(source.getStatus());
  });

  return router;
}

export function createStatusApp(source: StatusSource, logger: Logger): Express {
  const app = express();
  app.use(statusRouter(source));

  app.use((req, res) => {
    res.status(404).json({
      error: `Not found: ${req.method} ${req.path}`,
      hint: 'Available endpoints: GET /health, GET /status',
    });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Status request failed:', error);
    if (error instanceof FilewireError) {
      res.status(500).json({
        error: error.message,
        code: error.code,
        hint: error.hint,
      });
    } else {
      res.status(500).json({
        error: error instanceof Error ? error.message : 'Internal error',
      });
    }
  });

  return app;
}

export class StatusServer {
  private server: Server | null = null;
  private readonly logger: Logger;
  private readonly port: number;
  private readonly host: string;

  constructor(private readonly source: StatusSource, config: StatusServerConfig = {}) {
    this.port = config.port ?? 0;
    this.host = config.host ?? '127.0.0.1';
    this.logger = config.logger ?? createLogger('Status');
  }

  get isRunning(): boolean {
    return this.server !== null;
  }

  get baseUrl(): string | null {
    const address = this.server?.address();
    if (!address || typeof address !== 'object') return null;
    return `http://${formatHost(address)}:${address.port}`;
  }

  async start(): Promise<string> {
    if (this.server) {
      throw new Error('Status server already started');
    }

    const server = createServer(createStatusApp(this.source, this.logger));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    this.server = server;

    const url = this.baseUrl ?? `http://${this.host}:${this.port}`;
    this.logger.info(`Status API listening on ${url}`);
    return url;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
    this.logger.info('Status API stopped');
  }
}

function formatHost(address: AddressInfo): string {
  return address.family === 'IPv6' ? `[${address.address}]` : address.address;
}
