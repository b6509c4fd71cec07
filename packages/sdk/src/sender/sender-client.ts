/**
 * Sender Client
 *
 * Opens one connection per send and picks the wire variant from the source
 * type and whether a target directory was given.
 */

import * as net from 'node:net';
import {
  ConnectionFailedError,
  SourceNotFoundError,
  createLogger,
  describeError,
  type Clock,
  type Logger,
  type ShutdownSignal,
  type TransferFileSystem,
  type TransferHooks,
  type TransferResult,
} from '@filewire/core';
import {
  NodeFileSystem,
  SocketConnection,
  sendDirectory,
  sendDirectoryWithTarget,
  sendFile,
  sendFileWithTarget,
  validateTargetDirectory,
  type TransferContext,
} from '@filewire/transport-tcp';
import { resolveSenderConfig, type ResolvedSenderConfig, type SenderConfig } from '../config.js';

export interface SendRequest {
  host: string;
  /** File or directory to send */
  source: string;
  targetDir?: string;
  /** Overrides the configured port */
  port?: number;
}

export interface SenderClientOptions {
  config?: SenderConfig;
  fs?: TransferFileSystem;
  logger?: Logger;
  shutdown?: ShutdownSignal;
  hooks?: TransferHooks;
  clock?: Clock;
}

export class SenderClient {
  readonly config: ResolvedSenderConfig;
  private readonly fs: TransferFileSystem;
  private readonly logger: Logger;

  constructor(private readonly options: SenderClientOptions = {}) {
    this.config = resolveSenderConfig(options.config);
    this.fs = options.fs ?? new NodeFileSystem();
    this.logger = options.logger ?? createLogger('Sender', { level: this.config.logLevel });
  }

  /**
   * @throws InvalidTargetDirectoryError or SourceNotFoundError before connecting
   * @throws ConnectionFailedError when the receiver cannot be reached
   */
  async send(request: SendRequest): Promise<TransferResult> {
    if (request.targetDir !== undefined) {
      validateTargetDirectory(request.targetDir);
    }

    let isDirectory: boolean;
    try {
      const stats = await this.fs.stat(request.source);
      if (!stats.isFile && !stats.isDirectory) {
        throw new SourceNotFoundError(request.source, 'not a file or directory');
      }
      isDirectory = stats.isDirectory;
    } catch (error) {
      if (error instanceof SourceNotFoundError) throw error;
      throw new SourceNotFoundError(request.source, describeError(error));
    }

    const port = request.port ?? this.config.port;
    const socket = await this.connect(request.host, port);
    const conn = new SocketConnection(socket, { remoteLabel: `${request.host}:${port}` });

    const ctx: TransferContext = {
      fs: this.fs,
      shutdown: this.options.shutdown,
      hooks: this.options.hooks,
      logger: this.logger,
      clock: this.options.clock,
    };

    try {
      this.logger.info(`Connected! Sending ${isDirectory ? 'directory' : 'file'}: ${request.source}`);
      const { targetDir } = request;
      if (isDirectory) {
        return targetDir === undefined
          ? await sendDirectory(conn, request.source, ctx)
          : await sendDirectoryWithTarget(conn, request.source, targetDir, ctx);
      }
      return targetDir === undefined
        ? await sendFile(conn, request.source, ctx)
        : await sendFileWithTarget(conn, request.source, targetDir, ctx);
    } finally {
      await conn.close().catch((err: unknown) => {
        this.logger.debug(`Closing connection failed: ${describeError(err)}`);
      });
      socket.destroy();
    }
  }

  private async connect(host: string, port: number): Promise<net.Socket> {
    this.logger.info(`Connecting to ${host}:${port}...`);

    const socket = await new Promise<net.Socket>((resolve, reject) => {
      const pending = net.connect({ host, port });
      const fail = (reason: string) => {
        pending.destroy();
        reject(new ConnectionFailedError(host, port, reason));
      };

      pending.setTimeout(this.config.connectTimeoutMs, () => {
        fail(`timed out after ${this.config.connectTimeoutMs}ms`);
      });
      pending.once('error', (err) => fail(err.message));
      pending.once('connect', () => {
        pending.setTimeout(0);
        pending.removeAllListeners('error');
        pending.removeAllListeners('timeout');
        resolve(pending);
      });
    });

    socket.setNoDelay(true);
    return socket;
  }
}
