/**
 * Receiver Server
 *
 * Accepts TCP connections and serves them strictly one at a time: each
 * accepted socket is chained onto a promise queue and stays paused until
 * the transfers ahead of it have finished. A failed transfer is logged and
 * recorded; the server keeps accepting.
 */

import { EventEmitter } from 'node:events';
import * as net from 'node:net';
import {
  FilewireError,
  ShutdownStateMachine,
  createLogger,
  describeError,
  generateTransferId,
  type Clock,
  type ErrorCode,
  type Logger,
  type TransferFileSystem,
  type TransferHooks,
  type TransferKind,
  type TransferResult,
  type TransferStartedInfo,
} from '@filewire/core';
import {
  NodeFileSystem,
  SocketConnection,
  dispatchAndReceive,
} from '@filewire/transport-tcp';
import { resolveReceiverConfig, type ReceiverConfig, type ResolvedReceiverConfig } from '../config.js';

// ========== Status Types ==========

export interface ActiveTransfer {
  transferId: string;
  remote: string;
  kind?: TransferKind;
  name?: string;
  bytesTransferred: number;
  totalBytes: number;
  totalFiles: number;
  speed: number;
  startedAt: string;
}

export interface TransferRecord {
  transferId: string;
  remote: string;
  kind?: TransferKind;
  name?: string;
  bytes: number;
  files: number;
  outcome: 'completed' | 'failed';
  error?: { code?: ErrorCode; message: string; hint?: string };
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface ReceiverStatus {
  listening: boolean;
  address: string | null;
  receiveDir: string;
  active: ActiveTransfer | null;
  completed: number;
  failed: number;
  queued: number;
  /** Most recent first */
  history: TransferRecord[];
}

/**
 * Events emitted by ReceiverServer
 */
export interface ReceiverServerEvents {
  'transfer:started': (info: TransferStartedInfo) => void;
  'transfer:completed': (result: TransferResult) => void;
  'transfer:failed': (transferId: string, error: Error) => void;
  'stopped': () => void;
}

export interface ReceiverServerOptions {
  config?: ReceiverConfig;
  fs?: TransferFileSystem;
  logger?: Logger;
  shutdown?: ShutdownStateMachine;
  /** Forwarded to every transfer, e.g. for a progress renderer */
  hooks?: TransferHooks;
  clock?: Clock;
}

export class ReceiverServer extends EventEmitter {
  readonly config: ResolvedReceiverConfig;
  readonly shutdown: ShutdownStateMachine;
  private readonly fs: TransferFileSystem;
  private readonly logger: Logger;
  private readonly hooks: TransferHooks;
  private readonly clock?: Clock;

  private server: net.Server | null = null;
  private queue: Promise<void> = Promise.resolve();
  private queued = new Set<net.Socket>();
  private activeSocket: net.Socket | null = null;
  private active: ActiveTransfer | null = null;
  private history: TransferRecord[] = [];
  private completedCount = 0;
  private failedCount = 0;
  private stopping = false;
  private closing: Promise<void> | null = null;

  constructor(options: ReceiverServerOptions = {}) {
    super();
    this.config = resolveReceiverConfig(options.config);
    this.shutdown = options.shutdown ?? new ShutdownStateMachine();
    this.fs = options.fs ?? new NodeFileSystem();
    this.logger = options.logger ?? createLogger('Receiver', { level: this.config.logLevel });
    this.hooks = options.hooks ?? {};
    this.clock = options.clock;
  }

  get isRunning(): boolean {
    return this.server !== null && !this.stopping;
  }

  /** Bound address, `null` until started */
  get address(): net.AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  get isBusy(): boolean {
    return this.activeSocket !== null;
  }

  async start(): Promise<void> {
    if (this.server) {
      throw new Error('Receiver already started');
    }

    const server = net.createServer({ pauseOnConnect: true }, (socket) => this.enqueue(socket));

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (err) => this.logger.error(`Server error: ${err.message}`));

    this.server = server;
    this.logger.info(`Listening on port ${this.address?.port ?? this.config.port}...`);
    this.logger.info(`Saving received files under ${this.config.receiveDir}`);
  }

  /**
   * Stop accepting, drop queued connections and wait for the listener to
   * close. The active transfer, if any, is left to finish.
   */
  stop(): Promise<void> {
    this.closing ??= this.close();
    return this.closing;
  }

  /**
   * Feed one interrupt into the shutdown state machine.
   *
   * Idle: stop right away. Busy, first interrupt: let the transfer finish,
   * then stop. Busy, second interrupt: abort the transfer and stop.
   */
  handleInterrupt(): void {
    this.shutdown.signal();
    const state = this.shutdown.getState();

    if (!this.isBusy) {
      this.logger.info('Shutting down...');
    } else if (state === 'forced') {
      this.logger.warn('Forced exit! Closing server.');
      this.activeSocket?.destroy();
    } else {
      this.logger.warn('Waiting for current transfer to complete...');
      return;
    }
    this.stop().catch((err: unknown) => this.logger.error(`Stop failed: ${describeError(err)}`));
  }

  getStatus(): ReceiverStatus {
    const address = this.address;
    return {
      listening: this.isRunning,
      address: address ? `${address.address}:${address.port}` : null,
      receiveDir: this.config.receiveDir,
      active: this.active ? { ...this.active } : null,
      completed: this.completedCount,
      failed: this.failedCount,
      queued: this.queued.size,
      history: [...this.history],
    };
  }

  // ========== Connection Queue ==========

  private enqueue(socket: net.Socket): void {
    if (this.stopping) {
      socket.destroy();
      return;
    }

    const onQueuedError = (err: Error) => {
      this.logger.debug(`Queued connection failed: ${err.message}`);
    };
    socket.on('error', onQueuedError);
    this.queued.add(socket);

    this.queue = this.queue.then(() => {
      socket.off('error', onQueuedError);
      this.queued.delete(socket);
      return this.serve(socket);
    });
  }

  /** Never rejects; every failure is recorded on the transfer */
  private async serve(socket: net.Socket): Promise<void> {
    if (this.stopping || socket.destroyed) {
      socket.destroy();
      return;
    }

    const transferId = generateTransferId();
    const remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    const startedAt = Date.now();
    this.logger.info(`Connection established from ${remote}`);

    const conn = new SocketConnection(socket, { remoteLabel: remote });
    const active: ActiveTransfer = {
      transferId,
      remote,
      bytesTransferred: 0,
      totalBytes: 0,
      totalFiles: 0,
      speed: 0,
      startedAt: new Date(startedAt).toISOString(),
    };
    this.activeSocket = socket;
    this.active = active;

    try {
      const result = await dispatchAndReceive(conn, {
        fs: this.fs,
        baseDir: this.config.receiveDir,
        shutdown: this.shutdown,
        hooks: this.trackingHooks(),
        logger: this.logger,
        clock: this.clock,
        transferId,
      });
      this.completedCount++;
      this.record(active, startedAt, {
        outcome: 'completed',
        bytes: result.bytes,
        files: result.kind === 'directory' || result.kind === 'target-directory' ? result.files : 1,
      });
      this.logger.info('Transfer completed. Waiting for next connection...');
      this.logger.info('-'.repeat(50));
      this.emit('transfer:completed', result);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.failedCount++;
      this.record(active, startedAt, {
        outcome: 'failed',
        bytes: active.bytesTransferred,
        files: 0,
        error: err instanceof FilewireError ? err.toErrorMessage() : { message: err.message },
      });
      this.logger.error(`Transfer ${transferId} from ${remote} failed: ${err.message}`);
      this.emit('transfer:failed', transferId, err);
    } finally {
      this.active = null;
      this.activeSocket = null;
      await conn.close().catch((err: unknown) => {
        this.logger.debug(`Closing ${remote} failed: ${describeError(err)}`);
      });
    }

    if (this.shutdown.isRequested()) {
      this.stop().catch((err: unknown) => this.logger.error(`Stop failed: ${describeError(err)}`));
    }
  }

  private trackingHooks(): TransferHooks {
    const outer = this.hooks;
    return {
      ...outer,
      onTransferStarted: (info) => {
        if (this.active) {
          this.active.kind = info.kind;
          this.active.name = info.name;
          this.active.totalBytes = info.totalBytes;
          this.active.totalFiles = info.totalFiles;
        }
        outer.onTransferStarted?.(info);
        this.emit('transfer:started', info);
      },
      onProgress: (progress) => {
        if (this.active) {
          this.active.bytesTransferred = progress.bytesTransferred;
          this.active.speed = progress.speed;
        }
        outer.onProgress?.(progress);
      },
    };
  }

  private record(
    active: ActiveTransfer,
    startedAt: number,
    outcome: Pick<TransferRecord, 'outcome' | 'bytes' | 'files' | 'error'>,
  ): void {
    const finishedAt = Date.now();
    this.history.unshift({
      transferId: active.transferId,
      remote: active.remote,
      kind: active.kind,
      name: active.name,
      ...outcome,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      durationMs: finishedAt - startedAt,
    });
    if (this.history.length > this.config.historyLimit) {
      this.history.length = this.config.historyLimit;
    }
  }

  private async close(): Promise<void> {
    this.stopping = true;
    for (const socket of this.queued) {
      socket.destroy();
    }

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }
    this.logger.info('Receiver stopped');
    this.emit('stopped');
  }
}
