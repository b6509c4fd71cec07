/**
 * Socket Connection
 *
 * `Connection` over any Node Duplex: a `net.Socket` in production, an
 * in-memory stream in tests. Reading starts on the first `recvAll`, so a
 * socket accepted with `pauseOnConnect` stays paused until it is served.
 *
 * `sendAll` resolves on the stream's write callback. The stream must have
 * copied the bytes by then (a `net.Socket` has), since callers reuse buffers.
 */

import type { Duplex } from 'node:stream';
import { PeerClosedError, TransportError, type Connection } from '@filewire/core';

/** Incoming bytes buffered before the stream is paused */
export const DEFAULT_HIGH_WATER_MARK = 4 * 1024 * 1024;

export interface SocketConnectionOptions {
  remoteLabel?: string;
  highWaterMark?: number;
}

interface PendingRead {
  length: number;
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
}

export class SocketConnection implements Connection {
  readonly remoteLabel: string;
  private readonly highWaterMark: number;
  private chunks: Buffer[] = [];
  private buffered = 0;
  private reading = false;
  private ended = false;
  private closed = false;
  private failure?: Error;
  private pending?: PendingRead;

  constructor(
    private readonly stream: Duplex,
    options: SocketConnectionOptions = {},
  ) {
    this.remoteLabel = options.remoteLabel ?? 'stream';
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
    stream.on('error', (err: Error) => this.fail(new TransportError(`Socket error: ${err.message}`)));
  }

  async sendAll(data: Uint8Array): Promise<void> {
    if (this.failure) throw this.failure;
    if (data.length === 0) return;

    await new Promise<void>((resolve, reject) => {
      this.stream.write(data, (err) => {
        if (err) {
          reject(this.failure ?? new TransportError(`Send failed: ${err.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  recvAll(length: number): Promise<Buffer> {
    this.startReading();

    if (this.pending) {
      return Promise.reject(new TransportError('recvAll called while another receive is pending'));
    }
    if (this.buffered >= length) {
      return Promise.resolve(this.take(length));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.reject(new PeerClosedError(length, this.buffered));
    }

    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { length, resolve, reject };
      this.stream.resume();
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (!this.stream.writableEnded && !this.stream.destroyed) {
      await new Promise<void>((resolve) => {
        this.stream.end(() => resolve());
      });
    }
    if (this.reading) {
      this.stream.destroy();
    }
  }

  private startReading(): void {
    if (this.reading) return;
    this.reading = true;

    this.stream.on('data', (chunk: Buffer) => this.onData(chunk));
    this.stream.on('end', () => this.onEnd());
    this.stream.on('close', () => this.onEnd());
    this.stream.resume();
  }

  private onData(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.buffered += chunk.length;

    const pending = this.pending;
    if (pending && this.buffered >= pending.length) {
      this.pending = undefined;
      pending.resolve(this.take(pending.length));
    }

    if (!this.pending && this.buffered >= this.highWaterMark) {
      this.stream.pause();
    }
  }

  private onEnd(): void {
    if (this.ended) return;
    this.ended = true;

    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      pending.reject(new PeerClosedError(pending.length, this.buffered));
    }
  }

  private fail(error: Error): void {
    this.failure ??= error;

    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      pending.reject(this.failure);
    }
  }

  private take(length: number): Buffer {
    const out = Buffer.allocUnsafe(length);
    let filled = 0;

    while (filled < length) {
      const head = this.chunks[0];
      if (!head) break;

      const needed = length - filled;
      if (head.length <= needed) {
        head.copy(out, filled);
        filled += head.length;
        this.chunks.shift();
      } else {
        head.copy(out, filled, 0, needed);
        filled += needed;
        this.chunks[0] = head.subarray(needed);
      }
    }

    this.buffered -= length;
    if (this.buffered < this.highWaterMark && this.reading && !this.ended) {
      this.stream.resume();
    }
    return out;
  }
}
