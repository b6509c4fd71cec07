/**
 * Shared per-transfer plumbing for the file and directory engines
 */

import {
  ForcedShutdownError,
  ShortWriteError,
  SourceChangedError,
  AllocationError,
  TransportError,
  describeError,
  generateTransferId,
  silentLogger,
  type Clock,
  type Connection,
  type Logger,
  type ReadableFile,
  type ShutdownSignal,
  type TransferFileSystem,
  type TransferHooks,
  type TransferRole,
  type WritableFile,
} from '@filewire/core';
import { AdaptiveChunkController, MAX_CHUNK_SIZE, defaultClock } from '../adaptive/index.js';
import type { TransferContext } from '../types.js';

/** Longest name or path accepted off the wire, in bytes */
export const MAX_WIRE_PATH_BYTES = 4096;

const NEVER_SHUTDOWN: ShutdownSignal = {
  shouldShutdown: () => 'continue',
  acknowledge: () => undefined,
};

export interface TransferRun {
  transferId: string;
  role: TransferRole;
  fs: TransferFileSystem;
  shutdown: ShutdownSignal;
  hooks: TransferHooks;
  logger: Logger;
  clock: Clock;
  startedAt: number;
  /** One max-size buffer reused for every chunk of the transfer */
  buffer: Buffer;
}

export function beginRun(ctx: TransferContext, role: TransferRole): TransferRun {
  const clock = ctx.clock ?? defaultClock;
  let buffer: Buffer;
  try {
    buffer = Buffer.allocUnsafe(MAX_CHUNK_SIZE);
  } catch {
    throw new AllocationError('chunk buffer', MAX_CHUNK_SIZE);
  }

  return {
    transferId: ctx.transferId ?? generateTransferId(),
    role,
    fs: ctx.fs,
    shutdown: ctx.shutdown ?? NEVER_SHUTDOWN,
    hooks: ctx.hooks ?? {},
    logger: ctx.logger ?? silentLogger,
    clock,
    startedAt: clock(),
    buffer,
  };
}

export function elapsedSince(run: TransferRun): number {
  return run.clock() - run.startedAt;
}

/**
 * Once-per-chunk shutdown poll. The first request is reported and
 * acknowledged; a forced request aborts the transfer.
 */
export function pollShutdown(run: TransferRun): void {
  const decision = run.shutdown.shouldShutdown();
  if (decision === 'promptOnce') {
    run.logger.warn('Shutdown requested. Press Ctrl+C again to force exit...');
    run.hooks.onShutdownRequested?.(run.transferId);
    run.shutdown.acknowledge();
  } else if (decision === 'forceExit') {
    throw new ForcedShutdownError(run.transferId);
  }
}

/**
 * Read a length-prefixed string whose length came from a header.
 */
export async function recvString(
  conn: Connection,
  length: number,
  field: string,
  run: TransferRun,
): Promise<string> {
  if (length > MAX_WIRE_PATH_BYTES) {
    throw new AllocationError(field, length, run.transferId);
  }
  const bytes = await conn.recvAll(length);
  return bytes.toString('utf8');
}

export interface ChunkLoopOptions {
  /** Name reported in progress events */
  name: string;
  size: number;
  controller: AdaptiveChunkController;
  /** Bytes already moved by earlier files of the same transfer */
  offset?: number;
  /** Total bytes of the whole transfer */
  totalBytes?: number;
}

function reportProgress(run: TransferRun, options: ChunkLoopOptions, moved: number): void {
  if (!run.hooks.onProgress) return;
  const snapshot = options.controller.snapshot();
  run.hooks.onProgress({
    transferId: run.transferId,
    role: run.role,
    name: options.name,
    bytesTransferred: (options.offset ?? 0) + moved,
    totalBytes: options.totalBytes ?? options.size,
    speed: snapshot.speed,
    chunkSize: snapshot.chunkSize,
    elapsedMs: elapsedSince(run),
  });
}

/**
 * Stream exactly `size` bytes from `file` to the peer in controller-sized
 * chunks. Reads never go past the declared size.
 */
export async function sendContent(
  conn: Connection,
  file: ReadableFile,
  path: string,
  run: TransferRun,
  options: ChunkLoopOptions,
): Promise<void> {
  const { size, controller } = options;
  let sent = 0;
  let chunkStart = run.clock();

  while (sent < size) {
    const want = Math.min(controller.currentChunkSize(), size - sent);
    const got = await file.read(run.buffer, 0, want);
    if (got === 0) {
      throw new SourceChangedError(path, size, sent, run.transferId);
    }

    await conn.sendAll(run.buffer.subarray(0, got));

    const chunkEnd = run.clock();
    controller.update(got, (chunkEnd - chunkStart) / 1000);
    chunkStart = chunkEnd;
    sent += got;

    pollShutdown(run);
    reportProgress(run, options, sent);
  }
}

/**
 * Pull exactly `size` bytes from the peer into `file`, writing each chunk
 * before asking for the next.
 */
export async function receiveContent(
  conn: Connection,
  file: WritableFile,
  path: string,
  run: TransferRun,
  options: ChunkLoopOptions,
): Promise<void> {
  const { size, controller } = options;
  let received = 0;
  let chunkStart = run.clock();

  while (received < size) {
    const want = Math.min(controller.currentChunkSize(), size - received);
    const data = await conn.recvAll(want);

    const written = await file.write(data);
    if (written !== data.length) {
      throw new ShortWriteError(path, data.length, written, run.transferId);
    }

    const chunkEnd = run.clock();
    controller.update(data.length, (chunkEnd - chunkStart) / 1000);
    chunkStart = chunkEnd;
    received += data.length;

    pollShutdown(run);
    reportProgress(run, options, received);
  }
}

/**
 * Close a file handle on every exit path. After a failed transfer the
 * transfer error wins over a close failure.
 */
export async function withFile<F extends { close(): Promise<void> }, T>(
  file: F,
  run: TransferRun,
  body: (file: F) => Promise<T>,
): Promise<T> {
  let result: T;
  try {
    result = await body(file);
  } catch (error) {
    await file.close().catch((closeError: unknown) => {
      run.logger.debug(`Close after failure also failed: ${describeError(closeError)}`);
    });
    throw error;
  }
  try {
    await file.close();
  } catch (error) {
    throw new TransportError(`Failed to close file: ${describeError(error)}`, undefined, run.transferId);
  }
  return result;
}
