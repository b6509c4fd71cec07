/**
 * Single-File Transfer Engine
 *
 * FILE and TARG variants. Send functions write the magic number themselves;
 * receive functions start after the dispatcher has consumed it.
 */

import * as path from 'node:path';
import {
  MAGIC_BY_KIND,
  FILE_HEADER_SIZE,
  TARGET_FILE_HEADER_SIZE,
  SourceNotFoundError,
  describeError,
  formatBytes,
  type Connection,
  type FileStats,
  type FileTransferResult,
} from '@filewire/core';
import { AdaptiveChunkController } from '../adaptive/index.js';
import {
  encodeMagic,
  encodeFileHeader,
  decodeFileHeader,
  encodeTargetFileHeader,
  decodeTargetFileHeader,
} from '../codec/index.js';
import { baseName, resolveInside, validateTargetDirectory } from '../utils/index.js';
import type { ReceiveContext, TransferContext } from '../types.js';
import {
  beginRun,
  elapsedSince,
  receiveContent,
  recvString,
  sendContent,
  withFile,
  type TransferRun,
} from './run.js';

// ========== Send ==========

export async function sendFile(
  conn: Connection,
  filePath: string,
  ctx: TransferContext,
): Promise<FileTransferResult> {
  return sendFileVariant(conn, filePath, undefined, ctx);
}

/**
 * @throws InvalidTargetDirectoryError before anything is sent
 */
export async function sendFileWithTarget(
  conn: Connection,
  filePath: string,
  targetDir: string,
  ctx: TransferContext,
): Promise<FileTransferResult> {
  const sanitized = validateTargetDirectory(targetDir);
  return sendFileVariant(conn, filePath, sanitized, ctx);
}

export async function statSource(run: TransferRun, sourcePath: string): Promise<FileStats> {
  try {
    return await run.fs.stat(sourcePath);
  } catch (error) {
    throw new SourceNotFoundError(sourcePath, describeError(error));
  }
}

async function sendFileVariant(
  conn: Connection,
  filePath: string,
  targetDir: string | undefined,
  ctx: TransferContext,
): Promise<FileTransferResult> {
  const run = beginRun(ctx, 'send');
  const stats = await statSource(run, filePath);
  if (!stats.isFile) {
    throw new SourceNotFoundError(filePath, 'not a regular file');
  }

  const name = baseName(path.resolve(filePath));
  const nameBytes = Buffer.from(name, 'utf8');
  const size = stats.size;
  const kind = targetDir === undefined ? 'file' : 'target-file';

  return withFile(await run.fs.openForRead(filePath), run, async (file) => {
    const controller = new AdaptiveChunkController(run.clock);
    controller.init(size);

    run.hooks.onTransferStarted?.({
      transferId: run.transferId,
      role: 'send',
      kind,
      name,
      totalBytes: size,
      totalFiles: 1,
      targetDir,
    });

    await conn.sendAll(encodeMagic(MAGIC_BY_KIND[kind]));
    if (targetDir === undefined) {
      await conn.sendAll(encodeFileHeader({ fileSize: size, filenameLen: nameBytes.length }));
      await conn.sendAll(nameBytes);
    } else {
      const targetBytes = Buffer.from(targetDir, 'utf8');
      await conn.sendAll(encodeTargetFileHeader({
        fileSize: size,
        filenameLen: nameBytes.length,
        targetDirLen: targetBytes.length,
      }));
      await conn.sendAll(nameBytes);
      await conn.sendAll(targetBytes);
    }

    run.logger.info(
      `Sending file: ${name} (${formatBytes(size)})${targetDir ? ` -> ${targetDir}/` : ''}`,
    );
    await sendContent(conn, file, filePath, run, { name, size, controller });
    run.logger.info('File sent successfully!');

    const result: FileTransferResult = {
      transferId: run.transferId,
      role: 'send',
      kind,
      name,
      path: filePath,
      bytes: size,
      targetDir,
      durationMs: elapsedSince(run),
    };
    run.hooks.onTransferCompleted?.(result);
    return result;
  });
}

// ========== Receive ==========

export async function recvFile(conn: Connection, ctx: ReceiveContext): Promise<FileTransferResult> {
  const run = beginRun(ctx, 'receive');
  const header = decodeFileHeader(await conn.recvAll(FILE_HEADER_SIZE));
  const name = await recvString(conn, header.filenameLen, 'filename', run);

  await run.fs.mkdir(ctx.baseDir);
  const destination = resolveInside(ctx.baseDir, name, false, run.transferId);

  return receiveInto(conn, run, {
    kind: 'file',
    name,
    destination,
    size: header.fileSize,
  });
}

export async function recvFileWithTarget(
  conn: Connection,
  ctx: ReceiveContext,
): Promise<FileTransferResult> {
  const run = beginRun(ctx, 'receive');
  const header = decodeTargetFileHeader(await conn.recvAll(TARGET_FILE_HEADER_SIZE));
  const name = await recvString(conn, header.filenameLen, 'filename', run);
  const targetDir = header.targetDirLen > 0
    ? await recvString(conn, header.targetDirLen, 'target directory', run)
    : '';

  const directory = resolveInside(ctx.baseDir, targetDir, true, run.transferId);
  await run.fs.mkdir(directory);
  const destination = resolveInside(directory, name, false, run.transferId);

  return receiveInto(conn, run, {
    kind: 'target-file',
    name,
    destination,
    size: header.fileSize,
    targetDir,
  });
}

interface IncomingFile {
  kind: 'file' | 'target-file';
  name: string;
  destination: string;
  size: number;
  targetDir?: string;
}

async function receiveInto(
  conn: Connection,
  run: TransferRun,
  incoming: IncomingFile,
): Promise<FileTransferResult> {
  const { kind, name, destination, size, targetDir } = incoming;

  run.hooks.onTransferStarted?.({
    transferId: run.transferId,
    role: 'receive',
    kind,
    name,
    totalBytes: size,
    totalFiles: 1,
    targetDir,
  });
  run.logger.info(
    `Receiving file: ${name} (${formatBytes(size)})${targetDir ? ` -> ${targetDir}/` : ''}`,
  );

  return withFile(await run.fs.openForWrite(destination), run, async (file) => {
    const controller = new AdaptiveChunkController(run.clock);
    controller.init(size);

    await receiveContent(conn, file, destination, run, { name, size, controller });
    run.logger.info('File received successfully!');

    const result: FileTransferResult = {
      transferId: run.transferId,
      role: 'receive',
      kind,
      name,
      path: destination,
      bytes: size,
      targetDir,
      durationMs: elapsedSince(run),
    };
    run.hooks.onTransferCompleted?.(result);
    return result;
  });
}
