/**
 * Directory Transfer Engine
 *
 * DIR and TDIR variants. The plain variant closes the entry stream with the
 * `{0,0}` end marker; the target variant sends exactly `totalFiles` entries
 * and no marker. Both are kept as-is for wire compatibility.
 */

import * as path from 'node:path';
import {
  MAGIC_BY_KIND,
  FILE_HEADER_SIZE,
  DIRECTORY_HEADER_SIZE,
  TARGET_DIRECTORY_HEADER_SIZE,
  END_OF_STREAM_MARKER,
  SourceNotFoundError,
  TransportError,
  formatBytes,
  type Connection,
  type DirectoryTransferResult,
  type FileHeader,
} from '@filewire/core';
import { AdaptiveChunkController } from '../adaptive/index.js';
import {
  encodeMagic,
  encodeFileHeader,
  decodeFileHeader,
  encodeDirectoryHeader,
  decodeDirectoryHeader,
  encodeTargetDirectoryHeader,
  decodeTargetDirectoryHeader,
  isEndOfStreamMarker,
} from '../codec/index.js';
import {
  baseName,
  enumerateDirectory,
  resolveInside,
  validateTargetDirectory,
  type DirectoryListing,
} from '../utils/index.js';
import type { ReceiveContext, TransferContext } from '../types.js';
import { statSource } from './file-engine.js';
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

export async function sendDirectory(
  conn: Connection,
  dirPath: string,
  ctx: TransferContext,
): Promise<DirectoryTransferResult> {
  return sendDirectoryVariant(conn, dirPath, undefined, ctx);
}

/**
 * @throws InvalidTargetDirectoryError before anything is sent
 */
export async function sendDirectoryWithTarget(
  conn: Connection,
  dirPath: string,
  targetDir: string,
  ctx: TransferContext,
): Promise<DirectoryTransferResult> {
  const sanitized = validateTargetDirectory(targetDir);
  return sendDirectoryVariant(conn, dirPath, sanitized, ctx);
}

async function sendDirectoryVariant(
  conn: Connection,
  dirPath: string,
  targetDir: string | undefined,
  ctx: TransferContext,
): Promise<DirectoryTransferResult> {
  const run = beginRun(ctx, 'send');
  const stats = await statSource(run, dirPath);
  if (!stats.isDirectory) {
    throw new SourceNotFoundError(dirPath, 'not a directory');
  }

  const listing = await enumerateDirectory(run.fs, dirPath);
  const name = baseName(path.resolve(dirPath));
  const nameBytes = Buffer.from(name, 'utf8');
  const kind = targetDir === undefined ? 'directory' : 'target-directory';

  run.hooks.onTransferStarted?.({
    transferId: run.transferId,
    role: 'send',
    kind,
    name,
    totalBytes: listing.totalSize,
    totalFiles: listing.totalFiles,
    targetDir,
  });
  run.logger.info(
    `Sending directory: ${name} (${listing.totalFiles} files, ${formatBytes(listing.totalSize)} total)`,
  );

  await conn.sendAll(encodeMagic(MAGIC_BY_KIND[kind]));
  if (targetDir === undefined) {
    await conn.sendAll(encodeDirectoryHeader({
      totalFiles: listing.totalFiles,
      totalSize: listing.totalSize,
      basePathLen: nameBytes.length,
    }));
    await conn.sendAll(nameBytes);
  } else {
    const targetBytes = Buffer.from(targetDir, 'utf8');
    await conn.sendAll(encodeTargetDirectoryHeader({
      totalFiles: listing.totalFiles,
      totalSize: listing.totalSize,
      basePathLen: nameBytes.length,
      targetDirLen: targetBytes.length,
    }));
    await conn.sendAll(nameBytes);
    await conn.sendAll(targetBytes);
  }

  await sendEntries(conn, listing, run);

  if (targetDir === undefined) {
    await conn.sendAll(encodeFileHeader(END_OF_STREAM_MARKER));
  }
  run.logger.info(`Directory sent successfully: ${listing.totalFiles} files`);

  const result: DirectoryTransferResult = {
    transferId: run.transferId,
    role: 'send',
    kind,
    name,
    path: dirPath,
    files: listing.totalFiles,
    bytes: listing.totalSize,
    targetDir,
    durationMs: elapsedSince(run),
  };
  run.hooks.onTransferCompleted?.(result);
  return result;
}

async function sendEntries(conn: Connection, listing: DirectoryListing, run: TransferRun): Promise<void> {
  const controller = new AdaptiveChunkController(run.clock);
  controller.init(listing.totalSize);
  let offset = 0;

  for (const entry of listing.entries) {
    controller.reset();
    const pathBytes = Buffer.from(entry.relativePath, 'utf8');

    run.hooks.onFileStarted?.(run.transferId, entry.relativePath, entry.size);
    run.logger.debug(`Sending ${entry.relativePath} (${formatBytes(entry.size)})`);

    await withFile(await run.fs.openForRead(entry.sourcePath), run, async (file) => {
      await conn.sendAll(encodeFileHeader({ fileSize: entry.size, filenameLen: pathBytes.length }));
      await conn.sendAll(pathBytes);
      await sendContent(conn, file, entry.sourcePath, run, {
        name: entry.relativePath,
        size: entry.size,
        controller,
        offset,
        totalBytes: listing.totalSize,
      });
    });
    offset += entry.size;
  }
}

// ========== Receive ==========

export async function recvDirectory(
  conn: Connection,
  ctx: ReceiveContext,
): Promise<DirectoryTransferResult> {
  const run = beginRun(ctx, 'receive');
  const header = decodeDirectoryHeader(await conn.recvAll(DIRECTORY_HEADER_SIZE));
  const name = await recvString(conn, header.basePathLen, 'base path', run);

  const root = resolveInside(ctx.baseDir, name, false, run.transferId);
  await run.fs.mkdir(root);
  announce(run, 'directory', name, header.totalFiles, header.totalSize);

  const progress = { files: 0, bytes: 0 };
  for (;;) {
    const entry = decodeFileHeader(await conn.recvAll(FILE_HEADER_SIZE));
    if (isEndOfStreamMarker(entry)) break;
    await receiveEntry(conn, run, root, entry, header.totalSize, progress);
  }

  return finishReceive(run, 'directory', name, root, progress);
}

export async function recvDirectoryWithTarget(
  conn: Connection,
  ctx: ReceiveContext,
): Promise<DirectoryTransferResult> {
  const run = beginRun(ctx, 'receive');
  const header = decodeTargetDirectoryHeader(await conn.recvAll(TARGET_DIRECTORY_HEADER_SIZE));
  const name = await recvString(conn, header.basePathLen, 'base path', run);
  const targetDir = header.targetDirLen > 0
    ? await recvString(conn, header.targetDirLen, 'target directory', run)
    : '';

  const parent = resolveInside(ctx.baseDir, targetDir, true, run.transferId);
  await run.fs.mkdir(parent);
  const root = resolveInside(parent, name, false, run.transferId);
  await run.fs.mkdir(root);
  announce(run, 'target-directory', name, header.totalFiles, header.totalSize, targetDir);

  const progress = { files: 0, bytes: 0 };
  while (progress.files < header.totalFiles) {
    const entry = decodeFileHeader(await conn.recvAll(FILE_HEADER_SIZE));
    if (isEndOfStreamMarker(entry)) {
      throw new TransportError(
        `Unexpected end marker after ${progress.files} of ${header.totalFiles} files`,
        undefined,
        run.transferId,
      );
    }
    await receiveEntry(conn, run, root, entry, header.totalSize, progress);
  }

  return finishReceive(run, 'target-directory', name, root, progress, targetDir);
}

function announce(
  run: TransferRun,
  kind: 'directory' | 'target-directory',
  name: string,
  totalFiles: number,
  totalSize: number,
  targetDir?: string,
): void {
  run.hooks.onTransferStarted?.({
    transferId: run.transferId,
    role: 'receive',
    kind,
    name,
    totalBytes: totalSize,
    totalFiles,
    targetDir,
  });
  run.logger.info(
    `Receiving directory: ${name}${targetDir ? ` -> ${targetDir}/` : ''} ` +
    `(${totalFiles} files, ${formatBytes(totalSize)} total)`,
  );
}

async function receiveEntry(
  conn: Connection,
  run: TransferRun,
  root: string,
  entry: FileHeader,
  totalBytes: number,
  progress: { files: number; bytes: number },
): Promise<void> {
  const relativePath = await recvString(conn, entry.filenameLen, 'relative path', run);
  const destination = resolveInside(root, relativePath, false, run.transferId);
  await run.fs.mkdir(path.dirname(destination));

  run.hooks.onFileStarted?.(run.transferId, relativePath, entry.fileSize);
  run.logger.debug(`Receiving ${relativePath} (${formatBytes(entry.fileSize)})`);

  await withFile(await run.fs.openForWrite(destination), run, async (file) => {
    const controller = new AdaptiveChunkController(run.clock);
    controller.init(entry.fileSize);
    await receiveContent(conn, file, destination, run, {
      name: relativePath,
      size: entry.fileSize,
      controller,
      offset: progress.bytes,
      totalBytes,
    });
  });

  progress.files++;
  progress.bytes += entry.fileSize;
}

function finishReceive(
  run: TransferRun,
  kind: 'directory' | 'target-directory',
  name: string,
  root: string,
  progress: { files: number; bytes: number },
  targetDir?: string,
): DirectoryTransferResult {
  run.logger.info(`Directory received successfully: ${root} (${progress.files} files)`);

  const result: DirectoryTransferResult = {
    transferId: run.transferId,
    role: 'receive',
    kind,
    name,
    path: root,
    files: progress.files,
    bytes: progress.bytes,
    targetDir,
    durationMs: elapsedSince(run),
  };
  run.hooks.onTransferCompleted?.(result);
  return result;
}
