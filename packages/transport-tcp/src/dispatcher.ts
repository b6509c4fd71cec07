/**
 * Transfer-Type Dispatcher
 *
 * Reads the four-byte magic number that opens every connection and hands the
 * rest of the stream to the matching receive path.
 */

import {
  MAGIC_SIZE,
  UnknownMagicError,
  type Connection,
  type TransferKind,
  type TransferResult,
} from '@filewire/core';
import { decodeMagic, kindForMagic } from './codec/index.js';
import { recvFile, recvFileWithTarget, recvDirectory, recvDirectoryWithTarget } from './engine/index.js';
import type { ReceiveContext } from './types.js';

/**
 * @throws UnknownMagicError without reading past the magic number
 */
export async function readTransferKind(conn: Connection, transferId?: string): Promise<TransferKind> {
  const magic = decodeMagic(await conn.recvAll(MAGIC_SIZE));
  const kind = kindForMagic(magic);
  if (!kind) {
    throw new UnknownMagicError(magic, transferId);
  }
  return kind;
}

export async function dispatchAndReceive(
  conn: Connection,
  ctx: ReceiveContext,
): Promise<TransferResult> {
  const kind = await readTransferKind(conn, ctx.transferId);
  ctx.logger?.debug(`${conn.remoteLabel}: ${kind} transfer`);

  switch (kind) {
    case 'file':
      return recvFile(conn, ctx);
    case 'directory':
      return recvDirectory(conn, ctx);
    case 'target-file':
      return recvFileWithTarget(conn, ctx);
    case 'target-directory':
      return recvDirectoryWithTarget(conn, ctx);
  }
}
