/**
 * Transfer Results, Progress & Hooks
 */

import type { TransferKind } from './wire.js';

export type TransferRole = 'send' | 'receive';

export interface TransferProgress {
  transferId: string;
  role: TransferRole;
  /** Name of the file currently moving (relative path inside a directory) */
  name: string;
  bytesTransferred: number;
  totalBytes: number;
  /** Rolling speed estimate from the chunk controller, bytes/s */
  speed: number;
  chunkSize: number;
  elapsedMs: number;
}

export interface TransferStartedInfo {
  transferId: string;
  role: TransferRole;
  kind: TransferKind;
  name: string;
  totalBytes: number;
  totalFiles: number;
  targetDir?: string;
}

export interface FileTransferResult {
  transferId: string;
  role: TransferRole;
  kind: 'file' | 'target-file';
  name: string;
  /** Local path read from (send) or written to (receive) */
  path: string;
  bytes: number;
  targetDir?: string;
  durationMs: number;
}

export interface DirectoryTransferResult {
  transferId: string;
  role: TransferRole;
  kind: 'directory' | 'target-directory';
  name: string;
  path: string;
  files: number;
  bytes: number;
  targetDir?: string;
  durationMs: number;
}

export type TransferResult = FileTransferResult | DirectoryTransferResult;

export interface TransferHooks {
  onTransferStarted?: (info: TransferStartedInfo) => void;
  /** Fires when a file entry inside a directory transfer begins */
  onFileStarted?: (transferId: string, relativePath: string, size: number) => void;
  onProgress?: (progress: TransferProgress) => void;
  onTransferCompleted?: (result: TransferResult) => void;
  /** First interrupt seen; the transfer keeps going */
  onShutdownRequested?: (transferId: string) => void;
}
