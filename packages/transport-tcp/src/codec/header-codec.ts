/**
 * Header Codec
 *
 * Fixed-layout, big-endian encoding of the magic number and the four header
 * shapes. Lengths cross the wire as u64; inside the process they are plain
 * numbers, so anything past Number.MAX_SAFE_INTEGER is rejected at decode.
 */

import {
  AllocationError,
  TransportError,
  MagicNumbers,
  MAGIC_SIZE,
  FILE_HEADER_SIZE,
  DIRECTORY_HEADER_SIZE,
  TARGET_FILE_HEADER_SIZE,
  TARGET_DIRECTORY_HEADER_SIZE,
  type FileHeader,
  type DirectoryHeader,
  type TargetFileHeader,
  type TargetDirectoryHeader,
  type MagicNumber,
  type TransferKind,
} from '@filewire/core';

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

// ========== Primitives ==========

function writeU64(buffer: Buffer, offset: number, value: number): void {
  buffer.writeBigUInt64BE(BigInt(value), offset);
}

function readU64(buffer: Buffer, offset: number, field: string): number {
  const value = buffer.readBigUInt64BE(offset);
  if (value > MAX_SAFE) {
    throw new AllocationError(field, value);
  }
  return Number(value);
}

function expectSize(buffer: Buffer, size: number, what: string): void {
  if (buffer.length !== size) {
    throw new TransportError(`Malformed ${what}: expected ${size} bytes, got ${buffer.length}`);
  }
}

// ========== Magic ==========

export function encodeMagic(magic: MagicNumber): Buffer {
  const buffer = Buffer.alloc(MAGIC_SIZE);
  buffer.writeUInt32BE(magic, 0);
  return buffer;
}

export function decodeMagic(buffer: Buffer): number {
  expectSize(buffer, MAGIC_SIZE, 'magic number');
  return buffer.readUInt32BE(0);
}

/**
 * Map a magic number to its transfer kind; undefined when unrecognised.
 */
export function kindForMagic(magic: number): TransferKind | undefined {
  switch (magic) {
    case MagicNumbers.FILE:
      return 'file';
    case MagicNumbers.DIRECTORY:
      return 'directory';
    case MagicNumbers.TARGET_FILE:
      return 'target-file';
    case MagicNumbers.TARGET_DIRECTORY:
      return 'target-directory';
    default:
      return undefined;
  }
}

// ========== File Header ==========

export function encodeFileHeader(header: FileHeader): Buffer {
  const buffer = Buffer.alloc(FILE_HEADER_SIZE);
  writeU64(buffer, 0, header.fileSize);
  writeU64(buffer, 8, header.filenameLen);
  return buffer;
}

export function decodeFileHeader(buffer: Buffer): FileHeader {
  expectSize(buffer, FILE_HEADER_SIZE, 'file header');
  return {
    fileSize: readU64(buffer, 0, 'file content'),
    filenameLen: readU64(buffer, 8, 'filename'),
  };
}

export function isEndOfStreamMarker(header: FileHeader): boolean {
  return header.fileSize === 0 && header.filenameLen === 0;
}

// ========== Directory Header ==========

export function encodeDirectoryHeader(header: DirectoryHeader): Buffer {
  const buffer = Buffer.alloc(DIRECTORY_HEADER_SIZE);
  writeU64(buffer, 0, header.totalFiles);
  writeU64(buffer, 8, header.totalSize);
  writeU64(buffer, 16, header.basePathLen);
  return buffer;
}

export function decodeDirectoryHeader(buffer: Buffer): DirectoryHeader {
  expectSize(buffer, DIRECTORY_HEADER_SIZE, 'directory header');
  return {
    totalFiles: readU64(buffer, 0, 'file count'),
    totalSize: readU64(buffer, 8, 'directory content'),
    basePathLen: readU64(buffer, 16, 'base path'),
  };
}

// ========== Target File Header ==========

export function encodeTargetFileHeader(header: TargetFileHeader): Buffer {
  const buffer = Buffer.alloc(TARGET_FILE_HEADER_SIZE);
  writeU64(buffer, 0, header.fileSize);
  writeU64(buffer, 8, header.filenameLen);
  writeU64(buffer, 16, header.targetDirLen);
  return buffer;
}

export function decodeTargetFileHeader(buffer: Buffer): TargetFileHeader {
  expectSize(buffer, TARGET_FILE_HEADER_SIZE, 'target file header');
  return {
    fileSize: readU64(buffer, 0, 'file content'),
    filenameLen: readU64(buffer, 8, 'filename'),
    targetDirLen: readU64(buffer, 16, 'target directory'),
  };
}

// ========== Target Directory Header ==========

export function encodeTargetDirectoryHeader(header: TargetDirectoryHeader): Buffer {
  const buffer = Buffer.alloc(TARGET_DIRECTORY_HEADER_SIZE);
  writeU64(buffer, 0, header.totalFiles);
  writeU64(buffer, 8, header.totalSize);
  writeU64(buffer, 16, header.basePathLen);
  writeU64(buffer, 24, header.targetDirLen);
  return buffer;
}

export function decodeTargetDirectoryHeader(buffer: Buffer): TargetDirectoryHeader {
  expectSize(buffer, TARGET_DIRECTORY_HEADER_SIZE, 'target directory header');
  return {
    totalFiles: readU64(buffer, 0, 'file count'),
    totalSize: readU64(buffer, 8, 'directory content'),
    basePathLen: readU64(buffer, 16, 'base path'),
    targetDirLen: readU64(buffer, 24, 'target directory'),
  };
}
