/**
 * Wire Format Types
 *
 * Fixed-layout headers exchanged on a filewire connection. Every integer is
 * a 64-bit big-endian value on the wire; the structures carry no padding.
 */

/** Default TCP port for both sender and receiver */
export const DEFAULT_PORT = 9876;

/**
 * Magic numbers identifying the transfer variant.
 * Sent once per connection as the first four bytes (u32, big-endian).
 */
export const MagicNumbers = {
  FILE: 0x46494c45,        // "FILE"
  DIRECTORY: 0x44495220,   // "DIR "
  TARGET_FILE: 0x54415247, // "TARG"
  TARGET_DIRECTORY: 0x54444952, // "TDIR"
} as const;

export type MagicNumber = typeof MagicNumbers[keyof typeof MagicNumbers];

export type TransferKind = 'file' | 'directory' | 'target-file' | 'target-directory';

export const MAGIC_BY_KIND: Record<TransferKind, MagicNumber> = {
  'file': MagicNumbers.FILE,
  'directory': MagicNumbers.DIRECTORY,
  'target-file': MagicNumbers.TARGET_FILE,
  'target-directory': MagicNumbers.TARGET_DIRECTORY,
};

// ========== Sizes ==========

export const MAGIC_SIZE = 4;
export const FILE_HEADER_SIZE = 16;
export const DIRECTORY_HEADER_SIZE = 24;
export const TARGET_FILE_HEADER_SIZE = 24;
export const TARGET_DIRECTORY_HEADER_SIZE = 32;

// ========== Headers ==========

/**
 * Precedes a plain file, and every entry inside a directory transfer.
 * `{ fileSize: 0, filenameLen: 0 }` is the directory end-of-stream marker.
 */
export interface FileHeader {
  fileSize: number;
  filenameLen: number;
}

export interface DirectoryHeader {
  totalFiles: number;
  totalSize: number;
  basePathLen: number;
}

export interface TargetFileHeader {
  fileSize: number;
  filenameLen: number;
  targetDirLen: number;
}

export interface TargetDirectoryHeader {
  totalFiles: number;
  totalSize: number;
  basePathLen: number;
  targetDirLen: number;
}

export const END_OF_STREAM_MARKER: Readonly<FileHeader> = Object.freeze({
  fileSize: 0,
  filenameLen: 0,
});
