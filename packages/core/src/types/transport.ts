/**
 * Transport & Collaborator Interfaces
 *
 * Abstract seams consumed by the transfer engines. The engines never touch
 * sockets, disks or process signals directly; they go through these.
 */

// ========== Connection ==========

/**
 * A stream connection with all-or-nothing send and receive.
 *
 * Short reads and writes are absorbed here. Any peer close or I/O error
 * fails the whole call; callers never see partial buffers.
 */
export interface Connection {
  /** Resolves once every byte of `data` has been handed to the peer stream */
  sendAll(data: Uint8Array): Promise<void>;

  /** Resolves with exactly `length` bytes */
  recvAll(length: number): Promise<Buffer>;

  close(): Promise<void>;

  /** Human-readable peer address, for logs */
  readonly remoteLabel: string;
}

// ========== Filesystem ==========

export interface FileStats {
  size: number;
  isFile: boolean;
  isDirectory: boolean;
}

export interface DirectoryEntry {
  name: string;
}

export interface ReadableFile {
  /** Returns the number of bytes read; 0 means end of file */
  read(buffer: Buffer, offset: number, length: number): Promise<number>;
  close(): Promise<void>;
}

export interface WritableFile {
  /** Returns the number of bytes written */
  write(data: Uint8Array): Promise<number>;
  close(): Promise<void>;
}

/**
 * Filesystem operations used by the engines.
 * Implementations are assumed reliable and are never retried.
 */
export interface TransferFileSystem {
  openForRead(path: string): Promise<ReadableFile>;
  openForWrite(path: string): Promise<WritableFile>;
  stat(path: string): Promise<FileStats>;
  /** Recursive create; an existing directory is not an error */
  mkdir(path: string): Promise<void>;
  readdir(path: string): Promise<DirectoryEntry[]>;
}

// ========== Shutdown ==========

export type ShutdownDecision = 'continue' | 'promptOnce' | 'forceExit';

/**
 * Cooperative shutdown flag polled once per chunk.
 */
export interface ShutdownSignal {
  shouldShutdown(): ShutdownDecision;
  /** Called after a `promptOnce` decision has been reported */
  acknowledge(): void;
}

// ========== Clock ==========

/** Monotonic milliseconds */
export type Clock = () => number;
