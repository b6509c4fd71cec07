/**
 * filewire Error Codes
 */
export const ErrorCodes = {
  IO_FAILED: 'IO_FAILED',
  PEER_CLOSED: 'PEER_CLOSED',
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  SHORT_WRITE: 'SHORT_WRITE',
  SOURCE_CHANGED: 'SOURCE_CHANGED',
  SOURCE_NOT_FOUND: 'SOURCE_NOT_FOUND',
  UNKNOWN_MAGIC: 'UNKNOWN_MAGIC',
  INVALID_TARGET_DIR: 'INVALID_TARGET_DIR',
  UNSAFE_PATH: 'UNSAFE_PATH',
  ALLOCATION_FAILED: 'ALLOCATION_FAILED',
  FORCED_SHUTDOWN: 'FORCED_SHUTDOWN',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Base class for filewire errors
 */
export class FilewireError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
    public readonly transferId?: string,
  ) {
    super(message);
    this.name = 'FilewireError';
  }

  toErrorMessage() {
    return {
      code: this.code,
      message: this.message,
      hint: this.hint,
    };
  }
}

/**
 * Error: Socket or disk I/O failed
 */
export class TransportError extends FilewireError {
  constructor(message: string, hint?: string, transferId?: string) {
    super(ErrorCodes.IO_FAILED, message, hint, transferId);
    this.name = 'TransportError';
  }
}

/**
 * Error: Peer closed the stream before the expected bytes arrived
 */
export class PeerClosedError extends FilewireError {
  constructor(
    public readonly expectedBytes: number,
    public readonly receivedBytes: number,
    transferId?: string,
  ) {
    super(
      ErrorCodes.PEER_CLOSED,
      `Connection closed by peer after ${receivedBytes} of ${expectedBytes} bytes`,
      'The sender may have been interrupted; the partial file is left on disk',
      transferId,
    );
    this.name = 'PeerClosedError';
  }
}

/**
 * Error: Could not connect to the receiver
 */
export class ConnectionFailedError extends FilewireError {
  constructor(host: string, port: number, reason: string) {
    super(
      ErrorCodes.CONNECTION_FAILED,
      `Cannot connect to ${host}:${port}: ${reason}`,
      'Check that the receiver is running and the port is reachable',
    );
    this.name = 'ConnectionFailedError';
  }
}

/**
 * Error: Fewer bytes written to disk than requested
 */
export class ShortWriteError extends FilewireError {
  constructor(
    public readonly path: string,
    public readonly expected: number,
    public readonly written: number,
    transferId?: string,
  ) {
    super(
      ErrorCodes.SHORT_WRITE,
      `Short write to ${path}: ${written} of ${expected} bytes`,
      'Check free disk space on the receiver',
      transferId,
    );
    this.name = 'ShortWriteError';
  }
}

/**
 * Error: Source file shrank while it was being sent
 */
export class SourceChangedError extends FilewireError {
  constructor(path: string, declared: number, actual: number, transferId?: string) {
    super(
      ErrorCodes.SOURCE_CHANGED,
      `File changed during transfer: ${path} (declared ${declared} bytes, read ${actual})`,
      'Do not modify files while they are being sent',
      transferId,
    );
    this.name = 'SourceChangedError';
  }
}

/**
 * Error: Source path does not exist or is not a file/directory
 */
export class SourceNotFoundError extends FilewireError {
  constructor(path: string, reason: string = 'not found') {
    super(
      ErrorCodes.SOURCE_NOT_FOUND,
      `Cannot send ${path}: ${reason}`,
      'Provide an existing file or directory path',
    );
    this.name = 'SourceNotFoundError';
  }
}

/**
 * Error: Unrecognised magic number at the start of a connection
 */
export class UnknownMagicError extends FilewireError {
  constructor(public readonly magic: number, transferId?: string) {
    super(
      ErrorCodes.UNKNOWN_MAGIC,
      `Unknown transfer type magic number: 0x${magic.toString(16).toUpperCase().padStart(8, '0')}`,
      'The peer is not a filewire sender or speaks another protocol',
      transferId,
    );
    this.name = 'UnknownMagicError';
  }
}

export type TargetDirectoryRejection = 'traversal' | 'absolute' | 'too-long';

/**
 * Error: Target directory rejected before sending
 */
export class InvalidTargetDirectoryError extends FilewireError {
  constructor(
    public readonly targetDir: string,
    public readonly reason: TargetDirectoryRejection,
  ) {
    const messages: Record<TargetDirectoryRejection, string> = {
      'traversal': 'Path traversal detected in target directory',
      'absolute': 'Absolute paths not allowed in target directory',
      'too-long': 'Target directory path too long',
    };
    super(
      ErrorCodes.INVALID_TARGET_DIR,
      `${messages[reason]}: ${targetDir}`,
      'Use a relative directory such as "downloads/"',
    );
    this.name = 'InvalidTargetDirectoryError';
  }
}

/**
 * Error: A path read off the wire resolves outside the receive root
 */
export class UnsafePathError extends FilewireError {
  constructor(public readonly path: string, transferId?: string) {
    super(
      ErrorCodes.UNSAFE_PATH,
      `Refusing to write outside the receive directory: ${path}`,
      undefined,
      transferId,
    );
    this.name = 'UnsafePathError';
  }
}

/**
 * Error: A header-declared length cannot be allocated
 */
export class AllocationError extends FilewireError {
  constructor(
    public readonly field: string,
    public readonly length: number | bigint,
    transferId?: string,
  ) {
    super(
      ErrorCodes.ALLOCATION_FAILED,
      `Cannot allocate ${length} bytes for ${field}`,
      'The peer sent a corrupt or oversized header',
      transferId,
    );
    this.name = 'AllocationError';
  }
}

/**
 * Error: Second interrupt received mid-transfer
 */
export class ForcedShutdownError extends FilewireError {
  constructor(transferId?: string) {
    super(
      ErrorCodes.FORCED_SHUTDOWN,
      'Forced exit! File may be incomplete.',
      undefined,
      transferId,
    );
    this.name = 'ForcedShutdownError';
  }
}

/**
 * Error: Environment or config file values failed validation
 */
export class ConfigurationError extends FilewireError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(
      ErrorCodes.INVALID_CONFIG,
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      'Check FILEWIRE_* environment variables and the --env-file contents',
    );
    this.name = 'ConfigurationError';
  }
}
