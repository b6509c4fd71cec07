/**
 * @filewire/transport-tcp
 *
 * The filewire wire protocol: header codec, adaptive chunk sizing, the file
 * and directory engines and the receive-side dispatcher.
 */

export type { TransferContext, ReceiveContext } from './types.js';

export {
  AdaptiveChunkController,
  chunkSizeForSpeed,
  defaultClock,
  MIN_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
  INITIAL_CHUNK_SIZE,
  ADJUSTMENT_INTERVAL,
  SPEED_SAMPLES,
  type AdaptiveSnapshot,
} from './adaptive/index.js';

export * from './codec/index.js';

export {
  SocketConnection,
  DEFAULT_HIGH_WATER_MARK,
  type SocketConnectionOptions,
} from './connection/index.js';

export { NodeFileSystem } from './fs/index.js';

export {
  validateTargetDirectory,
  resolveInside,
  baseName,
  enumerateDirectory,
  MAX_TARGET_DIR_LENGTH,
  type EnumeratedFile,
  type DirectoryListing,
} from './utils/index.js';

export {
  sendFile,
  sendFileWithTarget,
  recvFile,
  recvFileWithTarget,
  sendDirectory,
  sendDirectoryWithTarget,
  recvDirectory,
  recvDirectoryWithTarget,
  MAX_WIRE_PATH_BYTES,
} from './engine/index.js';

export { readTransferKind, dispatchAndReceive } from './dispatcher.js';
