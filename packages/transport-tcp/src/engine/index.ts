export { sendFile, sendFileWithTarget, recvFile, recvFileWithTarget } from './file-engine.js';
export {
  sendDirectory,
  sendDirectoryWithTarget,
  recvDirectory,
  recvDirectoryWithTarget,
} from './directory-engine.js';
export { MAX_WIRE_PATH_BYTES } from './run.js';
