/**
 * Human-readable formatting for sizes, rates and durations
 */

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'] as const;

const KIB = 1024;
const MIB = 1024 * 1024;

/**
 * @example
 * formatBytes(512)     // "512 B"
 * formatBytes(1536)    // "1.50 KB"
 * formatBytes(2621440) // "2.50 MB"
 */
export function formatBytes(bytes: number): string {
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < BYTE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }
  return unit === 0
    ? `${size.toFixed(0)} ${BYTE_UNITS[unit]}`
    : `${size.toFixed(2)} ${BYTE_UNITS[unit]}`;
}

export function formatSpeed(bytesPerSecond: number): string {
  return `${formatBytes(Math.floor(bytesPerSecond))}/s`;
}

/**
 * Whole seconds as `Ns`, `Nm Ns` or `Nh Nm Ns`.
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  if (total < 60) {
    return `${total}s`;
  }
  if (total < 3600) {
    return `${Math.floor(total / 60)}m ${total % 60}s`;
  }
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  return `${hours}h ${minutes}m ${total % 60}s`;
}

export function formatChunkSize(bytes: number): string {
  return bytes < MIB
    ? `${(bytes / KIB).toFixed(0)} KB`
    : `${(bytes / MIB).toFixed(1)} MB`;
}

export interface ProgressLineInput {
  bytesTransferred: number;
  totalBytes: number;
  /** bytes/s */
  speed: number;
  chunkSize: number;
  elapsedMs: number;
}

/**
 * One-line progress summary.
 *
 * @example
 * "Progress: 45.00% | 1.17 MB/2.60 MB | Speed: 3.40 MB/s | Chunk: 64 KB | Elapsed: 3s | ETA: 4s"
 */
export function formatProgressLine(input: ProgressLineInput): string {
  const { bytesTransferred, totalBytes, speed, chunkSize, elapsedMs } = input;

  const percent = totalBytes > 0 ? (bytesTransferred / totalBytes) * 100 : 100;
  const etaSeconds = speed > 0 && bytesTransferred < totalBytes
    ? Math.floor((totalBytes - bytesTransferred) / speed)
    : 0;

  return [
    `Progress: ${percent.toFixed(2)}%`,
    `${formatBytes(bytesTransferred)}/${formatBytes(totalBytes)}`,
    `Speed: ${formatSpeed(speed)}`,
    `Chunk: ${formatChunkSize(chunkSize)}`,
    `Elapsed: ${formatDuration(elapsedMs / 1000)}`,
    `ETA: ${formatDuration(etaSeconds)}`,
  ].join(' | ');
}
