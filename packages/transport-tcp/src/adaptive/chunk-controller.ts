/**
 * Adaptive Chunk Controller
 *
 * Picks the read/write unit for a transfer from the throughput measured over
 * recent chunks. One instance belongs to one transfer; nothing is shared
 * across connections.
 */

import type { Clock } from '@filewire/core';

export const MIN_CHUNK_SIZE = 8 * 1024;
export const MAX_CHUNK_SIZE = 2 * 1024 * 1024;
export const INITIAL_CHUNK_SIZE = 64 * 1024;
/** Seconds between chunk-size adjustments */
export const ADJUSTMENT_INTERVAL = 2;
export const SPEED_SAMPLES = 5;

const MB = 1024 * 1024;

/**
 * Speed brackets, bytes/s upper bound (exclusive) to chunk size.
 * Anything at or above the last bound gets MAX_CHUNK_SIZE.
 */
const SPEED_BRACKETS: ReadonlyArray<readonly [number, number]> = [
  [1 * MB, MIN_CHUNK_SIZE],
  [10 * MB, 64 * 1024],
  [50 * MB, 256 * 1024],
  [100 * MB, 1024 * 1024],
];

export function chunkSizeForSpeed(bytesPerSecond: number): number {
  for (const [limit, size] of SPEED_BRACKETS) {
    if (bytesPerSecond < limit) return size;
  }
  return MAX_CHUNK_SIZE;
}

export interface AdaptiveSnapshot {
  chunkSize: number;
  /** Mean of the sample window, bytes/s */
  speed: number;
  bytesMoved: number;
  /** Bytes recorded since the last chunk-size adjustment */
  bytesSinceAdjustment: number;
  totalBytes: number;
  elapsedMs: number;
}

export const defaultClock: Clock = () => performance.now();

export class AdaptiveChunkController {
  private chunkSize = INITIAL_CHUNK_SIZE;
  private samples: number[] = new Array<number>(SPEED_SAMPLES).fill(0);
  private sampleIndex = 0;
  private sampleCount = 0;
  private lastAdjustmentAt: number;
  private startedAt: number;
  private bytesSinceAdjustment = 0;
  private bytesMoved = 0;
  private totalBytes = 0;

  constructor(private readonly clock: Clock = defaultClock) {
    this.lastAdjustmentAt = clock();
    this.startedAt = this.lastAdjustmentAt;
  }

  /**
   * Start a new transfer of `totalBytes`.
   */
  init(totalBytes: number): void {
    this.chunkSize = INITIAL_CHUNK_SIZE;
    this.clearWindow();
    this.totalBytes = totalBytes;
  }

  currentChunkSize(): number {
    this.chunkSize = Math.min(MAX_CHUNK_SIZE, Math.max(MIN_CHUNK_SIZE, this.chunkSize));
    return this.chunkSize;
  }

  /**
   * Record one chunk. Re-evaluates the chunk size once at least
   * ADJUSTMENT_INTERVAL seconds have passed since the previous adjustment.
   */
  update(bytesMoved: number, elapsedSeconds: number): void {
    if (!(elapsedSeconds > 0)) {
      return;
    }

    this.samples[this.sampleIndex] = bytesMoved / elapsedSeconds;
    this.sampleIndex = (this.sampleIndex + 1) % SPEED_SAMPLES;
    if (this.sampleCount < SPEED_SAMPLES) {
      this.sampleCount++;
    }

    this.bytesSinceAdjustment += bytesMoved;
    this.bytesMoved += bytesMoved;

    const now = this.clock();
    if (now - this.lastAdjustmentAt >= ADJUSTMENT_INTERVAL * 1000) {
      this.chunkSize = chunkSizeForSpeed(this.currentSpeedEstimate());
      this.lastAdjustmentAt = now;
      this.bytesSinceAdjustment = 0;
    }
  }

  /**
   * Keep the chunk size, forget everything else.
   */
  reset(): void {
    this.clearWindow();
    this.totalBytes = 0;
  }

  currentSpeedEstimate(): number {
    if (this.sampleCount === 0) {
      return 0;
    }
    let sum = 0;
    for (let i = 0; i < this.sampleCount; i++) {
      sum += this.samples[i] ?? 0;
    }
    return sum / this.sampleCount;
  }

  snapshot(): AdaptiveSnapshot {
    return {
      chunkSize: this.currentChunkSize(),
      speed: this.currentSpeedEstimate(),
      bytesMoved: this.bytesMoved,
      bytesSinceAdjustment: this.bytesSinceAdjustment,
      totalBytes: this.totalBytes,
      elapsedMs: this.clock() - this.startedAt,
    };
  }

  private clearWindow(): void {
    this.samples.fill(0);
    this.sampleIndex = 0;
    this.sampleCount = 0;
    this.bytesSinceAdjustment = 0;
    this.bytesMoved = 0;
    this.lastAdjustmentAt = this.clock();
    this.startedAt = this.lastAdjustmentAt;
  }
}
