/**
 * Terminal progress line, redrawn at most once per second and once more
 * when the transfer reaches its total.
 */

import { formatProgressLine, type TransferHooks, type TransferProgress } from '@filewire/core';

export interface ProgressOutput {
  write(text: string): unknown;
}

const REFRESH_INTERVAL_MS = 1000;
const CLEAR_LINE = '\r\x1b[K';

export class ProgressRenderer {
  private lastRenderMs = Number.NEGATIVE_INFINITY;
  private lineOpen = false;

  constructor(private readonly output: ProgressOutput = process.stdout) {}

  update(progress: TransferProgress): void {
    const done = progress.bytesTransferred >= progress.totalBytes;
    if (!done && progress.elapsedMs - this.lastRenderMs < REFRESH_INTERVAL_MS) {
      return;
    }
    this.lastRenderMs = progress.elapsedMs;
    this.output.write(CLEAR_LINE + formatProgressLine(progress));
    this.lineOpen = true;
    if (done) {
      this.finish();
    }
  }

  /** End the current line so later log output starts clean */
  finish(): void {
    if (this.lineOpen) {
      this.output.write('\n');
      this.lineOpen = false;
    }
    this.lastRenderMs = Number.NEGATIVE_INFINITY;
  }

  hooks(): TransferHooks {
    return {
      onProgress: (progress) => this.update(progress),
      onTransferCompleted: () => this.finish(),
      onShutdownRequested: () => this.finish(),
    };
  }
}
