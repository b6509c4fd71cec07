import { describe, it, expect, beforeEach } from 'vitest';
import type { TransferProgress } from '@filewire/core';
import { ProgressRenderer } from '../../src/cli/progress.js';

function progressAt(elapsedMs: number, bytesTransferred: number): TransferProgress {
  return {
    transferId: 'xfer_test',
    role: 'receive',
    name: 'notes.txt',
    bytesTransferred,
    totalBytes: 1000,
    speed: 50,
    chunkSize: 65536,
    elapsedMs,
  };
}

describe('ProgressRenderer', () => {
  let writes: string[];
  let renderer: ProgressRenderer;

  beforeEach(() => {
    writes = [];
    renderer = new ProgressRenderer({ write: (text: string) => writes.push(text) });
  });

  it('should render the first update immediately', () => {
    renderer.update(progressAt(0, 100));

    expect(writes).toEqual([
      '\r\x1b[KProgress: 10.00% | 100 B/1000 B | Speed: 50 B/s | Chunk: 64 KB | Elapsed: 0s | ETA: 18s',
    ]);
  });

  it('should redraw at most once per second', () => {
    renderer.update(progressAt(0, 100));
    renderer.update(progressAt(500, 200));
    renderer.update(progressAt(999, 250));
    renderer.update(progressAt(1000, 300));

    expect(writes).toHaveLength(2);
    expect(writes[1]).toContain('Progress: 30.00% | 300 B/1000 B');
  });

  it('should always render completion and end the line', () => {
    renderer.update(progressAt(0, 100));
    renderer.update(progressAt(200, 1000));

    expect(writes).toEqual([
      '\r\x1b[KProgress: 10.00% | 100 B/1000 B | Speed: 50 B/s | Chunk: 64 KB | Elapsed: 0s | ETA: 18s',
      '\r\x1b[KProgress: 100.00% | 1000 B/1000 B | Speed: 50 B/s | Chunk: 64 KB | Elapsed: 0s | ETA: 0s',
      '\n',
    ]);
  });

  it('should write nothing on finish when no line is open', () => {
    renderer.finish();
    expect(writes).toEqual([]);
  });

  it('should close the open line on a shutdown request and redraw afterwards', () => {
    const hooks = renderer.hooks();
    hooks.onProgress?.(progressAt(0, 100));
    hooks.onShutdownRequested?.('xfer_test');
    hooks.onProgress?.(progressAt(100, 200));

    expect(writes).toHaveLength(3);
    expect(writes[1]).toBe('\n');
    expect(writes[2]).toContain('Progress: 20.00%');
  });
});
