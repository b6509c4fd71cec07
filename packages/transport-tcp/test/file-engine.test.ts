/**
 * Single-File Engine Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ForcedShutdownError,
  InvalidTargetDirectoryError,
  ShortWriteError,
  ShutdownStateMachine,
  SourceChangedError,
  SourceNotFoundError,
  UnsafePathError,
  AllocationError,
  type FileStats,
  type TransferProgress,
} from '@filewire/core';
import { sendFile, sendFileWithTarget } from '../src/engine/index.js';
import { dispatchAndReceive } from '../src/dispatcher.js';
import { BufferConnection, patternBytes } from './helpers/connections.js';
import { MemoryFileSystem } from './helpers/memory-fs.js';

const clock = () => 0;

function u64(value: number): Buffer {
  const buffer = Buffer.alloc(8);
  buffer.writeBigUInt64BE(BigInt(value));
  return buffer;
}

describe('sendFile', () => {
  it('should write magic, header, name and content', async () => {
    const fs = new MemoryFileSystem();
    fs.addFile('/data/hello.txt', 'hello');
    const conn = new BufferConnection();

    const result = await sendFile(conn, '/data/hello.txt', { fs, clock });

    expect(conn.sentBytes()).toEqual(Buffer.concat([
      Buffer.from('FILE'),
      u64(5),
      u64(9),
      Buffer.from('hello.txt'),
      Buffer.from('hello'),
    ]));
    expect(result).toMatchObject({
      role: 'send',
      kind: 'file',
      name: 'hello.txt',
      path: '/data/hello.txt',
      bytes: 5,
    });
  });

  it('should announce a zero-length file with no content bytes', async () => {
    const fs = new MemoryFileSystem();
    fs.addFile('/data/empty.dat', '');
    const conn = new BufferConnection();

    await sendFile(conn, '/data/empty.dat', { fs, clock });

    expect(conn.sentBytes()).toEqual(Buffer.concat([
      Buffer.from('FILE'),
      u64(0),
      u64(9),
      Buffer.from('empty.dat'),
    ]));
  });

  it('should fail when the source is missing or a directory', async () => {
    const fs = new MemoryFileSystem();
    fs.addDir('/data/folder');

    await expect(sendFile(new BufferConnection(), '/data/nope.txt', { fs }))
      .rejects.toBeInstanceOf(SourceNotFoundError);
    await expect(sendFile(new BufferConnection(), '/data/folder', { fs }))
      .rejects.toThrow('Cannot send /data/folder: not a regular file');
  });

  it('should fail when the file shrinks mid-transfer', async () => {
    class GrowingStatFs extends MemoryFileSystem {
      override async stat(filePath: string): Promise<FileStats> {
        const stats = await super.stat(filePath);
        return { ...stats, size: stats.size + 10 };
      }
    }
    const fs = new GrowingStatFs();
    fs.addFile('/data/log.txt', 'abc');

    await expect(sendFile(new BufferConnection(), '/data/log.txt', { fs, clock }))
      .rejects.toBeInstanceOf(SourceChangedError);
  });

  it('should report progress per chunk', async () => {
    const fs = new MemoryFileSystem();
    fs.addFile('/data/report.bin', patternBytes(200_000));
    const progress: TransferProgress[] = [];

    await sendFile(new BufferConnection(), '/data/report.bin', {
      fs,
      clock,
      transferId: 'xfer_test',
      hooks: { onProgress: (p) => progress.push(p) },
    });

    expect(progress.map((p) => p.bytesTransferred)).toEqual([65536, 131072, 196608, 200000]);
    expect(progress[3]).toEqual({
      transferId: 'xfer_test',
      role: 'send',
      name: 'report.bin',
      bytesTransferred: 200000,
      totalBytes: 200000,
      speed: 0,
      chunkSize: 65536,
      elapsedMs: 0,
    });
  });

  it('should prompt once on the first interrupt and finish the transfer', async () => {
    const fs = new MemoryFileSystem();
    fs.addFile('/data/report.bin', patternBytes(200_000));
    const shutdown = new ShutdownStateMachine();
    shutdown.signal();
    const onShutdownRequested = vi.fn();

    const result = await sendFile(new BufferConnection(), '/data/report.bin', {
      fs,
      clock,
      shutdown,
      transferId: 'xfer_test',
      hooks: { onShutdownRequested },
    });

    expect(result.bytes).toBe(200_000);
    expect(onShutdownRequested).toHaveBeenCalledTimes(1);
    expect(onShutdownRequested).toHaveBeenCalledWith('xfer_test');
    expect(shutdown.getState()).toBe('acknowledged');
  });

  it('should abort on a forced shutdown after the current chunk', async () => {
    const fs = new MemoryFileSystem();
    fs.addFile('/data/report.bin', patternBytes(200_000));
    const shutdown = new ShutdownStateMachine();
    shutdown.signal();
    shutdown.signal();
    const conn = new BufferConnection();

    const sending = sendFile(conn, '/data/report.bin', { fs, clock, shutdown, transferId: 'xfer_test' });

    await expect(sending).rejects.toBeInstanceOf(ForcedShutdownError);
    await expect(sending).rejects.toMatchObject({ transferId: 'xfer_test' });
    expect(conn.sentBytes().length).toBe(4 + 16 + 10 + 65536);
  });
});

describe('sendFileWithTarget', () => {
  it('should send the target directory after the name', async () => {
    const fs = new MemoryFileSystem();
    fs.addFile('/data/hello.txt', 'hello');
    const conn = new BufferConnection();

    const result = await sendFileWithTarget(conn, '/data/hello.txt', 'inbox/today', { fs, clock });

    expect(conn.sentBytes()).toEqual(Buffer.concat([
      Buffer.from('TARG'),
      u64(5),
      u64(9),
      u64(11),
      Buffer.from('hello.txt'),
      Buffer.from('inbox/today'),
      Buffer.from('hello'),
    ]));
    expect(result.kind).toBe('target-file');
    expect(result.targetDir).toBe('inbox/today');
  });

  it('should reject unsafe targets before sending anything', async () => {
    const fs = new MemoryFileSystem();
    fs.addFile('/data/hello.txt', 'hello');

    for (const target of ['..', '/etc']) {
      const conn = new BufferConnection();
      await expect(sendFileWithTarget(conn, '/data/hello.txt', target, { fs }))
        .rejects.toBeInstanceOf(InvalidTargetDirectoryError);
      expect(conn.sent).toHaveLength(0);
    }
  });
});

describe('file round-trip', () => {
  async function transfer(send: (conn: BufferConnection, fs: MemoryFileSystem) => Promise<unknown>) {
    const sourceFs = new MemoryFileSystem();
    sourceFs.addFile('/data/report.bin', patternBytes(200_000));
    sourceFs.addFile('/data/empty.dat', '');
    const outgoing = new BufferConnection();
    await send(outgoing, sourceFs);

    const destFs = new MemoryFileSystem();
    const result = await dispatchAndReceive(new BufferConnection(outgoing.sentBytes()), {
      fs: destFs,
      baseDir: '/recv',
      clock,
    });
    return { result, destFs };
  }

  it('should reproduce the file byte for byte', async () => {
    const { result, destFs } = await transfer((conn, fs) => sendFile(conn, '/data/report.bin', { fs, clock }));

    expect(destFs.readFile('/recv/report.bin').equals(patternBytes(200_000))).toBe(true);
    expect(result).toMatchObject({
      role: 'receive',
      kind: 'file',
      name: 'report.bin',
      path: '/recv/report.bin',
      bytes: 200_000,
    });
  });

  it('should create an empty file for a zero-length transfer', async () => {
    const { destFs } = await transfer((conn, fs) => sendFile(conn, '/data/empty.dat', { fs, clock }));
    expect(destFs.readFile('/recv/empty.dat')).toHaveLength(0);
  });

  it('should place the file under the target directory', async () => {
    const { result, destFs } = await transfer(
      (conn, fs) => sendFileWithTarget(conn, '/data/report.bin', 'inbox/today', { fs, clock }),
    );

    expect(destFs.readFile('/recv/inbox/today/report.bin')).toHaveLength(200_000);
    expect(result).toMatchObject({ kind: 'target-file', targetDir: 'inbox/today' });
  });

  it.runIf(process.platform !== 'win32')('should keep a backslash in the file name', async () => {
    const { result, destFs } = await transfer((conn, fs) => {
      fs.addFile('/data/q1\\report.txt', 'quarterly');
      return sendFile(conn, '/data/q1\\report.txt', { fs, clock });
    });

    expect(result).toMatchObject({ name: 'q1\\report.txt', path: '/recv/q1\\report.txt' });
    expect(destFs.readFile('/recv/q1\\report.txt').toString()).toBe('quarterly');
  });
});

describe('file receive faults', () => {
  it('should refuse names that escape the receive directory', async () => {
    const incoming = Buffer.concat([Buffer.from('FILE'), u64(3), u64(7), Buffer.from('../evil'), Buffer.from('abc')]);

    await expect(dispatchAndReceive(new BufferConnection(incoming), { fs: new MemoryFileSystem(), baseDir: '/recv' }))
      .rejects.toBeInstanceOf(UnsafePathError);
  });

  it('should refuse oversized names without reading them', async () => {
    const incoming = Buffer.concat([Buffer.from('FILE'), u64(0), u64(5000)]);
    const conn = new BufferConnection(incoming);

    await expect(dispatchAndReceive(conn, { fs: new MemoryFileSystem(), baseDir: '/recv' }))
      .rejects.toBeInstanceOf(AllocationError);
    expect(conn.recvCalls).toEqual([4, 16]);
  });

  it('should fail on a short disk write', async () => {
    const incoming = Buffer.concat([Buffer.from('FILE'), u64(20), u64(1), Buffer.from('x'), Buffer.alloc(20)]);
    const fs = new MemoryFileSystem();
    fs.writeLimit = 10;

    await expect(dispatchAndReceive(new BufferConnection(incoming), { fs, baseDir: '/recv', clock }))
      .rejects.toThrow(ShortWriteError);
  });

  it('should keep the opened file when the sender disappears mid-chunk', async () => {
    const incoming = Buffer.concat([Buffer.from('FILE'), u64(100), u64(1), Buffer.from('x'), Buffer.alloc(30)]);
    const fs = new MemoryFileSystem();

    await expect(dispatchAndReceive(new BufferConnection(incoming), { fs, baseDir: '/recv', clock }))
      .rejects.toThrow('Connection closed by peer after 30 of 100 bytes');
    expect(fs.readFile('/recv/x')).toHaveLength(0);
  });
});
