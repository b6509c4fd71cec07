/**
 * Node Filesystem Adapter
 *
 * `TransferFileSystem` backed by `node:fs/promises`.
 */

import * as fs from 'node:fs/promises';
import type {
  DirectoryEntry,
  FileStats,
  ReadableFile,
  TransferFileSystem,
  WritableFile,
} from '@filewire/core';

export class NodeFileSystem implements TransferFileSystem {
  async openForRead(filePath: string): Promise<ReadableFile> {
    const handle = await fs.open(filePath, 'r');
    return {
      async read(buffer, offset, length) {
        const { bytesRead } = await handle.read(buffer, offset, length, null);
        return bytesRead;
      },
      close: () => handle.close(),
    };
  }

  async openForWrite(filePath: string): Promise<WritableFile> {
    const handle = await fs.open(filePath, 'w');
    return {
      async write(data) {
        const { bytesWritten } = await handle.write(data);
        return bytesWritten;
      },
      close: () => handle.close(),
    };
  }

  async stat(filePath: string): Promise<FileStats> {
    const stats = await fs.stat(filePath);
    return {
      size: stats.size,
      isFile: stats.isFile(),
      isDirectory: stats.isDirectory(),
    };
  }

  async mkdir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }

  async readdir(dirPath: string): Promise<DirectoryEntry[]> {
    const names = await fs.readdir(dirPath);
    return names.map((name) => ({ name }));
  }
}
