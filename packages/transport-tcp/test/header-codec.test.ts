/**
 * Header Codec Tests
 */

import { describe, it, expect } from 'vitest';
import {
  AllocationError,
  TransportError,
  MagicNumbers,
  MAGIC_BY_KIND,
  END_OF_STREAM_MARKER,
} from '@filewire/core';
import {
  encodeMagic,
  decodeMagic,
  kindForMagic,
  encodeFileHeader,
  decodeFileHeader,
  encodeDirectoryHeader,
  decodeDirectoryHeader,
  encodeTargetFileHeader,
  decodeTargetFileHeader,
  encodeTargetDirectoryHeader,
  decodeTargetDirectoryHeader,
  isEndOfStreamMarker,
} from '../src/codec/index.js';

function u64(value: number): Buffer {
  const buffer = Buffer.alloc(8);
  buffer.writeBigUInt64BE(BigInt(value));
  return buffer;
}

describe('magic numbers', () => {
  it('should encode as their ASCII tags', () => {
    expect(encodeMagic(MagicNumbers.FILE).toString('latin1')).toBe('FILE');
    expect(encodeMagic(MagicNumbers.DIRECTORY).toString('latin1')).toBe('DIR ');
    expect(encodeMagic(MagicNumbers.TARGET_FILE).toString('latin1')).toBe('TARG');
    expect(encodeMagic(MagicNumbers.TARGET_DIRECTORY).toString('latin1')).toBe('TDIR');
  });

  it('should decode big-endian', () => {
    expect(decodeMagic(Buffer.from('TDIR', 'latin1'))).toBe(0x54444952);
  });

  it('should map to transfer kinds', () => {
    expect(kindForMagic(0x46494c45)).toBe('file');
    expect(kindForMagic(0x44495220)).toBe('directory');
    expect(kindForMagic(0x54415247)).toBe('target-file');
    expect(kindForMagic(0x54444952)).toBe('target-directory');
    expect(kindForMagic(0xdeadbeef)).toBeUndefined();
  });

  it('should pick the magic number for each transfer kind', () => {
    expect(encodeMagic(MAGIC_BY_KIND['target-file']).toString('latin1')).toBe('TARG');
    for (const kind of ['file', 'directory', 'target-file', 'target-directory'] as const) {
      expect(kindForMagic(MAGIC_BY_KIND[kind])).toBe(kind);
    }
  });
});

describe('file header', () => {
  it('should lay out two big-endian u64 fields', () => {
    const encoded = encodeFileHeader({ fileSize: 0x0102, filenameLen: 5 });
    expect(encoded).toEqual(Buffer.concat([u64(0x0102), u64(5)]));
    expect(decodeFileHeader(encoded)).toEqual({ fileSize: 0x0102, filenameLen: 5 });
  });

  it('should recognise the end-of-stream marker', () => {
    expect(encodeFileHeader(END_OF_STREAM_MARKER)).toEqual(Buffer.alloc(16));
    expect(isEndOfStreamMarker(decodeFileHeader(Buffer.alloc(16)))).toBe(true);
    expect(isEndOfStreamMarker({ fileSize: 0, filenameLen: 3 })).toBe(false);
    expect(isEndOfStreamMarker({ fileSize: 3, filenameLen: 0 })).toBe(false);
  });

  it('should reject lengths beyond the safe integer range', () => {
    expect(() => decodeFileHeader(Buffer.alloc(16, 0xff))).toThrow(AllocationError);
  });

  it('should reject buffers of the wrong size', () => {
    expect(() => decodeFileHeader(Buffer.alloc(15))).toThrow(TransportError);
    expect(() => decodeFileHeader(Buffer.alloc(15))).toThrow('Malformed file header: expected 16 bytes, got 15');
  });
});

describe('directory header', () => {
  it('should encode three fields in order', () => {
    const encoded = encodeDirectoryHeader({ totalFiles: 4, totalSize: 70006, basePathLen: 6 });
    expect(encoded).toEqual(Buffer.concat([u64(4), u64(70006), u64(6)]));
    expect(decodeDirectoryHeader(encoded)).toEqual({ totalFiles: 4, totalSize: 70006, basePathLen: 6 });
  });
});

describe('target headers', () => {
  it('should append the target directory length to the file header', () => {
    const encoded = encodeTargetFileHeader({ fileSize: 5, filenameLen: 9, targetDirLen: 11 });
    expect(encoded).toEqual(Buffer.concat([u64(5), u64(9), u64(11)]));
    expect(decodeTargetFileHeader(encoded)).toEqual({ fileSize: 5, filenameLen: 9, targetDirLen: 11 });
  });

  it('should append the target directory length to the directory header', () => {
    const header = { totalFiles: 2, totalSize: 2 ** 40, basePathLen: 3, targetDirLen: 0 };
    const encoded = encodeTargetDirectoryHeader(header);
    expect(encoded.length).toBe(32);
    expect(encoded.subarray(8, 16)).toEqual(u64(2 ** 40));
    expect(decodeTargetDirectoryHeader(encoded)).toEqual(header);
  });
});
