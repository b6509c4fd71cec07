/**
 * Target Directory & Path Safety Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidTargetDirectoryError, UnsafePathError } from '@filewire/core';
import { validateTargetDirectory, resolveInside, baseName } from '../src/utils/index.js';

describe('validateTargetDirectory', () => {
  it('should return empty for no target', () => {
    expect(validateTargetDirectory('')).toBe('');
  });

  it('should accept relative paths unchanged', () => {
    expect(validateTargetDirectory('downloads')).toBe('downloads');
    expect(validateTargetDirectory('a/b/')).toBe('a/b/');
  });

  it('should reject traversal', () => {
    expect(() => validateTargetDirectory('..')).toThrow(InvalidTargetDirectoryError);
    expect(() => validateTargetDirectory('a/../b')).toThrow('Path traversal detected in target directory: a/../b');
  });

  it('should reject absolute paths', () => {
    expect(() => validateTargetDirectory('/etc')).toThrow('Absolute paths not allowed in target directory: /etc');
  });

  it('should reject paths over the length limit', () => {
    expect(validateTargetDirectory('x'.repeat(4094))).toHaveLength(4094);
    expect(() => validateTargetDirectory('x'.repeat(4095))).toThrow(InvalidTargetDirectoryError);
    expect(() => validateTargetDirectory('abcd', 3)).toThrow('Target directory path too long: abcd');
  });
});

describe('resolveInside', () => {
  it('should join relative paths under the root', () => {
    expect(resolveInside('/recv', 'a/b.txt')).toBe('/recv/a/b.txt');
    expect(resolveInside('/recv', 'a/../b')).toBe('/recv/b');
  });

  it('should reject paths escaping the root', () => {
    expect(() => resolveInside('/recv', '../x')).toThrow(UnsafePathError);
    expect(() => resolveInside('/recv', 'a/../../x')).toThrow(UnsafePathError);
    expect(() => resolveInside('/recv', '/etc/passwd')).toThrow(UnsafePathError);
    expect(() => resolveInside('/recv', '../recv-other/x')).toThrow(UnsafePathError);
  });

  it('should only accept the root itself when allowed', () => {
    expect(() => resolveInside('/recv', '')).toThrow(UnsafePathError);
    expect(resolveInside('/recv', '', true)).toBe('/recv');
  });

  it('should tag the error with the transfer id', () => {
    try {
      resolveInside('/recv', '../x', false, 'xfer_1');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnsafePathError);
      expect(error).toMatchObject({ transferId: 'xfer_1', code: 'UNSAFE_PATH' });
    }
  });
});

describe('baseName', () => {
  it('should strip directories and trailing separators', () => {
    expect(baseName('/home/me/photos/')).toBe('photos');
    expect(baseName('/home/me/photos//')).toBe('photos');
    expect(baseName('notes.txt')).toBe('notes.txt');
    expect(baseName('/')).toBe('');
  });

  it.runIf(process.platform !== 'win32')('should keep backslashes in POSIX file names', () => {
    expect(baseName('/data/q1\\report.txt')).toBe('q1\\report.txt');
    expect(baseName('dir\\file.txt')).toBe('dir\\file.txt');
  });
});
