/**
 * Target Directory & Path Safety
 *
 * Send side: `validateTargetDirectory` screens the user-supplied destination
 * before a single byte goes out. Receive side: `resolveInside` screens every
 * path that arrives off the wire, since the peer is not trusted.
 */

import * as path from 'node:path';
import { InvalidTargetDirectoryError, UnsafePathError } from '@filewire/core';

/** Longest accepted target directory, in characters */
export const MAX_TARGET_DIR_LENGTH = 4094;

/**
 * Returns the sanitised target directory ('' for none).
 *
 * @throws InvalidTargetDirectoryError on `..`, a leading `/`, or a path
 *   longer than `maxLength`
 */
export function validateTargetDirectory(
  input: string,
  maxLength: number = MAX_TARGET_DIR_LENGTH,
): string {
  if (input.length === 0) {
    return '';
  }
  if (input.includes('..')) {
    throw new InvalidTargetDirectoryError(input, 'traversal');
  }
  if (input.startsWith('/')) {
    throw new InvalidTargetDirectoryError(input, 'absolute');
  }

  const clean = input.replace(/^\/+/, '');
  if (clean.length > maxLength) {
    throw new InvalidTargetDirectoryError(input, 'too-long');
  }
  return clean;
}

/**
 * Join an untrusted relative path onto `root` and make sure the result stays
 * under it. `root` itself is only accepted when `allowRoot` is set.
 */
export function resolveInside(
  root: string,
  untrusted: string,
  allowRoot: boolean = false,
  transferId?: string,
): string {
  const normalizedRoot = path.resolve(root);
  const resolved = path.resolve(normalizedRoot, untrusted);

  if (resolved === normalizedRoot) {
    if (allowRoot) return resolved;
    throw new UnsafePathError(untrusted, transferId);
  }
  if (untrusted.includes('\0') || !resolved.startsWith(normalizedRoot + path.sep)) {
    throw new UnsafePathError(untrusted, transferId);
  }
  return resolved;
}

/**
 * Last path component with trailing separators stripped. Only the host
 * platform's separators split, so `\\` is part of a POSIX file name.
 *
 * @example
 * baseName('/home/me/photos/') // "photos"
 * baseName('notes.txt')        // "notes.txt"
 */
export function baseName(sourcePath: string): string {
  return path.basename(sourcePath);
}
