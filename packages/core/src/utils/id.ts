/**
 * ID Generation Utilities
 */

import { randomBytes } from 'node:crypto';

export type IdLength = 'short' | 'medium' | 'long';

const LENGTH_CONFIG: Record<IdLength, number> = {
  short: 8,
  medium: 12,
  long: 16,
};

export interface GenerateIdOptions {
  prefix?: string;
  length?: IdLength;
}

/**
 * Hex id with an optional `prefix_` in front.
 *
 * @example
 * generateId() // "3f9c01ab77d2"
 * generateId({ prefix: 'xfer', length: 'short' }) // "xfer_3f9c01ab"
 */
export function generateId(options: GenerateIdOptions = {}): string {
  const { prefix, length = 'medium' } = options;
  const chars = LENGTH_CONFIG[length];
  const id = randomBytes(Math.ceil(chars / 2)).toString('hex').slice(0, chars);
  return prefix ? `${prefix}_${id}` : id;
}

/**
 * Id attached to one connection's transfer, used in logs and the status API.
 */
export function generateTransferId(length: IdLength = 'medium'): string {
  return generateId({ prefix: 'xfer', length });
}
