/**
 * Transfer Engine Context Types
 */

import type {
  Clock,
  Logger,
  ShutdownSignal,
  TransferFileSystem,
  TransferHooks,
} from '@filewire/core';

export interface TransferContext {
  fs: TransferFileSystem;
  /** Polled once per chunk; defaults to a signal that never fires */
  shutdown?: ShutdownSignal;
  hooks?: TransferHooks;
  logger?: Logger;
  /** Millisecond clock for chunk timing; defaults to `performance.now` */
  clock?: Clock;
  /** Generated when omitted */
  transferId?: string;
}

export interface ReceiveContext extends TransferContext {
  /** Every received path is resolved under this directory */
  baseDir: string;
}
