#!/usr/bin/env node
/**
 * filewire CLI
 *
 * Usage:
 *   filewire receive [--port 9876] [--dir ./inbox] [--status-port 9877]
 *   filewire send 192.168.1.20 ./photos backups/
 *   filewire discover [--timeout 1000]
 */

import { once } from 'node:events';
import {
  FilewireError,
  ShutdownStateMachine,
  createLogger,
  describeError,
  formatBytes,
  formatDuration,
  type Logger,
} from '@filewire/core';
import {
  parseArgs,
  UsageError,
  USAGE,
  type DiscoverCommand,
  type ParsedCommand,
  type ReceiveCommand,
  type SendCommand,
} from '../cli/args.js';
import { ProgressRenderer } from '../cli/progress.js';
import { loadEnvConfig, type EnvConfig } from '../config.js';
import { ReceiverScanner } from '../discovery/scanner.js';
import { ReceiverServer } from '../receiver/receiver-server.js';
import { SenderClient } from '../sender/sender-client.js';
import { installInterruptHandler } from '../signals.js';
import { StatusServer } from '../status/status-server.js';

function reportError(logger: Logger, error: unknown): void {
  if (error instanceof FilewireError) {
    logger.error(`${error.message} [${error.code}]`);
    if (error.hint) {
      logger.error(`Hint: ${error.hint}`);
    }
  } else {
    logger.error(describeError(error));
  }
}

async function runReceive(cmd: ReceiveCommand, env: EnvConfig): Promise<number> {
  const progress = new ProgressRenderer();
  const receiver = new ReceiverServer({
    config: {
      ...env.receiver,
      port: cmd.port ?? env.receiver.port,
      receiveDir: cmd.dir ?? env.receiver.receiveDir,
      statusPort: cmd.statusPort ?? env.receiver.statusPort,
    },
    hooks: progress.hooks(),
  });
  const logger = createLogger('CLI', { level: receiver.config.logLevel });

  const stopped = once(receiver, 'stopped');
  receiver.on('transfer:failed', () => progress.finish());
  await receiver.start();

  let status: StatusServer | undefined;
  if (receiver.config.statusPort !== undefined) {
    status = new StatusServer(receiver, {
      port: receiver.config.statusPort,
      logger: createLogger('Status', { level: receiver.config.logLevel }),
    });
    await status.start();
  }

  const uninstall = installInterruptHandler(() => {
    progress.finish();
    receiver.handleInterrupt();
  });

  try {
    await stopped;
  } finally {
    uninstall();
    await status?.stop().catch((err: unknown) => reportError(logger, err));
  }

  return receiver.shutdown.getState() === 'forced' ? 1 : 0;
}

async function runSend(cmd: SendCommand, env: EnvConfig): Promise<number> {
  const progress = new ProgressRenderer();
  const shutdown = new ShutdownStateMachine();
  const sender = new SenderClient({
    config: {
      ...env.sender,
      port: cmd.port ?? env.sender.port,
    },
    shutdown,
    hooks: progress.hooks(),
  });
  const logger = createLogger('CLI', { level: sender.config.logLevel });

  const uninstall = installInterruptHandler(() => {
    shutdown.signal();
    if (shutdown.getState() === 'forced') {
      progress.finish();
      logger.error('Forced exit! File may be incomplete.');
      process.exit(1);
    }
  });

  try {
    const result = await sender.send({
      host: cmd.host,
      source: cmd.source,
      targetDir: cmd.targetDir,
    });
    const files = result.kind === 'directory' || result.kind === 'target-directory' ? result.files : 1;
    logger.info(
      `Transfer complete: ${files} file(s), ${formatBytes(result.bytes)} in ${formatDuration(result.durationMs / 1000)}`,
    );
    return 0;
  } catch (error) {
    progress.finish();
    reportError(logger, error);
    return 1;
  } finally {
    uninstall();
  }
}

async function runDiscover(cmd: DiscoverCommand, env: EnvConfig): Promise<number> {
  const scanner = new ReceiverScanner({
    config: {
      ...env.discovery,
      port: cmd.port ?? env.discovery.port,
      timeoutMs: cmd.timeoutMs ?? env.discovery.timeoutMs,
    },
  });
  const logger = createLogger('CLI', { level: scanner.config.logLevel });

  const result = await scanner.scan();
  if (result.networks.length === 0) {
    logger.warn('No non-internal IPv4 interface found');
  }
  return 0;
}

async function main(): Promise<number> {
  const logger = createLogger('CLI');

  let parsed: ParsedCommand;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(error.message);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  if (parsed.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  let env: EnvConfig;
  try {
    env = loadEnvConfig({ envFile: parsed.envFile });
  } catch (error) {
    reportError(logger, error);
    return 1;
  }

  if (parsed.command === 'receive') {
    try {
      return await runReceive(parsed, env);
    } catch (error) {
      reportError(logger, error);
      return 1;
    }
  }
  if (parsed.command === 'discover') {
    try {
      return await runDiscover(parsed, env);
    } catch (error) {
      reportError(logger, error);
      return 1;
    }
  }
  return runSend(parsed, env);
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('[Filewire:CLI] Fatal error:', error);
    process.exit(1);
  });
