/**
 * filewire Configuration
 *
 * Defaults, resolution and `.env` loading for the sender, the receiver and
 * receiver discovery.
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import {
  DEFAULT_PORT,
  ConfigurationError,
  LOG_LEVELS,
  describeError,
  type LogLevel,
} from '@filewire/core';

// ========== Receiver ==========

export interface ReceiverConfig {
  port?: number;
  host?: string;
  /** Root every received path is resolved under */
  receiveDir?: string;
  /** Port for the status HTTP API; disabled when unset */
  statusPort?: number;
  /** Finished transfers kept for `GET /status` */
  historyLimit?: number;
  logLevel?: LogLevel;
}

export const DEFAULT_RECEIVER = {
  port: DEFAULT_PORT,
  host: '0.0.0.0',
  receiveDir: '.',
  historyLimit: 50,
  logLevel: 'info',
} as const;

export interface ResolvedReceiverConfig {
  port: number;
  host: string;
  receiveDir: string;
  statusPort?: number;
  historyLimit: number;
  logLevel: LogLevel;
}

export function resolveReceiverConfig(config: ReceiverConfig = {}): ResolvedReceiverConfig {
  return {
    port: config.port ?? DEFAULT_RECEIVER.port,
    host: config.host ?? DEFAULT_RECEIVER.host,
    receiveDir: path.resolve(config.receiveDir ?? DEFAULT_RECEIVER.receiveDir),
    statusPort: config.statusPort,
    historyLimit: config.historyLimit ?? DEFAULT_RECEIVER.historyLimit,
    logLevel: config.logLevel ?? DEFAULT_RECEIVER.logLevel,
  };
}

// ========== Sender ==========

export interface SenderConfig {
  port?: number;
  connectTimeoutMs?: number;
  logLevel?: LogLevel;
}

export const DEFAULT_SENDER = {
  port: DEFAULT_PORT,
  connectTimeoutMs: 10000,   // 10 seconds
  logLevel: 'info',
} as const;

export type ResolvedSenderConfig = Required<SenderConfig>;

export function resolveSenderConfig(config: SenderConfig = {}): ResolvedSenderConfig {
  return {
    port: config.port ?? DEFAULT_SENDER.port,
    connectTimeoutMs: config.connectTimeoutMs ?? DEFAULT_SENDER.connectTimeoutMs,
    logLevel: config.logLevel ?? DEFAULT_SENDER.logLevel,
  };
}

// ========== Discovery ==========

export interface DiscoveryConfig {
  /** Port a receiver is expected on */
  port?: number;
  /** Per-host connect timeout */
  timeoutMs?: number;
  /** Hosts checked at the same time */
  concurrency?: number;
  logLevel?: LogLevel;
}

export const DEFAULT_DISCOVERY = {
  port: DEFAULT_PORT,
  timeoutMs: 1000,
  concurrency: 64,
  logLevel: 'info',
} as const;

export type ResolvedDiscoveryConfig = Required<DiscoveryConfig>;

export function resolveDiscoveryConfig(config: DiscoveryConfig = {}): ResolvedDiscoveryConfig {
  return {
    port: config.port ?? DEFAULT_DISCOVERY.port,
    timeoutMs: config.timeoutMs ?? DEFAULT_DISCOVERY.timeoutMs,
    concurrency: Math.max(1, config.concurrency ?? DEFAULT_DISCOVERY.concurrency),
    logLevel: config.logLevel ?? DEFAULT_DISCOVERY.logLevel,
  };
}

// ========== Environment ==========

const portSchema = z.coerce.number().int().min(0).max(65535);

const envSchema = z.object({
  FILEWIRE_PORT: portSchema.optional(),
  FILEWIRE_HOST: z.string().optional(),
  FILEWIRE_RECEIVE_DIR: z.string().optional(),
  FILEWIRE_STATUS_PORT: portSchema.optional(),
  FILEWIRE_HISTORY_LIMIT: z.coerce.number().int().positive().optional(),
  FILEWIRE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  FILEWIRE_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  FILEWIRE_DISCOVERY_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export type FilewireEnv = z.infer<typeof envSchema>;

export interface LoadEnvOptions {
  /** `.env` file read with dotenv; a missing file is an error */
  envFile?: string;
  /** Defaults to `process.env`; wins over the file */
  env?: Record<string, string | undefined>;
}

export interface EnvConfig {
  receiver: ReceiverConfig;
  sender: SenderConfig;
  discovery: DiscoveryConfig;
}

/**
 * Read FILEWIRE_* settings from an optional `.env` file and the environment.
 *
 * The environment is never mutated. Empty values count as unset.
 *
 * @throws ConfigurationError when the file cannot be read or a value is invalid
 */
export function loadEnvConfig(options: LoadEnvOptions = {}): EnvConfig {
  let fromFile: Record<string, string> = {};
  if (options.envFile) {
    try {
      fromFile = parseDotenv(readFileSync(options.envFile));
    } catch (error) {
      throw new ConfigurationError(`Cannot read env file ${options.envFile}`, [describeError(error)]);
    }
  }

  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries({ ...fromFile, ...(options.env ?? process.env) })) {
    if (key.startsWith('FILEWIRE_') && value !== undefined && value !== '') {
      merged[key] = value;
    }
  }

  const parsed = envSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid filewire environment',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const env = parsed.data;
  return {
    receiver: {
      port: env.FILEWIRE_PORT,
      host: env.FILEWIRE_HOST,
      receiveDir: env.FILEWIRE_RECEIVE_DIR,
      statusPort: env.FILEWIRE_STATUS_PORT,
      historyLimit: env.FILEWIRE_HISTORY_LIMIT,
      logLevel: env.FILEWIRE_LOG_LEVEL,
    },
    sender: {
      port: env.FILEWIRE_PORT,
      connectTimeoutMs: env.FILEWIRE_CONNECT_TIMEOUT_MS,
      logLevel: env.FILEWIRE_LOG_LEVEL,
    },
    discovery: {
      port: env.FILEWIRE_PORT,
      timeoutMs: env.FILEWIRE_DISCOVERY_TIMEOUT_MS,
      logLevel: env.FILEWIRE_LOG_LEVEL,
    },
  };
}
