/**
 * filewire command-line arguments
 */

export interface ReceiveCommand {
  command: 'receive';
  port?: number;
  dir?: string;
  statusPort?: number;
  envFile?: string;
}

export interface SendCommand {
  command: 'send';
  host: string;
  source: string;
  targetDir?: string;
  port?: number;
  envFile?: string;
}

export interface DiscoverCommand {
  command: 'discover';
  port?: number;
  timeoutMs?: number;
  envFile?: string;
}

export interface HelpCommand {
  command: 'help';
}

export type ParsedCommand = ReceiveCommand | SendCommand | DiscoverCommand | HelpCommand;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `filewire - point-to-point file and directory transfer over TCP

Usage:
  filewire receive [--port <n>] [--dir <path>] [--status-port <n>] [--env-file <path>]
  filewire send <TARGET_IP> <FILE_OR_DIR_PATH> [TARGET_DIR] [--port <n>] [--env-file <path>]
  filewire discover [--timeout <ms>] [--port <n>] [--env-file <path>]
  filewire help

Options:
  --port <n>          TCP port (default 9876)
  --dir <path>        Directory received files are saved under (default: current directory)
  --status-port <n>   Serve GET /health and GET /status on 127.0.0.1:<n>
  --timeout <ms>      Per-host connect timeout for discover (default 1000)
  --env-file <path>   Read FILEWIRE_* settings from a .env file

Press Ctrl+C once to finish the current transfer and stop, twice to abort it.
`;

function parsePort(flag: string, value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new UsageError(`${flag} expects a port number`);
  }
  const port = parseInt(value, 10);
  if (port > 65535) {
    throw new UsageError(`${flag} must be between 0 and 65535`);
  }
  return port;
}

function parseTimeout(flag: string, value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value) || parseInt(value, 10) === 0) {
    throw new UsageError(`${flag} expects a positive number of milliseconds`);
  }
  return parseInt(value, 10);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} expects a value`);
  }
  return value;
}

/**
 * @throws UsageError on unknown commands, unknown flags or missing operands
 */
export function parseArgs(args: string[]): ParsedCommand {
  const [command, ...rest] = args;

  switch (command) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help' };
    case 'receive':
    case 'send':
    case 'discover':
      break;
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }

  const positionals: string[] = [];
  let port: number | undefined;
  let dir: string | undefined;
  let statusPort: number | undefined;
  let timeoutMs: number | undefined;
  let envFile: string | undefined;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const nextArg = rest[i + 1];

    switch (arg) {
      case '--help':
      case '-h':
        return { command: 'help' };
      case '--port':
        port = parsePort(arg, nextArg);
        i++;
        break;
      case '--dir':
        dir = requireValue(arg, nextArg);
        i++;
        break;
      case '--status-port':
        statusPort = parsePort(arg, nextArg);
        i++;
        break;
      case '--timeout':
        timeoutMs = parseTimeout(arg, nextArg);
        i++;
        break;
      case '--env-file':
        envFile = requireValue(arg, nextArg);
        i++;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  if (timeoutMs !== undefined && command !== 'discover') {
    throw new UsageError('--timeout only applies to discover');
  }
  if (command === 'receive') {
    if (positionals.length > 0) {
      throw new UsageError(`Unexpected argument: ${positionals[0]}`);
    }
    return { command, port, dir, statusPort, envFile };
  }

  if (dir !== undefined || statusPort !== undefined) {
    throw new UsageError('--dir and --status-port only apply to receive');
  }
  if (command === 'discover') {
    if (positionals.length > 0) {
      throw new UsageError(`Unexpected argument: ${positionals[0]}`);
    }
    return { command, port, timeoutMs, envFile };
  }

  const [host, source, targetDir, extra] = positionals;
  if (host === undefined || source === undefined) {
    throw new UsageError('send requires <TARGET_IP> and <FILE_OR_DIR_PATH>');
  }
  if (extra !== undefined) {
    throw new UsageError(`Unexpected argument: ${extra}`);
  }
  return { command, host, source, targetDir, port, envFile };
}
