/**
 * Receiver Discovery
 *
 * Finds filewire receivers on the local networks by opening a TCP
 * connection to the filewire port of every host, a bounded number at a
 * time. A host counts as a receiver when the connection is accepted within
 * the timeout; the connection is closed right away without sending a magic
 * number, so the receiver records it as a failed transfer.
 */

import * as net from 'node:net';
import { createLogger, type Clock, type Logger } from '@filewire/core';
import { defaultClock } from '@filewire/transport-tcp';
import { resolveDiscoveryConfig, type DiscoveryConfig, type ResolvedDiscoveryConfig } from '../config.js';
import { hostsInNetwork, listLocalNetworks, type LocalNetwork } from './network.js';

export interface DiscoveredReceiver {
  host: string;
  port: number;
  /** Time until the connection was accepted */
  latencyMs: number;
}

export interface DiscoveryResult {
  networks: LocalNetwork[];
  /** Number of hosts checked */
  scanned: number;
  /** In scan order */
  receivers: DiscoveredReceiver[];
}

export interface ScanRequest {
  /** Check exactly these hosts instead of the local networks */
  hosts?: string[];
  /** Networks to sweep; defaults to every local IPv4 network */
  networks?: LocalNetwork[];
}

export interface ReceiverScannerOptions {
  config?: DiscoveryConfig;
  logger?: Logger;
  clock?: Clock;
  onFound?: (receiver: DiscoveredReceiver) => void;
}

/**
 * Resolves with the connect latency, or `null` when the host refused,
 * failed or did not answer within `timeoutMs`.
 */
export function checkService(
  host: string,
  port: number,
  timeoutMs: number,
  clock: Clock = defaultClock,
): Promise<number | null> {
  const startedAt = clock();

  return new Promise((resolve) => {
    const socket = net.connect({ host, port });
    const finish = (latencyMs: number | null) => {
      socket.destroy();
      resolve(latencyMs);
    };

    socket.setTimeout(timeoutMs, () => finish(null));
    socket.once('error', () => finish(null));
    socket.once('connect', () => finish(clock() - startedAt));
  });
}

export class ReceiverScanner {
  readonly config: ResolvedDiscoveryConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly options: ReceiverScannerOptions = {}) {
    this.config = resolveDiscoveryConfig(options.config);
    this.logger = options.logger ?? createLogger('Discovery', { level: this.config.logLevel });
    this.clock = options.clock ?? defaultClock;
  }

  async scan(request: ScanRequest = {}): Promise<DiscoveryResult> {
    const networks = request.hosts ? [] : (request.networks ?? listLocalNetworks());
    const hosts = request.hosts ?? [...new Set(networks.flatMap((network) => hostsInNetwork(network)))];
    const { port, timeoutMs, concurrency } = this.config;

    for (const network of networks) {
      this.logger.info(`Scanning ${network.interfaceName}: ${network.address}/${network.netmask}`);
    }
    this.logger.info(`Checking ${hosts.length} host(s) for filewire receivers on port ${port}...`);

    const found = new Map<string, DiscoveredReceiver>();
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < hosts.length) {
        const host = hosts[next];
        next++;
        if (host === undefined) break;

        const latencyMs = await checkService(host, port, timeoutMs, this.clock);
        if (latencyMs === null) continue;

        const receiver: DiscoveredReceiver = { host, port, latencyMs };
        found.set(host, receiver);
        this.logger.info(`  filewire receiver on ${host} (${latencyMs.toFixed(1)} ms)`);
        this.options.onFound?.(receiver);
      }
    };
    await Promise.all(Array.from({ length: Math.min(concurrency, hosts.length) }, () => worker()));

    const receivers = hosts.flatMap((host) => {
      const receiver = found.get(host);
      return receiver ? [receiver] : [];
    });
    this.logger.info(`Discovery completed. ${receivers.length} receiver(s) found on port ${port}.`);

    return { networks, scanned: hosts.length, receivers };
  }
}
