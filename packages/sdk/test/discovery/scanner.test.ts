import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { once } from 'node:events';
import * as net from 'node:net';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilewireError, silentLogger } from '@filewire/core';
import { ReceiverScanner, checkService, type DiscoveredReceiver } from '../../src/discovery/scanner.js';
import { ReceiverServer } from '../../src/receiver/receiver-server.js';

async function listen(server: net.Server): Promise<number> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  return address && typeof address === 'object' ? address.port : 0;
}

async function unusedPort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

describe('checkService', () => {
  let server: net.Server;
  let port: number;

  beforeEach(async () => {
    server = net.createServer((socket) => socket.destroy());
    port = await listen(server);
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should report the connect latency of a listening port', async () => {
    let now = 100;
    const latency = await checkService('127.0.0.1', port, 1000, () => (now += 5));

    expect(latency).toBe(5);
  });

  it('should report null for a closed port', async () => {
    expect(await checkService('127.0.0.1', await unusedPort(), 1000)).toBeNull();
  });
});

describe('ReceiverScanner', () => {
  let workDir: string;
  let receiver: ReceiverServer;
  let port: number;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'filewire-discovery-'));
    receiver = new ReceiverServer({
      config: { port: 0, host: '127.0.0.1', receiveDir: workDir },
      logger: silentLogger,
    });
    await receiver.start();
    port = receiver.address?.port ?? 0;
  });

  afterEach(async () => {
    await receiver.stop();
    await rm(workDir, { recursive: true, force: true });
  });

  it('should find a running receiver', async () => {
    const found: DiscoveredReceiver[] = [];
    const scanner = new ReceiverScanner({
      config: { port, timeoutMs: 1000 },
      logger: silentLogger,
      onFound: (receiverInfo) => found.push(receiverInfo),
    });
    const failed = once(receiver, 'transfer:failed');

    const result = await scanner.scan({ hosts: ['127.0.0.1'] });

    expect(result.networks).toEqual([]);
    expect(result.scanned).toBe(1);
    expect(result.receivers).toHaveLength(1);
    expect(result.receivers[0]).toMatchObject({ host: '127.0.0.1', port });
    expect(found).toEqual(result.receivers);

    const [, error] = await failed;
    expect(error).toBeInstanceOf(FilewireError);
    expect(receiver.getStatus().failed).toBe(1);
  });

  it('should report nothing when no receiver listens', async () => {
    const scanner = new ReceiverScanner({
      config: { port: await unusedPort(), timeoutMs: 500, concurrency: 2 },
      logger: silentLogger,
    });

    const result = await scanner.scan({ hosts: ['127.0.0.1'] });

    expect(result).toEqual({ networks: [], scanned: 1, receivers: [] });
  });

  it('should sweep the hosts of the given networks', async () => {
    const network = { interfaceName: 'test0', address: '127.0.0.5', netmask: '255.255.255.252' };
    const scanner = new ReceiverScanner({
      config: { port: await unusedPort(), timeoutMs: 200 },
      logger: silentLogger,
    });

    const result = await scanner.scan({ networks: [network] });

    expect(result).toEqual({ networks: [network], scanned: 1, receivers: [] });
  });
});
