/**
 * Local IPv4 networks and the host addresses inside them
 */

import * as os from 'node:os';

export interface LocalNetwork {
  interfaceName: string;
  address: string;
  netmask: string;
}

/** Subnets wider than a /24 are scanned only across the local /24 */
const WIDEST_SCANNED_MASK = 0xffffff00;

/**
 * Non-internal IPv4 interfaces, in the order the OS reports them.
 */
export function listLocalNetworks(
  interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces(),
): LocalNetwork[] {
  const networks: LocalNetwork[] = [];
  for (const [interfaceName, infos] of Object.entries(interfaces)) {
    for (const info of infos ?? []) {
      if (info.family === 'IPv4' && !info.internal && info.netmask) {
        networks.push({ interfaceName, address: info.address, netmask: info.netmask });
      }
    }
  }
  return networks;
}

export function parseIPv4(address: string): number | undefined {
  const parts = address.split('.');
  if (parts.length !== 4) return undefined;

  let value = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) return undefined;
    const octet = parseInt(part, 10);
    if (octet > 255) return undefined;
    value = value * 256 + octet;
  }
  return value;
}

export function formatIPv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join('.');
}

/**
 * Every usable host address of the network, without the network and
 * broadcast addresses and without the interface's own address.
 *
 * @example
 * hostsInNetwork({ address: '10.0.0.5', netmask: '255.255.255.252' }) // ['10.0.0.6']
 */
export function hostsInNetwork(network: Pick<LocalNetwork, 'address' | 'netmask'>): string[] {
  const address = parseIPv4(network.address);
  const netmask = parseIPv4(network.netmask);
  if (address === undefined || netmask === undefined) {
    return [];
  }

  const mask = (netmask < WIDEST_SCANNED_MASK ? WIDEST_SCANNED_MASK : netmask) >>> 0;
  const base = (address & mask) >>> 0;
  const broadcast = (base | ~mask) >>> 0;

  const hosts: string[] = [];
  for (let host = base + 1; host < broadcast; host++) {
    if (host !== address) {
      hosts.push(formatIPv4(host));
    }
  }
  return hosts;
}
