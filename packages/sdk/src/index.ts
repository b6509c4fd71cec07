/**
 * @filewire/sdk
 *
 * Sender client, sequential receiver server, receiver discovery, status API
 * and configuration.
 */

// ========== Configuration ==========

export {
  DEFAULT_RECEIVER,
  DEFAULT_SENDER,
  DEFAULT_DISCOVERY,
  resolveReceiverConfig,
  resolveSenderConfig,
  resolveDiscoveryConfig,
  loadEnvConfig,
  type ReceiverConfig,
  type ResolvedReceiverConfig,
  type SenderConfig,
  type ResolvedSenderConfig,
  type DiscoveryConfig,
  type ResolvedDiscoveryConfig,
  type LoadEnvOptions,
  type EnvConfig,
  type FilewireEnv,
} from './config.js';

// ========== Receiver ==========

export {
  ReceiverServer,
  type ReceiverServerOptions,
  type ReceiverServerEvents,
  type ReceiverStatus,
  type ActiveTransfer,
  type TransferRecord,
} from './receiver/receiver-server.js';

export {
  StatusServer,
  createStatusApp,
  statusRouter,
  type StatusSource,
  type StatusServerConfig,
} from './status/status-server.js';

// ========== Sender ==========

export {
  SenderClient,
  type SenderClientOptions,
  type SendRequest,
} from './sender/sender-client.js';

// ========== Discovery ==========

export {
  ReceiverScanner,
  checkService,
  type ReceiverScannerOptions,
  type ScanRequest,
  type DiscoveryResult,
  type DiscoveredReceiver,
} from './discovery/scanner.js';

export {
  listLocalNetworks,
  hostsInNetwork,
  parseIPv4,
  formatIPv4,
  type LocalNetwork,
} from './discovery/network.js';

// ========== CLI Support ==========

export { installInterruptHandler, type SignalSource } from './signals.js';
export { ProgressRenderer, type ProgressOutput } from './cli/progress.js';
export {
  parseArgs,
  UsageError,
  USAGE,
  type ParsedCommand,
  type ReceiveCommand,
  type SendCommand,
  type DiscoverCommand,
  type HelpCommand,
} from './cli/args.js';
