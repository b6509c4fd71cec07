/**
 * @filewire/core
 *
 * Wire types, error taxonomy, shutdown state machine and shared utilities
 */

// Types
export * from './types/index.js';

// Utils
export * from './utils/index.js';

// State Machine - Shutdown
export {
  ShutdownStateMachine,
  isTerminalShutdownState,
  isValidShutdownTransition,
  type ShutdownState,
  type ShutdownEvent,
  type ShutdownTransitionResult,
} from './state-machine/index.js';

// Errors
export * from './errors/index.js';
