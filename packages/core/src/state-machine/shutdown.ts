/**
 * Shutdown State Machine
 *
 * Tracks interrupt requests for a running process and answers the
 * once-per-chunk `shouldShutdown()` poll made by the transfer engines.
 *
 *   running --INTERRUPT--> requested --ACKNOWLEDGE--> acknowledged
 *      requested | acknowledged --INTERRUPT--> forced
 */

import type { ShutdownDecision, ShutdownSignal } from '../types/transport.js';

export type ShutdownState = 'running' | 'requested' | 'acknowledged' | 'forced';

// ========== Transition Table ==========

const SHUTDOWN_TRANSITIONS: Record<ShutdownState, ShutdownState[]> = {
  running: ['requested'],
  requested: ['acknowledged', 'forced'],
  acknowledged: ['forced'],
  forced: [],
};

const DECISIONS: Record<ShutdownState, ShutdownDecision> = {
  running: 'continue',
  requested: 'promptOnce',
  acknowledged: 'continue',
  forced: 'forceExit',
};

export function isTerminalShutdownState(state: ShutdownState): boolean {
  return SHUTDOWN_TRANSITIONS[state].length === 0;
}

export function isValidShutdownTransition(from: ShutdownState, to: ShutdownState): boolean {
  return SHUTDOWN_TRANSITIONS[from].includes(to);
}

// ========== Events ==========

export type ShutdownEvent =
  | { type: 'INTERRUPT' }
  | { type: 'ACKNOWLEDGE' };

export interface ShutdownTransitionResult {
  success: boolean;
  newState: ShutdownState;
  error?: string;
}

// ========== State Machine ==========

export class ShutdownStateMachine implements ShutdownSignal {
  private state: ShutdownState;
  private interrupts = 0;

  constructor(initialState: ShutdownState = 'running') {
    this.state = initialState;
  }

  getState(): ShutdownState {
    return this.state;
  }

  /** Number of interrupts seen so far */
  getInterruptCount(): number {
    return this.interrupts;
  }

  isTerminal(): boolean {
    return isTerminalShutdownState(this.state);
  }

  /** True once any interrupt has been received */
  isRequested(): boolean {
    return this.state !== 'running';
  }

  /** Record one interrupt (SIGINT or an API stop request) */
  signal(): ShutdownTransitionResult {
    this.interrupts++;
    return this.transition({ type: 'INTERRUPT' });
  }

  shouldShutdown(): ShutdownDecision {
    return DECISIONS[this.state];
  }

  acknowledge(): void {
    if (this.state === 'requested') {
      this.transition({ type: 'ACKNOWLEDGE' });
    }
  }

  transition(event: ShutdownEvent): ShutdownTransitionResult {
    const targetState = this.getTargetState(event);

    if (!targetState) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid event ${event.type} for state ${this.state}`,
      };
    }

    if (!isValidShutdownTransition(this.state, targetState)) {
      return {
        success: false,
        newState: this.state,
        error: `Invalid transition from ${this.state} to ${targetState}`,
      };
    }

    this.state = targetState;
    return { success: true, newState: this.state };
  }

  private getTargetState(event: ShutdownEvent): ShutdownState | null {
    switch (event.type) {
      case 'INTERRUPT':
        if (this.state === 'running') return 'requested';
        return isTerminalShutdownState(this.state) ? null : 'forced';

      case 'ACKNOWLEDGE':
        return this.state === 'requested' ? 'acknowledged' : null;

      default:
        return null;
    }
  }
}
