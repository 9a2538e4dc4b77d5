/**
 * sessionState.ts — Lifecycle state machine of the browser session.
 *
 *   uninitialized → bootstrapping → ready ⇄ degraded → bootstrapping (re-auth)
 *   ready | degraded → shutting-down → closed
 *
 * A failed bootstrap falls back to `uninitialized` (first attempt) or
 * `degraded` (re-auth).  `closed` is terminal.
 */

import type { SessionState } from '../core/types';
import { Logger } from '../core/logger';

const logger = new Logger('SessionState');

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  uninitialized: ['bootstrapping', 'shutting-down'],
  bootstrapping: ['ready', 'uninitialized', 'degraded', 'shutting-down'],
  ready: ['degraded', 'shutting-down'],
  degraded: ['bootstrapping', 'ready', 'shutting-down'],
  'shutting-down': ['closed'],
  closed: [],
};

export class IllegalTransitionError extends Error {
  constructor(readonly from: SessionState, readonly to: SessionState) {
    super(`Illegal session transition ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class SessionStateMachine {
  private current: SessionState = 'uninitialized';
  /** Set while a re-auth bootstrap is running, so failure returns to degraded. */
  private reauth = false;

  get state(): SessionState {
    return this.current;
  }

  canTransition(to: SessionState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: SessionState, reason?: string): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    if (to === 'bootstrapping') {
      this.reauth = this.current === 'degraded';
    }
    logger.info(`${this.current} → ${to}${reason ? ` (${reason})` : ''}`);
    this.current = to;
  }

  /** Where a failed bootstrap lands. */
  failureState(): SessionState {
    return this.reauth ? 'degraded' : 'uninitialized';
  }

  isTerminal(): boolean {
    return this.current === 'shutting-down' || this.current === 'closed';
  }
}
