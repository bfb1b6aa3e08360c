import { EventEmitter } from 'node:events';
import { logger } from '@tessera/shared';

const log = logger.child({ module: 'cycle-state' });

export type CycleState = 'awaiting_model' | 'resolving_tools' | 'awaiting_approval' | 'done' | 'aborted';

/**
 * awaiting_model    → resolving_tools | done | aborted
 * resolving_tools   → awaiting_approval | awaiting_model | aborted
 * awaiting_approval → resolving_tools | aborted
 * done, aborted     → (terminal)
 */
const VALID_TRANSITIONS: Record<CycleState, Set<CycleState>> = {
  awaiting_model: new Set(['resolving_tools', 'done', 'aborted']),
  resolving_tools: new Set(['awaiting_approval', 'awaiting_model', 'aborted']),
  awaiting_approval: new Set(['resolving_tools', 'aborted']),
  done: new Set(),
  aborted: new Set(),
};

export class CycleStateMachine extends EventEmitter {
  private _state: CycleState = 'awaiting_model';

  constructor(readonly conversationId: string) {
    super();
  }

  get state(): CycleState {
    return this._state;
  }

  get isTerminal(): boolean {
    return VALID_TRANSITIONS[this._state].size === 0;
  }

  canTransition(to: CycleState): boolean {
    return VALID_TRANSITIONS[this._state].has(to);
  }

  transition(to: CycleState): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid state transition: ${this._state} -> ${to}`);
    }
    log.debug({ conversationId: this.conversationId, from: this._state, to }, 'state transition');
    const from = this._state;
    this._state = to;
    this.emit('transition', to, from);
    this.emit(to);
  }
}
