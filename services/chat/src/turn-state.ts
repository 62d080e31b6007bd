import { EventEmitter } from 'node:events';

export type TurnState =
  | 'start'
  | 'deciding'
  | 'responding'
  | 'invoking'
  | 'awaiting'
  | 'done'
  | 'failed';

/**
 * Valid state transitions for a single agent turn.
 * Maps from current state to the set of valid next states.
 */
const VALID_TRANSITIONS: Record<TurnState, Set<TurnState>> = {
  start: new Set(['deciding']),
  deciding: new Set(['responding', 'invoking', 'failed']),
  invoking: new Set(['awaiting', 'failed']),
  awaiting: new Set(['deciding', 'failed']),
  responding: new Set(['done']),
  done: new Set(),
  failed: new Set(),
};

export class TurnStateMachine extends EventEmitter {
  private _state: TurnState = 'start';
  private readonly _history: TurnState[] = ['start'];

  get state(): TurnState {
    return this._state;
  }

  /** Every state visited so far, in order. */
  get history(): readonly TurnState[] {
    return this._history;
  }

  get isTerminal(): boolean {
    return this._state === 'done' || this._state === 'failed';
  }

  transition(to: TurnState): void {
    const allowed = VALID_TRANSITIONS[this._state];
    if (!allowed.has(to)) {
      throw new Error(`Invalid state transition: ${this._state} -> ${to}`);
    }
    this._state = to;
    this._history.push(to);
    this.emit(to);
  }
}
