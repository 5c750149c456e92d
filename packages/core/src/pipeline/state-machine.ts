/**
 * Pipeline State Machine
 *
 * Validates state transitions for the local build pipeline.
 *
 * ```
 * init → checking_deps → syncing → managed_build → collecting
 *      → copying_protos → systems_build → testing → done
 * ```
 *
 * Every non-terminal state may also move straight to `aborted` (fatal
 * failure or host interrupt). `done` and `aborted` are terminal.
 *
 * @module @libforge/core/pipeline/state-machine
 */

import type { PipelineState } from './types.js';

// =============================================================================
// State Machine Configuration
// =============================================================================

const STATE_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  init: ['checking_deps', 'aborted'],
  checking_deps: ['syncing', 'aborted'],
  syncing: ['managed_build', 'aborted'],
  managed_build: ['collecting', 'aborted'],
  collecting: ['copying_protos', 'aborted'],
  copying_protos: ['systems_build', 'aborted'],
  systems_build: ['testing', 'aborted'],
  testing: ['done', 'aborted'],
  done: [], // terminal
  aborted: [], // terminal
};

const TERMINAL_STATES: ReadonlySet<PipelineState> = new Set(['done', 'aborted']);

// =============================================================================
// State Machine Functions
// =============================================================================

export function isValidTransition(from: PipelineState, to: PipelineState): boolean {
  return STATE_TRANSITIONS[from].includes(to);
}

/**
 * @throws {InvalidTransitionError} If the transition is not allowed
 */
export function validateTransition(from: PipelineState, to: PipelineState): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function getNextValidStates(current: PipelineState): PipelineState[] {
  return [...STATE_TRANSITIONS[current]];
}

export function isTerminalState(state: PipelineState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Tracks the current state of one pipeline run
 */
export class PipelineStateMachine {
  private current: PipelineState = 'init';
  private readonly history: PipelineState[] = ['init'];

  get state(): PipelineState {
    return this.current;
  }

  /** States visited so far, including the current one */
  get visited(): readonly PipelineState[] {
    return this.history;
  }

  transition(to: PipelineState): void {
    validateTransition(this.current, to);
    this.current = to;
    this.history.push(to);
  }
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Thrown when an invalid state transition is attempted
 */
export class InvalidTransitionError extends Error {
  readonly name = 'InvalidTransitionError';

  constructor(
    public readonly from: PipelineState,
    public readonly to: PipelineState
  ) {
    const validStates = STATE_TRANSITIONS[from];
    const validTransitions = validStates.length > 0
      ? validStates.join(', ')
      : '(none - terminal state)';

    super(`Invalid state transition: ${from} -> ${to}. Valid transitions from ${from}: ${validTransitions}`);
  }

  isTerminalStateError(): boolean {
    return isTerminalState(this.from);
  }
}
