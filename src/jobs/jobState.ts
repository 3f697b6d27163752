import { createInternalError } from '../errors.js';
import type { Clock, PipelineStage, TerminalStatus } from '../types.js';

export type JobState =
  | 'pending'
  | 'initializing'
  | 'fetching'
  | 'processing'
  | 'extracting'
  | 'finalizing'
  | TerminalStatus;

export const STAGE_STATES: Readonly<Record<PipelineStage, JobState>> = {
  initialize: 'initializing',
  fetch: 'fetching',
  process: 'processing',
  extract: 'extracting',
  finalize: 'finalizing',
};

const FORWARD_TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
  pending: ['initializing'],
  initializing: ['fetching'],
  fetching: ['processing'],
  processing: ['extracting'],
  extracting: ['finalizing'],
  finalizing: ['completed'],
  completed: [],
  cancelled: [],
  failed: [],
};

export interface JobStateChange {
  from: JobState;
  to: JobState;
  at: number;
}

export function isTerminalState(state: JobState): state is TerminalStatus {
  return state === 'completed' || state === 'cancelled' || state === 'failed';
}

/**
 * Lifecycle of one job. Stages advance strictly in order; `cancelled` and
 * `failed` are reachable from every non-terminal state.
 */
export class JobStateMachine {
  private state: JobState = 'pending';
  private readonly changes: JobStateChange[] = [];

  constructor(private readonly clock: Clock = Date.now) {}

  get current(): JobState {
    return this.state;
  }

  get history(): readonly JobStateChange[] {
    return this.changes;
  }

  get isTerminal(): boolean {
    return isTerminalState(this.state);
  }

  canTransition(to: JobState): boolean {
    if (isTerminalState(this.state)) {
      return false;
    }

    if (to === 'cancelled' || to === 'failed') {
      return true;
    }

    return FORWARD_TRANSITIONS[this.state].includes(to);
  }

  transition(to: JobState): void {
    if (!this.canTransition(to)) {
      throw createInternalError(`Illegal job state transition ${this.state} -> ${to}`, {
        from: this.state,
        to,
      });
    }

    this.changes.push({ from: this.state, to, at: this.clock() });
    this.state = to;
  }
}
