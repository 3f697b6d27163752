import { describe, expect, it } from 'vitest';

import { JobStateMachine, isTerminalState } from '../src/jobs/jobState.js';
import { manualClock } from './helpers/fakes.js';

describe('JobStateMachine', () => {
  it('walks the stages in order and records each change', () => {
    const clock = manualClock();
    const machine = new JobStateMachine(clock.now);

    for (const state of ['initializing', 'fetching', 'processing', 'extracting', 'finalizing', 'completed'] as const) {
      clock.advance(10);
      machine.transition(state);
    }

    expect(machine.current).toBe('completed');
    expect(machine.isTerminal).toBe(true);
    expect(machine.history.map((change) => change.to)).toEqual([
      'initializing',
      'fetching',
      'processing',
      'extracting',
      'finalizing',
      'completed',
    ]);
    expect(machine.history[0]?.from).toBe('pending');
  });

  it('rejects skipped stages', () => {
    const machine = new JobStateMachine();
    machine.transition('initializing');

    expect(machine.canTransition('processing')).toBe(false);
    expect(() => machine.transition('processing')).toThrowError(
      'Illegal job state transition initializing -> processing',
    );
  });

  it('allows cancellation and failure from any live state', () => {
    const pending = new JobStateMachine();
    pending.transition('cancelled');
    expect(pending.current).toBe('cancelled');

    const fetching = new JobStateMachine();
    fetching.transition('initializing');
    fetching.transition('fetching');
    fetching.transition('failed');
    expect(fetching.current).toBe('failed');
  });

  it('freezes terminal states', () => {
    const machine = new JobStateMachine();
    machine.transition('failed');

    expect(machine.canTransition('cancelled')).toBe(false);
    expect(() => machine.transition('initializing')).toThrowError(/Illegal job state transition/);
    expect(isTerminalState(machine.current)).toBe(true);
  });
});
