import { describe, expect, it, vi } from 'vitest';

import { JobCancelledError, isCancellationError } from '../src/errors.js';
import { CancellationToken } from '../src/jobs/cancellation.js';

describe('CancellationToken', () => {
  it('starts uncancelled and lets checkpoints pass', () => {
    const token = new CancellationToken('job-1');

    expect(token.isCancelled()).toBe(false);
    expect(token.signal.aborted).toBe(false);
    expect(() => token.throwIfCancelled()).not.toThrow();
  });

  it('fires once and remembers the reason', () => {
    const token = new CancellationToken('job-1');

    expect(token.cancel('user request')).toBe(true);
    expect(token.cancel('second request')).toBe(false);
    expect(token.reason).toBe('user request');
    expect(token.signal.aborted).toBe(true);
    expect(token.cancelledAt).not.toBeNull();
  });

  it('throws a cancellation error at the next checkpoint', () => {
    const token = new CancellationToken('job-1');
    token.cancel('user request');

    let thrown: unknown;
    try {
      token.throwIfCancelled({ stage: 'fetch' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(JobCancelledError);
    expect(isCancellationError(thrown)).toBe(true);
    expect(thrown instanceof JobCancelledError && thrown.details).toEqual({
      label: 'job-1',
      stage: 'fetch',
    });
    expect(thrown instanceof Error && thrown.message).toBe(
      'Crawl operation was cancelled: user request',
    );
  });

  it('notifies listeners, including ones added after the fact', () => {
    const token = new CancellationToken();
    const early = vi.fn();
    const removed = vi.fn();

    token.onCancel(early);
    const unsubscribe = token.onCancel(removed);
    unsubscribe();
    token.cancel();

    const late = vi.fn();
    token.onCancel(late);

    expect(early).toHaveBeenCalledWith(null);
    expect(removed).not.toHaveBeenCalled();
    expect(late).toHaveBeenCalledTimes(1);
  });
});
