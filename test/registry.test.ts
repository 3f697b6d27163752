import { describe, expect, it } from 'vitest';

import { AsyncMutex } from '../src/jobs/asyncMutex.js';
import { JobHandle } from '../src/jobs/jobHandle.js';
import { JobRegistry } from '../src/jobs/registry.js';
import { deferred } from './helpers/fakes.js';

function handleFor(jobId: string): JobHandle {
  return new JobHandle(jobId, 'https://example.com', 'single');
}

describe('JobRegistry', () => {
  it('rejects a second registration and keeps the first entry', async () => {
    const registry = new JobRegistry();
    const first = handleFor('job-1');
    const second = handleFor('job-1');

    expect(await registry.register('job-1', first)).toBe(true);
    expect(await registry.register('job-1', second)).toBe(false);
    expect(registry.lookup('job-1')).toBe(first);
    expect(registry.size).toBe(1);
  });

  it('lets exactly one of many concurrent starts win', async () => {
    const registry = new JobRegistry();
    const results = await Promise.all(
      Array.from({ length: 5 }, () => registry.register('job-1', handleFor('job-1'))),
    );

    expect(results.filter(Boolean)).toHaveLength(1);
    expect(registry.activeJobIds()).toEqual(['job-1']);
  });

  it('unregisters idempotently and releases the lock', async () => {
    const registry = new JobRegistry();
    const handle = handleFor('job-1');
    await registry.register('job-1', handle);
    expect(registry.lockCount).toBe(1);

    await registry.unregister('job-1', handle);
    await registry.unregister('job-1', handle);
    await registry.unregister('job-1');

    expect(registry.lookup('job-1')).toBeUndefined();
    expect(registry.size).toBe(0);
    expect(registry.lockCount).toBe(0);
  });

  it('leaves a newer entry alone when an older handle unregisters', async () => {
    const registry = new JobRegistry();
    const stale = handleFor('job-1');
    const current = handleFor('job-1');
    await registry.register('job-1', current);

    await registry.unregister('job-1', stale);

    expect(registry.lookup('job-1')).toBe(current);
  });

  it('keeps unrelated ids independent', async () => {
    const registry = new JobRegistry();
    await registry.register('job-1', handleFor('job-1'));
    await registry.register('job-2', handleFor('job-2'));
    await registry.unregister('job-1');

    expect(registry.activeJobIds()).toEqual(['job-2']);
    expect(registry.lockCount).toBe(1);
  });
});

describe('AsyncMutex', () => {
  it('runs operations one at a time in arrival order', async () => {
    const mutex = new AsyncMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive(() => {
      order.push('second');
      return 2;
    });

    expect(mutex.isIdle).toBe(false);
    gate.resolve();

    await expect(second).resolves.toBe(2);
    await first;
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isIdle).toBe(true);
  });

  it('releases the lock when an operation throws', async () => {
    const mutex = new AsyncMutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrowError('boom');
    await expect(mutex.runExclusive(() => 'ok')).resolves.toBe('ok');
  });
});
