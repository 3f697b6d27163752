import { afterEach, describe, expect, it, vi } from 'vitest';

import { HEARTBEAT_MESSAGE, HeartbeatSink } from '../src/progress/heartbeat.js';
import { RecordingSink, createRecordingLogger, manualClock } from './helpers/fakes.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('HeartbeatSink', () => {
  it('pulses only once the observer has been idle for the interval', async () => {
    const clock = manualClock();
    const inner = new RecordingSink();
    const sink = new HeartbeatSink(inner, { intervalMs: 1_000, clock: clock.now });

    clock.advance(999);
    expect(await sink.pulse('fetch')).toBe(false);

    clock.advance(1);
    expect(await sink.pulse('fetch')).toBe(true);
    expect(sink.sentHeartbeats).toBe(1);
    expect(inner.events).toEqual([
      {
        type: 'update',
        status: 'fetch',
        progress: null,
        message: HEARTBEAT_MESSAGE,
        details: { heartbeat: true, timestamp: new Date(clock.now()).toISOString() },
      },
    ]);
  });

  it('stays quiet outside the pipeline stages', async () => {
    const clock = manualClock();
    const inner = new RecordingSink();
    const sink = new HeartbeatSink(inner, { intervalMs: 1_000, clock: clock.now });

    clock.advance(5_000);

    expect(await sink.pulse('pending')).toBe(false);
    expect(await sink.pulse('failed')).toBe(false);
    expect(await sink.pulse('completed')).toBe(false);
    expect(inner.events).toEqual([]);
    expect(await sink.pulse('extract')).toBe(true);
  });

  it('treats every forwarded update as activity', async () => {
    const clock = manualClock();
    const inner = new RecordingSink();
    const sink = new HeartbeatSink(inner, { intervalMs: 1_000, clock: clock.now });

    clock.advance(900);
    await sink.update('process', 50, 'working');
    clock.advance(900);

    expect(await sink.pulse('process')).toBe(false);
    expect(inner.updates()).toHaveLength(1);
  });

  it('pulses from its timer while a stage is waiting', async () => {
    vi.useFakeTimers();
    const clock = manualClock();
    const inner = new RecordingSink();
    const sink = new HeartbeatSink(inner, { intervalMs: 1_000, clock: clock.now });

    sink.startTimer(() => 'process');
    clock.advance(1_000);
    await vi.advanceTimersByTimeAsync(1_000);

    expect(inner.updates().map((event) => [event.status, event.progress])).toEqual([
      ['process', null],
    ]);

    sink.stopTimer();
    clock.advance(5_000);
    await vi.advanceTimersByTimeAsync(5_000);
    expect(inner.updates()).toHaveLength(1);
  });

  it('logs heartbeat delivery failures instead of rejecting', async () => {
    vi.useFakeTimers();
    const clock = manualClock();
    const logger = createRecordingLogger();
    const inner = new RecordingSink();
    inner.update = async () => {
      throw new Error('sink offline');
    };
    const sink = new HeartbeatSink(inner, { intervalMs: 500, clock: clock.now, logger });

    sink.startTimer(() => 'fetch');
    clock.advance(500);
    await vi.advanceTimersByTimeAsync(500);
    sink.stopTimer();

    expect(logger.entries.map((entry) => [entry.level, entry.args[1]])).toEqual([
      ['warn', 'Heartbeat delivery failed'],
    ]);
  });
});
