import { getLogger, type LoggerLike } from '../logger.js';
import { isPipelineStage } from './progressMapper.js';
import type {
  Clock,
  CompletionPayload,
  ProgressDetails,
  ProgressSink,
  ProgressStart,
  ProgressStatus,
} from '../types.js';

export const HEARTBEAT_MESSAGE = 'Background task still running...';

export interface HeartbeatOptions {
  intervalMs: number;
  clock?: Clock;
  logger?: LoggerLike;
}

/**
 * Progress sink decorator that remembers when the observer last heard from the
 * job and emits liveness-only updates once that gap reaches the interval.
 * Heartbeats carry a null percentage so polling clients keep the last value.
 */
export class HeartbeatSink implements ProgressSink {
  private readonly clock: Clock;
  private readonly logger: LoggerLike;
  private lastUpdateAt: number;
  private timer: ReturnType<typeof setInterval> | undefined;
  private heartbeats = 0;

  constructor(
    private readonly inner: ProgressSink,
    private readonly options: HeartbeatOptions,
  ) {
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? getLogger();
    this.lastUpdateAt = this.clock();
  }

  get sentHeartbeats(): number {
    return this.heartbeats;
  }

  async start(initial: ProgressStart): Promise<void> {
    this.touch();
    await this.inner.start(initial);
  }

  async update(
    status: ProgressStatus,
    progress: number | null,
    message: string,
    details?: ProgressDetails,
  ): Promise<void> {
    this.touch();
    await this.inner.update(status, progress, message, details);
  }

  async complete(payload: CompletionPayload): Promise<void> {
    this.touch();
    await this.inner.complete(payload);
  }

  async error(message: string): Promise<void> {
    this.touch();
    await this.inner.error(message);
  }

  /**
   * Sends a heartbeat when the observer has been idle for the interval. Only
   * pipeline stages pulse; a job that is pending or already terminal stays quiet.
   */
  async pulse(stage: ProgressStatus): Promise<boolean> {
    if (!isPipelineStage(stage)) {
      return false;
    }

    const now = this.clock();
    if (now - this.lastUpdateAt < this.options.intervalMs) {
      return false;
    }

    this.lastUpdateAt = now;
    this.heartbeats += 1;
    await this.inner.update(stage, null, HEARTBEAT_MESSAGE, {
      heartbeat: true,
      timestamp: new Date(now).toISOString(),
    });
    return true;
  }

  /** Pulses on a timer while a stage waits on a slow collaborator. */
  startTimer(currentStage: () => ProgressStatus): void {
    this.stopTimer();
    this.timer = setInterval(() => {
      this.pulse(currentStage()).catch((error: unknown) => {
        this.logger.warn({ err: error }, 'Heartbeat delivery failed');
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private touch(): void {
    this.lastUpdateAt = this.clock();
  }
}
