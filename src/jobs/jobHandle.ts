import { createInternalError } from '../errors.js';
import type { Clock, CrawlStrategy, JobOutcome } from '../types.js';
import { CancellationToken } from './cancellation.js';
import { JobStateMachine, type JobState } from './jobState.js';

/** What the registry keeps for a live job: its token, lifecycle and task. */
export class JobHandle {
  readonly token: CancellationToken;
  readonly lifecycle: JobStateMachine;
  readonly createdAt: number;
  private task: Promise<JobOutcome> | undefined;

  constructor(
    readonly jobId: string,
    readonly url: string,
    readonly strategy: CrawlStrategy,
    clock: Clock = Date.now,
  ) {
    this.createdAt = clock();
    this.token = new CancellationToken(jobId);
    this.lifecycle = new JobStateMachine();
  }

  get state(): JobState {
    return this.lifecycle.current;
  }

  get completion(): Promise<JobOutcome> | undefined {
    return this.task;
  }

  attach(task: Promise<JobOutcome>): void {
    if (this.task) {
      throw createInternalError(`Job ${this.jobId} already has a running task`, {
        jobId: this.jobId,
      });
    }
    this.task = task;
  }
}
