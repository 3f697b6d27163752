import type {
  Clock,
  CompletionPayload,
  ProgressDetails,
  ProgressSink,
  ProgressStart,
  ProgressStatus,
} from '../types.js';

const MAX_LOG_ENTRIES = 200;

export interface ProgressLogEntry {
  at: string;
  status: ProgressStatus;
  progress: number;
  message: string;
}

export interface ProgressSnapshot {
  jobId: string;
  url?: string;
  status: ProgressStatus;
  progress: number;
  message: string;
  startedAt?: string;
  updatedAt: string;
  lastHeartbeatAt?: string;
  details: ProgressDetails;
  logs: ProgressLogEntry[];
  result?: CompletionPayload;
  error?: string;
}

/**
 * Pollable progress state for one job. Percentages never move backwards and
 * nothing changes once the job reached a terminal status.
 */
export class InMemoryProgressTracker implements ProgressSink {
  private state: ProgressSnapshot;

  constructor(
    readonly jobId: string,
    private readonly clock: Clock = Date.now,
  ) {
    this.state = {
      jobId,
      status: 'pending',
      progress: 0,
      message: 'Queued',
      updatedAt: this.now(),
      details: {},
      logs: [],
    };
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this.state.status);
  }

  async start(initial: ProgressStart): Promise<void> {
    const at = this.now();
    this.state = {
      jobId: this.jobId,
      url: initial.url,
      status: initial.status,
      progress: initial.progress,
      message: initial.message,
      startedAt: at,
      updatedAt: at,
      details: {},
      logs: [],
    };
    this.appendLog(initial.message);
  }

  async update(
    status: ProgressStatus,
    progress: number | null,
    message: string,
    details: ProgressDetails = {},
  ): Promise<void> {
    if (this.isTerminal) {
      return;
    }

    const { heartbeat, ...rest } = details;
    if (heartbeat === true && isTerminalStatus(status)) {
      return;
    }

    const at = this.now();

    this.state.status = status;
    this.state.updatedAt = at;
    this.state.details = { ...this.state.details, ...rest };

    if (heartbeat === true) {
      this.state.lastHeartbeatAt = at;
      return;
    }

    if (progress !== null) {
      this.state.progress = Math.max(this.state.progress, progress);
    }
    this.state.message = message;
    this.appendLog(message);
  }

  async complete(payload: CompletionPayload): Promise<void> {
    if (this.isTerminal) {
      return;
    }

    this.state.status = 'completed';
    this.state.progress = 100;
    this.state.message = 'Crawl completed successfully!';
    this.state.result = { ...payload };
    this.state.updatedAt = this.now();
    this.appendLog(this.state.message);
  }

  async error(message: string): Promise<void> {
    if (this.isTerminal) {
      return;
    }

    this.state.status = 'failed';
    this.state.message = message;
    this.state.error = message;
    this.state.updatedAt = this.now();
    this.appendLog(message);
  }

  getState(): ProgressSnapshot {
    return {
      ...this.state,
      details: { ...this.state.details },
      logs: this.state.logs.map((entry) => ({ ...entry })),
      result: this.state.result ? { ...this.state.result } : undefined,
    };
  }

  private appendLog(message: string): void {
    this.state.logs.push({
      at: this.state.updatedAt,
      status: this.state.status,
      progress: this.state.progress,
      message,
    });

    if (this.state.logs.length > MAX_LOG_ENTRIES) {
      this.state.logs.splice(0, this.state.logs.length - MAX_LOG_ENTRIES);
    }
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }
}

function isTerminalStatus(status: ProgressStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

/** Trackers keyed by job id; the lookup behind a `GET /jobs/:id` style poll. */
export class ProgressStore {
  private readonly trackers = new Map<string, InMemoryProgressTracker>();

  constructor(private readonly clock: Clock = Date.now) {}

  /** Fresh tracker for a new run, replacing any state left by an earlier run. */
  create(jobId: string): InMemoryProgressTracker {
    const tracker = new InMemoryProgressTracker(jobId, this.clock);
    this.trackers.set(jobId, tracker);
    return tracker;
  }

  get(jobId: string): InMemoryProgressTracker | undefined {
    return this.trackers.get(jobId);
  }

  snapshot(jobId: string): ProgressSnapshot | undefined {
    return this.trackers.get(jobId)?.getState();
  }

  delete(jobId: string): boolean {
    return this.trackers.delete(jobId);
  }

  get size(): number {
    return this.trackers.size;
  }
}
