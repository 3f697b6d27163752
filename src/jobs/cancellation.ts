import { JobCancelledError } from '../errors.js';

export type CancellationListener = (reason: string | null) => void;

/**
 * Cooperative cancellation flag passed down the call chain. Setting it never
 * interrupts work by itself: stages and collaborators observe it at their
 * checkpoints, and fetches observe it through {@link signal}.
 */
export class CancellationToken {
  private readonly controller = new AbortController();
  private cancelReason: string | null = null;
  private cancelledAtMs: number | null = null;

  constructor(readonly label?: string) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get reason(): string | null {
    return this.cancelReason;
  }

  get cancelledAt(): number | null {
    return this.cancelledAtMs;
  }

  isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Returns false when the token had already been cancelled. */
  cancel(reason?: string): boolean {
    if (this.isCancelled()) {
      return false;
    }

    this.cancelReason = reason ?? null;
    this.cancelledAtMs = Date.now();
    this.controller.abort(new JobCancelledError({ label: this.label }, reason));
    return true;
  }

  throwIfCancelled(details: Record<string, unknown> = {}): void {
    if (this.isCancelled()) {
      throw new JobCancelledError({ label: this.label, ...details }, this.cancelReason ?? undefined);
    }
  }

  onCancel(listener: CancellationListener): () => void {
    if (this.isCancelled()) {
      listener(this.cancelReason);
      return () => undefined;
    }

    const handler = (): void => listener(this.cancelReason);
    this.controller.signal.addEventListener('abort', handler, { once: true });
    return () => this.controller.signal.removeEventListener('abort', handler);
  }
}
