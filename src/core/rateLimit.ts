import { logger } from './logger.js';

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

// Resolves early (never rejects) when the signal aborts
export const sleep: Sleeper = (ms, signal) => {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

/** Delay before retry number `attempt` (1-based): base, 2×base, 3×base... */
export function linearBackoff(baseDelayMs: number, attempt: number): number {
  return Math.max(0, baseDelayMs * attempt);
}

interface PacerState {
  lastRequest: number;
  waits: number;
}

/**
 * Politeness pause between successive page requests of one paginated query.
 * Independent of retry backoff.
 */
export class RequestPacer {
  private state: PacerState = { lastRequest: 0, waits: 0 };

  constructor(
    private readonly intervalMs: number,
    private readonly sleeper: Sleeper = sleep,
    private readonly now: () => number = Date.now,
  ) {}

  // Wait out whatever is left of the interval since the previous request
  async wait(signal?: AbortSignal): Promise<void> {
    if (this.state.lastRequest > 0) {
      const elapsed = this.now() - this.state.lastRequest;
      const remaining = this.intervalMs - elapsed;
      if (remaining > 0) {
        logger.debug(`Pacing archive requests: waiting ${Math.round(remaining)}ms`);
        this.state.waits++;
        await this.sleeper(remaining, signal);
      }
    }
    this.state.lastRequest = this.now();
  }

  reset(): void {
    this.state = { lastRequest: 0, waits: 0 };
  }

  // Get current state for monitoring
  getState(): { waits: number; intervalMs: number } {
    return { waits: this.state.waits, intervalMs: this.intervalMs };
  }
}
