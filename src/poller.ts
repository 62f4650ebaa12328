import { ConfigurationError, StatsError } from './errors';
import { groupLabel, MAX_INTERVAL_SECONDS } from './protocol';
import { findDiscontinuities } from './rates';
import type { Reporter } from './reporter';
import type { SnapshotStore } from './snapshot-store';
import { Logger, logger as defaultLogger } from './utils/logger';
import { sleep } from './utils/sleep';

export enum PollerState {
  RUNNING = 'running',
  STOPPED = 'stopped',
}

export type WaitFn = (ms: number, signal: AbortSignal) => Promise<unknown>;

export interface PollerOptions {
  logger?: Logger;
  /** Inter-cycle wait; must return early once `signal` aborts. */
  wait?: WaitFn;
}

/**
 * Drives collect -> swap -> render -> wait until cancelled.
 *
 * Cancellation is cooperative: `cancel()` only flips a signal, which the loop
 * checks at the top of every cycle and which cuts the wait short.
 */
export class StatsPoller {
  private state = PollerState.STOPPED;
  private abort: AbortController | null = null;
  private cycleCount = 0;
  private readonly logger: Logger;
  private readonly wait: WaitFn;

  constructor(
    private readonly store: SnapshotStore,
    private readonly reporter: Reporter,
    options: PollerOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.wait = options.wait ?? sleep;
  }

  get running(): boolean {
    return this.state === PollerState.RUNNING;
  }

  /** Completed render cycles since the last start. */
  get cycles(): number {
    return this.cycleCount;
  }

  /**
   * Runs until `cancel()` is called. Resolves once the loop has exited.
   */
  async start(intervalSeconds: number): Promise<void> {
    if (!Number.isInteger(intervalSeconds) || intervalSeconds <= 0) {
      throw new ConfigurationError(`Interval must be a positive integer, got ${intervalSeconds}`);
    }
    if (intervalSeconds > MAX_INTERVAL_SECONDS) {
      throw new ConfigurationError(`Interval must be at most ${MAX_INTERVAL_SECONDS}s, got ${intervalSeconds}`);
    }
    if (this.state === PollerState.RUNNING) {
      throw new StatsError('Poller is already running');
    }

    const abort = new AbortController();
    this.abort = abort;
    this.state = PollerState.RUNNING;
    this.cycleCount = 0;
    this.logger.info(`Polling every ${intervalSeconds}s (cpus:${this.store.layout.cpus} targets:${this.store.layout.targets})`);

    try {
      // Baseline sample, so the first render has something to compare against
      await this.collect();

      while (!abort.signal.aborted) {
        this.store.swap();
        await this.collect();
        this.reporter.render(this.store.current, this.store.previous);
        this.cycleCount++;
        await this.wait(intervalSeconds * 1000, abort.signal);
      }
    } finally {
      this.state = PollerState.STOPPED;
      this.abort = null;
      this.logger.info(`Stopped after ${this.cycleCount} cycles`);
    }
  }

  /** Requests a graceful stop. Safe to call any number of times. */
  cancel(): void {
    this.abort?.abort();
  }

  private async collect(): Promise<void> {
    const { failed } = await this.store.collect();
    if (failed.length > 0) {
      this.logger.debug(`Stale groups this cycle: ${failed.map(groupLabel).join(', ')}`);
    }

    const reset = findDiscontinuities(this.store.current, this.store.previous);
    if (reset.length > 0) {
      this.logger.warn(`⚠️ Counters went backwards (reset?) for: ${reset.join(', ')}. Reporting 0 pps.`);
    }
  }
}
