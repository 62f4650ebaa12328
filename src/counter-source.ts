import type { CounterBackend } from './backend';
import { CounterReadError, errorMessage } from './errors';
import type { CounterGroup } from './protocol';
import { allocRecord, type DataPoint, type GroupRecord } from './record';
import { monotonicNs, type Clock } from './utils/clock';
import { Logger, logger as defaultLogger } from './utils/logger';

export interface CounterSourceOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * Reads one counter group across all logical CPUs and stamps it.
 */
export class CounterSource {
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly backend: CounterBackend,
    public readonly cpus: number,
    options: CounterSourceOptions = {}
  ) {
    this.clock = options.clock ?? monotonicNs;
    this.logger = options.logger ?? defaultLogger;
  }

  /** Fresh record for `group`, or undefined if the read failed. */
  async read(group: CounterGroup): Promise<GroupRecord | undefined> {
    const record = allocRecord(this.cpus);
    return (await this.readInto(group, record)) ? record : undefined;
  }

  /**
   * Overwrites `target` with a new sample of `group`.
   * On failure `target` is left untouched and false is returned.
   */
  async readInto(group: CounterGroup, target: GroupRecord): Promise<boolean> {
    let values: DataPoint[];
    try {
      values = await this.backend.lookup(group.map, group.key);
    } catch (err) {
      const readErr = err instanceof CounterReadError
        ? err
        : new CounterReadError(group.map, group.key, errorMessage(err));
      this.logger.error(readErr.message);
      return false;
    }

    // As close as possible to the read itself
    const timestamp = this.clock();

    if (values.length !== this.cpus || target.perCore.length !== this.cpus) {
      const got = values.length !== this.cpus ? values.length : target.perCore.length;
      const what = values.length !== this.cpus ? 'per-cpu values' : 'slots in the target record';
      this.logger.error(new CounterReadError(group.map, group.key, `expected ${this.cpus} ${what}, got ${got}`).message);
      return false;
    }

    let sumProcessed = 0n;
    let sumDropped = 0n;
    for (let i = 0; i < this.cpus; i++) {
      const core = target.perCore[i];
      core.processed = values[i].processed;
      core.dropped = values[i].dropped;
      sumProcessed += values[i].processed;
      sumDropped += values[i].dropped;
    }
    target.total.processed = sumProcessed;
    target.total.dropped = sumDropped;
    target.timestamp = timestamp;
    return true;
  }
}
