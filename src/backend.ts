import type { CounterMap } from './protocol';
import type { DataPoint } from './record';

/**
 * The external counting subsystem: per-CPU maps indexed by small integer keys.
 */
export interface CounterBackend {
  /**
   * One DataPoint per logical CPU for `key` in `map`.
   * Rejects when the key is absent or the lookup fails.
   */
  lookup(map: CounterMap, key: number): Promise<DataPoint[]>;

  /** Logical CPUs each lookup returns values for. Queried once at startup. */
  possibleCpus(): number;
}
