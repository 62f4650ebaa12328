import type { CounterSource } from './counter-source';
import { ConfigurationError } from './errors';
import { trackedGroups, type CounterGroup } from './protocol';
import { allocSnapshot, recordFor, type Layout, type Snapshot, type SnapshotView } from './record';

export interface CollectResult {
  /** Groups read successfully this round. */
  collected: number;
  /** Groups whose read failed; their records still hold the older sample. */
  failed: CounterGroup[];
}

/**
 * Owns the current/previous snapshot pair. Both are allocated once here and
 * only ever rewritten in place or swapped.
 */
export class SnapshotStore {
  private currentSnapshot: Snapshot;
  private previousSnapshot: Snapshot;
  private readonly groups: readonly CounterGroup[];

  constructor(private readonly source: CounterSource, public readonly layout: Readonly<Layout>) {
    if (source.cpus !== layout.cpus) {
      throw new ConfigurationError(
        `Counter source reads ${source.cpus} CPUs but the layout expects ${layout.cpus}`
      );
    }
    this.currentSnapshot = allocSnapshot(layout);
    this.previousSnapshot = allocSnapshot(layout);
    this.groups = trackedGroups(layout.targets);
  }

  get current(): SnapshotView {
    return this.currentSnapshot;
  }

  get previous(): SnapshotView {
    return this.previousSnapshot;
  }

  /** Reads every tracked group into the current snapshot, one after another. */
  async collect(): Promise<CollectResult> {
    const target = this.currentSnapshot;
    const failed: CounterGroup[] = [];
    let collected = 0;

    for (const group of this.groups) {
      const record = recordFor(target, group);
      if (record && await this.source.readInto(group, record)) {
        collected++;
      } else {
        failed.push(group);
      }
    }
    return { collected, failed };
  }

  /** Exchanges the roles of current and previous. No data is copied. */
  swap(): void {
    const tmp = this.currentSnapshot;
    this.currentSnapshot = this.previousSnapshot;
    this.previousSnapshot = tmp;
  }
}
