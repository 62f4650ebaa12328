import { AllocationError, ConfigurationError } from './errors';
import type { CounterGroup } from './protocol';

export interface DataPoint {
  processed: bigint;
  dropped: bigint;
}

export interface GroupRecord {
  /** Monotonic clock, nanoseconds. 0 until the first successful read. */
  timestamp: bigint;
  total: DataPoint;
  perCore: DataPoint[];
}

export interface Snapshot {
  rx: GroupRecord;
  redirectErr: GroupRecord;
  kthread: GroupRecord;
  /** Indexed by target. */
  enqueue: GroupRecord[];
}

export type DataPointView = Readonly<DataPoint>;

export interface GroupView {
  readonly timestamp: bigint;
  readonly total: DataPointView;
  readonly perCore: readonly DataPointView[];
}

export interface SnapshotView {
  readonly rx: GroupView;
  readonly redirectErr: GroupView;
  readonly kthread: GroupView;
  readonly enqueue: readonly GroupView[];
}

export interface Layout {
  /** Logical cores reported by the counting subsystem. */
  cpus: number;
  /** Redirect targets tracked by the enqueue map. */
  targets: number;
}

export function allocRecord(cpus: number): GroupRecord {
  const perCore: DataPoint[] = new Array(cpus);
  for (let i = 0; i < cpus; i++) {
    perCore[i] = { processed: 0n, dropped: 0n };
  }
  return { timestamp: 0n, total: { processed: 0n, dropped: 0n }, perCore };
}

/**
 * Allocates a zeroed snapshot with every per-core array sized to `layout.cpus`.
 * Happens twice per process; records are rewritten in place afterwards.
 */
export function allocSnapshot(layout: Layout): Snapshot {
  const { cpus, targets } = layout;
  if (!Number.isInteger(cpus) || cpus <= 0) {
    throw new ConfigurationError(`Invalid logical core count: ${cpus}`);
  }
  if (!Number.isInteger(targets) || targets <= 0) {
    throw new ConfigurationError(`Invalid target count: ${targets}`);
  }

  try {
    const enqueue: GroupRecord[] = [];
    for (let t = 0; t < targets; t++) {
      enqueue.push(allocRecord(cpus));
    }
    return {
      rx: allocRecord(cpus),
      redirectErr: allocRecord(cpus),
      kthread: allocRecord(cpus),
      enqueue,
    };
  } catch (err) {
    if (err instanceof RangeError) {
      throw new AllocationError(cpus, targets);
    }
    throw err;
  }
}

/** Resolves the record a counter group is stored in. */
export function recordFor(snapshot: Snapshot, group: CounterGroup): GroupRecord | undefined {
  switch (group.name) {
    case 'rx': return snapshot.rx;
    case 'redirect_err': return snapshot.redirectErr;
    case 'kthread': return snapshot.kthread;
    case 'enqueue': return group.target === undefined ? undefined : snapshot.enqueue[group.target];
  }
}
