/** Per-CPU array maps exported by the XDP cpumap program. */
export enum CounterMap {
  RX = 'rx_cnt',
  REDIRECT_ERR = 'redirect_err_cnt',
  CPUMAP_ENQUEUE = 'cpumap_enqueue_cnt',
  CPUMAP_KTHREAD = 'cpumap_kthread_cnt',
}

/** Keys inside the maps. Enqueue counters are keyed by target instead. */
export enum CounterKey {
  RX = 0,
  REDIRECT_ERR = 1,
  KTHREAD = 0,
}

/** Must match the target count compiled into the XDP program. */
export const DEFAULT_TARGETS = 12;

export const DEFAULT_INTERVAL_SECONDS = 2;

/** Longest wait setTimeout honours (2^31-1 ms); larger delays fire after 1 ms. */
export const MAX_INTERVAL_SECONDS = Math.floor(0x7fffffff / 1000);

export type GroupName = 'rx' | 'redirect_err' | 'enqueue' | 'kthread';

export interface CounterGroup {
  name: GroupName;
  map: CounterMap;
  key: number;
  /** Set for enqueue groups only. */
  target?: number;
}

/**
 * Every tracked group, in collection order: rx, redirect_err, enqueue[0..targets), kthread.
 */
export function trackedGroups(targets: number): CounterGroup[] {
  const groups: CounterGroup[] = [
    { name: 'rx', map: CounterMap.RX, key: CounterKey.RX },
    { name: 'redirect_err', map: CounterMap.REDIRECT_ERR, key: CounterKey.REDIRECT_ERR },
  ];
  for (let target = 0; target < targets; target++) {
    groups.push({ name: 'enqueue', map: CounterMap.CPUMAP_ENQUEUE, key: target, target });
  }
  groups.push({ name: 'kthread', map: CounterMap.CPUMAP_KTHREAD, key: CounterKey.KTHREAD });
  return groups;
}

export function groupLabel(group: CounterGroup): string {
  return group.target === undefined ? group.name : `${group.name}[${group.target}]`;
}
