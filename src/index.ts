export { StatsPoller, PollerState } from './poller';
export type { PollerOptions, WaitFn } from './poller';

export { SnapshotStore } from './snapshot-store';
export type { CollectResult } from './snapshot-store';

export { CounterSource } from './counter-source';
export type { CounterSourceOptions } from './counter-source';

export { Reporter, formatReport, formatHeader, formatRow, humanReadable, NOT_APPLICABLE } from './reporter';
export type { ReportSink } from './reporter';

export { calcPeriod, calcPps, calcDropPps, calcRate, groupRate, findDiscontinuities } from './rates';
export type { Rate } from './rates';

export type { CounterBackend } from './backend';
export { BpftoolBackend } from './backends/bpftool';
export type { BpftoolOptions, ExecFn } from './backends/bpftool';

export { loadConfig } from './config';
export type { StatsConfig } from './config';

export { CounterMap, CounterKey, DEFAULT_TARGETS, DEFAULT_INTERVAL_SECONDS, MAX_INTERVAL_SECONDS, trackedGroups } from './protocol';
export type { CounterGroup, GroupName } from './protocol';

export { allocSnapshot, allocRecord } from './record';
export type { DataPoint, GroupRecord, Snapshot, SnapshotView, GroupView, Layout } from './record';

export * from './errors';
