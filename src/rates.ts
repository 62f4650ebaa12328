import type { DataPointView, GroupView, SnapshotView } from './record';
import { NANOSEC_PER_SEC } from './utils/clock';

export interface Rate {
  /** Processed events per second, truncated to a whole number. */
  pps: number;
  dropPps: number;
  /** Seconds between the two samples; 0 when they are not strictly ordered. */
  period: number;
  /** A counter went backwards, e.g. after the XDP program was reloaded. */
  discontinuity: boolean;
}

export function calcPeriod(r: GroupView, p: GroupView): number {
  if (r.timestamp <= p.timestamp) return 0;
  return Number(r.timestamp - p.timestamp) / NANOSEC_PER_SEC;
}

function perSecond(current: bigint, previous: bigint, period: number): number {
  // A reset counter would wrap under u64 arithmetic; report nothing instead
  if (period <= 0 || current <= previous) return 0;
  return Math.trunc(Number(current - previous) / period);
}

export function calcPps(r: DataPointView, p: DataPointView, period: number): number {
  return perSecond(r.processed, p.processed, period);
}

export function calcDropPps(r: DataPointView, p: DataPointView, period: number): number {
  return perSecond(r.dropped, p.dropped, period);
}

export function isDiscontinuous(r: DataPointView, p: DataPointView): boolean {
  return r.processed < p.processed || r.dropped < p.dropped;
}

export function calcRate(r: DataPointView, p: DataPointView, period: number): Rate {
  return {
    pps: calcPps(r, p, period),
    dropPps: calcDropPps(r, p, period),
    period,
    discontinuity: isDiscontinuous(r, p),
  };
}

/** Aggregate rate of a group. */
export function groupRate(r: GroupView, p: GroupView): Rate {
  return calcRate(r.total, p.total, calcPeriod(r, p));
}

/**
 * Labels of the groups whose totals went backwards between two snapshots.
 */
export function findDiscontinuities(current: SnapshotView, previous: SnapshotView): string[] {
  const found: string[] = [];
  const check = (label: string, r: GroupView, p: GroupView) => {
    // A stale record (failed read) is older than its baseline; that is not a reset
    if (r.timestamp > p.timestamp && isDiscontinuous(r.total, p.total)) found.push(label);
  };

  check('rx', current.rx, previous.rx);
  check('redirect_err', current.redirectErr, previous.redirectErr);
  current.enqueue.forEach((record, target) => {
    const prev = previous.enqueue[target];
    if (prev) check(`enqueue[${target}]`, record, prev);
  });
  check('kthread', current.kthread, previous.kthread);
  return found;
}
