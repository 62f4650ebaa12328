import { calcDropPps, calcPeriod, calcPps } from './rates';
import type { GroupView, SnapshotView } from './record';

export const NOT_APPLICABLE = '(n/a)';

const COLUMNS = { label: 15, cpu: 7, pps: 10, human: 18, drop: 12, period: 9 } as const;

const grouped = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** 1234567 -> "1,234,567" */
export function humanReadable(value: number): string {
  return grouped.format(value);
}

export function formatHeader(): string {
  return [
    'XDP-cpumap'.padEnd(COLUMNS.label),
    'CPU:to'.padEnd(COLUMNS.cpu),
    'pps '.padEnd(COLUMNS.pps),
    'pps-human-readable'.padEnd(COLUMNS.human),
    'drop-pps'.padEnd(COLUMNS.drop),
    'period'.padEnd(COLUMNS.period),
  ].join(' ');
}

export function formatRow(label: string, cpu: string, pps: number, drop: string, period: number): string {
  return [
    label.padEnd(COLUMNS.label),
    cpu.padEnd(COLUMNS.cpu),
    String(pps).padEnd(COLUMNS.pps),
    humanReadable(pps).padEnd(COLUMNS.human),
    drop.padEnd(COLUMNS.drop),
    period.toFixed(6),
  ].join(' ');
}

/** "  3:7  " style core:target column of the enqueue rows. */
function enqueueColumn(core: string, target: number): string {
  return `${core.padStart(3)}:${String(target).padEnd(3)}`;
}

interface GroupSection {
  label: string;
  /** Renders the CPU column for a per-core row. */
  cpu: (core: number) => string;
  /** CPU column of the aggregate row, or undefined to skip it. */
  total: (pps: number) => string | undefined;
  withDrops: boolean;
}

function formatGroup(section: GroupSection, r: GroupView, p: GroupView): string[] {
  const lines: string[] = [];
  const period = calcPeriod(r, p);
  const drop = (pps: number) => section.withDrops ? humanReadable(pps) : NOT_APPLICABLE;

  // Both snapshots come from one layout; tolerate a mismatch rather than throw
  const cores = Math.min(r.perCore.length, p.perCore.length);
  for (let i = 0; i < cores; i++) {
    const pps = calcPps(r.perCore[i], p.perCore[i], period);
    if (pps > 0) {
      lines.push(formatRow(section.label, section.cpu(i), pps, drop(calcDropPps(r.perCore[i], p.perCore[i], period)), period));
    }
  }

  const pps = calcPps(r.total, p.total, period);
  const totalCpu = section.total(pps);
  if (totalCpu !== undefined) {
    lines.push(formatRow(section.label, totalCpu, pps, drop(calcDropPps(r.total, p.total, period)), period));
  }
  return lines;
}

/**
 * One report block: header, XDP-RX, cpumap-enqueue per target, cpumap_kthread, redirect_err.
 * Per-core rows with zero pps are left out, and so are enqueue sums with zero pps.
 */
export function formatReport(current: SnapshotView, previous: SnapshotView): string[] {
  const lines = [formatHeader()];

  lines.push(...formatGroup({
    label: 'XDP-RX',
    cpu: core => String(core),
    total: () => 'total',
    withDrops: false,
  }, current.rx, previous.rx));

  const targets = Math.min(current.enqueue.length, previous.enqueue.length);
  for (let target = 0; target < targets; target++) {
    lines.push(...formatGroup({
      label: 'cpumap-enqueue',
      cpu: core => enqueueColumn(String(core), target),
      total: pps => pps > 0 ? enqueueColumn('sum', target) : undefined,
      withDrops: true,
    }, current.enqueue[target], previous.enqueue[target]));
  }

  lines.push(...formatGroup({
    label: 'cpumap_kthread',
    cpu: core => String(core),
    total: () => 'total',
    withDrops: true,
  }, current.kthread, previous.kthread));

  // Always shown: any non-zero value here means the pipeline is failing
  lines.push(...formatGroup({
    label: 'redirect_err',
    cpu: core => String(core),
    total: () => 'total',
    withDrops: true,
  }, current.redirectErr, previous.redirectErr));

  return lines;
}

export interface ReportSink {
  write(chunk: string): unknown;
}

/**
 * Writes one block per call, terminated by a blank line, in a single write.
 */
export class Reporter {
  constructor(private readonly out: ReportSink = process.stdout) { }

  render(current: SnapshotView, previous: SnapshotView): void {
    this.out.write(`${formatReport(current, previous).join('\n')}\n\n`);
  }
}
