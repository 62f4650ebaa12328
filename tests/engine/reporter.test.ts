import { describe, it, expect } from 'vitest';
import { formatHeader, formatReport, humanReadable, Reporter } from '../../src/reporter';
import { allocSnapshot } from '../../src/record';
import { groupRecord } from '../fake-backend';

const HEADER = 'XDP-cpumap      CPU:to  pps        pps-human-readable drop-pps     period   ';

describe('REPORTER', () => {
    it('should render the column header', () => {
        expect(formatHeader()).toBe(HEADER);
    });

    it('should group thousands the en-US way', () => {
        expect(humanReadable(0)).toBe('0');
        expect(humanReadable(999)).toBe('999');
        expect(humanReadable(1234567)).toBe('1,234,567');
    });

    it('should render only the always-on totals for a first, all-zero cycle', () => {
        const layout = { cpus: 4, targets: 12 };

        expect(formatReport(allocSnapshot(layout), allocSnapshot(layout))).toEqual([
            HEADER,
            'XDP-RX          total   0          0                  (n/a)        0.000000',
            'cpumap_kthread  total   0          0                  0            0.000000',
            'redirect_err    total   0          0                  0            0.000000',
        ]);
    });

    it('should render non-zero cores, enqueue sums and totals in order', () => {
        const layout = { cpus: 2, targets: 4 };
        const previous = allocSnapshot(layout);
        const current = allocSnapshot(layout);

        previous.rx = groupRecord(0, [[600, 0], [400, 0]]);
        current.rx = groupRecord(1_000_000_000, [[1800, 0], [1200, 0]]);
        current.enqueue[3] = groupRecord(2_000_000_000, [[0, 0], [3_000_000, 2_469_134]]);
        current.redirectErr = groupRecord(2_000_000_000, [[10, 10], [0, 0]]);

        expect(formatReport(current, previous)).toEqual([
            HEADER,
            'XDP-RX          0       1200       1,200              (n/a)        1.000000',
            'XDP-RX          1       800        800                (n/a)        1.000000',
            'XDP-RX          total   2000       2,000              (n/a)        1.000000',
            'cpumap-enqueue    1:3   1500000    1,500,000          1,234,567    2.000000',
            'cpumap-enqueue  sum:3   1500000    1,500,000          1,234,567    2.000000',
            'cpumap_kthread  total   0          0                  0            0.000000',
            'redirect_err    0       5          5                  5            2.000000',
            'redirect_err    total   5          5                  5            2.000000',
        ]);
    });

    it('should suppress a target whose aggregate pps is zero', () => {
        const layout = { cpus: 1, targets: 2 };
        const previous = allocSnapshot(layout);
        const current = allocSnapshot(layout);

        // Drops alone do not make a target visible
        previous.enqueue[0] = groupRecord(0, [[50, 0]]);
        current.enqueue[0] = groupRecord(1_000_000_000, [[50, 80]]);

        const lines = formatReport(current, previous);
        expect(lines.filter(line => line.startsWith('cpumap-enqueue'))).toEqual([]);
    });

    it('should report a counter reset as zero rather than a wrapped value', () => {
        const layout = { cpus: 1, targets: 1 };
        const previous = allocSnapshot(layout);
        const current = allocSnapshot(layout);

        previous.rx = groupRecord(0, [[5_000_000, 0]]);
        current.rx = groupRecord(1_000_000_000, [[10, 0]]);

        expect(formatReport(current, previous)[1]).toBe(
            'XDP-RX          total   0          0                  (n/a)        1.000000'
        );
    });

    it('should write one block per render, ended by a blank line', () => {
        const chunks: string[] = [];
        const reporter = new Reporter({ write: (chunk: string) => chunks.push(chunk) });
        const layout = { cpus: 1, targets: 1 };

        reporter.render(allocSnapshot(layout), allocSnapshot(layout));

        expect(chunks).toEqual([
            [
                HEADER,
                'XDP-RX          total   0          0                  (n/a)        0.000000',
                'cpumap_kthread  total   0          0                  0            0.000000',
                'redirect_err    total   0          0                  0            0.000000',
            ].join('\n') + '\n\n',
        ]);
    });
});
