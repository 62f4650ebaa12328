import { describe, it, expect } from 'vitest';
import {
    calcDropPps,
    calcPeriod,
    calcPps,
    calcRate,
    findDiscontinuities,
    groupRate,
} from '../../src/rates';
import { allocSnapshot } from '../../src/record';
import { groupRecord } from '../fake-backend';

describe('RATES', () => {
    it('should report nothing when both samples share a timestamp', () => {
        const p = groupRecord(5_000, [[100, 10]]);
        const r = groupRecord(5_000, [[900, 90]]);

        const period = calcPeriod(r, p);
        expect(period).toBe(0);
        expect(calcPps(r.total, p.total, period)).toBe(0);
        expect(calcDropPps(r.total, p.total, period)).toBe(0);
    });

    it('should compute pps over a one second period', () => {
        const p = groupRecord(0, [[1000, 0]]);
        const r = groupRecord(1_000_000_000, [[3000, 0]]);

        expect(groupRate(r, p)).toEqual({ pps: 2000, dropPps: 0, period: 1, discontinuity: false });
    });

    it('should divide by fractional periods', () => {
        const p = groupRecord(1_000_000_000, [[0, 0]]);
        const r = groupRecord(3_500_000_000, [[1000, 250]]);

        const period = calcPeriod(r, p);
        expect(period).toBe(2.5);
        expect(calcPps(r.total, p.total, period)).toBe(400);
        expect(calcDropPps(r.total, p.total, period)).toBe(100);
    });

    it('should truncate fractional rates toward zero', () => {
        const p = groupRecord(0, [[0, 0]]);
        const r = groupRecord(3_000_000_000, [[10, 5]]);

        const rate = groupRate(r, p);
        expect(rate.pps).toBe(3);
        expect(rate.dropPps).toBe(1);
    });

    it('should treat an older current sample as a zero period', () => {
        const p = groupRecord(2_000_000_000, [[10, 0]]);
        const r = groupRecord(1_000_000_000, [[500, 0]]);

        expect(calcPeriod(r, p)).toBe(0);
        expect(groupRate(r, p).pps).toBe(0);
    });

    it('should clamp a counter reset to zero and flag it', () => {
        const rate = calcRate(
            { processed: 50n, dropped: 7n },
            { processed: 1_000_000n, dropped: 3n },
            1
        );

        expect(rate).toEqual({ pps: 0, dropPps: 4, period: 1, discontinuity: true });
    });

    it('should handle counters beyond 32 bits', () => {
        const p = groupRecord(0, [[2n ** 40n, 0]]);
        const r = groupRecord(2_000_000_000, [[2n ** 40n + 4_000_000n, 0]]);

        expect(groupRate(r, p).pps).toBe(2_000_000);
    });

    it('should compute per-core pairs exactly like totals', () => {
        const p = groupRecord(0, [[100, 0], [200, 0]]);
        const r = groupRecord(2_000_000_000, [[300, 0], [1200, 0]]);
        const period = calcPeriod(r, p);

        expect(calcPps(r.perCore[0], p.perCore[0], period)).toBe(100);
        expect(calcPps(r.perCore[1], p.perCore[1], period)).toBe(500);
        expect(calcPps(r.total, p.total, period)).toBe(600);
    });

    describe('findDiscontinuities', () => {
        it('should name every group whose totals went backwards', () => {
            const layout = { cpus: 1, targets: 2 };
            const previous = allocSnapshot(layout);
            const current = allocSnapshot(layout);

            previous.rx = groupRecord(1, [[500, 0]]);
            current.rx = groupRecord(2, [[10, 0]]);
            previous.enqueue[1] = groupRecord(1, [[0, 9]]);
            current.enqueue[1] = groupRecord(2, [[0, 1]]);
            previous.kthread = groupRecord(1, [[5, 0]]);
            current.kthread = groupRecord(2, [[6, 0]]);

            expect(findDiscontinuities(current, previous)).toEqual(['rx', 'enqueue[1]']);
        });

        it('should ignore stale records left by a failed read', () => {
            const layout = { cpus: 1, targets: 1 };
            const previous = allocSnapshot(layout);
            const current = allocSnapshot(layout);

            previous.rx = groupRecord(2_000, [[500, 0]]);
            current.rx = groupRecord(1_000, [[100, 0]]);

            expect(findDiscontinuities(current, previous)).toEqual([]);
        });
    });
});
