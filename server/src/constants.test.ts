import { describe, it, expect } from 'vitest';
import { formatNaiveUTC, parseUTC, roundTo } from './constants';

describe('roundTo', () => {
    it('rounds an exact half up', () => {
        expect(roundTo(0.25, 1)).toBe(0.3);
        expect(roundTo(0.125, 2)).toBe(0.13);
        expect(roundTo(2.5, 0)).toBe(3);
    });

    it('rounds a negative half toward positive infinity', () => {
        expect(roundTo(-0.25, 1)).toBe(-0.2);
    });

    it('works on the scaled binary value', () => {
        // 1.005 * 100 is 100.49999999999999
        expect(roundTo(1.005, 2)).toBe(1);
    });
});

describe('naive UTC timestamps', () => {
    it('parses strings without a zone as UTC', () => {
        expect(parseUTC('2026-02-05T06:00:00')).toBe(Date.UTC(2026, 1, 5, 6));
        expect(parseUTC('2026-02-05T06:00:00Z')).toBe(Date.UTC(2026, 1, 5, 6));
    });

    it('formats without milliseconds or zone', () => {
        expect(formatNaiveUTC(Date.UTC(2026, 1, 5, 18))).toBe('2026-02-05T18:00:00');
    });
});
