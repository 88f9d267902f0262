import { describe, it, expect } from 'vitest';
import { aggregateDaily } from './aggregator';
import { validTimeFor } from './extractor';
import { makeStep } from '../test/helpers';
import type { StepRecord } from '../types';

const INIT = '2026-02-05T03:00:00';

const stepAt = (leadHours: number, overrides: Partial<StepRecord> = {}): StepRecord =>
    makeStep({ lead_hours: leadHours, valid_time: validTimeFor(INIT, leadHours), ...overrides });

describe('aggregateDaily', () => {
    it('groups a 5-day run by UTC calendar day of valid time', () => {
        const steps = Array.from({ length: 20 }, (_, i) => stepAt(i * 6, { temp_f: 50 + i }));
        const daily = aggregateDaily(steps, INIT);

        expect(daily.map(d => d.date)).toEqual(['2026-02-05', '2026-02-06', '2026-02-07', '2026-02-08', '2026-02-09']);
        // Leads 0-18 land on the 5th (the last at 21:00), 24 opens the 6th at 03:00
        expect(daily[0].temp_high_f).toBe(53);
        expect(daily[0].temp_low_f).toBe(50);
        expect(daily[1].temp_low_f).toBe(54);
    });

    it('reduces each day to highs, lows and averages', () => {
        const steps = [
            stepAt(0, { temp_f: 50.2, wind_mph: 5, pressure_inhg: 30.12, cloud_pct: 20 }),
            stepAt(6, { temp_f: 60.4, wind_mph: 10.5, pressure_inhg: 30.04, cloud_pct: 40 }),
            stepAt(12, { temp_f: 55.1, wind_mph: 7.5, pressure_inhg: 30.0, cloud_pct: 60 }),
            stepAt(18, { temp_f: 48.3, wind_mph: 12, pressure_inhg: 30.0, cloud_pct: 80 })
        ];

        expect(aggregateDaily(steps, INIT)).toEqual([{
            date: '2026-02-05',
            temp_high_f: 60.4,
            temp_low_f: 48.3,
            temp_avg_f: 53.5,
            wind_avg_mph: 8.8,
            wind_max_mph: 12,
            pressure_avg_inhg: 30.04,
            cloud_avg_pct: 50,
            weather_code: 2
        }]);
    });

    it('derives the daily code from average cloud only, ignoring rain', () => {
        const steps = [
            stepAt(0, { cloud_pct: 5, tp: 15, weather_code: 65 }),
            stepAt(6, { cloud_pct: 5, weather_code: 0 })
        ];
        expect(aggregateDaily(steps, INIT)[0].weather_code).toBe(0);
    });

    it('leaves statistics null when a day has no values for them', () => {
        const [day] = aggregateDaily([stepAt(0, { cloud_pct: 70 })], INIT);
        expect(day.temp_high_f).toBeNull();
        expect(day.temp_avg_f).toBeNull();
        expect(day.wind_max_mph).toBeNull();
        expect(day.pressure_avg_inhg).toBeNull();
        expect(day.weather_code).toBe(3);
    });

    it('falls back to partly cloudy when a day has no cloud values', () => {
        const [day] = aggregateDaily([stepAt(0, { temp_f: 50, cloud_pct: Number.NaN })], INIT);
        expect(day.cloud_avg_pct).toBeNull();
        expect(day.weather_code).toBe(2);
    });

    it('omits days without steps instead of emitting empty summaries', () => {
        expect(aggregateDaily([], INIT)).toEqual([]);

        // Steps on the 5th and the 7th only
        const daily = aggregateDaily([stepAt(0, { temp_f: 50 }), stepAt(48, { temp_f: 60 })], INIT);
        expect(daily.map(d => d.date)).toEqual(['2026-02-05', '2026-02-07']);
    });

    it('orders days ascending regardless of input order', () => {
        const daily = aggregateDaily([stepAt(30), stepAt(0), stepAt(54)], INIT);
        expect(daily.map(d => d.date)).toEqual(['2026-02-05', '2026-02-06', '2026-02-07']);
    });

    it('gives the same result when run twice on the same steps', () => {
        const steps = [stepAt(0, { temp_f: 41.5, cloud_pct: 33 }), stepAt(6, { temp_f: 47.2, cloud_pct: 12 })];
        expect(aggregateDaily(steps, INIT)).toEqual(aggregateDaily(steps, INIT));
    });
});
