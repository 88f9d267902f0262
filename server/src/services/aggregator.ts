import { WEATHER_CODES, roundTo } from '../constants';
import { cloudCoverToWeatherCode } from './derived';
import { validTimeFor } from './extractor';
import type { DailySummary, StepRecord } from '../types';

interface DayBucket {
    temps: number[];
    winds: number[];
    pressures: number[];
    clouds: number[];
}

const mean = (values: number[]): number => values.reduce((a, b) => a + b, 0) / values.length;

const maybe = (values: number[], reduce: (v: number[]) => number, digits: number): number | null =>
    values.length > 0 ? roundTo(reduce(values), digits) : null;

const push = (list: number[], value: number | null) => {
    if (value !== null) list.push(value);
};

/**
 * Folds 6-hourly steps into one summary per calendar day of valid time.
 * Valid times are init time + lead hours in UTC, so days are UTC dates.
 * Days without any step are absent from the result.
 */
export function aggregateDaily(steps: readonly StepRecord[], initTime: string): DailySummary[] {
    const days = new Map<string, DayBucket>();

    for (const step of steps) {
        const day = validTimeFor(initTime, step.lead_hours).slice(0, 10);
        let bucket = days.get(day);
        if (!bucket) {
            bucket = { temps: [], winds: [], pressures: [], clouds: [] };
            days.set(day, bucket);
        }
        push(bucket.temps, step.temp_f);
        push(bucket.winds, step.wind_mph);
        push(bucket.pressures, step.pressure_inhg);
        if (Number.isFinite(step.cloud_pct)) bucket.clouds.push(step.cloud_pct);
    }

    return [...days.keys()].sort().map(date => {
        const { temps, winds, pressures, clouds } = days.get(date) ?? { temps: [], winds: [], pressures: [], clouds: [] };
        const cloudAvg = maybe(clouds, mean, 1);
        return {
            date,
            temp_high_f: maybe(temps, v => Math.max(...v), 1),
            temp_low_f: maybe(temps, v => Math.min(...v), 1),
            temp_avg_f: maybe(temps, mean, 1),
            wind_avg_mph: maybe(winds, mean, 1),
            wind_max_mph: maybe(winds, v => Math.max(...v), 1),
            pressure_avg_inhg: maybe(pressures, mean, 2),
            cloud_avg_pct: cloudAvg,
            // Daily code comes from average cloud only; precipitation is not considered here
            weather_code: cloudAvg !== null ? cloudCoverToWeatherCode(cloudAvg) : WEATHER_CODES.partlyCloudy
        };
    });
}
