import { CLOUD_LEVELS, DRY_COLUMN_MAX_CLOUD, DRY_COLUMN_TCWV, PRECIP_THRESHOLDS, WEATHER_CODES, roundTo } from '../constants';
import type { GridVariable, StepRecord, WeatherCode } from '../types';

// --- Unit conversions ---

export const kelvinToFahrenheit = (k: number): number => roundTo((k - 273.15) * 9 / 5 + 32, 1);

export const msToMph = (ms: number): number => roundTo(ms * 2.237, 1);

export const paToInHg = (pa: number): number => roundTo(pa / 3386.39, 2);

export const windSpeed = (u: number, v: number): number => Math.sqrt(u * u + v * v);

/**
 * Relative humidity (0-100%) from specific humidity (kg/kg), temperature (K)
 * and pressure level (hPa), using the Tetens saturation vapor pressure.
 */
export function specificToRelativeHumidity(q: number, tKelvin: number, pHpa: number): number {
    const tC = tKelvin - 273.15;
    const es = 6.112 * Math.exp(17.67 * tC / (tC + 243.5));
    const w = q < 1 ? q / (1 - q) : q;
    // p <= es only happens for invalid or extreme inputs; treat as saturated
    const ws = pHpa > es ? 0.622 * es / (pHpa - es) : 1.0;
    const rh = ws > 0 ? (w / ws) * 100 : 0;
    return Math.max(0, Math.min(100, rh));
}

/**
 * Sundqvist (1989) cloud fraction (0-1) for a level:
 * cf = 1 - sqrt((1 - RH) / (1 - RH_crit))
 */
export function sundqvistCloudFraction(rhPct: number, rhCrit: number): number {
    const rh = rhPct / 100;
    if (rh <= rhCrit) return 0;
    if (rh >= 1) return 1;
    return 1 - Math.sqrt(Math.max(0, (1 - rh) / (1 - rhCrit)));
}

/**
 * Total cloud cover (0-100) from low/mid/high RH (850/700/500 hPa) and total
 * column water vapor. A missing level contributes no cloud.
 */
export function estimateCloudCover(rh850: number | null, rh700: number | null, rh500: number | null, tcwv: number | null): number {
    const [low, mid, high] = CLOUD_LEVELS;
    const cfLow = rh850 !== null ? sundqvistCloudFraction(rh850, low.rhCrit) : 0;
    const cfMid = rh700 !== null ? sundqvistCloudFraction(rh700, mid.rhCrit) : 0;
    const cfHigh = rh500 !== null ? sundqvistCloudFraction(rh500, high.rhCrit) : 0;

    let total = 1 - (1 - cfLow) * (1 - cfMid) * (1 - cfHigh);

    // Dry column: no room for the mid/high cloud the RH profile suggests
    if (tcwv !== null && tcwv < DRY_COLUMN_TCWV) {
        total = Math.min(total, DRY_COLUMN_MAX_CLOUD);
    }

    return roundTo(total * 100, 1);
}

export function cloudCoverToWeatherCode(cloudPct: number): WeatherCode {
    if (cloudPct < 10) return WEATHER_CODES.clear;
    if (cloudPct < 30) return WEATHER_CODES.mainlyClear;
    if (cloudPct < 60) return WEATHER_CODES.partlyCloudy;
    return WEATHER_CODES.overcast;
}

/**
 * WMO weather code for a step. Precipitation (kg/m2 per step) wins over cloud.
 */
export function classifyWeatherCode(cloudPct: number, tp: number | null = null): WeatherCode {
    if (tp !== null && tp > PRECIP_THRESHOLDS.any) {
        if (tp > PRECIP_THRESHOLDS.heavy) return WEATHER_CODES.heavyRain;
        if (tp > PRECIP_THRESHOLDS.moderate) return WEATHER_CODES.moderateRain;
        return WEATHER_CODES.slightRain;
    }
    return cloudCoverToWeatherCode(cloudPct);
}

export type StepValues = Partial<Record<GridVariable, number>>;

const levelHumidity = (values: StepValues, level: typeof CLOUD_LEVELS[number]): number | null => {
    const q = values[level.humidity];
    const t = values[level.temperature];
    if (q === undefined || t === undefined) return null;
    return specificToRelativeHumidity(q, t, level.hpa);
};

const oneDecimal = (value: number | null): number | null => (value !== null ? roundTo(value, 1) : null);

/**
 * Derives every physical and categorical quantity for one time-step from the
 * raw values read at the grid point. Absent inputs yield null outputs.
 */
export function deriveStepRecord(leadHours: number, validTime: string, values: StepValues): StepRecord {
    const [low, mid, high] = CLOUD_LEVELS;
    const rh850 = levelHumidity(values, low);
    const rh700 = levelHumidity(values, mid);
    const rh500 = levelHumidity(values, high);

    const raw = (name: GridVariable): number | null => values[name] ?? null;
    const tcwv = raw('tcwv');
    const tp = raw('tp');
    const t2m = raw('t2m');
    const u10m = raw('u10m');
    const v10m = raw('v10m');
    const msl = raw('msl');

    const cloudPct = estimateCloudCover(rh850, rh700, rh500, tcwv);

    return {
        lead_hours: leadHours,
        valid_time: validTime,
        t2m,
        u10m,
        v10m,
        msl,
        tcwv,
        sp: raw('sp'),
        tp,
        rh_850: oneDecimal(rh850),
        rh_700: oneDecimal(rh700),
        rh_500: oneDecimal(rh500),
        cloud_pct: cloudPct,
        weather_code: classifyWeatherCode(cloudPct, tp),
        temp_f: t2m !== null ? kelvinToFahrenheit(t2m) : null,
        wind_mph: u10m !== null && v10m !== null ? msToMph(windSpeed(u10m, v10m)) : null,
        pressure_inhg: msl !== null ? paToInHg(msl) : null
    };
}
