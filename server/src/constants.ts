// Default location: Palo Alto, CA
export const DEFAULT_LOCATION = {
    name: 'Palo Alto, CA',
    lat: 37.4478,
    lon: -122.136
};

export const DEFAULT_MODEL = {
    id: 'atlas-crps',
    params: '4.3B'
};

// --- Variable Sets ---

// Surface fields copied into every step record as-is
export const SURFACE_VARS = ['t2m', 'u10m', 'v10m', 'msl', 'tcwv', 'sp', 'tp'] as const;

// Upper-level humidity/temperature used for cloud cover estimation
export const CLOUD_VARS = ['q850', 'q700', 'q500', 't850', 't700', 't500'] as const;

export const ALL_VARS: readonly string[] = [...SURFACE_VARS, ...CLOUD_VARS];

// Pressure levels (hPa) with the Sundqvist critical RH for each
export const CLOUD_LEVELS = [
    { hpa: 850, humidity: 'q850', temperature: 't850', rhCrit: 0.70 },
    { hpa: 700, humidity: 'q700', temperature: 't700', rhCrit: 0.60 },
    { hpa: 500, humidity: 'q500', temperature: 't500', rhCrit: 0.50 }
] as const;

// --- Thresholds ---

export const DRY_COLUMN_TCWV = 8; // kg/m2
export const DRY_COLUMN_MAX_CLOUD = 0.2;

// Precipitation per step (kg/m2 per 6h)
export const PRECIP_THRESHOLDS = {
    any: 1.0,
    moderate: 3,
    heavy: 10
};

export const WEATHER_CODES = {
    clear: 0,
    mainlyClear: 1,
    partlyCloudy: 2,
    overcast: 3,
    slightRain: 61,
    moderateRain: 63,
    heavyRain: 65
} as const;

// --- Timing ---

export const DEFAULT_STEP_HOURS = 6;
export const CYCLE_HOURS = 6; // upstream runs at 00/06/12/18 UTC
export const STALE_AFTER_HOURS = 12;

export const PERSIST_RETRY = {
    attempts: 3,
    delayMs: 5000
};

// --- Accuracy ---

export const TRACKED_FIELDS = ['temp_high_f', 'temp_low_f', 'wind_max_mph'] as const;
export const ACCURACY_LOG_LIMIT = 90;
export const MAE_WINDOW_DAYS = 14;

// --- Documents ---

export const FORECAST_DOCUMENT = 'atlas_forecast.json';
export const ACCURACY_DOCUMENT = 'accuracy_log.json';

export const parseUTC = (isoStr: string): number => {
    return new Date(isoStr + (isoStr.includes('Z') ? '' : 'Z')).getTime();
};

// Naive ISO string (no zone suffix) for a UTC epoch
export const formatNaiveUTC = (epochMs: number): string => {
    return new Date(epochMs).toISOString().slice(0, 19);
};

// Math.round semantics: an exact half goes up (0.25 -> 0.3, -0.25 -> -0.2)
export const roundTo = (value: number, digits: number): number => {
    const factor = Math.pow(10, digits);
    return Math.round(value * factor) / factor;
};
