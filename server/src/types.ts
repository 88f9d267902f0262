import type { SURFACE_VARS, CLOUD_VARS, TRACKED_FIELDS, WEATHER_CODES } from './constants';

export type SurfaceVariable = typeof SURFACE_VARS[number];
export type CloudVariable = typeof CLOUD_VARS[number];
export type GridVariable = SurfaceVariable | CloudVariable;
export type TrackedField = typeof TRACKED_FIELDS[number];
export type WeatherCode = typeof WEATHER_CODES[keyof typeof WEATHER_CODES];

/**
 * One variable of a gridded model run, addressable as [batch, step, lat, lon].
 */
export interface FieldArray {
    readonly shape: readonly [number, number, number, number];
    get(batch: number, step: number, latIndex: number, lonIndex: number): number;
}

/**
 * Read-only view of an inference job's output: named variables plus the
 * 1-D coordinate axes they are laid out on.
 */
export interface GriddedField {
    has(name: string): boolean;
    field(name: string): FieldArray;
    coord(axis: 'lat' | 'lon'): readonly number[];
}

export interface GridPoint {
    lat_index: number;
    lon_index: number;
    lat: number;
    lon: number;
}

export interface TargetLocation {
    name: string;
    lat: number;
    lon: number; // signed, -180..180
}

/**
 * Represents one 6-hourly forecast step at the configured grid point.
 * Raw model fields are kept in model units (K, m/s, Pa, kg/m2).
 */
export interface StepRecord {
    lead_hours: number;
    valid_time: string;

    t2m: number | null;
    u10m: number | null;
    v10m: number | null;
    msl: number | null;
    tcwv: number | null;
    sp: number | null;
    tp: number | null;

    rh_850: number | null;
    rh_700: number | null;
    rh_500: number | null;
    cloud_pct: number;
    weather_code: WeatherCode;

    temp_f: number | null;
    wind_mph: number | null;
    pressure_inhg: number | null;
}

export interface DailySummary {
    date: string;
    temp_high_f: number | null;
    temp_low_f: number | null;
    temp_avg_f: number | null;
    wind_avg_mph: number | null;
    wind_max_mph: number | null;
    pressure_avg_inhg: number | null;
    cloud_avg_pct: number | null;
    weather_code: WeatherCode;
}

export interface ForecastLocation {
    name: string;
    target_lat: number;
    target_lon: number;
    grid_lat: number;
    grid_lon: number;
}

export interface ForecastPayload {
    model: string;
    model_params: string;
    init_time: string;
    generated_at: string;
    stale_after_hours: number;
    location: ForecastLocation;
    daily: DailySummary[];
    hourly_6h: StepRecord[];
}

export interface ForecastView extends ForecastPayload {
    age_hours: number | null;
    stale: boolean;
}

export type DailyValues = Record<TrackedField, number | null>;

/**
 * Ground truth for one local calendar day, in the same units as predictions.
 */
export interface ObservedDay extends DailyValues {
    date: string;
    source: string;
}

export interface PredictedDay extends DailyValues {
    date: string;
    source: string;
    init_time: string;
    wind_avg_mph: number | null;
}

export interface AccuracyEntry {
    date: string;
    predicted: PredictedDay | null;
    observed: ObservedDay;
    errors: DailyValues;
}

export interface AccuracySummary {
    last_updated: string;
    total_days: number;
    tracked_days: number;
    window_days: number;
    mae: DailyValues;
}

export interface AccuracyLogDocument {
    summary: AccuracySummary | null;
    log: AccuracyEntry[];
}

export interface ObservationSource {
    fetchDaily(date: string): Promise<ObservedDay | null>;
}

export interface GridSource {
    /** Rejects with UpstreamUnavailableError when the cycle has not been produced. */
    load(initTime: string): Promise<GriddedField>;
}

export interface DocumentStore {
    read(name: string): Promise<string | null>;
    write(name: string, content: string): Promise<void>;
}
