import { z } from 'zod';
import { WEATHER_CODES } from '../constants';
import type {
    AccuracyEntry,
    AccuracyLogDocument,
    AccuracySummary,
    DailySummary,
    DailyValues,
    ForecastPayload,
    ObservedDay,
    PredictedDay,
    StepRecord,
    WeatherCode
} from '../types';

const num = z.number().nullable();

export const WeatherCodeSchema: z.ZodType<WeatherCode> = z.union([
    z.literal(WEATHER_CODES.clear),
    z.literal(WEATHER_CODES.mainlyClear),
    z.literal(WEATHER_CODES.partlyCloudy),
    z.literal(WEATHER_CODES.overcast),
    z.literal(WEATHER_CODES.slightRain),
    z.literal(WEATHER_CODES.moderateRain),
    z.literal(WEATHER_CODES.heavyRain)
]);

export const StepRecordSchema: z.ZodType<StepRecord> = z.object({
    lead_hours: z.number(),
    valid_time: z.string(),
    t2m: num,
    u10m: num,
    v10m: num,
    msl: num,
    tcwv: num,
    sp: num,
    tp: num,
    rh_850: num,
    rh_700: num,
    rh_500: num,
    cloud_pct: z.number(),
    weather_code: WeatherCodeSchema,
    temp_f: num,
    wind_mph: num,
    pressure_inhg: num
});

export const DailySummarySchema: z.ZodType<DailySummary> = z.object({
    date: z.string(),
    temp_high_f: num,
    temp_low_f: num,
    temp_avg_f: num,
    wind_avg_mph: num,
    wind_max_mph: num,
    pressure_avg_inhg: num,
    cloud_avg_pct: num,
    weather_code: WeatherCodeSchema
});

export const ForecastPayloadSchema: z.ZodType<ForecastPayload> = z.object({
    model: z.string(),
    model_params: z.string(),
    init_time: z.string(),
    generated_at: z.string(),
    stale_after_hours: z.number(),
    location: z.object({
        name: z.string(),
        target_lat: z.number(),
        target_lon: z.number(),
        grid_lat: z.number(),
        grid_lon: z.number()
    }),
    daily: z.array(DailySummarySchema),
    hourly_6h: z.array(StepRecordSchema)
});

const dailyValues = {
    temp_high_f: num,
    temp_low_f: num,
    wind_max_mph: num
};

const DailyValuesSchema: z.ZodType<DailyValues> = z.object(dailyValues);

export const ObservedDaySchema: z.ZodType<ObservedDay> = z.object({
    ...dailyValues,
    date: z.string(),
    source: z.string()
});

export const PredictedDaySchema: z.ZodType<PredictedDay> = z.object({
    ...dailyValues,
    date: z.string(),
    source: z.string(),
    init_time: z.string(),
    wind_avg_mph: num
});

export const AccuracyEntrySchema: z.ZodType<AccuracyEntry> = z.object({
    date: z.string(),
    predicted: PredictedDaySchema.nullable(),
    observed: ObservedDaySchema,
    errors: DailyValuesSchema
});

export const AccuracySummarySchema: z.ZodType<AccuracySummary> = z.object({
    last_updated: z.string(),
    total_days: z.number(),
    tracked_days: z.number(),
    window_days: z.number(),
    mae: DailyValuesSchema
});

export const AccuracyLogDocumentSchema: z.ZodType<AccuracyLogDocument> = z.object({
    summary: AccuracySummarySchema.nullable(),
    log: z.array(AccuracyEntrySchema)
});
