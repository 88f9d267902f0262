import { FORECAST_DOCUMENT, STALE_AFTER_HOURS, roundTo } from '../constants';
import { loadLatestCycle } from '../grid/gridSource';
import { readJsonDocument, writeJsonDocument } from '../storage/documentStore';
import type { RetryPolicy } from '../storage/documentStore';
import { ForecastPayloadSchema } from '../storage/schemas';
import { extractForecast } from './extractor';
import { aggregateDaily } from './aggregator';
import { createLogger } from '../logger';
import type { DocumentStore, ForecastPayload, ForecastView, GriddedField, GridSource, TargetLocation } from '../types';

const log = createLogger('FORECAST');

export interface ForecastOptions {
    location: TargetLocation;
    model: { id: string; params: string };
    stepHours: number;
    retry?: RetryPolicy;
}

export interface ForecastDeps {
    source: GridSource;
    store: DocumentStore;
    now?: () => Date;
    // Aborted when the run has been abandoned; nothing is written after that
    signal?: AbortSignal;
}

/**
 * Builds the forecast payload for one gridded run. Returns null when the grid
 * carries none of the model variables.
 */
export function buildForecastPayload(grid: GriddedField, initTime: string, generatedAt: Date, options: ForecastOptions): ForecastPayload | null {
    const { point, steps } = extractForecast(grid, {
        target: options.location,
        initTime,
        stepHours: options.stepHours
    });
    if (steps.length === 0) return null;

    return {
        model: options.model.id,
        model_params: options.model.params,
        init_time: initTime,
        generated_at: generatedAt.toISOString(),
        stale_after_hours: STALE_AFTER_HOURS,
        location: {
            name: options.location.name,
            target_lat: options.location.lat,
            target_lon: options.location.lon,
            grid_lat: point.lat,
            grid_lon: point.lon
        },
        daily: aggregateDaily(steps, initTime),
        hourly_6h: steps
    };
}

/**
 * One forecast run: pick the newest available cycle, extract and aggregate the
 * configured point, and persist the payload. An empty extraction leaves the
 * previously stored forecast in place.
 */
export async function produceForecast(deps: ForecastDeps, options: ForecastOptions): Promise<ForecastPayload | null> {
    const now = deps.now ?? (() => new Date());

    const { initTime, grid } = await loadLatestCycle(deps.source, now());
    log(`Extracting ${options.location.name} from cycle ${initTime}...`);

    const payload = buildForecastPayload(grid, initTime, now(), options);
    if (!payload) {
        log(`Cycle ${initTime} has no model variables; no forecast available`);
        return null;
    }

    await writeJsonDocument(deps.store, FORECAST_DOCUMENT, payload, options.retry, deps.signal);
    log(`Forecast complete: ${payload.daily.length} days, ${payload.hourly_6h.length} timesteps`);
    return payload;
}

/** Hours since generation, or null when the timestamp cannot be parsed. */
export function forecastAgeHours(generatedAt: string, now: Date): number | null {
    const generated = Date.parse(generatedAt);
    if (Number.isNaN(generated)) return null;
    return (now.getTime() - generated) / 3600000;
}

export function isStale(generatedAt: string, now: Date, thresholdHours: number = STALE_AFTER_HOURS): boolean {
    const age = forecastAgeHours(generatedAt, now);
    return age === null || age > thresholdHours;
}

export function buildForecastView(payload: ForecastPayload, now: Date): ForecastView {
    const age = forecastAgeHours(payload.generated_at, now);
    return {
        ...payload,
        age_hours: age !== null ? roundTo(age, 1) : null,
        stale: isStale(payload.generated_at, now)
    };
}

export async function readForecast(store: DocumentStore): Promise<ForecastPayload | null> {
    return readJsonDocument(store, FORECAST_DOCUMENT, ForecastPayloadSchema);
}
