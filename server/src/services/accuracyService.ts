import { ACCURACY_DOCUMENT, ACCURACY_LOG_LIMIT, FORECAST_DOCUMENT, MAE_WINDOW_DAYS, TRACKED_FIELDS, roundTo } from '../constants';
import { readJsonDocument, writeJsonDocument } from '../storage/documentStore';
import type { RetryPolicy } from '../storage/documentStore';
import { AccuracyLogDocumentSchema, ForecastPayloadSchema } from '../storage/schemas';
import { createLogger } from '../logger';
import type {
    AccuracyEntry,
    AccuracyLogDocument,
    AccuracySummary,
    DailyValues,
    DocumentStore,
    ForecastPayload,
    ObservationSource,
    ObservedDay,
    PredictedDay,
    TrackedField
} from '../types';

const log = createLogger('ACCURACY');

export interface AccuracyOptions {
    logLimit: number;
    windowDays: number;
    retry?: RetryPolicy;
}

export const DEFAULT_ACCURACY_OPTIONS: AccuracyOptions = {
    logLimit: ACCURACY_LOG_LIMIT,
    windowDays: MAE_WINDOW_DAYS
};

export interface AccuracyDeps {
    store: DocumentStore;
    observations: ObservationSource;
    now?: () => Date;
    signal?: AbortSignal;
}

export type AccuracyRunResult =
    | { status: 'skipped'; date: string; reason: string }
    | { status: 'recorded'; date: string; entry: AccuracyEntry; summary: AccuracySummary };

const emptyValues = (): DailyValues => ({ temp_high_f: null, temp_low_f: null, wind_max_mph: null });

/**
 * The archived forecast's daily aggregate for a date, or null if that forecast
 * did not cover it.
 */
export function findPrediction(forecast: ForecastPayload | null, date: string): PredictedDay | null {
    const day = forecast?.daily.find(d => d.date === date);
    if (!forecast || !day) return null;
    return {
        date,
        source: forecast.model,
        init_time: forecast.init_time,
        temp_high_f: day.temp_high_f,
        temp_low_f: day.temp_low_f,
        wind_max_mph: day.wind_max_mph,
        wind_avg_mph: day.wind_avg_mph
    };
}

export function absoluteErrors(predicted: PredictedDay | null, observed: ObservedDay): DailyValues {
    const errors = emptyValues();
    if (!predicted) return errors;
    for (const field of TRACKED_FIELDS) {
        const p = predicted[field];
        const a = observed[field];
        if (p !== null && a !== null) errors[field] = roundTo(Math.abs(p - a), 1);
    }
    return errors;
}

export function buildAccuracyEntry(date: string, predicted: PredictedDay | null, observed: ObservedDay): AccuracyEntry {
    return { date, predicted, observed, errors: absoluteErrors(predicted, observed) };
}

/** Appends and keeps the newest `limit` entries; oldest entries drop first. */
export function appendToLog(entries: readonly AccuracyEntry[], entry: AccuracyEntry, limit: number): AccuracyEntry[] {
    return [...entries, entry].slice(-limit);
}

/**
 * Mean |predicted - actual| for a field over the entries given, counting only
 * entries where both sides are present. Null when there is no complete pair.
 */
export function meanAbsoluteError(entries: readonly AccuracyEntry[], field: TrackedField): number | null {
    const errors: number[] = [];
    for (const entry of entries) {
        const p = entry.predicted?.[field] ?? null;
        const a = entry.observed[field];
        if (p !== null && a !== null) errors.push(Math.abs(p - a));
    }
    if (errors.length === 0) return null;
    return roundTo(errors.reduce((sum, e) => sum + e, 0) / errors.length, 2);
}

export function summarizeAccuracy(entries: readonly AccuracyEntry[], now: Date, windowDays: number): AccuracySummary {
    const recent = entries.slice(-windowDays);
    const mae = emptyValues();
    for (const field of TRACKED_FIELDS) {
        mae[field] = meanAbsoluteError(recent, field);
    }
    return {
        last_updated: now.toISOString(),
        total_days: entries.length,
        tracked_days: recent.filter(e => e.predicted !== null).length,
        window_days: windowDays,
        mae
    };
}

export async function readAccuracyLog(store: DocumentStore): Promise<AccuracyLogDocument> {
    return (await readJsonDocument(store, ACCURACY_DOCUMENT, AccuracyLogDocumentSchema)) ?? { summary: null, log: [] };
}

/**
 * Pairs the archived prediction for `date` with ground truth, appends the
 * result to the accuracy log and rewrites the log with fresh rolling metrics.
 * Nothing is written when ground truth for the date is unavailable, or once
 * `deps.signal` has been aborted.
 */
export async function evaluateAccuracy(date: string, deps: AccuracyDeps, options: AccuracyOptions = DEFAULT_ACCURACY_OPTIONS): Promise<AccuracyRunResult> {
    const now = deps.now ?? (() => new Date());
    log(`Checking accuracy for ${date}`);

    const observed = await deps.observations.fetchDaily(date);
    if (!observed || observed.temp_high_f === null) {
        log(`No actuals available for ${date} yet, skipping`);
        return { status: 'skipped', date, reason: 'ground truth unavailable' };
    }

    const forecast = await readJsonDocument(deps.store, FORECAST_DOCUMENT, ForecastPayloadSchema);
    const predicted = findPrediction(forecast, date);
    if (!predicted) {
        log(`No archived prediction covers ${date}; recording actuals only`);
    }

    const current = await readAccuracyLog(deps.store);
    const entry = buildAccuracyEntry(date, predicted, observed);
    const entries = appendToLog(current.log, entry, options.logLimit);
    const summary = summarizeAccuracy(entries, now(), options.windowDays);

    await writeJsonDocument(deps.store, ACCURACY_DOCUMENT, { summary, log: entries }, options.retry, deps.signal);

    log(`Recorded ${date}: ${JSON.stringify(entry.errors)}; ${summary.window_days}-day MAE ${JSON.stringify(summary.mae)}`);
    return { status: 'recorded', date, entry, summary };
}
