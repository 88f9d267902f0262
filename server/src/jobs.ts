import { RunTimeoutError } from './errors';
import { createLogger } from './logger';
import { produceForecast } from './services/forecastService';
import { evaluateAccuracy } from './services/accuracyService';
import type { AccuracyRunResult } from './services/accuracyService';
import type { AppConfig } from './config';
import type { DocumentStore, ForecastPayload, GridSource, ObservationSource } from './types';

const log = createLogger('JOBS');

export type JobName = 'forecast' | 'accuracy';

export interface JobStatus {
    running: boolean;
    last_started: string | null;
    last_finished: string | null;
    last_outcome: 'ok' | 'skipped' | 'failed' | null;
    last_error: string | null;
}

export interface JobDeps {
    source: GridSource;
    store: DocumentStore;
    observations: ObservationSource;
    now?: () => Date;
}

const emptyStatus = (): JobStatus => ({
    running: false,
    last_started: null,
    last_finished: null,
    last_outcome: null,
    last_error: null
});

export async function withTimeout<T>(job: string, timeoutMs: number, work: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new RunTimeoutError(job, timeoutMs)), timeoutMs);
    });
    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/** Calendar date (YYYY-MM-DD) of the day before `now` in the given time zone. */
export function previousLocalDate(now: Date, timeZone: string): string {
    const formatter = new Intl.DateTimeFormat('en-CA', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit'
    });
    const today = formatter.format(now);
    const d = new Date(`${today}T00:00:00Z`);
    d.setUTCDate(d.getUTCDate() - 1);
    return d.toISOString().slice(0, 10);
}

/**
 * Runs the forecast and accuracy jobs with at most one run of each in flight.
 * A request that arrives while the same job is running is skipped. A run that
 * times out is reported failed at once, but keeps the job marked running until
 * its work settles, and its signal is aborted so it writes nothing further.
 */
export function createJobRunner(deps: JobDeps, config: Readonly<AppConfig>) {
    const now = deps.now ?? (() => new Date());
    const status: Record<JobName, JobStatus> = { forecast: emptyStatus(), accuracy: emptyStatus() };

    async function guarded<T>(
        job: JobName,
        work: (signal: AbortSignal) => Promise<T>,
        outcome: (result: T) => 'ok' | 'skipped'
    ): Promise<T | null> {
        const s = status[job];
        if (s.running) {
            log(`${job} already running, skipping.`);
            return null;
        }
        s.running = true;
        s.last_started = now().toISOString();

        const controller = new AbortController();
        const pending = work(controller.signal);
        const release = () => {
            s.running = false;
            s.last_finished = now().toISOString();
        };
        pending.then(release, release);

        try {
            const result = await withTimeout(job, config.runTimeoutMs, pending);
            s.last_outcome = outcome(result);
            s.last_error = null;
            return result;
        } catch (e) {
            if (e instanceof RunTimeoutError) {
                log(`${job} timed out; abandoning the run`);
                controller.abort(e);
            }
            s.last_outcome = 'failed';
            s.last_error = String(e);
            throw e;
        }
    }

    return {
        runForecast(): Promise<ForecastPayload | null> {
            return guarded('forecast', signal => produceForecast(
                { source: deps.source, store: deps.store, now, signal },
                { location: config.location, model: config.model, stepHours: config.stepHours, retry: config.retry }
            ), payload => (payload ? 'ok' : 'skipped'));
        },

        runAccuracy(date: string = previousLocalDate(now(), config.observationTimezone)): Promise<AccuracyRunResult | null> {
            return guarded('accuracy', signal => evaluateAccuracy(
                date,
                { store: deps.store, observations: deps.observations, now, signal },
                { ...config.accuracy, retry: config.retry }
            ), result => (result.status === 'recorded' ? 'ok' : 'skipped'));
        },

        status(): Record<JobName, JobStatus> {
            return { forecast: { ...status.forecast }, accuracy: { ...status.accuracy } };
        }
    };
}

export type JobRunner = ReturnType<typeof createJobRunner>;
