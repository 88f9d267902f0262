import { z } from 'zod';
import { createLogger } from '../logger';
import type { ObservationSource, ObservedDay, TargetLocation } from '../types';

const log = createLogger('OBS');

type FetchFn = typeof fetch;

// Observation reads only: exponential backoff on throttling and server errors.
// Document writes use the fixed-delay retry in storage/documentStore.
export const fetchWithRetry = async (url: string, retries = 3, delay = 1000, fetchImpl: FetchFn = fetch): Promise<Response> => {
    for (let i = 0; i < retries; i++) {
        try {
            const res = await fetchImpl(url);
            if (res.status === 429 || res.status >= 500) {
                throw new Error(`HTTP ${res.status}`);
            }
            return res;
        } catch (err) {
            if (i === retries - 1) throw err;
            await new Promise(r => setTimeout(r, delay * Math.pow(2, i)));
        }
    }
    throw new Error('Max retries reached');
};

const ArchiveResponseSchema = z.object({
    daily: z.object({
        time: z.array(z.string()).optional(),
        temperature_2m_max: z.array(z.number().nullable()).optional(),
        temperature_2m_min: z.array(z.number().nullable()).optional(),
        wind_speed_10m_max: z.array(z.number().nullable()).optional()
    }).optional()
});

export interface ArchiveSourceOptions {
    location: TargetLocation;
    timezone: string;
    fetchImpl?: FetchFn;
    retryDelayMs?: number;
}

export const archiveUrl = (location: TargetLocation, timezone: string, date: string): string =>
    'https://archive-api.open-meteo.com/v1/archive' +
    `?latitude=${location.lat}&longitude=${location.lon}` +
    `&start_date=${date}&end_date=${date}` +
    '&daily=temperature_2m_max,temperature_2m_min,wind_speed_10m_max' +
    '&temperature_unit=fahrenheit&wind_speed_unit=mph' +
    `&timezone=${encodeURIComponent(timezone)}`;

/**
 * Ground truth from the Open-Meteo historical archive: daily high/low (°F) and
 * max wind (mph) for a local calendar day. Resolves null when the archive has
 * no high temperature for the day yet, or cannot be reached.
 */
export function createOpenMeteoArchiveSource(options: ArchiveSourceOptions): ObservationSource {
    const fetchImpl = options.fetchImpl ?? fetch;
    const retryDelay = options.retryDelayMs ?? 1000;

    return {
        async fetchDaily(date: string): Promise<ObservedDay | null> {
            const url = archiveUrl(options.location, options.timezone, date);
            try {
                const res = await fetchWithRetry(url, 3, retryDelay, fetchImpl);
                if (!res.ok) {
                    log(`Archive HTTP ${res.status} for ${date}`);
                    return null;
                }
                const parsed = ArchiveResponseSchema.safeParse(await res.json());
                if (!parsed.success) {
                    log(`Unexpected archive response for ${date}`);
                    return null;
                }
                const daily = parsed.data.daily;
                const observed: ObservedDay = {
                    date,
                    source: 'open-meteo-archive',
                    temp_high_f: daily?.temperature_2m_max?.[0] ?? null,
                    temp_low_f: daily?.temperature_2m_min?.[0] ?? null,
                    wind_max_mph: daily?.wind_speed_10m_max?.[0] ?? null
                };
                return observed.temp_high_f === null ? null : observed;
            } catch (e) {
                log(`Failed to fetch actuals for ${date}: ${e}`);
                return null;
            }
        }
    };
}
