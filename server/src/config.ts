import { z } from 'zod';
import {
    ACCURACY_LOG_LIMIT,
    DEFAULT_LOCATION,
    DEFAULT_MODEL,
    DEFAULT_STEP_HOURS,
    MAE_WINDOW_DAYS,
    PERSIST_RETRY
} from './constants';

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3001),
    DB_PATH: z.string().default('./forecast.db'),
    GRID_DIR: z.string().default('./grids'),
    LOCATION_NAME: z.string().default(DEFAULT_LOCATION.name),
    LOCATION_LAT: z.coerce.number().min(-90).max(90).default(DEFAULT_LOCATION.lat),
    LOCATION_LON: z.coerce.number().min(-180).max(180).default(DEFAULT_LOCATION.lon),
    MODEL_ID: z.string().default(DEFAULT_MODEL.id),
    MODEL_PARAMS: z.string().default(DEFAULT_MODEL.params),
    STEP_HOURS: z.coerce.number().int().positive().default(DEFAULT_STEP_HOURS),
    STORAGE: z.enum(['sqlite', 'gist']).default('sqlite'),
    FORECAST_GIST_ID: z.string().optional(),
    GH_TOKEN: z.string().optional(),
    OBSERVATION_TIMEZONE: z.string().default('America/Los_Angeles'),
    RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(2400 * 1000),
    FORECAST_CRON: z.string().default('30 3,9,15,21 * * *'),
    ACCURACY_CRON: z.string().default('15 6 * * *')
});

export type StorageConfig =
    | { kind: 'sqlite'; dbPath: string }
    | { kind: 'gist'; gistId: string; token: string };

export interface AppConfig {
    port: number;
    gridDir: string;
    storage: StorageConfig;
    location: { name: string; lat: number; lon: number };
    model: { id: string; params: string };
    stepHours: number;
    observationTimezone: string;
    accuracy: { logLimit: number; windowDays: number };
    retry: { attempts: number; delayMs: number };
    runTimeoutMs: number;
    schedule: { forecast: string; accuracy: string };
}

// Empty strings in .env mean "unset"
const withoutBlanks = (env: NodeJS.ProcessEnv): Record<string, string> => {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') out[key] = value;
    }
    return out;
};

const deepFreeze = <T extends object>(obj: T): Readonly<T> => {
    for (const value of Object.values(obj)) {
        if (value !== null && typeof value === 'object') deepFreeze(value);
    }
    return Object.freeze(obj);
};

/**
 * Builds the immutable run configuration from environment variables.
 * Throws a ZodError describing every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
    const e = EnvSchema.parse(withoutBlanks(env));

    let storage: StorageConfig;
    if (e.STORAGE === 'gist') {
        if (!e.FORECAST_GIST_ID || !e.GH_TOKEN) {
            throw new Error('STORAGE=gist requires FORECAST_GIST_ID and GH_TOKEN');
        }
        storage = { kind: 'gist', gistId: e.FORECAST_GIST_ID, token: e.GH_TOKEN };
    } else {
        storage = { kind: 'sqlite', dbPath: e.DB_PATH };
    }

    return deepFreeze({
        port: e.PORT,
        gridDir: e.GRID_DIR,
        storage,
        location: { name: e.LOCATION_NAME, lat: e.LOCATION_LAT, lon: e.LOCATION_LON },
        model: { id: e.MODEL_ID, params: e.MODEL_PARAMS },
        stepHours: e.STEP_HOURS,
        observationTimezone: e.OBSERVATION_TIMEZONE,
        accuracy: { logLimit: ACCURACY_LOG_LIMIT, windowDays: MAE_WINDOW_DAYS },
        retry: { ...PERSIST_RETRY },
        runTimeoutMs: e.RUN_TIMEOUT_MS,
        schedule: { forecast: e.FORECAST_CRON, accuracy: e.ACCURACY_CRON }
    });
}
