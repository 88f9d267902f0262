import 'dotenv/config';
import cron from 'node-cron';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { createApp } from './app';
import { createJobRunner } from './jobs';
import { openDatabase } from './db';
import { NetcdfDirectorySource } from './grid/gridSource';
import { createOpenMeteoArchiveSource } from './services/observationService';
import { SqliteDocumentStore } from './storage/sqliteStore';
import { GistDocumentStore } from './storage/gistStore';
import { createLogger } from './logger';
import type { DocumentStore } from './types';

const log = createLogger('SERVER');

const createStore = (config: Readonly<AppConfig>): DocumentStore => {
    if (config.storage.kind === 'gist') {
        return new GistDocumentStore(config.storage.gistId, config.storage.token);
    }
    return new SqliteDocumentStore(openDatabase(config.storage.dbPath));
};

const config = loadConfig();
const store = createStore(config);

const jobs = createJobRunner({
    source: new NetcdfDirectorySource(config.gridDir),
    store,
    observations: createOpenMeteoArchiveSource({
        location: config.location,
        timezone: config.observationTimezone
    })
}, config);

const app = createApp({ store, jobs });

// --- Scheduler ---

cron.schedule(config.schedule.forecast, () => {
    jobs.runForecast().catch(err => log(`Scheduled forecast failed: ${err}`));
}, { timezone: 'UTC' });

cron.schedule(config.schedule.accuracy, () => {
    jobs.runAccuracy().catch(err => log(`Scheduled accuracy check failed: ${err}`));
}, { timezone: config.observationTimezone });

app.listen(config.port, () => {
    log(`Running on http://localhost:${config.port} (storage: ${config.storage.kind}, grids: ${config.gridDir})`);
});
