import express from 'express';
import cors from 'cors';
import { z } from 'zod';
import { buildForecastView, readForecast } from './services/forecastService';
import { readAccuracyLog } from './services/accuracyService';
import { createLogger } from './logger';
import type { JobRunner } from './jobs';
import type { DocumentStore } from './types';

const log = createLogger('API');

const AccuracyTriggerSchema = z.object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional()
});

export interface AppDeps {
    store: DocumentStore;
    jobs: JobRunner;
    now?: () => Date;
}

export function createApp(deps: AppDeps): express.Express {
    const app = express();
    const now = deps.now ?? (() => new Date());

    app.use(cors());
    app.use(express.json());

    // --- API Routes ---

    app.get('/api/forecast', async (req, res) => {
        try {
            const payload = await readForecast(deps.store);
            if (!payload) {
                res.status(404).json({ error: 'No forecast available' });
                return;
            }
            res.json(buildForecastView(payload, now()));
        } catch (e) {
            res.status(500).json({ error: String(e) });
        }
    });

    app.get('/api/accuracy', async (req, res) => {
        try {
            res.json(await readAccuracyLog(deps.store));
        } catch (e) {
            res.status(500).json({ error: String(e) });
        }
    });

    app.get('/api/status', (req, res) => {
        res.json({
            status: 'online',
            jobs: deps.jobs.status(),
            server_time: now().getTime()
        });
    });

    app.post('/api/trigger-forecast', (req, res) => {
        log('Triggering forecast run...');
        // Run in background to avoid timeout
        deps.jobs.runForecast().catch(err => log(`Forecast run failed: ${err}`));
        res.status(202).json({ message: 'Forecast run started' });
    });

    app.post('/api/trigger-accuracy', (req, res) => {
        const body = AccuracyTriggerSchema.safeParse(req.body ?? {});
        if (!body.success) {
            res.status(400).json({ error: 'date must be YYYY-MM-DD' });
            return;
        }
        log(`Triggering accuracy run${body.data.date ? ` for ${body.data.date}` : ''}...`);
        deps.jobs.runAccuracy(body.data.date).catch(err => log(`Accuracy run failed: ${err}`));
        res.status(202).json({ message: 'Accuracy run started' });
    });

    return app;
}
