import fs from 'fs/promises';
import path from 'path';
import { loadNetcdfGrid } from './netcdfGrid';
import { UpstreamUnavailableError } from '../errors';
import { ALL_VARS, CYCLE_HOURS, formatNaiveUTC } from '../constants';
import { createLogger } from '../logger';
import type { GriddedField, GridSource } from '../types';

const log = createLogger('GRID');

const HOUR_MS = 3600000;

export const gridFileName = (initTime: string): string => `${initTime.replace(/:/g, '-')}.nc`;

const isMissingFile = (e: unknown): boolean =>
    e instanceof Error && 'code' in e && (e.code === 'ENOENT' || e.code === 'ENOTDIR');

/**
 * Gridded data written by the inference job as one NetCDF file per cycle.
 */
export class NetcdfDirectorySource implements GridSource {
    constructor(private readonly dir: string) { }

    async load(initTime: string): Promise<GriddedField> {
        const file = path.join(this.dir, gridFileName(initTime));
        let data: Buffer;
        try {
            data = await fs.readFile(file);
        } catch (e) {
            if (isMissingFile(e)) throw new UpstreamUnavailableError(initTime);
            throw e;
        }
        log(`Reading ${file} (${data.byteLength} bytes)`);
        return loadNetcdfGrid(data, ALL_VARS);
    }
}

/**
 * Initialization times to try, newest first. Upstream data takes a few hours to
 * land, so the primary choice is one full cycle back and the fallback two.
 */
export function cycleCandidates(now: Date, cycleHours: number = CYCLE_HOURS): [string, string] {
    const cycleMs = cycleHours * HOUR_MS;
    const currentCycle = Math.floor(now.getTime() / cycleMs) * cycleMs;
    return [formatNaiveUTC(currentCycle - cycleMs), formatNaiveUTC(currentCycle - 2 * cycleMs)];
}

/**
 * Loads the primary cycle, falling back once to the earlier cycle when the
 * source reports it unavailable. Any other failure propagates unchanged.
 */
export async function loadLatestCycle(source: GridSource, now: Date): Promise<{ initTime: string; grid: GriddedField }> {
    const [primary, fallback] = cycleCandidates(now);
    try {
        return { initTime: primary, grid: await source.load(primary) };
    } catch (e) {
        if (!(e instanceof UpstreamUnavailableError)) throw e;
        log(`Cycle ${primary} not ready, trying previous cycle ${fallback}...`);
    }
    return { initTime: fallback, grid: await source.load(fallback) };
}
