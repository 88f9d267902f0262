import { ALL_VARS, formatNaiveUTC, parseUTC } from '../constants';
import { locateGridPoint } from './locator';
import { deriveStepRecord } from './derived';
import type { StepValues } from './derived';
import type { GriddedField, GridPoint, GridVariable, StepRecord } from '../types';

export interface ExtractionOptions {
    target: { lat: number; lon: number };
    initTime: string;
    stepHours: number;
}

export interface Extraction {
    point: GridPoint;
    steps: StepRecord[];
}

const isGridVariable = (name: string): name is GridVariable => ALL_VARS.includes(name);

export const validTimeFor = (initTime: string, leadHours: number): string =>
    formatNaiveUTC(parseUTC(initTime) + leadHours * 3600000);

/**
 * Walks every time-step of the grid at the cell nearest the target and derives
 * one StepRecord per step. Yields no steps when none of the model variables are
 * present; callers treat that as "no forecast available".
 */
export function extractForecast(grid: GriddedField, options: ExtractionOptions): Extraction {
    const point = locateGridPoint(grid.coord('lat'), grid.coord('lon'), options.target);

    const present = ALL_VARS.filter(isGridVariable).filter(name => grid.has(name));
    if (present.length === 0) {
        return { point, steps: [] };
    }

    // All variables share the step axis; take its length from the first present one
    const nsteps = grid.field(present[0]).shape[1];
    const steps: StepRecord[] = [];

    for (let step = 0; step < nsteps; step++) {
        const leadHours = step * options.stepHours;
        const values: StepValues = {};

        for (const name of present) {
            const field = grid.field(name);
            if (step >= field.shape[1]) continue;
            const value = field.get(0, step, point.lat_index, point.lon_index);
            // Fill values come through as NaN; treat them as absent
            if (Number.isFinite(value)) values[name] = value;
        }

        steps.push(deriveStepRecord(leadHours, validTimeFor(options.initTime, leadHours), values));
    }

    return { point, steps };
}
