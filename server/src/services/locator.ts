import { GridConfigError } from '../errors';
import type { GridPoint } from '../types';

// Index of the value closest to target; the first index wins a tie
export function nearestIndex(axis: readonly number[], target: number): number {
    if (axis.length === 0) {
        throw new GridConfigError('Coordinate axis is empty');
    }
    let best = 0;
    let bestDiff = Math.abs(axis[0] - target);
    for (let i = 1; i < axis.length; i++) {
        const diff = Math.abs(axis[i] - target);
        if (diff < bestDiff) {
            best = i;
            bestDiff = diff;
        }
    }
    return best;
}

/** True when the longitude axis is laid out 0..360 rather than -180..180. */
export const usesPositiveLongitudes = (lons: readonly number[]): boolean => lons.some(l => l > 180);

export function normalizeLongitude(lon: number, lons: readonly number[]): number {
    return usesPositiveLongitudes(lons) && lon < 0 ? lon + 360 : lon;
}

/**
 * Resolves the grid cell nearest to a signed (-180..180) target coordinate.
 * Throws GridConfigError when either axis is empty.
 */
export function locateGridPoint(lats: readonly number[], lons: readonly number[], target: { lat: number; lon: number }): GridPoint {
    if (lats.length === 0 || lons.length === 0) {
        throw new GridConfigError(`Empty coordinate axes (lat: ${lats.length}, lon: ${lons.length})`);
    }
    const latIndex = nearestIndex(lats, target.lat);
    const lonIndex = nearestIndex(lons, normalizeLongitude(target.lon, lons));
    return {
        lat_index: latIndex,
        lon_index: lonIndex,
        lat: lats[latIndex],
        lon: lons[lonIndex]
    };
}
