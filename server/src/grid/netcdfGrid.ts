import { NetCDFReader } from 'netcdfjs';
import { DenseField, DenseGrid } from './denseGrid';
import type { Shape4 } from './denseGrid';
import { GridConfigError } from '../errors';

const LAT_NAMES = ['lat', 'latitude'];
const LON_NAMES = ['lon', 'longitude'];

const toNumbers = (data: unknown, name: string): number[] => {
    if (!Array.isArray(data)) {
        throw new GridConfigError(`Variable ${name} is not a numeric array`);
    }
    // NaN marks a missing cell; the extractor treats non-finite values as absent
    return data.map(v => (typeof v === 'number' ? v : Number.NaN));
};

/**
 * Reads a NetCDF-3 file written by the inference job into a dense grid.
 * Data variables are laid out (batch, step, lat, lon); 3-D variables without a
 * batch axis are read as batch=1. Only the variables in `wanted` are loaded.
 */
export function loadNetcdfGrid(data: Uint8Array | ArrayBuffer, wanted: readonly string[]): DenseGrid {
    const reader = new NetCDFReader(data);
    const dims = reader.dimensions;
    const byName = new Map(reader.variables.map(v => [v.name, v]));

    const latVar = LAT_NAMES.map(n => byName.get(n)).find(v => v !== undefined);
    const lonVar = LON_NAMES.map(n => byName.get(n)).find(v => v !== undefined);
    if (!latVar || !lonVar) {
        throw new GridConfigError('NetCDF file has no lat/lon coordinate variables');
    }

    const lats = toNumbers(reader.getDataVariable(latVar.name), latVar.name);
    const lons = toNumbers(reader.getDataVariable(lonVar.name), lonVar.name);
    const grid = new DenseGrid(lats, lons);

    for (const name of wanted) {
        const variable = byName.get(name);
        if (!variable) continue;

        const sizes = variable.dimensions.map(id => dims[id].size);
        let shape: Shape4;
        if (sizes.length === 4) {
            shape = [sizes[0], sizes[1], sizes[2], sizes[3]];
        } else if (sizes.length === 3) {
            shape = [1, sizes[0], sizes[1], sizes[2]];
        } else {
            throw new GridConfigError(`Variable ${name} has ${sizes.length} dimensions, expected 3 or 4`);
        }

        grid.addField(name, new DenseField(shape, toNumbers(reader.getDataVariable(name), name)));
    }

    return grid;
}
