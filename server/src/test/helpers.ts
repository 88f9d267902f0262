import { DenseField, DenseGrid } from '../grid/denseGrid';
import type { DocumentStore, StepRecord } from '../types';

/** In-process DocumentStore that records every write attempt. */
export class MemoryStore implements DocumentStore {
    readonly docs = new Map<string, string>();
    readonly writes: Array<{ name: string; content: string }> = [];
    failWrites = 0;

    async read(name: string): Promise<string | null> {
        return this.docs.get(name) ?? null;
    }

    async write(name: string, content: string): Promise<void> {
        this.writes.push({ name, content });
        if (this.failWrites > 0) {
            this.failWrites--;
            throw new Error('store offline');
        }
        this.docs.set(name, content);
    }
}

export const makeField = (
    nsteps: number,
    nlat: number,
    nlon: number,
    value: (step: number, lat: number, lon: number) => number
): DenseField => {
    const values: number[] = [];
    for (let s = 0; s < nsteps; s++) {
        for (let i = 0; i < nlat; i++) {
            for (let j = 0; j < nlon; j++) {
                values.push(value(s, i, j));
            }
        }
    }
    return new DenseField([1, nsteps, nlat, nlon], values);
};

export const makeGrid = (
    lats: number[],
    lons: number[],
    nsteps: number,
    fields: Record<string, (step: number, lat: number, lon: number) => number>
): DenseGrid => {
    const grid = new DenseGrid(lats, lons);
    for (const [name, fn] of Object.entries(fields)) {
        grid.addField(name, makeField(nsteps, lats.length, lons.length, fn));
    }
    return grid;
};

export const makeStep = (overrides: Partial<StepRecord> = {}): StepRecord => ({
    lead_hours: 0,
    valid_time: '2026-02-05T03:00:00',
    t2m: null,
    u10m: null,
    v10m: null,
    msl: null,
    tcwv: null,
    sp: null,
    tp: null,
    rh_850: null,
    rh_700: null,
    rh_500: null,
    cloud_pct: 0,
    weather_code: 0,
    temp_f: null,
    wind_mph: null,
    pressure_inhg: null,
    ...overrides
});

export interface NetcdfVar {
    name: string;
    dims: number[];
    values: number[];
}

const NC_DIMENSION = 10;
const NC_VARIABLE = 11;
const NC_DOUBLE = 6;

/**
 * Minimal NetCDF-3 classic (CDF-1) writer for fixtures: no attributes, no
 * record dimension, every variable stored as big-endian doubles.
 */
export function encodeNetcdf(dims: Array<[string, number]>, vars: NetcdfVar[]): Uint8Array {
    const nameBytes = (name: string) => 4 + Math.ceil(name.length / 4) * 4;

    let headerSize = 4 + 4;
    headerSize += 8 + dims.reduce((n, [name]) => n + nameBytes(name) + 4, 0);
    headerSize += 8;
    headerSize += 8 + vars.reduce((n, v) => n + nameBytes(v.name) + 4 + 4 * v.dims.length + 8 + 12, 0);

    const dataSize = vars.reduce((n, v) => n + v.values.length * 8, 0);
    const buf = Buffer.alloc(headerSize + dataSize);
    let offset = 0;

    const int = (n: number) => {
        buf.writeInt32BE(n, offset);
        offset += 4;
    };
    const name = (s: string) => {
        int(s.length);
        buf.write(s, offset, 'ascii');
        offset += Math.ceil(s.length / 4) * 4;
    };

    buf.write('CDF', 0, 'ascii');
    buf.writeUInt8(1, 3);
    offset = 4;
    int(0); // numrecs

    int(NC_DIMENSION);
    int(dims.length);
    for (const [dimName, size] of dims) {
        name(dimName);
        int(size);
    }

    int(0); // no global attributes
    int(0);

    int(NC_VARIABLE);
    int(vars.length);
    let begin = headerSize;
    for (const v of vars) {
        name(v.name);
        int(v.dims.length);
        v.dims.forEach(int);
        int(0); // no variable attributes
        int(0);
        int(NC_DOUBLE);
        int(v.values.length * 8);
        int(begin);
        begin += v.values.length * 8;
    }

    for (const v of vars) {
        for (const value of v.values) {
            buf.writeDoubleBE(value, offset);
            offset += 8;
        }
    }
    return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}
