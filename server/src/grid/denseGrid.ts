import type { FieldArray, GriddedField } from '../types';

export type Shape4 = readonly [number, number, number, number];

/**
 * Fixed-shape dense field stored row-major as [batch, step, lat, lon].
 */
export class DenseField implements FieldArray {
    readonly shape: Shape4;
    private readonly values: Float64Array;

    constructor(shape: Shape4, values: ArrayLike<number>) {
        const size = shape[0] * shape[1] * shape[2] * shape[3];
        if (values.length !== size) {
            throw new RangeError(`Expected ${size} values for shape [${shape.join(', ')}], got ${values.length}`);
        }
        this.shape = shape;
        this.values = Float64Array.from(values);
    }

    get(batch: number, step: number, latIndex: number, lonIndex: number): number {
        const [nb, ns, nlat, nlon] = this.shape;
        if (batch < 0 || batch >= nb || step < 0 || step >= ns || latIndex < 0 || latIndex >= nlat || lonIndex < 0 || lonIndex >= nlon) {
            throw new RangeError(`Index [${batch}, ${step}, ${latIndex}, ${lonIndex}] outside shape [${this.shape.join(', ')}]`);
        }
        return this.values[((batch * ns + step) * nlat + latIndex) * nlon + lonIndex];
    }
}

export class DenseGrid implements GriddedField {
    private readonly fields = new Map<string, DenseField>();
    private readonly lats: readonly number[];
    private readonly lons: readonly number[];

    constructor(lats: readonly number[], lons: readonly number[]) {
        this.lats = [...lats];
        this.lons = [...lons];
    }

    /** Adds a variable; its lat/lon extents must match the coordinate axes. */
    addField(name: string, field: DenseField): this {
        const [, , nlat, nlon] = field.shape;
        if (nlat !== this.lats.length || nlon !== this.lons.length) {
            throw new RangeError(`Field ${name} is ${nlat}x${nlon}, grid is ${this.lats.length}x${this.lons.length}`);
        }
        this.fields.set(name, field);
        return this;
    }

    has(name: string): boolean {
        return this.fields.has(name);
    }

    field(name: string): DenseField {
        const field = this.fields.get(name);
        if (!field) throw new Error(`Variable ${name} not present in grid`);
        return field;
    }

    coord(axis: 'lat' | 'lon'): readonly number[] {
        return axis === 'lat' ? this.lats : this.lons;
    }

    variables(): string[] {
        return [...this.fields.keys()];
    }
}
