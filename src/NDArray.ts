import { Marker, TYPE_CHAR, TYPE_FLOAT16, typeName } from './markers';
import { NumericArray, markerOfArray } from './numeric';

/**
 * Homogeneous N-dimensional numeric array: a flat row-major typed array plus
 * its shape.
 *
 * `elementType` is the wire type. It defaults to the natural type of `data`
 * and may only differ from it for half floats (held in a Float32Array) and
 * chars (held in a Uint8Array).
 */
export class NDArray<T extends NumericArray = NumericArray> {
    readonly shape: readonly number[];
    readonly elementType: Marker;

    constructor(readonly data: T, shape: readonly number[], elementType?: Marker) {
        for (const dim of shape) {
            if (!Number.isSafeInteger(dim) || dim < 0) {
                throw new RangeError(`Invalid dimension: ${dim}`);
            }
        }
        const size = shape.reduce((acc, dim) => acc * dim, 1);
        if (shape.length === 0 || size !== data.length) {
            throw new RangeError(
                `Shape [${shape.join(', ')}] does not match ${data.length} element(s)`
            );
        }

        const natural = markerOfArray(data);
        const type = elementType ?? natural;
        const compatible = type === natural
            || (type === TYPE_FLOAT16 && data instanceof Float32Array)
            || (type === TYPE_CHAR && data instanceof Uint8Array);
        if (!compatible) {
            throw new TypeError(`${data.constructor.name} cannot hold ${typeName(type)} elements`);
        }

        this.shape = Object.freeze([...shape]);
        this.elementType = type;
    }

    get ndim(): number {
        return this.shape.length;
    }

    get size(): number {
        return this.data.length;
    }

    /**
     * Nested plain arrays in row-major order.
     */
    toNested(): unknown[] {
        const flat = Array.from<number | bigint>(this.data);
        return reshape(flat, this.shape);
    }
}

/**
 * Splits a flat row-major list into nested arrays following `shape`.
 */
export function reshape<T>(flat: readonly T[], shape: readonly number[]): unknown[] {
    if (shape.length <= 1) {
        return flat.slice();
    }
    const [outer, ...inner] = shape;
    const stride = inner.reduce((acc, dim) => acc * dim, 1);
    const out: unknown[] = [];
    for (let i = 0; i < outer; i++) {
        out.push(reshape(flat.slice(i * stride, (i + 1) * stride), inner));
    }
    return out;
}
