/**
 * @file numeric.ts
 * @brief Byte-order aware numeric reads/writes and integer width selection.
 *
 * All multi-byte values go through DataView with an explicit endianness flag,
 * so the configured byte order never depends on the host's.
 */

import {
    Marker,
    TYPE_INT8, TYPE_UINT8, TYPE_INT16, TYPE_UINT16,
    TYPE_INT32, TYPE_UINT32, TYPE_INT64, TYPE_UINT64,
    TYPE_FLOAT16, TYPE_FLOAT32, TYPE_FLOAT64, TYPE_CHAR,
    byteLengthOf, describeMarker,
} from './markers';
import { fromFloat16Bits, toFloat16Bits } from './utils/float16';

export type ByteOrder = 'little' | 'big';

/** Typed arrays that map onto a BJData element type. */
export type NumericArray =
    | Int8Array | Uint8Array
    | Int16Array | Uint16Array
    | Int32Array | Uint32Array
    | BigInt64Array | BigUint64Array
    | Float32Array | Float64Array;

type NumberArray = Exclude<NumericArray, BigInt64Array | BigUint64Array>;

type NumberReader = (view: DataView, offset: number, littleEndian: boolean) => number;
type NumberWriter = (view: DataView, offset: number, value: number, littleEndian: boolean) => void;

const NUMBER_READERS = new Map<Marker, NumberReader>([
    [TYPE_INT8, (v, o) => v.getInt8(o)],
    [TYPE_UINT8, (v, o) => v.getUint8(o)],
    [TYPE_INT16, (v, o, le) => v.getInt16(o, le)],
    [TYPE_UINT16, (v, o, le) => v.getUint16(o, le)],
    [TYPE_INT32, (v, o, le) => v.getInt32(o, le)],
    [TYPE_UINT32, (v, o, le) => v.getUint32(o, le)],
    [TYPE_FLOAT16, (v, o, le) => fromFloat16Bits(v.getUint16(o, le))],
    [TYPE_FLOAT32, (v, o, le) => v.getFloat32(o, le)],
    [TYPE_FLOAT64, (v, o, le) => v.getFloat64(o, le)],
    [TYPE_CHAR, (v, o) => v.getUint8(o)],
]);

const NUMBER_WRITERS = new Map<Marker, NumberWriter>([
    [TYPE_INT8, (v, o, x) => v.setInt8(o, x)],
    [TYPE_UINT8, (v, o, x) => v.setUint8(o, x)],
    [TYPE_INT16, (v, o, x, le) => v.setInt16(o, x, le)],
    [TYPE_UINT16, (v, o, x, le) => v.setUint16(o, x, le)],
    [TYPE_INT32, (v, o, x, le) => v.setInt32(o, x, le)],
    [TYPE_UINT32, (v, o, x, le) => v.setUint32(o, x, le)],
    [TYPE_FLOAT16, (v, o, x, le) => v.setUint16(o, toFloat16Bits(x), le)],
    [TYPE_FLOAT32, (v, o, x, le) => v.setFloat32(o, x, le)],
    [TYPE_FLOAT64, (v, o, x, le) => v.setFloat64(o, x, le)],
    [TYPE_CHAR, (v, o, x) => v.setUint8(o, x)],
]);

export function viewOf(bytes: Uint8Array): DataView {
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** 64-bit values come back as numbers when they fit, bigints otherwise. */
export function narrowBigInt(value: bigint): number | bigint {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(value)
        : value;
}

export function readNumber(view: DataView, offset: number, marker: Marker, littleEndian: boolean): number | bigint {
    if (marker === TYPE_INT64) {
        return narrowBigInt(view.getBigInt64(offset, littleEndian));
    }
    if (marker === TYPE_UINT64) {
        return narrowBigInt(view.getBigUint64(offset, littleEndian));
    }
    const reader = NUMBER_READERS.get(marker);
    if (!reader) {
        throw new TypeError(`Not a numeric type: ${describeMarker(marker)}`);
    }
    return reader(view, offset, littleEndian);
}

export function writeNumber(
    view: DataView,
    offset: number,
    marker: Marker,
    value: number | bigint,
    littleEndian: boolean
): void {
    if (marker === TYPE_INT64) {
        view.setBigInt64(offset, BigInt(value), littleEndian);
        return;
    }
    if (marker === TYPE_UINT64) {
        view.setBigUint64(offset, BigInt(value), littleEndian);
        return;
    }
    const writer = NUMBER_WRITERS.get(marker);
    if (!writer) {
        throw new TypeError(`Not a numeric type: ${describeMarker(marker)}`);
    }
    writer(view, offset, Number(value), littleEndian);
}

/**
 * Narrowest integer marker that holds `value` losslessly: unsigned types for
 * non-negative values, signed types for negative ones. Returns undefined when
 * the value lies outside the 64-bit range.
 */
export function intMarkerFor(value: number | bigint): Marker | undefined {
    if (typeof value === 'number') {
        if (value >= 0) {
            if (value <= 0xff) return TYPE_UINT8;
            if (value <= 0xffff) return TYPE_UINT16;
            if (value <= 0xffffffff) return TYPE_UINT32;
            return Number.isSafeInteger(value) ? TYPE_UINT64 : intMarkerFor(BigInt(value));
        }
        if (value >= -0x80) return TYPE_INT8;
        if (value >= -0x8000) return TYPE_INT16;
        if (value >= -0x80000000) return TYPE_INT32;
        return Number.isSafeInteger(value) ? TYPE_INT64 : intMarkerFor(BigInt(value));
    }
    if (value >= 0n) {
        if (value <= 0xffn) return TYPE_UINT8;
        if (value <= 0xffffn) return TYPE_UINT16;
        if (value <= 0xffffffffn) return TYPE_UINT32;
        if (value <= 0xffffffffffffffffn) return TYPE_UINT64;
        return undefined;
    }
    if (value >= -0x80n) return TYPE_INT8;
    if (value >= -0x8000n) return TYPE_INT16;
    if (value >= -0x80000000n) return TYPE_INT32;
    if (value >= -0x8000000000000000n) return TYPE_INT64;
    return undefined;
}

export function isNumericArray(value: unknown): value is NumericArray {
    return value instanceof Int8Array
        || value instanceof Uint8Array
        || value instanceof Int16Array
        || value instanceof Uint16Array
        || value instanceof Int32Array
        || value instanceof Uint32Array
        || value instanceof BigInt64Array
        || value instanceof BigUint64Array
        || value instanceof Float32Array
        || value instanceof Float64Array;
}

/** Element type a typed array is written as. */
export function markerOfArray(data: NumericArray): Marker {
    if (data instanceof Int8Array) return TYPE_INT8;
    if (data instanceof Uint8Array) return TYPE_UINT8;
    if (data instanceof Int16Array) return TYPE_INT16;
    if (data instanceof Uint16Array) return TYPE_UINT16;
    if (data instanceof Int32Array) return TYPE_INT32;
    if (data instanceof Uint32Array) return TYPE_UINT32;
    if (data instanceof BigInt64Array) return TYPE_INT64;
    if (data instanceof BigUint64Array) return TYPE_UINT64;
    if (data instanceof Float32Array) return TYPE_FLOAT32;
    return TYPE_FLOAT64;
}

/**
 * Typed array class used to hold decoded elements of `marker`. Half floats
 * widen to Float32Array and chars are kept as their bytes.
 */
function createNumberArray(marker: Marker, length: number): NumberArray {
    switch (marker) {
        case TYPE_INT8: return new Int8Array(length);
        case TYPE_UINT8: return new Uint8Array(length);
        case TYPE_INT16: return new Int16Array(length);
        case TYPE_UINT16: return new Uint16Array(length);
        case TYPE_INT32: return new Int32Array(length);
        case TYPE_UINT32: return new Uint32Array(length);
        case TYPE_FLOAT16: return new Float32Array(length);
        case TYPE_FLOAT32: return new Float32Array(length);
        case TYPE_FLOAT64: return new Float64Array(length);
        case TYPE_CHAR: return new Uint8Array(length);
        default:
            throw new TypeError(`Not a numeric type: ${describeMarker(marker)}`);
    }
}

/**
 * Unpacks `count` elements of `marker` from a flat row-major block.
 */
export function readTypedBlock(bytes: Uint8Array, marker: Marker, count: number, littleEndian: boolean): NumericArray {
    const view = viewOf(bytes);
    const size = byteLengthOf(marker);

    if (marker === TYPE_INT64) {
        const out = new BigInt64Array(count);
        for (let i = 0; i < count; i++) {
            out[i] = view.getBigInt64(i * size, littleEndian);
        }
        return out;
    }
    if (marker === TYPE_UINT64) {
        const out = new BigUint64Array(count);
        for (let i = 0; i < count; i++) {
            out[i] = view.getBigUint64(i * size, littleEndian);
        }
        return out;
    }

    const reader = NUMBER_READERS.get(marker);
    if (!reader) {
        throw new TypeError(`Not a numeric type: ${describeMarker(marker)}`);
    }
    const out = createNumberArray(marker, count);
    for (let i = 0; i < count; i++) {
        out[i] = reader(view, i * size, littleEndian);
    }
    return out;
}
