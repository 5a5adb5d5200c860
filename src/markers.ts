/**
 * @file markers.ts
 * @brief BJData (Draft 2) marker table.
 *
 * Every value and structural token on the wire starts with one of these
 * single ASCII bytes. BJData keeps the UBJSON Draft 12 markers and adds the
 * unsigned integer types (`u`, `m`, `M`) and half precision floats (`h`).
 */

export type Marker = number;

/** Internal placeholder for "container has no declared element type". Never on the wire. */
export const TYPE_NONE: Marker = 0x00;

export const TYPE_NULL: Marker = 0x5a; // Z
export const TYPE_NOOP: Marker = 0x4e; // N
export const TYPE_BOOL_TRUE: Marker = 0x54; // T
export const TYPE_BOOL_FALSE: Marker = 0x46; // F

export const TYPE_INT8: Marker = 0x69; // i
export const TYPE_UINT8: Marker = 0x55; // U
export const TYPE_INT16: Marker = 0x49; // I
export const TYPE_UINT16: Marker = 0x75; // u
export const TYPE_INT32: Marker = 0x6c; // l
export const TYPE_UINT32: Marker = 0x6d; // m
export const TYPE_INT64: Marker = 0x4c; // L
export const TYPE_UINT64: Marker = 0x4d; // M

export const TYPE_FLOAT16: Marker = 0x68; // h
export const TYPE_FLOAT32: Marker = 0x64; // d
export const TYPE_FLOAT64: Marker = 0x44; // D

export const TYPE_HIGH_PREC: Marker = 0x48; // H
export const TYPE_CHAR: Marker = 0x43; // C
export const TYPE_STRING: Marker = 0x53; // S

export const ARRAY_START: Marker = 0x5b; // [
export const ARRAY_END: Marker = 0x5d; // ]
export const OBJECT_START: Marker = 0x7b; // {
export const OBJECT_END: Marker = 0x7d; // }

export const CONTAINER_TYPE: Marker = 0x24; // $
export const CONTAINER_COUNT: Marker = 0x23; // #

const FIXED_LENGTHS: ReadonlyMap<Marker, number> = new Map([
    [TYPE_INT8, 1],
    [TYPE_UINT8, 1],
    [TYPE_INT16, 2],
    [TYPE_UINT16, 2],
    [TYPE_INT32, 4],
    [TYPE_UINT32, 4],
    [TYPE_INT64, 8],
    [TYPE_UINT64, 8],
    [TYPE_FLOAT16, 2],
    [TYPE_FLOAT32, 4],
    [TYPE_FLOAT64, 8],
    [TYPE_CHAR, 1],
]);

const INTEGER_TYPES: ReadonlySet<Marker> = new Set([
    TYPE_INT8, TYPE_UINT8, TYPE_INT16, TYPE_UINT16,
    TYPE_INT32, TYPE_UINT32, TYPE_INT64, TYPE_UINT64,
]);

const VALUE_MARKERS: ReadonlySet<Marker> = new Set([
    TYPE_NULL, TYPE_BOOL_TRUE, TYPE_BOOL_FALSE,
    ...FIXED_LENGTHS.keys(),
    TYPE_HIGH_PREC, TYPE_STRING, ARRAY_START, OBJECT_START,
]);

/** Types whose payload has a fixed, nonzero byte length (`u U i I l m L M h d D C`). */
export function isFixedLengthType(marker: Marker): boolean {
    return FIXED_LENGTHS.has(marker);
}

/** Types that carry no payload at all (null, true, false). */
export function isNoDataType(marker: Marker): boolean {
    return marker === TYPE_NULL || marker === TYPE_BOOL_TRUE || marker === TYPE_BOOL_FALSE;
}

export function isIntegerType(marker: Marker): boolean {
    return INTEGER_TYPES.has(marker);
}

/** Markers that may start a value. */
export function isValueMarker(marker: Marker): boolean {
    return VALUE_MARKERS.has(marker);
}

/**
 * Element types a `$` header may declare. Anything with a variable-length
 * payload is refused so that typed containers always have a flat layout.
 */
export function isContainerElementType(marker: Marker): boolean {
    return isFixedLengthType(marker) || isNoDataType(marker);
}

/** Payload size in bytes of a fixed-length type, or 0 for anything else. */
export function byteLengthOf(marker: Marker): number {
    return FIXED_LENGTHS.get(marker) ?? 0;
}

/** Printable form of a marker for error messages, e.g. `'l'` or `0x01`. */
export function describeMarker(marker: Marker): string {
    if (marker >= 0x21 && marker <= 0x7e) {
        return `'${String.fromCharCode(marker)}'`;
    }
    return `0x${marker.toString(16).padStart(2, '0')}`;
}

const TYPE_NAMES: ReadonlyMap<Marker, string> = new Map([
    [TYPE_NULL, 'null'],
    [TYPE_BOOL_TRUE, 'true'],
    [TYPE_BOOL_FALSE, 'false'],
    [TYPE_INT8, 'int8'],
    [TYPE_UINT8, 'uint8'],
    [TYPE_INT16, 'int16'],
    [TYPE_UINT16, 'uint16'],
    [TYPE_INT32, 'int32'],
    [TYPE_UINT32, 'uint32'],
    [TYPE_INT64, 'int64'],
    [TYPE_UINT64, 'uint64'],
    [TYPE_FLOAT16, 'float16'],
    [TYPE_FLOAT32, 'float32'],
    [TYPE_FLOAT64, 'float64'],
    [TYPE_HIGH_PREC, 'highprec'],
    [TYPE_CHAR, 'char'],
    [TYPE_STRING, 'string'],
]);

export function typeName(marker: Marker): string {
    return TYPE_NAMES.get(marker) ?? describeMarker(marker);
}
