/**
 * @file Encoder.ts
 * @brief Recursive encoder driven by a closed value classification.
 *
 * `classify` maps any JavaScript value onto one of a fixed set of categories;
 * the encoder switches over them exhaustively. Values that fall outside all
 * categories get one pass through the `defaultEncoder` hook.
 */

import { EncodeError } from '../errors';
import { HighPrecision } from '../HighPrecision';
import {
    Marker,
    TYPE_NULL, TYPE_BOOL_TRUE, TYPE_BOOL_FALSE,
    TYPE_UINT8, TYPE_FLOAT32, TYPE_FLOAT64, TYPE_HIGH_PREC, TYPE_CHAR, TYPE_STRING,
    ARRAY_START, ARRAY_END, OBJECT_START, OBJECT_END,
    CONTAINER_TYPE, CONTAINER_COUNT,
} from '../markers';
import { NDArray } from '../NDArray';
import { NumericArray, intMarkerFor, isNumericArray, markerOfArray } from '../numeric';
import type { ResolvedEncoderOptions } from '../validation';
import type { EncoderBuffer } from './EncoderBuffer';

export type ValueCategory =
    | { kind: 'null' }
    | { kind: 'bool'; value: boolean }
    | { kind: 'int'; value: number | bigint }
    | { kind: 'float'; value: number }
    | { kind: 'decimal'; value: HighPrecision }
    | { kind: 'char'; value: string }
    | { kind: 'text'; value: string }
    | { kind: 'bytes'; value: Uint8Array }
    | { kind: 'numericArray'; value: NumericArray | NDArray }
    | { kind: 'sequence'; value: readonly unknown[] }
    | { kind: 'mapping'; value: Record<string, unknown> | Map<unknown, unknown> }
    | { kind: 'unknown'; value: unknown; typeName: string };

const utf8 = new TextEncoder();

function isPlainObject(value: object): value is Record<string, unknown> {
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function describeType(value: unknown): string {
    if (typeof value === 'object' && value !== null) {
        return value.constructor?.name ?? 'object';
    }
    return typeof value;
}

/**
 * Places a value in exactly one category. Checks run in a fixed order and the
 * first match wins.
 */
export function classify(value: unknown): ValueCategory {
    if (value === null || value === undefined) {
        return { kind: 'null' };
    }
    switch (typeof value) {
        case 'boolean':
            return { kind: 'bool', value };
        case 'number':
            // integral doubles past 2^53 stay floats so they decode as numbers
            return Number.isSafeInteger(value) && !Object.is(value, -0)
                ? { kind: 'int', value }
                : { kind: 'float', value };
        case 'bigint':
            return { kind: 'int', value };
        case 'string':
            return value.length === 1 && value.charCodeAt(0) < 0x80
                ? { kind: 'char', value }
                : { kind: 'text', value };
        case 'object':
            if (value instanceof HighPrecision) return { kind: 'decimal', value };
            if (value instanceof Uint8Array) return { kind: 'bytes', value };
            if (value instanceof ArrayBuffer) return { kind: 'bytes', value: new Uint8Array(value) };
            if (value instanceof NDArray || isNumericArray(value)) return { kind: 'numericArray', value };
            if (Array.isArray(value)) return { kind: 'sequence', value };
            if (value instanceof Map || isPlainObject(value)) return { kind: 'mapping', value };
            break;
    }
    return { kind: 'unknown', value, typeName: describeType(value) };
}

function compareBytes(a: Uint8Array, b: Uint8Array): number {
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
        if (a[i] !== b[i]) return a[i] - b[i];
    }
    return a.length - b.length;
}

export class Encoder {
    private depth = 0;

    constructor(
        private readonly out: EncoderBuffer,
        private readonly options: ResolvedEncoderOptions
    ) { }

    encode(value: unknown): void {
        this.encodeValue(value, true);
    }

    private encodeValue(value: unknown, allowDefault: boolean): void {
        const category = classify(value);
        switch (category.kind) {
            case 'null':
                this.out.writeMarker(TYPE_NULL);
                return;
            case 'bool':
                this.out.writeMarker(category.value ? TYPE_BOOL_TRUE : TYPE_BOOL_FALSE);
                return;
            case 'int':
                this.encodeInt(category.value);
                return;
            case 'float':
                this.encodeFloat(category.value);
                return;
            case 'decimal':
                this.encodeHighPrecision(category.value.text);
                return;
            case 'char':
                this.out.writeMarker(TYPE_CHAR);
                this.out.writeNumber(TYPE_CHAR, category.value.charCodeAt(0));
                return;
            case 'text': {
                const bytes = utf8.encode(category.value);
                this.out.writeMarker(TYPE_STRING);
                this.writeLength(bytes.length);
                this.out.writeBytes(bytes);
                return;
            }
            case 'bytes':
                this.writeTypedHeader(TYPE_UINT8);
                this.writeLength(category.value.length);
                this.out.writeBytes(category.value);
                return;
            case 'numericArray':
                this.encodeNumericArray(category.value);
                return;
            case 'sequence': {
                const items = category.value;
                this.nested(items, 'array', () => this.encodeSequence(items));
                return;
            }
            case 'mapping': {
                const mapping = category.value;
                this.nested(mapping, 'object', () => this.encodeMapping(mappingEntries(mapping)));
                return;
            }
            case 'unknown':
                if (allowDefault && this.options.defaultEncoder) {
                    this.encodeValue(this.options.defaultEncoder(category.value), false);
                    return;
                }
                throw new EncodeError(`Cannot encode item of type ${category.typeName}`);
        }
    }

    private nested(container: object, kind: string, fn: () => void): void {
        if (this.depth >= this.options.maxRecursionDepth) {
            throw new EncodeError(
                `Maximum recursion depth (${this.options.maxRecursionDepth}) exceeded whilst encoding a BJData ${kind}`
            );
        }
        this.out.enter(container);
        this.depth++;
        try {
            fn();
        } finally {
            this.depth--;
            this.out.leave(container);
        }
    }

    /** Count or length token: narrowest integer type, then the value. */
    private writeLength(length: number): void {
        const marker = intMarkerFor(length);
        if (marker === undefined) {
            throw new EncodeError(`Length ${length} cannot be represented`);
        }
        this.out.writeMarker(marker);
        this.out.writeNumber(marker, length);
    }

    private encodeInt(value: number | bigint): void {
        const marker = intMarkerFor(value);
        if (marker === undefined) {
            // outside the 64-bit range
            this.encodeHighPrecision(BigInt(value).toString());
            return;
        }
        this.out.writeMarker(marker);
        this.out.writeNumber(marker, value);
    }

    private encodeFloat(value: number): void {
        if (!Number.isFinite(value)) {
            this.out.writeMarker(TYPE_NULL);
            return;
        }
        const marker = this.options.preferFloat32 && Math.fround(value) === value ? TYPE_FLOAT32 : TYPE_FLOAT64;
        this.out.writeMarker(marker);
        this.out.writeNumber(marker, value);
    }

    private encodeHighPrecision(text: string): void {
        const bytes = utf8.encode(text);
        this.out.writeMarker(TYPE_HIGH_PREC);
        this.writeLength(bytes.length);
        this.out.writeBytes(bytes);
    }

    /** `[$t#` - the count or shape follows. */
    private writeTypedHeader(type: Marker): void {
        this.out.writeMarker(ARRAY_START);
        this.out.writeMarker(CONTAINER_TYPE);
        this.out.writeMarker(type);
        this.out.writeMarker(CONTAINER_COUNT);
    }

    private encodeNumericArray(value: NumericArray | NDArray): void {
        if (!(value instanceof NDArray)) {
            const type = markerOfArray(value);
            this.writeTypedHeader(type);
            this.writeLength(value.length);
            this.out.writeTypedArray(type, value);
            return;
        }

        this.writeTypedHeader(value.elementType);
        if (value.ndim < 2) {
            this.writeLength(value.size);
        } else {
            const dimType = intMarkerFor(Math.max(...value.shape));
            if (dimType === undefined) {
                throw new EncodeError(`Shape [${value.shape.join(', ')}] cannot be represented`);
            }
            this.writeTypedHeader(dimType);
            this.writeLength(value.ndim);
            for (const dim of value.shape) {
                this.out.writeNumber(dimType, dim);
            }
        }
        this.out.writeTypedArray(value.elementType, value.data);
    }

    private encodeSequence(items: readonly unknown[]): void {
        this.out.writeMarker(ARRAY_START);
        if (this.options.containerCount) {
            this.out.writeMarker(CONTAINER_COUNT);
            this.writeLength(items.length);
        }
        for (let i = 0; i < items.length; i++) {
            this.encodeValue(items[i], true);
        }
        if (!this.options.containerCount) {
            this.out.writeMarker(ARRAY_END);
        }
    }

    private encodeMapping(entries: Array<[string, unknown]>): void {
        const keyed = entries.map(([key, value]): [Uint8Array, unknown] => [utf8.encode(key), value]);
        if (this.options.sortKeys) {
            keyed.sort((a, b) => compareBytes(a[0], b[0]));
        }

        this.out.writeMarker(OBJECT_START);
        if (this.options.containerCount) {
            this.out.writeMarker(CONTAINER_COUNT);
            this.writeLength(keyed.length);
        }
        for (const [key, value] of keyed) {
            this.writeLength(key.length);
            this.out.writeBytes(key);
            this.encodeValue(value, true);
        }
        if (!this.options.containerCount) {
            this.out.writeMarker(OBJECT_END);
        }
    }
}

function mappingEntries(mapping: Record<string, unknown> | Map<unknown, unknown>): Array<[string, unknown]> {
    if (!(mapping instanceof Map)) {
        return Object.entries(mapping);
    }
    const entries: Array<[string, unknown]> = [];
    for (const [key, value] of mapping) {
        if (typeof key !== 'string') {
            throw new EncodeError(`Mapping keys must be strings, got ${describeType(key)}`);
        }
        entries.push([key, value]);
    }
    return entries;
}
