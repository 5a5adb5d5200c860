/**
 * @file Decoder.ts
 * @brief Marker-driven recursive descent over a DecoderBuffer.
 *
 * Every value starts with a one-byte marker. Containers may open with an
 * optional `$type` and `#count` header (or `#[dims]` for N-dimensional arrays);
 * typed, counted containers of fixed-length elements are read as one block.
 */

import { DecodeError, RecursionLimitError, ResourceError } from '../errors';
import { HighPrecision } from '../HighPrecision';
import {
    Marker,
    TYPE_NONE, TYPE_NULL, TYPE_NOOP, TYPE_BOOL_TRUE, TYPE_BOOL_FALSE,
    TYPE_UINT8, TYPE_FLOAT16, TYPE_HIGH_PREC, TYPE_CHAR, TYPE_STRING,
    ARRAY_START, ARRAY_END, OBJECT_START, OBJECT_END,
    CONTAINER_TYPE, CONTAINER_COUNT,
    byteLengthOf, isContainerElementType, isFixedLengthType, isIntegerType, isNoDataType, typeName,
} from '../markers';
import { NDArray, reshape } from '../NDArray';
import { readNumber, readTypedBlock, viewOf } from '../numeric';
import type { ResolvedDecoderOptions } from '../validation';
import type { DecoderBuffer } from './DecoderBuffer';

/** Longest array a JavaScript Array can hold. */
const MAX_ARRAY_LENGTH = 2 ** 32 - 1;

interface ContainerHeader {
    /** Declared element type, or TYPE_NONE. */
    type: Marker;
    counted: boolean;
    count: number;
    shape?: number[];
    /** Marker of the first element (or key) when it had to be read ahead. */
    marker: Marker;
}

export class Decoder {
    private depth = 0;
    private readonly littleEndian: boolean;
    private readonly utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
    private readonly keys = new Map<string, string>();

    constructor(
        private readonly input: DecoderBuffer,
        private readonly options: ResolvedDecoderOptions
    ) {
        this.littleEndian = options.byteOrder === 'little';
    }

    /**
     * Decodes one complete value.
     */
    decode(): unknown {
        return this.guard(() => this.decodeValue(this.readMarker('Type marker')));
    }

    /**
     * Decodes the next value, or returns undefined if the input ended cleanly
     * before its marker.
     */
    decodeNext(): { value: unknown } | undefined {
        const head = this.input.borrow(1);
        if (head.length === 0) {
            return undefined;
        }
        const marker = head[0];
        return { value: this.guard(() => this.decodeValue(marker)) };
    }

    private guard<T>(fn: () => T): T {
        try {
            return fn();
        } catch (error) {
            // allocation failures and stack exhaustion
            if (error instanceof RangeError) {
                throw new ResourceError(`Insufficient resources to decode input: ${error.message}`, error);
            }
            throw error;
        }
    }

    private fail(reason: string): DecodeError {
        return new DecodeError(reason, this.input.totalRead);
    }

    private readMarker(item: string): Marker {
        const bytes = this.input.borrow(1);
        if (bytes.length === 0) {
            throw this.fail(`Insufficient input (${item})`);
        }
        return bytes[0];
    }

    private readExact(length: number, item: string, owned: boolean = false): Uint8Array {
        const bytes = owned ? this.input.take(length) : this.input.borrow(length);
        if (bytes.length < length) {
            throw this.fail(bytes.length === 0 ? `Insufficient input (${item})` : `Insufficient (partial) input (${item})`);
        }
        return bytes;
    }

    private readNumeric(marker: Marker): number | bigint {
        const bytes = this.readExact(byteLengthOf(marker), typeName(marker));
        return readNumber(viewOf(bytes), 0, marker, this.littleEndian);
    }

    private decodeText(bytes: Uint8Array, item: string): string {
        try {
            return this.utf8.decode(bytes);
        } catch (error) {
            if (error instanceof TypeError) {
                throw this.fail(`Failed to decode utf8: ${item}`);
            }
            throw error;
        }
    }

    /**
     * Reads a non-negative integer payload for an already-read marker.
     */
    private decodeLength(marker: Marker): number {
        if (!isIntegerType(marker)) {
            throw this.fail('Integer marker expected');
        }
        const value = this.readNumeric(marker);
        if (typeof value === 'bigint') {
            if (value < 0n) {
                throw this.fail('Negative count/length unexpected');
            }
            throw new ResourceError(`Count/length ${value} exceeds the supported maximum`);
        }
        if (value < 0) {
            throw this.fail('Negative count/length unexpected');
        }
        return value;
    }

    private decodeValue(marker: Marker): unknown {
        switch (marker) {
            case TYPE_NULL:
                return null;
            case TYPE_BOOL_TRUE:
                return true;
            case TYPE_BOOL_FALSE:
                return false;
            case TYPE_CHAR:
                return this.decodeText(this.readExact(1, 'char'), 'char');
            case TYPE_STRING: {
                const length = this.decodeLength(this.readMarker('string length'));
                return length === 0 ? '' : this.decodeText(this.readExact(length, 'string'), 'string');
            }
            case TYPE_HIGH_PREC:
                return this.decodeHighPrecision();
            case ARRAY_START:
                return this.nested('array', () => this.decodeArray());
            case OBJECT_START:
                return this.nested('object', () => this.decodeObject());
            default:
                if (isFixedLengthType(marker)) {
                    return this.readNumeric(marker);
                }
                throw this.fail('Invalid marker');
        }
    }

    private nested<T>(container: string, fn: () => T): T {
        if (this.depth >= this.options.maxRecursionDepth) {
            throw new RecursionLimitError(this.options.maxRecursionDepth, this.input.totalRead, container);
        }
        this.depth++;
        try {
            return fn();
        } finally {
            this.depth--;
        }
    }

    private decodeHighPrecision(): HighPrecision {
        const length = this.decodeLength(this.readMarker('highprec length'));
        const text = this.decodeText(this.readExact(length, 'highprec'), 'highprec');
        if (!HighPrecision.isValid(text)) {
            throw this.fail('Invalid high-precision number');
        }
        return new HighPrecision(text);
    }

    /**
     * Parses the optional `$type` / `#count` header that follows `[` or `{`.
     */
    private getContainerParams(inMapping: boolean, allowShape: boolean): ContainerHeader {
        let marker = this.readMarker('container type, count or 1st key/value type');
        let type = TYPE_NONE;

        if (marker === CONTAINER_TYPE) {
            type = this.readMarker('container type');
            if (!isContainerElementType(type)) {
                throw this.fail('Invalid container type');
            }
            marker = this.readMarker('container count or 1st key/value type');
        }

        if (marker === CONTAINER_COUNT) {
            marker = this.readMarker('container count marker or optimized ND-array dimension array marker');
            let count: number;
            let shape: number[] | undefined;
            if (marker === ARRAY_START && allowShape) {
                shape = this.decodeShape();
                count = this.shapeSize(shape);
            } else {
                count = this.decodeLength(marker);
            }
            marker = count > 0 && (inMapping || type === TYPE_NONE)
                ? this.readMarker('1st key/value type')
                : type;
            return { type, counted: true, count, shape, marker };
        }

        if (type !== TYPE_NONE) {
            throw this.fail('Container type without count');
        }
        return { type, counted: false, count: 0, marker };
    }

    /**
     * Reads the dimension list of an ND-array header (after `#[`). The list is
     * itself an array of integers, either `$t#n`-typed, counted, or closed by `]`.
     */
    private decodeShape(): number[] {
        const header = this.getContainerParams(false, false);
        const dims: number[] = [];

        if (header.counted) {
            for (let i = 0; i < header.count; i++) {
                if (header.type !== TYPE_NONE) {
                    dims.push(this.decodeLength(header.type));
                } else {
                    const marker = i === 0 ? header.marker : this.readMarker('Length marker');
                    dims.push(this.decodeLength(marker));
                }
            }
        } else {
            let marker = header.marker;
            while (marker !== ARRAY_END) {
                dims.push(this.decodeLength(marker));
                marker = this.readMarker('Length marker');
            }
        }

        if (dims.length === 0) {
            throw this.fail('Empty ND-array dimension list');
        }
        return dims;
    }

    private shapeSize(shape: readonly number[]): number {
        if (shape.includes(0)) {
            return 0;
        }
        let size = 1;
        for (const dim of shape) {
            size *= dim;
            if (!Number.isSafeInteger(size)) {
                throw new ResourceError(`ND-array shape [${shape.join(', ')}] is too large`);
            }
        }
        return size;
    }

    /**
     * A zero dimension leaves no elements to read, but the dimensions before it
     * still become nested lists.
     */
    private checkNestedLists(shape: readonly number[]): void {
        if (!shape.includes(0)) {
            return;
        }
        let lists = 1;
        for (const dim of shape) {
            if (dim === 0) {
                return;
            }
            lists *= dim;
            if (lists > this.options.maxNoDataElements) {
                throw new ResourceError(
                    `ND-array shape [${shape.join(', ')}] exceeds the limit of ${this.options.maxNoDataElements} elements`
                );
            }
        }
    }

    private decodeArray(): unknown {
        const header = this.getContainerParams(false, true);
        const { type, count, shape } = header;

        if (header.counted && count > MAX_ARRAY_LENGTH) {
            throw new ResourceError(`Array of ${count} elements exceeds the supported maximum`);
        }

        if (header.counted && isNoDataType(type)) {
            if (count > this.options.maxNoDataElements) {
                throw new ResourceError(
                    `No-data array of ${count} elements exceeds the limit of ${this.options.maxNoDataElements}`
                );
            }
            if (shape) {
                this.checkNestedLists(shape);
            }
            const value = type === TYPE_NULL ? null : type === TYPE_BOOL_TRUE;
            const flat = new Array<boolean | null>(count).fill(value);
            return shape ? reshape(flat, shape) : flat;
        }

        if (header.counted && isFixedLengthType(type)) {
            return this.decodeTypedBlock(type, count, shape);
        }

        const out: unknown[] = [];
        let marker = header.marker;

        if (header.counted) {
            if (shape) {
                this.checkNestedLists(shape);
            }
            for (let i = 0; i < count; i++) {
                if (i > 0) {
                    marker = this.readMarker('Type marker');
                }
                if (marker === TYPE_NOOP) {
                    throw this.fail('No-op not permitted in typed or counted container');
                }
                out.push(this.decodeValue(marker));
            }
            return shape ? reshape(out, shape) : out;
        }

        while (marker !== ARRAY_END) {
            if (marker !== TYPE_NOOP) {
                out.push(this.decodeValue(marker));
            }
            marker = this.readMarker('Type marker');
        }
        return out;
    }

    private decodeTypedBlock(type: Marker, count: number, shape: number[] | undefined): unknown {
        if (type === TYPE_UINT8 && !shape) {
            if (this.options.bytesForUint8Arrays) {
                return this.readExact(count, 'bytes array', true);
            }
            return Array.from(this.readExact(count, 'bytes array'));
        }

        const total = count * byteLengthOf(type);
        if (!Number.isSafeInteger(total)) {
            throw new ResourceError(`Array of ${count} ${typeName(type)} elements is too large`);
        }
        const block = this.readExact(total, `${typeName(type)} array`);

        if (type === TYPE_CHAR && !shape) {
            return this.decodeText(block, 'char array');
        }

        const data = readTypedBlock(block, type, count, this.littleEndian);
        if (shape) {
            return new NDArray(data, shape, type);
        }
        if (type === TYPE_FLOAT16) {
            return new NDArray(data, [count], type);
        }
        return data;
    }

    private decodeKey(marker: Marker): string {
        const length = this.decodeLength(marker);
        const key = this.decodeText(this.readExact(length, 'object key'), 'object key');
        if (!this.options.internKeys) {
            return key;
        }
        const interned = this.keys.get(key);
        if (interned !== undefined) {
            return interned;
        }
        this.keys.set(key, key);
        return key;
    }

    private decodeObject(): unknown {
        const header = this.getContainerParams(true, false);
        const { type } = header;
        const pairsHook = this.options.pairsHook;
        const pairs: Array<[string, unknown]> = [];
        const obj: Record<string, unknown> = {};

        const put = (key: string, value: unknown): void => {
            if (pairsHook) {
                pairs.push([key, value]);
            } else if (key === '__proto__') {
                Object.defineProperty(obj, key, { value, writable: true, enumerable: true, configurable: true });
            } else {
                obj[key] = value;
            }
        };
        // typed objects carry no per-value marker
        const readValue = (): unknown => this.decodeValue(
            type === TYPE_NONE ? this.readMarker('Type marker') : type
        );

        let marker = header.marker;
        if (header.counted) {
            for (let i = 0; i < header.count; i++) {
                if (i > 0) {
                    marker = this.readMarker('object key length');
                }
                if (marker === TYPE_NOOP) {
                    throw this.fail('No-op not permitted in typed or counted container');
                }
                const key = this.decodeKey(marker);
                put(key, readValue());
            }
        } else {
            while (marker !== OBJECT_END) {
                if (marker !== TYPE_NOOP) {
                    const key = this.decodeKey(marker);
                    put(key, readValue());
                }
                marker = this.readMarker('object key length');
            }
        }

        if (pairsHook) {
            return pairsHook(pairs);
        }
        return this.options.objectHook ? this.options.objectHook(obj) : obj;
    }
}
