import { describe, it, expect } from 'vitest';
import { encode } from '../src/codec';
import { classify } from '../src/encoder/Encoder';
import { EncodeError } from '../src/errors';
import { HighPrecision } from '../src/HighPrecision';
import { TYPE_FLOAT16 } from '../src/markers';
import { NDArray } from '../src/NDArray';
import { hex, wire } from './test-utils';

describe('Encoder', () => {
    describe('classify', () => {
        it('places values in one category', () => {
            expect(classify(undefined).kind).toBe('null');
            expect(classify(3).kind).toBe('int');
            expect(classify(-0).kind).toBe('float');
            expect(classify(2 ** 53 - 1).kind).toBe('int');
            expect(classify(2 ** 53).kind).toBe('float');
            expect(classify(2n).kind).toBe('int');
            expect(classify('x').kind).toBe('char');
            expect(classify('é').kind).toBe('text');
            expect(classify(new Uint8Array(1)).kind).toBe('bytes');
            expect(classify(new Int8Array(1)).kind).toBe('numericArray');
            expect(classify(Object.create(null)).kind).toBe('mapping');
            expect(classify(new Set())).toEqual({ kind: 'unknown', value: new Set(), typeName: 'Set' });
        });
    });

    describe('scalars', () => {
        it('encodes null and booleans', () => {
            expect(hex(encode(null))).toBe('5a');
            expect(hex(encode(undefined))).toBe('5a');
            expect(hex(encode(true))).toBe('54');
            expect(hex(encode(false))).toBe('46');
        });

        it('picks the narrowest integer type', () => {
            expect(hex(encode(0))).toBe('55 00');
            expect(hex(encode(255))).toBe('55 ff');
            expect(hex(encode(256))).toBe('75 00 01');
            expect(hex(encode(65536))).toBe('6d 00 00 01 00');
            expect(hex(encode(2 ** 32))).toBe('4d 00 00 00 00 01 00 00 00');
            expect(hex(encode(-1))).toBe('69 ff');
            expect(hex(encode(-129))).toBe('49 7f ff');
            expect(hex(encode(-32769))).toBe('6c ff 7f ff ff');
            expect(hex(encode(-2147483649))).toBe('4c ff ff ff 7f ff ff ff ff');
        });

        it('writes integral doubles beyond 2^53 as floats', () => {
            expect(hex(encode(2 ** 60))).toBe('64 00 00 80 5d');
            expect(hex(encode(2 ** 60, { preferFloat32: false }))).toBe('44 00 00 00 00 00 00 b0 43');
        });

        it('encodes bigints and falls back to high precision past 64 bits', () => {
            expect(hex(encode(2n ** 64n - 1n))).toBe('4d ff ff ff ff ff ff ff ff');
            expect(encode(2n ** 64n)).toEqual(wire('H', 'U', 20, '18446744073709551616'));
            expect(encode(-(2n ** 63n) - 1n)).toEqual(wire('H', 'U', 20, '-9223372036854775809'));
        });

        it('uses float32 only when it is exact', () => {
            expect(hex(encode(1.5))).toBe('64 00 00 c0 3f');
            expect(hex(encode(-0))).toBe('64 00 00 00 80');
            expect(hex(encode(0.1))).toBe('44 9a 99 99 99 99 99 b9 3f');
            expect(hex(encode(1.5, { preferFloat32: false }))).toBe('44 00 00 00 00 00 00 f8 3f');
        });

        it('writes non-finite floats as null', () => {
            expect(hex(encode(NaN))).toBe('5a');
            expect(hex(encode(Infinity))).toBe('5a');
            expect(hex(encode(-Infinity))).toBe('5a');
        });

        it('writes big-endian when configured', () => {
            expect(hex(encode(2.5, { preferFloat32: false, byteOrder: 'big' }))).toBe('44 40 04 00 00 00 00 00 00');
            expect(hex(encode(256, { byteOrder: 'big' }))).toBe('75 01 00');
        });

        it('encodes chars and strings', () => {
            expect(hex(encode('a'))).toBe('43 61');
            expect(hex(encode('ab'))).toBe('53 55 02 61 62');
            expect(hex(encode(''))).toBe('53 55 00');
            expect(hex(encode('é'))).toBe('53 55 02 c3 a9');
        });

        it('encodes high-precision numbers', () => {
            expect(hex(encode(new HighPrecision('1.5')))).toBe('48 55 03 31 2e 35');
        });
    });

    describe('binary and numeric arrays', () => {
        it('encodes bytes as a typed uint8 array', () => {
            expect(hex(encode(new Uint8Array([1, 2])))).toBe('5b 24 55 23 55 02 01 02');
            expect(hex(encode(new Uint8Array([1, 2]).buffer))).toBe('5b 24 55 23 55 02 01 02');
        });

        it('encodes typed arrays with their element type', () => {
            expect(hex(encode(new Int16Array([1, -1])))).toBe('5b 24 49 23 55 02 01 00 ff ff');
            expect(hex(encode(new Float32Array([1])))).toBe('5b 24 64 23 55 01 00 00 80 3f');
        });

        it('writes the shape of multi-dimensional arrays', () => {
            const arr = new NDArray(new Int32Array([1, 2, 3, 4, 5, 6]), [2, 3]);
            const payload = [1, 2, 3, 4, 5, 6].flatMap(v => [v, 0, 0, 0]);
            expect(encode(arr)).toEqual(wire('[$l#[$U#U', 2, 2, 3, payload));
        });

        it('writes 1-D arrays with a plain count', () => {
            const arr = new NDArray(new Float32Array([1]), [1], TYPE_FLOAT16);
            expect(hex(encode(arr))).toBe('5b 24 68 23 55 01 00 3c');
        });
    });

    describe('containers', () => {
        it('encodes arrays with an end marker or a count', () => {
            expect(encode([1, 'ab'])).toEqual(wire('[', 'U', 1, 'S', 'U', 2, 'ab', ']'));
            expect(encode([1, 'ab'], { containerCount: true })).toEqual(wire('[#U', 2, 'U', 1, 'S', 'U', 2, 'ab'));
            expect(encode([])).toEqual(wire('[]'));
        });

        it('encodes objects in insertion order', () => {
            expect(encode({ b: 1, a: 'xy' })).toEqual(wire('{', 'U', 1, 'b', 'U', 1, 'U', 1, 'a', 'S', 'U', 2, 'xy', '}'));
        });

        it('sorts keys by their UTF-8 bytes', () => {
            expect(encode({ b: 1, a: 'xy' }, { sortKeys: true })).toEqual(
                wire('{', 'U', 1, 'a', 'S', 'U', 2, 'xy', 'U', 1, 'b', 'U', 1, '}')
            );
            expect(encode({ 'é': 1, z: 2 }, { sortKeys: true })).toEqual(
                wire('{', 'U', 1, 'z', 'U', 2, 'U', 2, [0xc3, 0xa9], 'U', 1, '}')
            );
        });

        it('counts objects when asked', () => {
            expect(encode({ k: null }, { containerCount: true })).toEqual(wire('{#U', 1, 'U', 1, 'k', 'Z'));
        });

        it('encodes maps with string keys', () => {
            expect(encode(new Map([['k', true]]))).toEqual(wire('{', 'U', 1, 'k', 'T', '}'));
            expect(() => encode(new Map([[1, true]]))).toThrow('Mapping keys must be strings, got number');
        });

        it('detects circular references', () => {
            const loop: unknown[] = [];
            loop.push(loop);
            expect(() => encode(loop)).toThrow(EncodeError);
            expect(() => encode(loop)).toThrow('Circular reference detected');

            const obj: Record<string, unknown> = {};
            obj.self = obj;
            expect(() => encode(obj)).toThrow('Circular reference detected');
        });

        it('allows the same container more than once when not nested in itself', () => {
            const shared = [1];
            expect(encode([shared, shared])).toEqual(wire('[', '[', 'U', 1, ']', '[', 'U', 1, ']', ']'));
        });

        it('enforces the recursion limit', () => {
            expect(encode([[]], { maxRecursionDepth: 2 })).toEqual(wire('[[]]'));
            expect(() => encode([[[]]], { maxRecursionDepth: 2 })).toThrow(
                'Maximum recursion depth (2) exceeded whilst encoding a BJData array'
            );
        });
    });

    describe('unsupported values', () => {
        it('names the type it cannot encode', () => {
            class Point {
                x = 1;
            }
            expect(() => encode(new Date(0))).toThrow('Cannot encode item of type Date');
            expect(() => encode(new Point())).toThrow('Cannot encode item of type Point');
            expect(() => encode(Symbol('s'))).toThrow('Cannot encode item of type symbol');
            expect(() => encode(() => 1)).toThrow('Cannot encode item of type function');
        });

        it('passes them through defaultEncoder once', () => {
            const defaultEncoder = (value: unknown): unknown => (value instanceof Date ? value.toISOString() : value);
            expect(encode(new Date(0), { defaultEncoder })).toEqual(wire('S', 'U', 24, '1970-01-01T00:00:00.000Z'));
            expect(() => encode(new Set(), { defaultEncoder })).toThrow('Cannot encode item of type Set');
        });

        it('applies defaultEncoder inside containers', () => {
            const defaultEncoder = (value: unknown): unknown => (value instanceof Set ? Array.from(value) : value);
            expect(encode({ s: new Set([1]) }, { defaultEncoder })).toEqual(wire('{', 'U', 1, 's', '[', 'U', 1, ']', '}'));
        });
    });
});
