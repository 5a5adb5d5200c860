import { describe, it, expect } from 'vitest';
import { ConfigurationError } from './errors';
import {
    DEFAULT_MAX_NO_DATA_ELEMENTS,
    DEFAULT_MAX_RECURSION_DEPTH,
    resolveDecoderOptions,
    resolveEncoderOptions,
    truncate,
} from './validation';

describe('validation', () => {
    describe('resolveEncoderOptions', () => {
        it('fills in defaults', () => {
            expect(resolveEncoderOptions()).toEqual({
                sortKeys: false,
                preferFloat32: true,
                containerCount: false,
                byteOrder: 'little',
                maxRecursionDepth: DEFAULT_MAX_RECURSION_DEPTH,
                debug: false,
            });
        });

        it('keeps supplied values and hooks', () => {
            const hook = (value: unknown) => String(value);
            const resolved = resolveEncoderOptions({ sortKeys: true, byteOrder: 'big', defaultEncoder: hook });
            expect(resolved.sortKeys).toBe(true);
            expect(resolved.byteOrder).toBe('big');
            expect(resolved.defaultEncoder).toBe(hook);
        });

        it('rejects values of the wrong type', () => {
            const options = JSON.parse('{"byteOrder": "middle"}');
            expect(() => resolveEncoderOptions(options)).toThrow(ConfigurationError);
            expect(() => resolveEncoderOptions({ maxRecursionDepth: 0 })).toThrow(
                'Invalid encoder options: maxRecursionDepth: Number must be greater than 0'
            );
        });

        it('rejects unknown options', () => {
            const options = JSON.parse('{"sortkeys": true}');
            expect(() => resolveEncoderOptions(options)).toThrow(/Unrecognized key\(s\) in object: 'sortkeys'/);
        });

        it('rejects a defaultEncoder that is not a function', () => {
            const options = JSON.parse('{"defaultEncoder": 1}');
            expect(() => resolveEncoderOptions(options)).toThrow('Invalid encoder options: defaultEncoder: Expected a function');
        });
    });

    describe('resolveDecoderOptions', () => {
        it('fills in defaults', () => {
            expect(resolveDecoderOptions({})).toEqual({
                internKeys: false,
                bytesForUint8Arrays: true,
                byteOrder: 'little',
                maxRecursionDepth: DEFAULT_MAX_RECURSION_DEPTH,
                maxNoDataElements: DEFAULT_MAX_NO_DATA_ELEMENTS,
                debug: false,
            });
        });

        it('rejects non-function hooks', () => {
            const options = JSON.parse('{"objectHook": "nope"}');
            expect(() => resolveDecoderOptions(options)).toThrow('Invalid decoder options: objectHook: Expected a function');
        });

        it('rejects fractional recursion depths', () => {
            expect(() => resolveDecoderOptions({ maxRecursionDepth: 1.5 })).toThrow(ConfigurationError);
        });

        it('rejects a non-positive no-data element limit', () => {
            expect(() => resolveDecoderOptions({ maxNoDataElements: 0 })).toThrow(
                'Invalid decoder options: maxNoDataElements: Number must be greater than 0'
            );
        });
    });

    it('truncate shortens long strings', () => {
        expect(truncate('abc', 5)).toBe('abc');
        expect(truncate('abcdefgh', 5)).toBe('abcde... (3 more chars)');
    });
});
