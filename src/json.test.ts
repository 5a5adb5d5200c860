import { describe, it, expect } from 'vitest';
import { HighPrecision } from './HighPrecision';
import { parseJSON, parseJSONNumeral } from './json';

describe('json', () => {
    describe('parseJSONNumeral', () => {
        it('keeps integers exact', () => {
            expect(parseJSONNumeral('42')).toBe(42);
            expect(parseJSONNumeral('-9007199254740991')).toBe(-9007199254740991);
            expect(parseJSONNumeral('9007199254740993')).toBe(9007199254740993n);
            expect(parseJSONNumeral('12345678901234567890')).toBe(12345678901234567890n);
        });

        it('reads other numerals as doubles', () => {
            expect(parseJSONNumeral('1.5')).toBe(1.5);
            expect(parseJSONNumeral('-2e3')).toBe(-2000);
        });

        it('keeps numerals that overflow a double as high-precision text', () => {
            expect(parseJSONNumeral('1e400')).toEqual(new HighPrecision('1e400'));
        });
    });

    describe('parseJSON', () => {
        it('reads objects into Maps in source order', () => {
            const value = parseJSON('{"b":1,"10":[true,null,"x"],"a":{}}');
            expect(value).toEqual(new Map<string, unknown>([
                ['b', 1],
                ['10', [true, null, 'x']],
                ['a', new Map()],
            ]));
            expect(value instanceof Map ? Array.from(value.keys()) : []).toEqual(['b', '10', 'a']);
        });

        it('keeps the last value of a repeated key', () => {
            expect(parseJSON('{"a":1,"a":2}')).toEqual(new Map([['a', 2]]));
        });

        it('reads scalars at top level', () => {
            expect(parseJSON('"text"')).toBe('text');
            expect(parseJSON(' 18446744073709551616 ')).toBe(18446744073709551616n);
        });

        it('rejects what strict JSON does not allow', () => {
            expect(() => parseJSON('{"a":')).toThrow(SyntaxError);
            expect(() => parseJSON('[1,]')).toThrow(SyntaxError);
            expect(() => parseJSON('// note\n1')).toThrow(SyntaxError);
            expect(() => parseJSON('1 2')).toThrow(SyntaxError);
            expect(() => parseJSON('')).toThrow(SyntaxError);
        });
    });
});
