import { describe, it, expect } from 'vitest';
import {
    ARRAY_END, OBJECT_START, TYPE_CHAR, TYPE_FLOAT16, TYPE_NOOP, TYPE_NULL, TYPE_STRING, TYPE_UINT64,
    byteLengthOf, describeMarker, isContainerElementType, isIntegerType, isValueMarker, typeName,
} from './markers';

describe('markers', () => {
    it('knows which markers start a value', () => {
        expect(isValueMarker(TYPE_NULL)).toBe(true);
        expect(isValueMarker(OBJECT_START)).toBe(true);
        expect(isValueMarker(TYPE_NOOP)).toBe(false);
        expect(isValueMarker(ARRAY_END)).toBe(false);
    });

    it('limits container element types to flat layouts', () => {
        expect(isContainerElementType(TYPE_FLOAT16)).toBe(true);
        expect(isContainerElementType(TYPE_NULL)).toBe(true);
        expect(isContainerElementType(TYPE_STRING)).toBe(false);
        expect(isContainerElementType(OBJECT_START)).toBe(false);
    });

    it('reports payload sizes', () => {
        expect(byteLengthOf(TYPE_UINT64)).toBe(8);
        expect(byteLengthOf(TYPE_CHAR)).toBe(1);
        expect(byteLengthOf(TYPE_STRING)).toBe(0);
        expect(isIntegerType(TYPE_UINT64)).toBe(true);
        expect(isIntegerType(TYPE_CHAR)).toBe(false);
    });

    it('names markers for messages', () => {
        expect(typeName(TYPE_FLOAT16)).toBe('float16');
        expect(typeName(ARRAY_END)).toBe("']'");
        expect(describeMarker(0x01)).toBe('0x01');
    });
});
