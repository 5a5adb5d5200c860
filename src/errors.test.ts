import { describe, it, expect } from 'vitest';
import {
    BJDataError,
    DecodeError,
    RecursionLimitError,
    EncodeError,
    ResourceError,
    ConfigurationError
} from './errors';

describe('Errors', () => {
    it('BJDataError should work', () => {
        const err = new BJDataError('test', 'CODE');
        expect(err.message).toBe('test');
        expect(err.code).toBe('CODE');
        expect(err.name).toBe('BJDataError');
        expect(err).toBeInstanceOf(Error);
    });

    it('DecodeError carries reason and offset', () => {
        const err = new DecodeError('Invalid marker', 7);
        expect(err.code).toBe('DECODE_ERROR');
        expect(err.name).toBe('DecodeError');
        expect(err.reason).toBe('Invalid marker');
        expect(err.offset).toBe(7);
        expect(err.message).toBe('Invalid marker (at byte 7)');
    });

    it('RecursionLimitError is a DecodeError', () => {
        const err = new RecursionLimitError(4, 5, 'array');
        expect(err).toBeInstanceOf(DecodeError);
        expect(err.code).toBe('RECURSION_LIMIT');
        expect(err.maxDepth).toBe(4);
        expect(err.message).toBe('Maximum recursion depth (4) exceeded whilst decoding a BJData array (at byte 5)');
    });

    it('EncodeError should work', () => {
        const err = new EncodeError('Circular reference detected');
        expect(err.code).toBe('ENCODE_ERROR');
        expect(err.name).toBe('EncodeError');
        expect(err).toBeInstanceOf(BJDataError);
    });

    it('ResourceError keeps its cause', () => {
        const cause = new RangeError('Invalid array length');
        const err = new ResourceError('too big', cause);
        expect(err.code).toBe('RESOURCE_ERROR');
        expect(err.cause).toBe(cause);
        expect(new ResourceError('no cause').cause).toBeUndefined();
    });

    it('ConfigurationError should work', () => {
        const err = new ConfigurationError('bad config');
        expect(err.code).toBe('CONFIGURATION_ERROR');
        expect(err.name).toBe('ConfigurationError');
    });
});
