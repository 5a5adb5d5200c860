/**
 * bjdata-codec - BJData (Draft 2) and UBJSON encoder/decoder
 *
 * @example
 * ```typescript
 * import { encode, decode, NDArray } from 'bjdata-codec';
 *
 * const image = new NDArray(new Float32Array(6), [2, 3]);
 * const bytes = encode({ name: 'frame', image });
 * const back = decode(bytes);
 * ```
 *
 * @packageDocumentation
 */

export { encode, encodeStream, decode, decodeAll } from './codec';

// Values
export { HighPrecision } from './HighPrecision';
export { NDArray, reshape } from './NDArray';

// Types
export type {
    BJDataValue,
    ByteOrder,
    NumericArray,
    DecodeSource,
    PullSource,
    SeekableSource,
    SeekOrigin,
    EncoderSink,
    EncoderOptions,
    DecoderOptions,
    ObjectHook,
    PairsHook,
    DefaultEncoder,
} from './types';

// Errors
export {
    BJDataError,
    DecodeError,
    RecursionLimitError,
    EncodeError,
    ResourceError,
    ConfigurationError,
} from './errors';

// Lower-level building blocks
export * as markers from './markers';
export type { DecoderBuffer } from './decoder/DecoderBuffer';
export {
    FixedDecoderBuffer,
    CallbackDecoderBuffer,
    BufferedDecoderBuffer,
    createDecoderBuffer,
    BUFFER_FP_SIZE,
} from './decoder/DecoderBuffer';
export { Decoder } from './decoder/Decoder';
export { EncoderBuffer } from './encoder/EncoderBuffer';
export { Encoder, classify } from './encoder/Encoder';
export type { ValueCategory } from './encoder/Encoder';
export { resolveEncoderOptions, resolveDecoderOptions, DEFAULT_MAX_RECURSION_DEPTH, DEFAULT_MAX_NO_DATA_ELEMENTS } from './validation';
export type { ResolvedEncoderOptions, ResolvedDecoderOptions } from './validation';

// Node.js I/O
export { FileSource, streamSource, fdSink, MAX_READ_CHUNK } from './io';

// Logging
export { Logger, LogLevel, logger } from './utils/Logger';

export { VERSION } from './version';
