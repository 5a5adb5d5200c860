import type { HighPrecision } from './HighPrecision';
import type { NDArray } from './NDArray';
import type { ByteOrder, NumericArray } from './numeric';

export type { ByteOrder, NumericArray } from './numeric';

/**
 * A value the decoder can produce.
 */
export type BJDataValue =
    | null
    | boolean
    | number
    | bigint
    | string
    | HighPrecision
    | NumericArray
    | NDArray
    | BJDataValue[]
    | { [key: string]: BJDataValue };

/**
 * Non-seekable byte source: produce up to `size` bytes, an empty array at end
 * of input. Previously returned arrays may be reused by the source.
 */
export type PullSource = (size: number) => Uint8Array;

export type SeekOrigin = 'start' | 'current';

/**
 * Seekable byte source. `seek(offset, 'current')` with a negative offset must
 * step back over bytes already returned by `read`.
 */
export interface SeekableSource {
    read(size: number): Uint8Array;
    seek(offset: number, origin: SeekOrigin): void;
}

export type DecodeSource = Uint8Array | ArrayBuffer | PullSource | SeekableSource;

/**
 * Destination for streamed encoding. Chunks are handed over by ownership and
 * never touched by the encoder again.
 */
export interface EncoderSink {
    write(chunk: Uint8Array): unknown;
}

export type ObjectHook = (obj: Record<string, unknown>) => unknown;
export type PairsHook = (pairs: Array<[string, unknown]>) => unknown;

/**
 * Converts a value the encoder does not understand into one it does.
 */
export type DefaultEncoder = (value: unknown) => unknown;

export interface EncoderOptions {
    /** Write object keys in UTF-8 byte order. */
    sortKeys?: boolean;
    /** Use float32 for doubles that survive the round trip. */
    preferFloat32?: boolean;
    /** Prefix arrays and objects with `#` counts instead of closing markers. */
    containerCount?: boolean;
    byteOrder?: ByteOrder;
    defaultEncoder?: DefaultEncoder;
    maxRecursionDepth?: number;
    debug?: boolean;
}

export interface DecoderOptions {
    objectHook?: ObjectHook;
    /** Receives object contents as ordered pairs; wins over `objectHook`. */
    pairsHook?: PairsHook;
    internKeys?: boolean;
    /** Decode `[$U#n` as a Uint8Array instead of a number array. */
    bytesForUint8Arrays?: boolean;
    byteOrder?: ByteOrder;
    maxRecursionDepth?: number;
    /** Most elements (or nested lists) a `$Z`/`$T`/`$F` array may expand to. */
    maxNoDataElements?: number;
    debug?: boolean;
}
