/**
 * @file codec.ts
 * @brief Public encode/decode operations for BJData.
 *
 * Options are validated once here; the encoder and decoder engines only see
 * resolved options.
 *
 * @example
 * ```typescript
 * import { encode, decode } from 'bjdata-codec';
 *
 * const bytes = encode({ x: 100, y: [1.5, 2.5] });
 * const obj = decode(bytes);
 * ```
 */

import { Decoder } from './decoder/Decoder';
import { DecoderBuffer, createDecoderBuffer } from './decoder/DecoderBuffer';
import { Encoder } from './encoder/Encoder';
import { EncoderBuffer } from './encoder/EncoderBuffer';
import type { DecodeSource, DecoderOptions, EncoderOptions, EncoderSink } from './types';
import { Logger, componentLogger } from './utils/Logger';
import { resolveDecoderOptions, resolveEncoderOptions } from './validation';

/**
 * Encodes a value to BJData bytes.
 *
 * @throws {EncodeError} If the value (or something inside it) cannot be encoded
 * @throws {ConfigurationError} If options are invalid
 */
export function encode(value: unknown, options?: EncoderOptions): Uint8Array {
    const resolved = resolveEncoderOptions(options);
    const log = componentLogger('encoder', resolved.debug);
    const buffer = new EncoderBuffer(resolved.byteOrder === 'little', undefined, log);
    new Encoder(buffer, resolved).encode(value);
    const bytes = buffer.finalize();
    log.debug(`Encoded ${bytes.length} byte(s)`);
    return bytes;
}

/**
 * Encodes a value straight into a sink and returns the number of bytes
 * written. On failure, bytes already flushed stay with the sink.
 */
export function encodeStream(value: unknown, sink: EncoderSink, options?: EncoderOptions): number {
    if (typeof sink !== 'object' || sink === null || typeof sink.write !== 'function') {
        throw new TypeError('Sink must have a write(chunk) method');
    }
    const resolved = resolveEncoderOptions(options);
    const log = componentLogger('encoder', resolved.debug);
    const buffer = new EncoderBuffer(resolved.byteOrder === 'little', sink, log);
    new Encoder(buffer, resolved).encode(value);
    buffer.finalize();
    log.debug(`Streamed ${buffer.bytesWritten} byte(s)`);
    return buffer.bytesWritten;
}

/**
 * Releases the input after a failed decode. The decode error is the one the
 * caller needs to see, so a failure to release is only logged.
 */
function releaseAfterError(input: DecoderBuffer, log: Logger): void {
    try {
        input.close();
    } catch (closeError) {
        log.warn('Failed to release decode source after error', closeError);
    }
}

/**
 * Decodes one BJData value. Bytes after it are ignored; a seekable source is
 * left positioned just past it.
 *
 * @throws {DecodeError} If the input is malformed or truncated
 * @throws {ResourceError} If the input declares sizes that cannot be allocated
 */
export function decode(source: DecodeSource, options?: DecoderOptions): unknown {
    const resolved = resolveDecoderOptions(options);
    const log = componentLogger('decoder', resolved.debug);
    const input = createDecoderBuffer(source, log);

    let value: unknown;
    try {
        value = new Decoder(input, resolved).decode();
    } catch (error) {
        releaseAfterError(input, log);
        throw error;
    }
    input.close();
    log.debug(`Decoded ${input.totalRead} byte(s)`);
    return value;
}

/**
 * Decodes consecutive BJData values until the source is exhausted. Stopping
 * early releases the source (and rewinds a seekable one).
 */
export function decodeAll(source: DecodeSource, options?: DecoderOptions): Generator<unknown, void, undefined> {
    const resolved = resolveDecoderOptions(options);
    const log = componentLogger('decoder', resolved.debug);
    const input = createDecoderBuffer(source, log);
    return iterate(new Decoder(input, resolved), input, log);
}

function* iterate(decoder: Decoder, input: DecoderBuffer, log: Logger): Generator<unknown, void, undefined> {
    let failed = false;
    try {
        for (; ;) {
            const next = decoder.decodeNext();
            if (next === undefined) {
                return;
            }
            yield next.value;
        }
    } catch (error) {
        failed = true;
        releaseAfterError(input, log);
        throw error;
    } finally {
        if (!failed) {
            input.close();
            log.debug(`Decoded stream of ${input.totalRead} byte(s)`);
        }
    }
}
