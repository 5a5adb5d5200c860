/**
 * @file EncoderBuffer.ts
 * @brief Growable output buffer, in memory or streaming to a sink.
 *
 * Without a sink the buffer doubles as needed and `finalize()` hands back the
 * encoded bytes. With a sink, buffered bytes are flushed whenever more room is
 * needed, so memory use stays bounded by the largest single write.
 */

import { EncodeError } from '../errors';
import { Marker, byteLengthOf } from '../markers';
import { NumericArray, viewOf, writeNumber } from '../numeric';
import type { EncoderSink } from '../types';
import { Logger, logger as rootLogger } from '../utils/Logger';

export const INITIAL_CAPACITY = 256;

export class EncoderBuffer {
    private buffer: Uint8Array;
    private view: DataView;
    private offset = 0;
    private flushed = 0;
    private readonly active = new Set<object>();
    private readonly log: Logger;

    constructor(
        private readonly littleEndian: boolean,
        private readonly sink?: EncoderSink,
        log: Logger = rootLogger
    ) {
        this.buffer = new Uint8Array(INITIAL_CAPACITY);
        this.view = viewOf(this.buffer);
        this.log = log;
    }

    /** Total bytes produced so far, flushed or not. */
    get bytesWritten(): number {
        return this.flushed + this.offset;
    }

    get capacity(): number {
        return this.buffer.length;
    }

    /**
     * Marks a container as being encoded.
     *
     * @throws {EncodeError} If it is already being encoded further up
     */
    enter(container: object): void {
        if (this.active.has(container)) {
            throw new EncodeError('Circular reference detected');
        }
        this.active.add(container);
    }

    leave(container: object): void {
        this.active.delete(container);
    }

    writeMarker(marker: Marker): void {
        this.ensure(1);
        this.buffer[this.offset++] = marker;
    }

    writeNumber(marker: Marker, value: number | bigint): void {
        const size = byteLengthOf(marker);
        this.ensure(size);
        writeNumber(this.view, this.offset, marker, value, this.littleEndian);
        this.offset += size;
    }

    /** Raw bytes, written as they are. */
    writeBytes(data: Uint8Array): void {
        if (this.sink && data.length >= this.buffer.length) {
            this.flush();
            this.sink.write(data.slice());
            this.flushed += data.length;
            this.log.debug(`Wrote ${data.length} byte(s) straight to sink`);
            return;
        }
        this.ensure(data.length);
        this.buffer.set(data, this.offset);
        this.offset += data.length;
    }

    /** Elements of a typed array as `marker` values in the configured byte order. */
    writeTypedArray(marker: Marker, data: NumericArray): void {
        const size = byteLengthOf(marker);
        if (size === 1 && (data instanceof Uint8Array || data instanceof Int8Array)) {
            this.writeBytes(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
            return;
        }
        for (let i = 0; i < data.length; i++) {
            this.ensure(size);
            writeNumber(this.view, this.offset, marker, data[i], this.littleEndian);
            this.offset += size;
        }
    }

    /**
     * In memory: the encoded bytes. With a sink: flushes the remainder and
     * returns an empty array.
     */
    finalize(): Uint8Array {
        if (this.sink) {
            this.flush();
            return new Uint8Array(0);
        }
        return this.buffer.slice(0, this.offset);
    }

    private flush(): void {
        if (!this.sink || this.offset === 0) return;
        this.sink.write(this.buffer.slice(0, this.offset));
        this.log.debug(`Flushed ${this.offset} byte(s) to sink`);
        this.flushed += this.offset;
        this.offset = 0;
    }

    private ensure(size: number): void {
        if (this.offset + size <= this.buffer.length) return;

        if (this.sink) {
            this.flush();
            if (size <= this.buffer.length) return;
        }

        let capacity = this.buffer.length * 2;
        while (capacity < this.offset + size) {
            capacity *= 2;
        }
        const next = new Uint8Array(capacity);
        next.set(this.buffer.subarray(0, this.offset));
        this.buffer = next;
        this.view = viewOf(next);
    }
}
