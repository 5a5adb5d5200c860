import type { EncoderSink, PullSource, SeekableSource, SeekOrigin } from '../src/types';

/**
 * Builds a byte array from ASCII strings (one byte per char code), single
 * byte values and byte lists, so wire fixtures read like the format:
 * `wire('[$U#', 3, [1, 2, 3])`.
 */
export function wire(...parts: Array<string | number | number[] | Uint8Array>): Uint8Array {
    const out: number[] = [];
    for (const part of parts) {
        if (typeof part === 'string') {
            for (let i = 0; i < part.length; i++) {
                out.push(part.charCodeAt(i));
            }
        } else if (typeof part === 'number') {
            out.push(part);
        } else {
            out.push(...part);
        }
    }
    return new Uint8Array(out);
}

export function hex(bytes: Uint8Array): string {
    return Array.from(bytes, b => b.toString(16).padStart(2, '0')).join(' ');
}

export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
    const total = chunks.reduce((n, c) => n + c.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
        out.set(chunk, offset);
        offset += chunk.length;
    }
    return out;
}

/**
 * Pull source that hands out at most `maxChunk` bytes per call through one
 * reused scratch array, like a driver that recycles its read buffer.
 */
export function chunkedPullSource(data: Uint8Array, maxChunk: number): PullSource & { calls: number[] } {
    let position = 0;
    const scratch = new Uint8Array(maxChunk);
    const calls: number[] = [];
    const read = (size: number): Uint8Array => {
        calls.push(size);
        const n = Math.min(size, maxChunk, data.length - position);
        scratch.set(data.subarray(position, position + n));
        position += n;
        return scratch.subarray(0, n);
    };
    return Object.assign(read, { calls });
}

/**
 * In-memory seekable source; records every read size and seek.
 */
export class MemorySeekable implements SeekableSource {
    position = 0;
    readonly reads: number[] = [];
    readonly seeks: Array<[number, SeekOrigin]> = [];

    constructor(private readonly data: Uint8Array, private readonly maxChunk: number = Infinity) { }

    read(size: number): Uint8Array {
        this.reads.push(size);
        const n = Math.min(size, this.maxChunk, this.data.length - this.position);
        const out = this.data.slice(this.position, this.position + n);
        this.position += n;
        return out;
    }

    seek(offset: number, origin: SeekOrigin): void {
        this.seeks.push([offset, origin]);
        this.position = origin === 'start' ? offset : this.position + offset;
    }
}

export class CollectingSink implements EncoderSink {
    readonly chunks: Uint8Array[] = [];

    write(chunk: Uint8Array): void {
        this.chunks.push(chunk);
    }

    bytes(): Uint8Array {
        return concatBytes(this.chunks);
    }
}
