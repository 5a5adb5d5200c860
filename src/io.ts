/**
 * Node.js byte sources and sinks over file descriptors.
 */

import fs from 'fs';
import type { EncoderSink, PullSource, SeekableSource, SeekOrigin } from './types';

/** Upper bound on a single read, whatever size the decoder asks for. */
export const MAX_READ_CHUNK = 64 * 1024;

/**
 * Seekable source over a regular file. Keeps its own position and reads with
 * explicit offsets, so the descriptor's file pointer is never moved.
 */
export class FileSource implements SeekableSource {
    private pos: number;

    constructor(private readonly fd: number, position: number = 0) {
        this.pos = position;
    }

    get position(): number {
        return this.pos;
    }

    read(size: number): Uint8Array {
        const want = Math.min(size, MAX_READ_CHUNK);
        if (want <= 0) {
            return new Uint8Array(0);
        }
        const chunk = new Uint8Array(want);
        const n = fs.readSync(this.fd, chunk, 0, want, this.pos);
        this.pos += n;
        return n === want ? chunk : chunk.subarray(0, n);
    }

    seek(offset: number, origin: SeekOrigin): void {
        const target = origin === 'start' ? offset : this.pos + offset;
        if (target < 0) {
            throw new RangeError(`Cannot seek to ${target}: before start of file`);
        }
        this.pos = target;
    }
}

/**
 * Non-seekable pull source reading from the descriptor's current position
 * (pipes, sockets, terminals).
 */
export function streamSource(fd: number): PullSource {
    return (size: number): Uint8Array => {
        const want = Math.min(size, MAX_READ_CHUNK);
        if (want <= 0) {
            return new Uint8Array(0);
        }
        const chunk = new Uint8Array(want);
        const n = fs.readSync(fd, chunk, 0, want, null);
        return chunk.subarray(0, n);
    };
}

/**
 * Sink writing every chunk fully to a descriptor.
 */
export function fdSink(fd: number): EncoderSink {
    return {
        write(chunk: Uint8Array): number {
            let offset = 0;
            while (offset < chunk.length) {
                offset += fs.writeSync(fd, chunk, offset, chunk.length - offset);
            }
            return offset;
        },
    };
}
