/**
 * @file DecoderBuffer.ts
 * @brief Input side of the decoder: one interface, three read strategies.
 *
 * The decoder only ever asks for "the next n bytes". Where those bytes come
 * from (a block already in memory, a pull callback, or a seekable stream read
 * in chunks) is decided once, when the buffer is created.
 */

import type { DecodeSource, PullSource, SeekableSource } from '../types';
import { Logger, logger as rootLogger } from '../utils/Logger';

/** Minimum chunk size requested from seekable sources. */
export const BUFFER_FP_SIZE = 256;

const EMPTY = new Uint8Array(0);

export interface DecoderBuffer {
    /**
     * Up to `size` bytes; shorter only at end of input, empty when nothing is
     * left. The returned view is only valid until the next call.
     */
    borrow(size: number): Uint8Array;
    /** As `borrow`, but the caller owns the result. */
    take(size: number): Uint8Array;
    /** Bytes handed out so far. */
    readonly totalRead: number;
    /** Releases the source. Seekable sources are rewound to the logical position. */
    close(): void;
}

function checkChunk(chunk: unknown, requested: number): Uint8Array {
    if (!(chunk instanceof Uint8Array)) {
        throw new TypeError('Source read must return a Uint8Array');
    }
    if (chunk.length > requested) {
        throw new TypeError(`Source returned ${chunk.length} bytes, more than the ${requested} requested`);
    }
    return chunk;
}

function concat(parts: readonly Uint8Array[], total: number, head: Uint8Array = EMPTY): Uint8Array {
    const out = new Uint8Array(head.length + total);
    out.set(head, 0);
    let offset = head.length;
    for (const part of parts) {
        out.set(part, offset);
        offset += part.length;
    }
    return out;
}

/**
 * Whole input already in memory. Borrowed views are subarrays of it.
 */
export class FixedDecoderBuffer implements DecoderBuffer {
    private position = 0;

    constructor(private readonly bytes: Uint8Array) { }

    get totalRead(): number {
        return this.position;
    }

    borrow(size: number): Uint8Array {
        if (size <= 0) return EMPTY;
        const end = Math.min(this.bytes.length, this.position + size);
        const view = this.bytes.subarray(this.position, end);
        this.position = end;
        return view;
    }

    take(size: number): Uint8Array {
        return this.borrow(size).slice();
    }

    close(): void {
        // nothing held
    }
}

/**
 * Non-seekable pull source. Every request goes straight to the callback,
 * repeated until enough bytes arrive or the callback signals end of input.
 */
export class CallbackDecoderBuffer implements DecoderBuffer {
    private consumed = 0;

    constructor(private readonly read: PullSource) { }

    get totalRead(): number {
        return this.consumed;
    }

    borrow(size: number): Uint8Array {
        if (size <= 0) return EMPTY;

        const first = checkChunk(this.read(size), size);
        if (first.length === 0 || first.length === size) {
            this.consumed += first.length;
            return first;
        }

        // The callback may reuse its array, so keep copies until done.
        const parts = [first.slice()];
        let got = first.length;
        while (got < size) {
            const next = checkChunk(this.read(size - got), size - got);
            if (next.length === 0) break;
            parts.push(next.slice());
            got += next.length;
        }
        this.consumed += got;
        return concat(parts, got);
    }

    take(size: number): Uint8Array {
        const view = this.borrow(size);
        return view.slice();
    }

    close(): void {
        // the callback owns its resources
    }
}

/**
 * Seekable source read in chunks of at least BUFFER_FP_SIZE bytes. Bytes read
 * ahead but not consumed are given back on `close()` by seeking backwards, so
 * the source ends up positioned just past the decoded document.
 *
 * Arrays returned by the source's `read` must not be modified afterwards.
 */
export class BufferedDecoderBuffer implements DecoderBuffer {
    private chunk: Uint8Array = EMPTY;
    private position = 0;
    private consumed = 0;
    private closed = false;
    private readonly log: Logger;

    constructor(private readonly source: SeekableSource, log: Logger = rootLogger) {
        this.log = log;
    }

    get totalRead(): number {
        return this.consumed;
    }

    /** Bytes read from the source but not yet handed out. */
    get unread(): number {
        return this.chunk.length - this.position;
    }

    borrow(size: number): Uint8Array {
        if (size <= 0) return EMPTY;
        if (size > this.unread) {
            this.refill(size - this.unread);
        }
        const end = Math.min(this.chunk.length, this.position + size);
        const view = this.chunk.subarray(this.position, end);
        this.consumed += view.length;
        this.position = end;
        return view;
    }

    take(size: number): Uint8Array {
        return this.borrow(size).slice();
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        const unread = this.unread;
        this.chunk = EMPTY;
        this.position = 0;
        if (unread > 0) {
            this.log.debug(`Rewinding source by ${unread} unread byte(s)`);
            this.source.seek(-unread, 'current');
        }
    }

    /**
     * Reads until `needed` more bytes are available or the source runs dry,
     * then joins the unread tail with the fresh data.
     */
    private refill(needed: number): void {
        const parts: Uint8Array[] = [];
        let got = 0;
        while (got < needed) {
            const request = Math.max(BUFFER_FP_SIZE, needed - got);
            const part = checkChunk(this.source.read(request), request);
            if (part.length === 0) break;
            parts.push(part);
            got += part.length;
        }
        if (parts.length === 0) return;

        const tail = this.chunk.subarray(this.position);
        this.chunk = tail.length === 0 && parts.length === 1 ? parts[0] : concat(parts, got, tail);
        this.position = 0;
    }
}

function isSeekable(source: PullSource | SeekableSource): source is SeekableSource {
    return typeof source === 'object'
        && source !== null
        && typeof source.read === 'function'
        && typeof source.seek === 'function';
}

/**
 * Picks the read strategy for a source.
 */
export function createDecoderBuffer(source: DecodeSource, log: Logger = rootLogger): DecoderBuffer {
    if (source instanceof Uint8Array) {
        return new FixedDecoderBuffer(source);
    }
    if (source instanceof ArrayBuffer) {
        return new FixedDecoderBuffer(new Uint8Array(source));
    }
    if (typeof source === 'function') {
        return new CallbackDecoderBuffer(source);
    }
    if (isSeekable(source)) {
        return new BufferedDecoderBuffer(source, log);
    }
    throw new TypeError('Unsupported decode source: expected bytes, a read function or a { read, seek } object');
}
