/**
 * Error types for the BJData codec.
 *
 * Every failure surfaces as one of these so callers can tell malformed input
 * apart from unencodable values or bad configuration.
 */

/**
 * Base class for all codec errors.
 */
export class BJDataError extends Error {
    constructor(message: string, public readonly code: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'BJDataError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, BJDataError);
        }
    }
}

/**
 * Thrown when input is malformed or truncated.
 *
 * `offset` is the number of bytes the decoder had consumed when it gave up.
 */
export class DecodeError extends BJDataError {
    constructor(
        public readonly reason: string,
        public readonly offset: number,
        code: string = 'DECODE_ERROR'
    ) {
        super(`${reason} (at byte ${offset})`, code);
        this.name = 'DecodeError';
    }
}

/**
 * Thrown when nested containers exceed the configured recursion depth.
 */
export class RecursionLimitError extends DecodeError {
    constructor(public readonly maxDepth: number, offset: number, container: string) {
        super(
            `Maximum recursion depth (${maxDepth}) exceeded whilst decoding a BJData ${container}`,
            offset,
            'RECURSION_LIMIT'
        );
        this.name = 'RecursionLimitError';
    }
}

/**
 * Thrown when a value cannot be encoded.
 */
export class EncodeError extends BJDataError {
    constructor(message: string) {
        super(message, 'ENCODE_ERROR');
        this.name = 'EncodeError';
    }
}

/**
 * Thrown when the input asks for more memory than the runtime can provide.
 */
export class ResourceError extends BJDataError {
    constructor(message: string, cause?: unknown) {
        super(message, 'RESOURCE_ERROR', cause === undefined ? undefined : { cause });
        this.name = 'ResourceError';
    }
}

/**
 * Thrown when codec options are invalid.
 */
export class ConfigurationError extends BJDataError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}
