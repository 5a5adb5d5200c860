import { z } from 'zod';
import { ConfigurationError } from './errors';
import type {
    DecoderOptions,
    DefaultEncoder,
    EncoderOptions,
    ObjectHook,
    PairsHook,
} from './types';

/**
 * Zod schemas for codec options.
 * Every option is checked once at the API boundary; the encoder and decoder
 * only ever see fully-populated, validated option objects.
 */

export const DEFAULT_MAX_RECURSION_DEPTH = 512;

export const DEFAULT_MAX_NO_DATA_ELEMENTS = 2 ** 24;

function isFunction(value: unknown): boolean {
    return typeof value === 'function';
}

const ByteOrderSchema = z.enum(['little', 'big']);

const DepthSchema = z.number().int().positive();

export const EncoderOptionsSchema = z.object({
    sortKeys: z.boolean().default(false),
    preferFloat32: z.boolean().default(true),
    containerCount: z.boolean().default(false),
    byteOrder: ByteOrderSchema.default('little'),
    defaultEncoder: z.custom<DefaultEncoder>(isFunction, { message: 'Expected a function' }).optional(),
    maxRecursionDepth: DepthSchema.default(DEFAULT_MAX_RECURSION_DEPTH),
    debug: z.boolean().default(false),
}).strict();

export const DecoderOptionsSchema = z.object({
    objectHook: z.custom<ObjectHook>(isFunction, { message: 'Expected a function' }).optional(),
    pairsHook: z.custom<PairsHook>(isFunction, { message: 'Expected a function' }).optional(),
    internKeys: z.boolean().default(false),
    bytesForUint8Arrays: z.boolean().default(true),
    byteOrder: ByteOrderSchema.default('little'),
    maxRecursionDepth: DepthSchema.default(DEFAULT_MAX_RECURSION_DEPTH),
    maxNoDataElements: z.number().int().positive().default(DEFAULT_MAX_NO_DATA_ELEMENTS),
    debug: z.boolean().default(false),
}).strict();

export type ResolvedEncoderOptions = z.output<typeof EncoderOptionsSchema>;
export type ResolvedDecoderOptions = z.output<typeof DecoderOptionsSchema>;

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(e => `${e.path.join('.')}: ${e.message}`)
        .join(', ');
}

/**
 * Validates encoder options and fills in defaults.
 *
 * @throws {ConfigurationError} If an option has the wrong type or is unknown
 */
export function resolveEncoderOptions(options: EncoderOptions = {}): ResolvedEncoderOptions {
    const result = EncoderOptionsSchema.safeParse(options);
    if (!result.success) {
        throw new ConfigurationError(`Invalid encoder options: ${describeIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Validates decoder options and fills in defaults.
 *
 * @throws {ConfigurationError} If an option has the wrong type or is unknown
 */
export function resolveDecoderOptions(options: DecoderOptions = {}): ResolvedDecoderOptions {
    const result = DecoderOptionsSchema.safeParse(options);
    if (!result.success) {
        throw new ConfigurationError(`Invalid decoder options: ${describeIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Safely truncates a string for logging/error messages.
 */
export function truncate(str: string, maxLength: number = 200): string {
    if (str.length <= maxLength) return str;
    return str.substring(0, maxLength) + `... (${str.length - maxLength} more chars)`;
}
