/**
 * Command-line converter between JSON and BJData.
 *
 *   bjdata fromjson <input|-> [output]
 *   bjdata tojson <input|-> [output]
 *
 * Input `-` is stdin; without an output path the result goes to stdout.
 */

import cac from 'cac';
import fs from 'fs';
import { decode, encodeStream } from './codec';
import { BJDataError, EncodeError } from './errors';
import { HighPrecision } from './HighPrecision';
import { FileSource, fdSink } from './io';
import { parseJSON } from './json';
import { NDArray } from './NDArray';
import { isNumericArray } from './numeric';
import type { ByteOrder, DecodeSource } from './types';
import { logger } from './utils/Logger';
import { truncate } from './validation';
import { VERSION } from './version';

export const ExitCode = {
    OK: 0,
    USAGE: 1,
    INPUT_OPEN: 2,
    OUTPUT_OPEN: 4,
    DECODE: 8,
    ENCODE: 16,
    IO: 32,
} as const;

const STDIN_FD = 0;
const STDOUT_FD = 1;

const log = logger.child('cli');

export interface ConvertOptions {
    sortKeys?: boolean;
    containerCount?: boolean;
    byteOrder?: ByteOrder;
    debug?: boolean;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Opens the output file, or returns stdout's descriptor when no path is given.
 */
function openOutput(outputPath: string | undefined): number | undefined {
    if (outputPath === undefined) {
        return STDOUT_FD;
    }
    try {
        return fs.openSync(outputPath, 'w');
    } catch (error) {
        log.error(`Failed to open output file for writing: ${errorMessage(error)}`);
        return undefined;
    }
}

function closeOutput(fd: number): void {
    if (fd !== STDOUT_FD) {
        fs.closeSync(fd);
    }
}

function isSystemError(error: unknown): error is Error & { code: string } {
    return error instanceof Error
        && !(error instanceof BJDataError)
        && 'code' in error
        && typeof error.code === 'string';
}

/**
 * Turns a read or write failure after the files were opened into `ExitCode.IO`.
 */
function reportIOFailure(convert: () => number): number {
    try {
        return convert();
    } catch (error) {
        if (isSystemError(error)) {
            log.error(`I/O failure: ${error.message}`);
            return ExitCode.IO;
        }
        throw error;
    }
}

/**
 * JSON numerals may not carry a leading `+`, leading zeros or a bare decimal
 * point, all of which high-precision text allows.
 */
function toJSONNumeral(text: string): string {
    const match = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/.exec(text);
    if (!match) {
        throw new TypeError(`Not a numeral: ${text}`);
    }
    const [, sign, whole, fraction, exponent] = match;
    let out = sign === '-' ? '-' : '';
    out += whole.replace(/^0+(?=\d)/, '') || '0';
    if (fraction) {
        out += `.${fraction}`;
    }
    if (exponent !== undefined) {
        out += `e${exponent}`;
    }
    return out;
}

/**
 * Serializes decoded BJData to compact JSON. Unlike JSON.stringify it keeps
 * bigints and high-precision numbers exact, writes typed and N-dimensional
 * arrays as (nested) arrays, and preserves Map key order.
 *
 * @throws {TypeError} For values JSON cannot represent
 */
export function toJSONText(value: unknown): string {
    if (value === null || value === undefined) {
        return 'null';
    }
    switch (typeof value) {
        case 'boolean':
            return value ? 'true' : 'false';
        case 'number':
            return Number.isFinite(value) ? JSON.stringify(value) : 'null';
        case 'bigint':
            return value.toString();
        case 'string':
            return JSON.stringify(value);
        case 'object': {
            if (value instanceof HighPrecision) {
                return toJSONNumeral(value.text);
            }
            if (value instanceof NDArray) {
                return toJSONText(value.toNested());
            }
            if (isNumericArray(value)) {
                const parts: string[] = [];
                for (let i = 0; i < value.length; i++) {
                    parts.push(toJSONText(value[i]));
                }
                return `[${parts.join(',')}]`;
            }
            if (Array.isArray(value)) {
                return `[${value.map(item => toJSONText(item)).join(',')}]`;
            }
            const entries = value instanceof Map ? Array.from(value.entries()) : Object.entries(value);
            return `{${entries.map(([k, v]) => `${JSON.stringify(String(k))}:${toJSONText(v)}`).join(',')}}`;
        }
        default:
            throw new TypeError(`Object of type ${typeof value} is not JSON serializable`);
    }
}

/**
 * JSON file (or stdin) to BJData. Object key order and integer precision are
 * kept.
 */
export function fromJson(inputPath: string, outputPath?: string, options: ConvertOptions = {}): number {
    return reportIOFailure(() => convertFromJson(inputPath, outputPath, options));
}

function convertFromJson(inputPath: string, outputPath: string | undefined, options: ConvertOptions): number {
    let text: string;
    try {
        text = fs.readFileSync(inputPath === '-' ? STDIN_FD : inputPath, 'utf8');
    } catch (error) {
        log.error(`Failed to open input file for reading: ${errorMessage(error)}`);
        return ExitCode.INPUT_OPEN;
    }

    const fd = openOutput(outputPath);
    if (fd === undefined) {
        return ExitCode.OUTPUT_OPEN;
    }
    try {
        let value: unknown;
        try {
            value = parseJSON(text);
        } catch (error) {
            log.error(`Failed to decode json: ${truncate(errorMessage(error))}`);
            return ExitCode.DECODE;
        }
        try {
            encodeStream(value, fdSink(fd), options);
        } catch (error) {
            if (error instanceof EncodeError) {
                log.error(`Failed to encode to bjdata: ${error.message}`);
                return ExitCode.ENCODE;
            }
            throw error;
        }
        return ExitCode.OK;
    } finally {
        closeOutput(fd);
    }
}

/**
 * BJData file (or stdin) to compact JSON. Object key order is kept.
 */
export function toJson(inputPath: string, outputPath?: string, options: Pick<ConvertOptions, 'byteOrder' | 'debug'> = {}): number {
    return reportIOFailure(() => convertToJson(inputPath, outputPath, options));
}

function convertToJson(inputPath: string, outputPath: string | undefined, options: Pick<ConvertOptions, 'byteOrder' | 'debug'>): number {
    let source: DecodeSource;
    let inputFd: number | undefined;
    try {
        if (inputPath === '-') {
            source = new Uint8Array(fs.readFileSync(STDIN_FD));
        } else {
            inputFd = fs.openSync(inputPath, 'r');
            source = new FileSource(inputFd);
        }
    } catch (error) {
        log.error(`Failed to open input file for reading: ${errorMessage(error)}`);
        return ExitCode.INPUT_OPEN;
    }

    try {
        const fd = openOutput(outputPath);
        if (fd === undefined) {
            return ExitCode.OUTPUT_OPEN;
        }
        try {
            let value: unknown;
            try {
                value = decode(source, {
                    ...options,
                    internKeys: true,
                    pairsHook: pairs => new Map(pairs),
                });
            } catch (error) {
                if (error instanceof BJDataError) {
                    log.error(`Failed to decode bjdata: ${error.message}`);
                    return ExitCode.DECODE;
                }
                throw error;
            }
            let text: string;
            try {
                text = toJSONText(value);
            } catch (error) {
                if (error instanceof TypeError) {
                    log.error(`Failed to encode to json: ${error.message}`);
                    return ExitCode.ENCODE;
                }
                throw error;
            }
            fdSink(fd).write(new TextEncoder().encode(text));
            return ExitCode.OK;
        } finally {
            closeOutput(fd);
        }
    } finally {
        if (inputFd !== undefined) {
            fs.closeSync(inputFd);
        }
    }
}

interface FromJsonFlags {
    sortKeys?: boolean;
    containerCount?: boolean;
    bigEndian?: boolean;
    debug?: boolean;
}

interface ToJsonFlags {
    bigEndian?: boolean;
    debug?: boolean;
}

export function createCLI() {
    const cli = cac('bjdata');

    cli
        .command('fromjson <input> [output]', 'Convert JSON to BJData (input "-" reads stdin)')
        .option('--sort-keys', 'Write object keys in sorted order')
        .option('--container-count', 'Write container counts instead of end markers')
        .option('--big-endian', 'Write numbers big-endian (UBJSON / BJData Draft 1)')
        .option('--debug', 'Enable debug logging')
        .action((input: string, output: string | undefined, flags: FromJsonFlags): number => fromJson(input, output, {
            sortKeys: flags.sortKeys === true,
            containerCount: flags.containerCount === true,
            byteOrder: flags.bigEndian ? 'big' : 'little',
            debug: flags.debug === true,
        }));

    cli
        .command('tojson <input> [output]', 'Convert BJData to JSON (input "-" reads stdin)')
        .option('--big-endian', 'Read numbers as big-endian (UBJSON / BJData Draft 1)')
        .option('--debug', 'Enable debug logging')
        .action((input: string, output: string | undefined, flags: ToJsonFlags): number => toJson(input, output, {
            byteOrder: flags.bigEndian ? 'big' : 'little',
            debug: flags.debug === true,
        }));

    cli.help();
    cli.version(VERSION);

    return cli;
}

/**
 * Parses `argv` and runs the matched command.
 *
 * @returns The process exit code
 */
export function runCLI(argv: string[]): number {
    const cli = createCLI();
    try {
        cli.parse(argv, { run: false });
        if (cli.options.help || cli.options.version) {
            return ExitCode.OK;
        }
        if (!cli.matchedCommand) {
            log.error(cli.args.length > 0 ? `Unknown command: ${cli.args[0]}` : 'No command given');
            cli.outputHelp();
            return ExitCode.USAGE;
        }
        const result: unknown = cli.runMatchedCommand();
        return typeof result === 'number' ? result : ExitCode.OK;
    } catch (error) {
        if (error instanceof Error && error.name === 'CACError') {
            log.error(error.message);
            cli.outputHelp();
            return ExitCode.USAGE;
        }
        throw error;
    }
}
