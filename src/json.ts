/**
 * Lossless JSON reading for the `fromjson` command.
 *
 * Objects become Maps in source key order (integer-like keys included), and
 * every numeral is converted from its own source text: integers to `number`
 * when safe, otherwise `bigint`; other numerals to `number`, or to
 * `HighPrecision` when they overflow a double.
 */

import { parseTree, printParseErrorCode } from 'jsonc-parser';
import type { Node, ParseError } from 'jsonc-parser';
import { HighPrecision } from './HighPrecision';
import { narrowBigInt } from './numeric';

const STRICT_JSON = {
    disallowComments: true,
    allowTrailingComma: false,
    allowEmptyContent: false,
} as const;

export function parseJSONNumeral(text: string): number | bigint | HighPrecision {
    if (/^-?\d+$/.test(text)) {
        return narrowBigInt(BigInt(text));
    }
    const value = Number(text);
    return Number.isFinite(value) ? value : new HighPrecision(text);
}

function fromNode(node: Node, text: string): unknown {
    switch (node.type) {
        case 'object': {
            const out = new Map<string, unknown>();
            for (const property of node.children ?? []) {
                const [keyNode, valueNode] = property.children ?? [];
                const key: unknown = keyNode?.value;
                if (typeof key !== 'string' || valueNode === undefined) {
                    throw new SyntaxError(`Malformed property at offset ${property.offset}`);
                }
                out.set(key, fromNode(valueNode, text));
            }
            return out;
        }
        case 'array':
            return (node.children ?? []).map(child => fromNode(child, text));
        case 'number':
            return parseJSONNumeral(text.slice(node.offset, node.offset + node.length));
        default: {
            const value: unknown = node.value;
            return value;
        }
    }
}

/**
 * Parses strict JSON without losing integer precision or key order.
 *
 * @throws {SyntaxError} On the first syntax error, naming its offset
 */
export function parseJSON(text: string): unknown {
    const errors: ParseError[] = [];
    const root = parseTree(text, errors, STRICT_JSON);
    if (errors.length > 0) {
        const [first] = errors;
        throw new SyntaxError(`${printParseErrorCode(first.error)} at offset ${first.offset}`);
    }
    if (root === undefined) {
        throw new SyntaxError('No JSON value found');
    }
    return fromNode(root, text);
}
