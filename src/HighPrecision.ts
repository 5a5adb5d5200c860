/**
 * Arbitrary-precision decimal carried as its numeral text (`H` on the wire).
 */
export class HighPrecision {
    static readonly PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

    constructor(public readonly text: string) {
        if (!HighPrecision.isValid(text)) {
            throw new TypeError(`Invalid high-precision number: ${JSON.stringify(text)}`);
        }
    }

    static isValid(text: string): boolean {
        return HighPrecision.PATTERN.test(text);
    }

    static fromBigInt(value: bigint): HighPrecision {
        return new HighPrecision(value.toString());
    }

    /** Nearest double; precision beyond 53 bits is lost. */
    toNumber(): number {
        return Number(this.text);
    }

    toString(): string {
        return this.text;
    }

    toJSON(): string {
        return this.text;
    }
}
