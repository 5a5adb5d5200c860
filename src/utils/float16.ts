/**
 * @module Float16
 * @description
 * IEEE 754 binary16 conversion. Node 20 has no Float16Array or
 * DataView#getFloat16, so half precision values travel as their raw 16 bits.
 */

/**
 * Expands half precision bits to a number. Every binary16 value is exactly
 * representable as a double.
 */
export function fromFloat16Bits(bits: number): number {
    const exp = (bits >> 10) & 0x1f;
    const mant = bits & 0x3ff;
    let val: number;
    if (exp === 0) {
        val = mant * 2 ** -24;
    } else if (exp !== 31) {
        val = (mant + 1024) * 2 ** (exp - 25);
    } else {
        val = mant === 0 ? Infinity : NaN;
    }
    return bits & 0x8000 ? -val : val;
}

/**
 * Rounds a number to the nearest half precision value (ties to even) and
 * returns its bits. Values past the largest finite half become infinity.
 */
export function toFloat16Bits(value: number): number {
    if (Number.isNaN(value)) {
        return 0x7e00;
    }
    const sign = value < 0 || Object.is(value, -0) ? 0x8000 : 0;
    const abs = Math.abs(value);

    // 65520 is halfway between 65504 (max finite half) and 2^16
    if (abs >= 65520) {
        return sign | 0x7c00;
    }

    if (abs < 2 ** -14) {
        // subnormal: units of 2^-24; a carry to 1024 lands on the smallest normal
        return sign | roundHalfEven(abs * 2 ** 24);
    }

    let exp = Math.floor(Math.log2(abs));
    if (2 ** exp > abs) {
        exp--;
    } else if (2 ** (exp + 1) <= abs) {
        exp++;
    }
    const mant = roundHalfEven((abs / 2 ** exp - 1) * 1024);
    // mant === 1024 carries into the exponent field
    return sign | (((exp + 15) << 10) + mant);
}

function roundHalfEven(x: number): number {
    const r = Math.round(x);
    return r - x === 0.5 && r % 2 !== 0 ? r - 1 : r;
}
