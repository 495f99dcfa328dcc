/**
 * CSD Utilities
 *
 * Digit-level helpers shared by the encoder, decoder and multiplier generator.
 */
import { InvalidArgumentError } from './csd/errors.js';
import type { CsdDigit, CsdSymbol } from './csd-types.js';

/**
 * Greedy non-adjacent-form digit selection.
 * Picks +1 when 1.5 * residual exceeds the scale, -1 below its negation, else 0.
 *
 * 1.5r > s is tested as 2(r - s) > -r: near the boundary r - s is exact
 * (Sterbenz) and doubling never rounds, where 1.5r can round onto s.
 */
export function selectDigit(residual: number, scale: number): CsdDigit {
    if (2 * (residual - scale) > -residual) return 1;
    if (2 * (residual + scale) < -residual) return -1;
    return 0;
}

/** 1.5 * magnitude > bound, without rounding the product. */
export function exceedsTwoThirds(magnitude: number, bound: number): boolean {
    return magnitude > 2 * (bound - magnitude);
}

export function symbolOf(digit: CsdDigit): CsdSymbol {
    if (digit === 1) return '+';
    if (digit === -1) return '-';
    return '0';
}

/** Digit value of a CSD character, or null for `.` and anything unknown. */
export function digitOf(ch: string): CsdDigit | null {
    switch (ch) {
        case '+': return 1;
        case '-': return -1;
        case '0': return 0;
        default: return null;
    }
}

/**
 * Number of integer-part digits needed for a magnitude >= 1:
 * ceil(log2(magnitude * 1.5)).
 */
export function integerPower(magnitude: number): number {
    let rem = Math.ceil(Math.log2(magnitude * 1.5));
    if (!Number.isFinite(rem)) return rem;
    // log2 of a rounded product can land one off either way
    while (exceedsTwoThirds(magnitude, 2 ** rem)) rem++;
    while (rem > 0 && !exceedsTwoThirds(magnitude, 2 ** (rem - 1))) rem--;
    return rem;
}

/**
 * Exact counterpart of `integerPower` for non-zero integers.
 * 2^r >= 1.5|v| is the same as 2^(r+1) >= 3|v|, so r + 1 is the bit length of 3|v| - 1.
 */
export function bigintPower(magnitude: bigint): number {
    return (3n * magnitude - 1n).toString(2).length - 1;
}

export function countNonZero(csd: string): number {
    let count = 0;
    for (const ch of csd) {
        if (ch === '+' || ch === '-') count++;
    }
    return count;
}

/** True when no two non-zero digits are adjacent. The `.` separator is skipped. */
export function isCanonical(csd: string): boolean {
    let prevNonZero = false;
    for (const ch of csd) {
        if (ch === '.') continue;
        const nonZero = ch === '+' || ch === '-';
        if (nonZero && prevNonZero) return false;
        prevNonZero = nonZero;
    }
    return true;
}

/** Digit-wise sign flip: `+` and `-` swap, everything else is kept. */
export function negate(csd: string): string {
    let out = '';
    for (const ch of csd) {
        out += ch === '+' ? '-' : ch === '-' ? '+' : ch;
    }
    return out;
}

export function assertCount(name: string, value: number, max: number = Number.MAX_SAFE_INTEGER): void {
    if (!Number.isSafeInteger(value) || value < 0) {
        throw new InvalidArgumentError(`${name} must be a non-negative integer (got ${value})`);
    }
    if (value > max) {
        throw new InvalidArgumentError(`${name} must not exceed ${max} (got ${value})`);
    }
}
