/**
 * DigitEncoder: decimal and integer values to CSD strings.
 *
 * Two termination policies:
 *   - fixed places: a set number of fractional digits after the `.`
 *   - fixed budget (nnz): stop once the allowed count of non-zero digits is spent
 *
 * The float variants walk a halving power-of-two scale and pick each digit
 * with `selectDigit`. The integer variants run the same rule scaled by two
 * (3v against the scale) on bigints, so they stay exact at any width.
 */
import { InvalidArgumentError } from './errors.js';
import { MAX_PLACES, NEGLIGIBLE_RESIDUAL } from '../csd-types.js';
import { assertCount, bigintPower, exceedsTwoThirds, integerPower, selectDigit, symbolOf } from '../csd-utils.js';

interface Seed {
    /** Integer-part digits still to emit. */
    rem: number;
    /** Leading text: `0` for magnitudes the fractional digits can carry alone. */
    prefix: string;
}

// 2^1023 is the largest finite power of two.
const MAX_EXPONENT = 1023;

export class DigitEncoder {

    /**
     * Encode with a fixed number of fractional digits.
     *
     * @example
     * DigitEncoder.toCsd(28.5, 2); // '+00-00.+0'
     * DigitEncoder.toCsd(-0.5, 2); // '0.-0'
     *
     * Magnitudes between 2/3 and 1 start with an integer digit rather than `0`,
     * so no two non-zero digits meet after the point:
     * DigitEncoder.toCsd(0.75, 2);  // '+.0-' (not '0.++')
     */
    static toCsd(value: number, places: number): string {
        assertFinite(value);
        assertCount('places', places, MAX_PLACES);
        if (value === 0) return '0.' + '0'.repeat(places);

        let { rem, prefix: csd } = seedFor(value);
        let p = 2 ** rem;
        let v = value;

        const step = (): void => {
            p /= 2;
            const digit = selectDigit(v, p);
            v -= digit * p;
            csd += symbolOf(digit);
        };

        for (; rem > 0; rem--) step();
        csd += '.';
        for (let i = 0; i < places; i++) step();
        return csd;
    }

    /**
     * Encode with at most `nnz` non-zero digits. Fractional digits are produced
     * only while budget remains and the residual is not negligible; no `.` is
     * emitted when the integer part is exact.
     *
     * @example
     * DigitEncoder.toCsdNnz(28.5, 4); // '+00-00.+'
     * DigitEncoder.toCsdNnz(0.5, 4);  // '0.+'
     * DigitEncoder.toCsdNnz(0.75, 4); // '+.0-' (integer digit for magnitudes in (2/3, 1))
     */
    static toCsdNnz(value: number, nnz: number): string {
        assertFinite(value);
        assertCount('nnz', nnz);
        if (value === 0) return '0';

        let { rem, prefix: csd } = seedFor(value);
        let p = 2 ** rem;
        let v = value;
        let budget = nnz;

        while (rem > 0 || (budget > 0 && Math.abs(v) > NEGLIGIBLE_RESIDUAL)) {
            if (rem === 0) csd += '.';
            p /= 2;
            rem--;
            const digit = budget > 0 ? selectDigit(v, p) : 0;
            if (digit !== 0) {
                v -= digit * p;
                budget--;
            }
            csd += symbolOf(digit);
        }
        return csd;
    }

    /**
     * Integer encode, no `.`.
     *
     * @example
     * DigitEncoder.toCsdInteger(28); // '+00-00'
     */
    static toCsdInteger(value: number | bigint): string {
        return encodeInteger(toBigInt(value), Infinity);
    }

    /**
     * Integer encode with at most `nnz` non-zero digits. Digits past the budget are `0`.
     *
     * @example
     * DigitEncoder.toCsdNnzInteger(37, 2);  // '+00+00'
     * DigitEncoder.toCsdNnzInteger(158, 2); // '+0+00000'
     */
    static toCsdNnzInteger(value: number | bigint, nnz: number): string {
        assertCount('nnz', nnz);
        return encodeInteger(toBigInt(value), nnz);
    }
}

function encodeInteger(value: bigint, nnz: number): string {
    if (value === 0n) return '0';

    const magnitude = value < 0n ? -value : value;
    let p = 1n << BigInt(bigintPower(magnitude));
    let v = value;
    let budget = nnz;
    let csd = '';

    while (p > 1n) {
        const half = p >> 1n;
        const det = 3n * v;
        if (budget > 0 && det > p) {
            csd += '+';
            v -= half;
            budget--;
        } else if (budget > 0 && det < -p) {
            csd += '-';
            v += half;
            budget--;
        } else {
            csd += '0';
        }
        p = half;
    }
    return csd;
}

/**
 * Magnitudes up to 2/3 fit in the fractional digits behind a single `0`.
 * Anything larger needs ceil(log2(1.5|v|)) integer digits; starting the
 * (2/3, 1) range at one integer digit keeps the output non-adjacent.
 */
function seedFor(value: number): Seed {
    const magnitude = Math.abs(value);
    if (!exceedsTwoThirds(magnitude, 1)) return { rem: 0, prefix: '0' };

    const rem = integerPower(magnitude);
    if (!(rem <= MAX_EXPONENT)) {
        throw new InvalidArgumentError(`Value ${value} is outside the encodable range`);
    }
    return { rem, prefix: '' };
}

function assertFinite(value: number): void {
    if (!Number.isFinite(value)) {
        throw new InvalidArgumentError(`Cannot encode non-finite value ${value}`);
    }
}

function toBigInt(value: number | bigint): bigint {
    if (typeof value === 'bigint') return value;
    if (!Number.isSafeInteger(value)) {
        throw new InvalidArgumentError(`Expected a safe integer (got ${value}); pass a bigint for wider values`);
    }
    return BigInt(value);
}
