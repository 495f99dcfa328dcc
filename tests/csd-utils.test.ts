// NOTE: Vitest globals are enabled (see vitest.config.ts).
import {
    selectDigit,
    exceedsTwoThirds,
    symbolOf,
    digitOf,
    integerPower,
    bigintPower,
    countNonZero,
    isCanonical,
    negate,
    assertCount,
} from '../src/csd-utils.js';
import { InvalidArgumentError } from '../src/csd/errors.js';

describe('CSD utilities', () => {

    it('selectDigit compares 1.5 * residual against the scale', () => {
        expect(selectDigit(1, 1)).toBe(1);
        expect(selectDigit(-1, 1)).toBe(-1);
        expect(selectDigit(0.5, 1)).toBe(0);
        // 1.5 * 2 equals the scale: not strictly greater
        expect(selectDigit(2, 3)).toBe(0);
        expect(selectDigit(-2, 3)).toBe(0);
    });

    it('selectDigit does not round 1.5 * residual onto the scale', () => {
        // 1.5 * 0.6666666666666667 rounds to 1 but is strictly above it
        expect(selectDigit(0.6666666666666667, 1)).toBe(1);
        expect(selectDigit(-0.6666666666666667, 1)).toBe(-1);
        // subnormal: 1.5 * 3 * 2^-1074 rounds to 4 * 2^-1074
        const unit = 2 ** -1074;
        expect(selectDigit(3 * unit, 4 * unit)).toBe(1);
        expect(selectDigit(unit, unit)).toBe(1);
        expect(selectDigit(unit, 2 * unit)).toBe(0);
    });

    it('exceedsTwoThirds tests 1.5 * magnitude > bound exactly', () => {
        expect(exceedsTwoThirds(0.6666666666666666, 1)).toBe(false);
        expect(exceedsTwoThirds(0.6666666666666667, 1)).toBe(true);
        expect(exceedsTwoThirds(2, 3)).toBe(false);
        expect(exceedsTwoThirds(0.1, 1)).toBe(false);
        expect(exceedsTwoThirds(5, 1)).toBe(true);
    });

    it('maps between digits and symbols', () => {
        expect(symbolOf(1)).toBe('+');
        expect(symbolOf(-1)).toBe('-');
        expect(symbolOf(0)).toBe('0');
        expect(digitOf('+')).toBe(1);
        expect(digitOf('-')).toBe(-1);
        expect(digitOf('0')).toBe(0);
        expect(digitOf('.')).toBeNull();
        expect(digitOf('1')).toBeNull();
    });

    it('computes the integer digit count', () => {
        expect(integerPower(28.5)).toBe(6);
        expect(integerPower(1)).toBe(1);
        expect(integerPower(0.6666666666666667)).toBe(1);
        expect(integerPower(1.3333333333333335)).toBe(2);
        expect(integerPower(2 ** 40)).toBe(41);
        expect(bigintPower(28n)).toBe(6);
        expect(bigintPower(15n)).toBe(5);
        expect(bigintPower(1n)).toBe(1);
    });

    it('counts non-zero digits', () => {
        expect(countNonZero('+00-00.+')).toBe(3);
        expect(countNonZero('0.00')).toBe(0);
    });

    it('checks the non-adjacent property across the separator', () => {
        expect(isCanonical('+0-0+')).toBe(true);
        expect(isCanonical('+0.-')).toBe(true);
        expect(isCanonical('+-')).toBe(false);
        expect(isCanonical('+.+')).toBe(false);
        expect(isCanonical('')).toBe(true);
    });

    it('flips signs digit-wise', () => {
        expect(negate('+00-00.+0')).toBe('-00+00.-0');
        expect(negate('0.')).toBe('0.');
    });

    it('validates counts', () => {
        expect(() => assertCount('places', 3)).not.toThrow();
        expect(() => assertCount('places', -1)).toThrow(InvalidArgumentError);
        expect(() => assertCount('places', 5, 4)).toThrow('places must not exceed 4 (got 5)');
    });
});
