/**
 * CSD codec public API
 *
 * @module csd
 */

import { DigitEncoder } from './csd/encode.js';
import { DigitDecoder } from './csd/decode.js';
import { RepeatFinder } from './csd/repeat.js';
import { generateCsdMultiplier } from './csd/multiplier.js';
import type { DecoderOptions, RepeatMatch } from './csd-types.js';

export type { CsdDigit, CsdSymbol, CsdLogger, DecoderOptions, MultiplierOptions, RepeatMatch } from './csd-types.js';
export { CLI_DEFAULTS, MAX_PLACES, NEGLIGIBLE_RESIDUAL } from './csd-types.js';
export { CsdError, InvalidArgumentError, FormatError } from './csd/errors.js';
export type { CsdErrorKind } from './csd/errors.js';
export { selectDigit, countNonZero, isCanonical, negate } from './csd-utils.js';
export { DigitEncoder, DigitDecoder, RepeatFinder, generateCsdMultiplier };
export { VERSION } from './version.js';

export const toCsd = (value: number, places: number): string => DigitEncoder.toCsd(value, places);
export const toCsdInteger = (value: number | bigint): string => DigitEncoder.toCsdInteger(value);
export const toCsdNnz = (value: number, nnz: number): string => DigitEncoder.toCsdNnz(value, nnz);
export const toCsdNnzInteger = (value: number | bigint, nnz: number): string => DigitEncoder.toCsdNnzInteger(value, nnz);
export const toDecimal = (csd: string, options?: DecoderOptions): number => DigitDecoder.toDecimal(csd, options);
export const toDecimalInteger = (csd: string, options?: DecoderOptions): bigint => DigitDecoder.toDecimalInteger(csd, options);
export const longestRepeatedSubstring = (s: string): string => RepeatFinder.longestRepeatedSubstring(s);
export const findLongestRepeat = (s: string): RepeatMatch | null => RepeatFinder.find(s);

// The CSD Namespace Object
export const CSD = {
    /**
     * Decimal to CSD with a fixed number of fractional digits.
     */
    toCsd,
    toCsdInteger,

    /**
     * Decimal to CSD with a bounded count of non-zero digits.
     */
    toCsdNnz,
    toCsdNnzInteger,

    toDecimal,
    toDecimalInteger,

    longestRepeatedSubstring,
    findLongestRepeat,

    /**
     * Verilog shift-add module for multiplying by a CSD constant.
     */
    multiplier: generateCsdMultiplier,
};

export default CSD;
