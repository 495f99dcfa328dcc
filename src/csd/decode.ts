/**
 * DigitDecoder: CSD strings back to numbers.
 *
 * The integer part folds left to right (acc * 2 + digit). The fractional part
 * adds digit * scale with the scale starting at 1/2 and halving per character.
 * Characters outside `+ - 0 .` keep their position and count as `0`, unless
 * the decoder runs in strict mode.
 */
import { FormatError } from './errors.js';
import type { CsdDigit, DecoderOptions } from '../csd-types.js';
import { digitOf } from '../csd-utils.js';

export class DigitDecoder {

    /**
     * @example
     * DigitDecoder.toDecimal('+00-00.+'); // 28.5
     * DigitDecoder.toDecimal('0.-');      // -0.5
     */
    static toDecimal(csd: string, options: DecoderOptions = {}): number {
        const { integral, fractional } = splitParts(csd);
        const digit = digitReader(csd, options);

        let value = 0;
        for (let i = 0; i < integral.length; i++) {
            value = value * 2 + digit(integral[i], i);
        }
        if (fractional === null) return value;

        const offset = integral.length + 1;
        let fraction = 0;
        let scale = 0.5;
        for (let i = 0; i < fractional.length; i++) {
            fraction += scale * digit(fractional[i], offset + i);
            scale /= 2;
        }
        return value + fraction;
    }

    /**
     * Exact decode of an integer CSD string.
     *
     * @example
     * DigitDecoder.toDecimalInteger('+00-00'); // 28n
     */
    static toDecimalInteger(csd: string, options: DecoderOptions = {}): bigint {
        const { integral, fractional } = splitParts(csd);
        if (fractional !== null) {
            throw new FormatError(`Integer CSD string must not contain '.': "${csd}"`);
        }
        const digit = digitReader(csd, options);

        let value = 0n;
        for (let i = 0; i < integral.length; i++) {
            value = value * 2n + BigInt(digit(integral[i], i));
        }
        return value;
    }
}

function splitParts(csd: string): { integral: string; fractional: string | null } {
    const dot = csd.indexOf('.');
    if (dot === -1) return { integral: csd, fractional: null };
    if (csd.indexOf('.', dot + 1) !== -1) {
        throw new FormatError(`CSD string has more than one '.': "${csd}"`);
    }
    return { integral: csd.slice(0, dot), fractional: csd.slice(dot + 1) };
}

function digitReader(csd: string, options: DecoderOptions): (ch: string, pos: number) => CsdDigit {
    const strict = options.strict ?? false;
    const logger = options.logger ?? null;

    return (ch, pos) => {
        const digit = digitOf(ch);
        if (digit !== null) return digit;
        if (strict) {
            throw new FormatError(`Unexpected character '${ch}' at position ${pos} in "${csd}"`);
        }
        logger?.warn?.(`Unknown character '${ch}' at position ${pos}, read as 0`);
        return 0;
    };
}
