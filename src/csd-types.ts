/**
 * CSD Types
 *
 * Shared types and defaults for the encoder, decoder and multiplier generator.
 */

/** Signed digit value. */
export type CsdDigit = -1 | 0 | 1;

/** Characters that carry a digit. `.` separates integer and fractional parts. */
export type CsdSymbol = '+' | '-' | '0';

export type CsdLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
};

export type DecoderOptions = {
    /**
     * Reject characters outside `+ - 0 .` with a FormatError.
     * Off by default: unknown characters count as `0` and are reported via `logger.warn`.
     */
    strict?: boolean;
    logger?: CsdLogger | null;
};

export type MultiplierOptions = {
    /** Verilog module name. Default: `csd_multiplier`. */
    moduleName?: string;
};

export interface RepeatMatch {
    substring: string;
    length: number;
    /** Start offset of the earlier occurrence. */
    first: number;
    /** Start offset of the later occurrence. */
    second: number;
}

/**
 * Largest fractional digit count for `toCsd`. Past 2^-1074 the scale
 * underflows to zero.
 */
export const MAX_PLACES = 1074;

/** Residual magnitude at which the fixed-budget encoder stops. */
export const NEGLIGIBLE_RESIDUAL = 1e-100;

export const CLI_DEFAULTS = {
    places: 4,
    nnz: 4,
    width: 8,
} as const;
