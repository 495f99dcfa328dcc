/**
 * csd CLI: convert between decimals and CSD strings.
 *
 * Usage:
 *   csd to-csd <decimal> [--places N]
 *   csd to-csdnnz <decimal> [--nnz N]
 *   csd to-decimal <csd> [--strict]
 *   csd lrs <string>
 *   csd multiplier <csd> [--width N]
 *
 * Negative values go after `--`, e.g. `csd to-csd -- -0.5`.
 */

import { Command, CommanderError, InvalidArgumentError as ArgumentParseError } from 'commander';
import { DigitEncoder } from '../csd/encode.js';
import { DigitDecoder } from '../csd/decode.js';
import { RepeatFinder } from '../csd/repeat.js';
import { generateCsdMultiplier } from '../csd/multiplier.js';
import { CsdError } from '../csd/errors.js';
import { CLI_DEFAULTS } from '../csd-types.js';
import type { CsdLogger } from '../csd-types.js';
import { VERSION } from '../version.js';

export interface CliIO {
    out: (text: string) => void;
    err: (text: string) => void;
}

const processIO: CliIO = {
    out: (text) => process.stdout.write(text),
    err: (text) => process.stderr.write(text),
};

function parseDecimal(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
        throw new ArgumentParseError('Not a number.');
    }
    return parsed;
}

function parseCount(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new ArgumentParseError('Not a non-negative integer.');
    }
    return Number(value);
}

function createLogger(io: CliIO, verbose: boolean): CsdLogger {
    return {
        info: verbose ? (msg) => io.err(`[info] ${msg}\n`) : undefined,
        warn: (msg) => io.err(`[warn] ${msg}\n`),
    };
}

export function createProgram(io: CliIO = processIO): Command {
    const program = new Command();

    program
        .name('csd')
        .description('Convert between decimal numbers and Canonical Signed Digit strings')
        .version(VERSION, '-v, --version', 'output the version number')
        .option('--verbose', 'log progress to standard error')
        .showHelpAfterError()
        .exitOverride()
        .configureOutput({
            writeOut: (str) => io.out(str),
            writeErr: (str) => io.err(str),
        });

    const logger = (): CsdLogger => createLogger(io, program.opts<{ verbose?: boolean }>().verbose === true);

    program
        .command('to-csd')
        .description('convert a decimal to CSD with a fixed number of fractional digits')
        .argument('<decimal>', 'value to convert', parseDecimal)
        .option('-p, --places <n>', 'fractional digits', parseCount, CLI_DEFAULTS.places)
        .action((decimal: number, opts: { places: number }) => {
            logger().info?.(`to-csd ${decimal} with ${opts.places} places`);
            io.out(DigitEncoder.toCsd(decimal, opts.places) + '\n');
        });

    program
        .command('to-csdnnz')
        .description('convert a decimal to CSD with a bounded count of non-zero digits')
        .argument('<decimal>', 'value to convert', parseDecimal)
        .option('-z, --nnz <n>', 'maximum non-zero digits', parseCount, CLI_DEFAULTS.nnz)
        .action((decimal: number, opts: { nnz: number }) => {
            logger().info?.(`to-csdnnz ${decimal} with at most ${opts.nnz} non-zero digits`);
            io.out(DigitEncoder.toCsdNnz(decimal, opts.nnz) + '\n');
        });

    program
        .command('to-decimal')
        .description('convert a CSD string to a decimal')
        .argument('<csd>', 'CSD string, e.g. +00-00.+')
        .option('--strict', 'reject characters other than + - 0 .')
        .action((csd: string, opts: { strict?: boolean }) => {
            const log = logger();
            log.info?.(`to-decimal ${csd}`);
            const value = DigitDecoder.toDecimal(csd, { strict: opts.strict === true, logger: log });
            io.out(`${value}\n`);
        });

    program
        .command('lrs')
        .description('print the longest repeated non-overlapping substring')
        .argument('<string>', 'input, usually a CSD string')
        .action((input: string) => {
            const match = RepeatFinder.find(input);
            logger().info?.(match
                ? `repeat of length ${match.length} at offsets ${match.first} and ${match.second}`
                : 'no repeated substring');
            io.out(`${match?.substring ?? ''}\n`);
        });

    program
        .command('multiplier')
        .description('print a Verilog shift-add module multiplying by a CSD constant')
        .argument('<csd>', 'CSD string without a fractional part, e.g. +00-00+0')
        .option('-w, --width <n>', 'input bit width', parseCount, CLI_DEFAULTS.width)
        .action((csd: string, opts: { width: number }) => {
            logger().info?.(`multiplier ${csd} for ${opts.width}-bit input`);
            io.out(generateCsdMultiplier(csd, opts.width, csd.length - 1));
        });

    return program;
}

/**
 * Runs the CLI against user arguments (no node/script prefix) and returns the exit code.
 */
export function run(argv: readonly string[], io: CliIO = processIO): number {
    const program = createProgram(io);
    try {
        program.parse([...argv], { from: 'user' });
        return 0;
    } catch (err) {
        if (err instanceof CommanderError) return err.exitCode;
        if (err instanceof CsdError) {
            io.err(`error: ${err.message}\n`);
            return 1;
        }
        throw err;
    }
}
