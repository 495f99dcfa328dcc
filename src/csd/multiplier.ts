/**
 * Verilog generator for constant multipliers.
 *
 * Each non-zero digit at index i of an (m+1)-digit CSD string contributes
 * x << (m - i). The module sign-extends the input to n + m bits and sums the
 * shifted copies, adding `+` digits and subtracting `-` digits.
 */
import { InvalidArgumentError } from './errors.js';
import type { CsdDigit, MultiplierOptions } from '../csd-types.js';
import { digitOf } from '../csd-utils.js';

interface Term {
    power: number;
    digit: CsdDigit;
}

export function generateCsdMultiplier(csd: string, n: number, m: number, options: MultiplierOptions = {}): string {
    if (!Number.isSafeInteger(n) || n < 1) {
        throw new InvalidArgumentError(`Input width must be a positive integer (got ${n})`);
    }
    if (!Number.isSafeInteger(m) || m < 0) {
        throw new InvalidArgumentError(`Highest power must be a non-negative integer (got ${m})`);
    }
    if (csd.length !== m + 1) {
        throw new InvalidArgumentError(`CSD length ${csd.length} doesn't match M=${m} (should be M+1)`);
    }

    const terms: Term[] = [];
    let value = 0n;
    for (let i = 0; i < csd.length; i++) {
        const digit = digitOf(csd[i]);
        if (digit === null) {
            throw new InvalidArgumentError(`CSD string can only contain '+', '-', or '0' (found '${csd[i]}')`);
        }
        value = value * 2n + BigInt(digit);
        if (digit !== 0) terms.push({ power: m - i, digit });
    }

    const moduleName = options.moduleName ?? 'csd_multiplier';
    const msb = n + m - 1;
    const lines = [
        `// CSD multiplier for pattern ${csd} (value: ${value})`,
        `module ${moduleName} (`,
        `    input signed [${n - 1}:0] x,`,
        `    output signed [${msb}:0] result`,
        `);`,
        '',
    ];

    if (terms.length > 0) {
        lines.push('    // Shifted copies of x, sign-extended to the result width');
        for (const { power } of terms) {
            lines.push(`    wire signed [${msb}:0] x_shift${power} = x <<< ${power};`);
        }
        lines.push('');
    }

    lines.push(`    assign result = ${sumExpression(terms)};`);
    lines.push('endmodule');
    return lines.join('\n') + '\n';
}

function sumExpression(terms: Term[]): string {
    if (terms.length === 0) return '0';
    return terms
        .map(({ power, digit }, idx) => {
            const signal = `x_shift${power}`;
            if (idx === 0) return digit < 0 ? `-${signal}` : signal;
            return `${digit < 0 ? '-' : '+'} ${signal}`;
        })
        .join(' ');
}
