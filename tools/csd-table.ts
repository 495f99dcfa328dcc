/**
 * CLI: CSD Table
 *
 * Usage:  tsx tools/csd-table.ts [--from N] [--to N] [--step N] [--places N]
 *
 * Prints each value in the range with its CSD encoding, non-zero digit count
 * and longest repeated digit pattern.
 */

import { CSD, countNonZero } from '../src/index.js';

// --- CLI args ---
const args = process.argv.slice(2);

function getArg(name: string, fallback: string): string {
    const idx = args.indexOf(`--${name}`);
    return idx !== -1 && args[idx + 1] ? args[idx + 1] : fallback;
}

const from = Number(getArg('from', '-8'));
const to = Number(getArg('to', '8'));
const step = Number(getArg('step', '0.5'));
const places = parseInt(getArg('places', '4'), 10);

if (!(step > 0) || Number.isNaN(from) || Number.isNaN(to)) {
    console.error('--from/--to must be numbers and --step must be positive');
    process.exit(1);
}

const rows: string[][] = [['value', 'csd', 'nnz', 'repeat']];
for (let v = from; v <= to; v += step) {
    const csd = CSD.toCsd(v, places);
    rows.push([String(v), csd, String(countNonZero(csd)), CSD.longestRepeatedSubstring(csd) || '-']);
}

const widths = rows[0].map((_, col) => Math.max(...rows.map(r => r[col].length)));
for (const row of rows) {
    console.log(row.map((cell, col) => cell.padEnd(widths[col])).join('  '));
}
