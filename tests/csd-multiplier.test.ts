// NOTE: Vitest globals are enabled (see vitest.config.ts).
import { generateCsdMultiplier } from '../src/csd/multiplier.js';
import { InvalidArgumentError } from '../src/csd/errors.js';

describe('generateCsdMultiplier', () => {

    it('emits one shifted copy per non-zero digit, most significant first', () => {
        const verilog = generateCsdMultiplier('+00-00+0', 8, 7);
        expect(verilog).toBe([
            '// CSD multiplier for pattern +00-00+0 (value: 114)',
            'module csd_multiplier (',
            '    input signed [7:0] x,',
            '    output signed [14:0] result',
            ');',
            '',
            '    // Shifted copies of x, sign-extended to the result width',
            '    wire signed [14:0] x_shift7 = x <<< 7;',
            '    wire signed [14:0] x_shift4 = x <<< 4;',
            '    wire signed [14:0] x_shift1 = x <<< 1;',
            '',
            '    assign result = x_shift7 - x_shift4 + x_shift1;',
            'endmodule',
            '',
        ].join('\n'));
    });

    it('negates a leading minus digit', () => {
        const verilog = generateCsdMultiplier('-0+', 4, 2);
        expect(verilog).toContain('// CSD multiplier for pattern -0+ (value: -3)\n');
        expect(verilog).toContain('    assign result = -x_shift2 + x_shift0;\n');
    });

    it('assigns a constant zero without non-zero digits', () => {
        expect(generateCsdMultiplier('000', 4, 2)).toBe([
            '// CSD multiplier for pattern 000 (value: 0)',
            'module csd_multiplier (',
            '    input signed [3:0] x,',
            '    output signed [5:0] result',
            ');',
            '',
            '    assign result = 0;',
            'endmodule',
            '',
        ].join('\n'));
    });

    it('uses the requested module name', () => {
        expect(generateCsdMultiplier('+', 8, 0, { moduleName: 'mul_by_one' })).toContain('module mul_by_one (\n');
    });

    it('rejects a length that does not match M', () => {
        expect(() => generateCsdMultiplier('+00-', 8, 7)).toThrow("CSD length 4 doesn't match M=7 (should be M+1)");
    });

    it('rejects characters other than + - 0', () => {
        expect(() => generateCsdMultiplier('+0.-', 8, 3)).toThrow(InvalidArgumentError);
        expect(() => generateCsdMultiplier('+0x-', 8, 3)).toThrow("found 'x'");
    });

    it('rejects bad widths', () => {
        expect(() => generateCsdMultiplier('+', 0, 0)).toThrow(InvalidArgumentError);
        expect(() => generateCsdMultiplier('+', 8, -1)).toThrow(InvalidArgumentError);
    });
});
