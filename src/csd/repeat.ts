/**
 * RepeatFinder: longest repeated non-overlapping substring.
 *
 * Dynamic programming over a flat (n+1) x (n+1) table where cell (i, j), i < j,
 * holds the length of the common suffix of s[0..i) and s[0..j), reset to zero
 * once the suffix would reach past the start of the later occurrence.
 * Among equal lengths the match ending at the larger i wins.
 *
 * O(n^2) time and memory. CSD strings are bounded by the hardware word width,
 * so n stays small.
 */
import type { RepeatMatch } from '../csd-types.js';

export class RepeatFinder {

    static find(s: string): RepeatMatch | null {
        const n = s.length;
        const width = n + 1;
        const table = new Uint32Array(width * width);

        let bestLength = 0;
        let bestEnd = 0;
        let bestLaterEnd = 0;

        for (let i = 1; i <= n; i++) {
            for (let j = i + 1; j <= n; j++) {
                const diag = table[(i - 1) * width + (j - 1)];
                if (s[i - 1] === s[j - 1] && diag < j - i) {
                    const length = diag + 1;
                    table[i * width + j] = length;
                    if (length >= bestLength) {
                        bestLength = length;
                        bestEnd = i;
                        bestLaterEnd = j;
                    }
                }
            }
        }

        if (bestLength === 0) return null;
        return {
            substring: s.slice(bestEnd - bestLength, bestEnd),
            length: bestLength,
            first: bestEnd - bestLength,
            second: bestLaterEnd - bestLength,
        };
    }

    /**
     * @example
     * RepeatFinder.longestRepeatedSubstring('+-00+-00+-00+-0'); // '+-00+-0'
     */
    static longestRepeatedSubstring(s: string): string {
        return RepeatFinder.find(s)?.substring ?? '';
    }
}
