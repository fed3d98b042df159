/**
 * Odds format conversion
 */

import type { OddsFormat } from './types.js';

export class OddsParseError extends Error {
    constructor(public readonly raw: string, public readonly format: OddsFormat, reason: string) {
        super(`Cannot parse ${format} odds "${raw}": ${reason}`);
        this.name = 'OddsParseError';
    }
}

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;
const FRACTIONAL_PATTERN = /^(\d+)\/(\d+)$/;
const AMERICAN_PATTERN = /^([+-])(\d+)$/;

/**
 * Guess the format of scraped odds text
 */
export function detectOddsFormat(raw: string): OddsFormat | null {
    const text = raw.trim();
    if (FRACTIONAL_PATTERN.test(text)) return 'fractional';
    if (AMERICAN_PATTERN.test(text)) return 'american';
    if (DECIMAL_PATTERN.test(text)) return 'decimal';
    return null;
}

/**
 * Convert odds in the declared format to decimal odds.
 * An unknown format gives null; text that does not fit a known format throws OddsParseError.
 */
export function toDecimal(raw: string, format: string): number | null {
    const text = raw.trim();

    switch (format) {
        case 'decimal': {
            if (!DECIMAL_PATTERN.test(text)) {
                throw new OddsParseError(raw, 'decimal', 'expected a positive decimal number');
            }
            return parseFloat(text);
        }
        case 'fractional': {
            const match = FRACTIONAL_PATTERN.exec(text);
            if (!match) {
                throw new OddsParseError(raw, 'fractional', 'expected "numerator/denominator"');
            }
            const numerator = parseInt(match[1], 10);
            const denominator = parseInt(match[2], 10);
            if (denominator === 0) {
                throw new OddsParseError(raw, 'fractional', 'denominator is zero');
            }
            return 1 + numerator / denominator;
        }
        case 'american': {
            const match = AMERICAN_PATTERN.exec(text);
            if (!match) {
                throw new OddsParseError(raw, 'american', 'expected a signed integer such as +150 or -200');
            }
            const value = parseInt(match[2], 10);
            if (match[1] === '+') {
                return 1 + value / 100;
            }
            if (value === 0) {
                throw new OddsParseError(raw, 'american', 'negative odds cannot be zero');
            }
            return 1 + 100 / value;
        }
        default:
            return null;
    }
}

/**
 * 1 / decimal odds; null when the odds cannot express a probability
 */
export function impliedProbability(decimalOdds: number | null): number | null {
    if (decimalOdds === null || !(decimalOdds > 1.0)) return null;
    return 1 / decimalOdds;
}
