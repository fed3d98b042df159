/**
 * Market decoder tests
 *
 * Gamma payloads carry list fields either as arrays or as JSON strings;
 * anything malformed must decode to an empty list rather than throw.
 */

import { describe, it, expect, jest } from '@jest/globals';
import {
    decodeMarket,
    decodeMarketList,
    decodePriceArray,
    decodeStringArray,
    extractTokenId,
    mergeMarket,
} from '../polymarket/market-decoder.js';
import { makeMarket } from './helpers.js';

jest.mock('../logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

describe('decodeStringArray', () => {
    it('accepts a JSON-encoded string', () => {
        expect(decodeStringArray('["Yes","No"]')).toEqual(['Yes', 'No']);
    });

    it('accepts a raw array', () => {
        expect(decodeStringArray(['Mumbai Indians', 'Chennai Super Kings'])).toEqual([
            'Mumbai Indians',
            'Chennai Super Kings',
        ]);
    });

    it('returns an empty list for malformed or missing values', () => {
        expect(decodeStringArray('not json')).toEqual([]);
        expect(decodeStringArray('{"a":1}')).toEqual([]);
        expect(decodeStringArray(42)).toEqual([]);
        expect(decodeStringArray(undefined)).toEqual([]);
        expect(decodeStringArray('')).toEqual([]);
    });
});

describe('decodePriceArray', () => {
    it('parses numeric strings', () => {
        expect(decodePriceArray('["0.65","0.35"]')).toEqual([0.65, 0.35]);
    });

    it('keeps numbers as they are', () => {
        expect(decodePriceArray([0.2, 0.8])).toEqual([0.2, 0.8]);
    });

    it('drops the whole list when one entry is not numeric', () => {
        expect(decodePriceArray(['0.5', 'abc'])).toEqual([]);
        expect(decodePriceArray('["0.5", null]')).toEqual([]);
    });
});

describe('decodeMarket', () => {
    it('decodes a full payload', () => {
        const market = decodeMarket({
            id: 531900,
            question: 'Mumbai Indians vs. Chennai Super Kings',
            eventSlug: 'ipl-mi-csk',
            outcomes: '["Mumbai Indians","Chennai Super Kings"]',
            outcomePrices: '["0.65","0.35"]',
            clobTokenIds: '["111","222"]',
            gameStartTime: '2026-04-12 14:00:00+00',
            volume: '1234.5',
            liquidity: 500,
            closed: false,
            active: true,
        });

        expect(market).toEqual({
            id: '531900',
            question: 'Mumbai Indians vs. Chennai Super Kings',
            slug: undefined,
            eventSlug: 'ipl-mi-csk',
            conditionId: undefined,
            clobTokenIds: ['111', '222'],
            outcomes: ['Mumbai Indians', 'Chennai Super Kings'],
            outcomePrices: [0.65, 0.35],
            gameStartTime: '2026-04-12 14:00:00+00',
            startDate: undefined,
            endDate: undefined,
            closed: false,
            active: true,
            volume: 1234.5,
            liquidity: 500,
        });
    });

    it('returns null without an id', () => {
        expect(decodeMarket({ question: 'No id here' })).toBeNull();
        expect(decodeMarket({ id: '' })).toBeNull();
    });

    it('fills defaults for missing fields', () => {
        const market = decodeMarket({ id: '7', outcomes: 'garbage' });
        expect(market?.question).toBe('N/A');
        expect(market?.outcomes).toEqual([]);
        expect(market?.outcomePrices).toEqual([]);
        expect(market?.closed).toBe(false);
        expect(market?.active).toBe(false);
        expect(market?.volume).toBeUndefined();
    });

    it('splits comma-separated token ids', () => {
        expect(decodeMarket({ id: '8', clobTokenIds: '111, 222' })?.clobTokenIds).toEqual(['111', '222']);
    });
});

describe('decodeMarketList', () => {
    it('skips entries that are not objects or have no id', () => {
        const markets = decodeMarketList([{ id: '1' }, null, 'x', { question: 'no id' }, [1, 2]]);
        expect(markets.map(m => m.id)).toEqual(['1']);
    });

    it('returns an empty list for a non-array payload', () => {
        expect(decodeMarketList({ id: '1' })).toEqual([]);
    });
});

describe('mergeMarket', () => {
    it('prefers detail fields and falls back to the listing', () => {
        const base = makeMarket({ id: '1', eventSlug: 'ipl-mi-csk', volume: 100 });
        const detail = makeMarket({
            id: '1',
            question: 'N/A',
            outcomes: [],
            outcomePrices: [],
            gameStartTime: '2026-04-12T14:00:00Z',
            closed: true,
        });

        const merged = mergeMarket(base, detail);
        expect(merged.question).toBe('Mumbai Indians vs. Chennai Super Kings');
        expect(merged.outcomes).toEqual(['Mumbai Indians', 'Chennai Super Kings']);
        expect(merged.outcomePrices).toEqual([0.5, 0.5]);
        expect(merged.gameStartTime).toBe('2026-04-12T14:00:00Z');
        expect(merged.eventSlug).toBe('ipl-mi-csk');
        expect(merged.volume).toBe(100);
        expect(merged.closed).toBe(true);
    });
});

describe('extractTokenId', () => {
    it('uses the condition id first', () => {
        expect(extractTokenId(makeMarket({ conditionId: '0xabc', clobTokenIds: ['111'] }))).toBe('0xabc');
    });

    it('falls back to the first CLOB token id', () => {
        expect(extractTokenId(makeMarket({ clobTokenIds: ['111', '222'] }))).toBe('111');
    });

    it('returns null when neither is present', () => {
        expect(extractTokenId(makeMarket())).toBeNull();
    });
});
