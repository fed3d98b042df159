/**
 * Cricket market discovery tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import {
    CricketMarketDiscovery,
    classifyCricket,
    dedupeActive,
    filterByTerm,
    selectMarkets,
    sortByEndDate,
    sortByGameStartDesc,
} from '../cricket/market-discovery.js';
import type { MarketDataSource, MarketRecord } from '../polymarket/types.js';
import { makeMarket } from './helpers.js';

jest.mock('../logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

class FakeMarketSource implements MarketDataSource {
    readonly relatedCalls: Array<{ marketId: string; limit?: number; offset?: number }> = [];

    constructor(
        private readonly related: Record<string, MarketRecord[]> = {},
        private readonly listed: MarketRecord[] = [],
        private readonly details: Record<string, MarketRecord> = {}
    ) {}

    async listMarkets(): Promise<MarketRecord[]> {
        return this.listed;
    }

    async getRelatedMarkets(marketId: string, limit?: number, offset?: number): Promise<MarketRecord[]> {
        this.relatedCalls.push({ marketId, limit, offset });
        return this.related[marketId] ?? [];
    }

    async getMarket(marketId: string): Promise<MarketRecord | null> {
        return this.details[marketId] ?? null;
    }
}

const miCsk = makeMarket({ id: '1', question: 'Mumbai Indians vs. Chennai Super Kings' });
const rcbDc = makeMarket({ id: '2', question: 'Royal Challengers Bengaluru vs. Delhi Capitals' });

describe('classifyCricket', () => {
    it('matches team and competition keywords case-insensitively', () => {
        expect(classifyCricket(makeMarket({ question: 'IPL 2026 Winner?' }))).toBe(true);
        expect(classifyCricket(makeMarket({ question: 'Will Gujarat Titans make the playoffs?' }))).toBe(true);
        expect(classifyCricket(makeMarket({ question: 'Will it rain in London tomorrow?' }))).toBe(false);
    });

    it('looks at the slugs as well as the question', () => {
        expect(classifyCricket(makeMarket({ question: 'Who wins?', eventSlug: 'cricket-final' }))).toBe(true);
    });
});

describe('filterByTerm', () => {
    it('matches a plain substring', () => {
        expect(filterByTerm([miCsk, rcbDc], 'chennai')).toEqual([miCsk]);
    });

    it('matches both teams of an "a vs b" term in either order', () => {
        expect(filterByTerm([miCsk, rcbDc], 'Chennai Super Kings vs Mumbai Indians')).toEqual([miCsk]);
    });

    it('returns nothing when no market matches', () => {
        expect(filterByTerm([miCsk, rcbDc], 'Rajasthan Royals')).toEqual([]);
    });
});

describe('selectMarkets', () => {
    it('returns everything without a term', () => {
        expect(selectMarkets([miCsk, rcbDc])).toEqual({ markets: [miCsk, rcbDc], usedFallback: false });
    });

    it('narrows to matching markets', () => {
        expect(selectMarkets([miCsk, rcbDc], 'delhi')).toEqual({ markets: [rcbDc], usedFallback: false });
    });

    it('falls back to the full set when nothing matches', () => {
        expect(selectMarkets([miCsk, rcbDc], 'zzz')).toEqual({ markets: [miCsk, rcbDc], usedFallback: true });
    });
});

describe('dedupeActive', () => {
    it('keeps the first record per id and drops closed markets', () => {
        const first = makeMarket({ id: '1', question: 'first' });
        const second = makeMarket({ id: '1', question: 'second' });
        const closed = makeMarket({ id: '3', closed: true });

        expect(dedupeActive([first, closed, second, rcbDc])).toEqual([first, rcbDc]);
    });
});

describe('sorting', () => {
    it('sorts by end date ascending with missing dates last', () => {
        const a = makeMarket({ id: 'a', endDate: '2026-05-02T00:00:00Z' });
        const b = makeMarket({ id: 'b' });
        const c = makeMarket({ id: 'c', endDate: '2026-04-30T00:00:00Z' });

        expect(sortByEndDate([a, b, c]).map(m => m.id)).toEqual(['c', 'a', 'b']);
    });

    it('sorts by game start descending with missing or unparsable times last', () => {
        const a = makeMarket({ id: 'a', gameStartTime: '2026-04-10T14:00:00Z' });
        const b = makeMarket({ id: 'b' });
        const c = makeMarket({ id: 'c', gameStartTime: '2026-04-12T14:00:00Z' });
        const d = makeMarket({ id: 'd', gameStartTime: 'soon' });

        expect(sortByGameStartDesc([a, b, c, d]).map(m => m.id)).toEqual(['c', 'a', 'b', 'd']);
    });
});

describe('CricketMarketDiscovery', () => {
    it('combines related and keyword-matched markets, deduplicated in first-seen order', async () => {
        const closed = makeMarket({ id: '3', question: 'Kolkata Knight Riders vs. Punjab Kings', closed: true });
        const ipl = makeMarket({ id: '5', question: 'IPL 2026 Winner?' });
        const weather = makeMarket({ id: '4', question: 'Will it rain in London tomorrow?' });
        const source = new FakeMarketSource(
            { r1: [miCsk, rcbDc], r2: [miCsk, closed] },
            [weather, ipl, rcbDc]
        );

        const discovery = new CricketMarketDiscovery(source, ['r1', 'r2']);
        const markets = await discovery.discoverMarkets();

        expect(markets.map(m => m.id)).toEqual(['1', '2', '5']);
        expect(source.relatedCalls).toEqual([
            { marketId: 'r1', limit: 50, offset: 0 },
            { marketId: 'r2', limit: 50, offset: 0 },
        ]);
    });

    it('keeps one entry for a market returned by several lookups', async () => {
        const shared = makeMarket({ id: '531894', question: 'Sunrisers Hyderabad vs. Gujarat Titans' });
        const source = new FakeMarketSource({ r1: [shared], r2: [shared] }, [shared]);
        const discovery = new CricketMarketDiscovery(source, ['r1', 'r2']);

        const first = await discovery.discoverMarkets();
        const second = await discovery.discoverMarkets();

        expect(first.map(m => m.id)).toEqual(['531894']);
        expect(second.map(m => m.id)).toEqual(first.map(m => m.id));
    });

    it('returns an empty list when the API has nothing', async () => {
        const discovery = new CricketMarketDiscovery(new FakeMarketSource(), ['r1']);
        await expect(discovery.discoverMarkets()).resolves.toEqual([]);
    });

    it('puts upcoming markets first and drops ones already started', async () => {
        const now = new Date('2026-04-11T00:00:00Z');
        const upcoming = makeMarket({ id: 'up' });
        const noDetail = makeMarket({ id: 'missing' });
        const started = makeMarket({ id: 'started' });
        const noStart = makeMarket({ id: 'nostart' });

        const source = new FakeMarketSource({}, [], {
            up: makeMarket({ id: 'up', gameStartTime: '2026-04-12T14:00:00Z', outcomePrices: [0.7, 0.3] }),
            started: makeMarket({ id: 'started', gameStartTime: '2026-04-10T14:00:00Z' }),
            nostart: makeMarket({ id: 'nostart' }),
        });

        const discovery = new CricketMarketDiscovery(source, []);
        const enriched = await discovery.enrichWithDetails([noStart, started, noDetail, upcoming], now);

        expect(enriched.map(m => m.id)).toEqual(['up', 'nostart', 'missing']);
        expect(enriched[0].gameStartTime).toBe('2026-04-12T14:00:00Z');
        expect(enriched[0].outcomePrices).toEqual([0.7, 0.3]);
        expect(enriched[2]).toBe(noDetail);
    });
});
