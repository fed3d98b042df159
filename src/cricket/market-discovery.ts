/**
 * Cricket Market Discovery
 * Identifies cricket-related markets on Polymarket and narrows them by search term
 */

import { config } from '../config.js';
import { logger } from '../logger.js';
import { mergeMarket } from '../polymarket/market-decoder.js';
import type { MarketDataSource, MarketRecord } from '../polymarket/types.js';

// Team nicknames and competition words that mark a market as cricket
export const CRICKET_KEYWORDS = [
    'vs', 'knight riders', 'super kings', 'capitals',
    'indians', 'royals', 'sunrisers', 'kings', 'titans',
    'super giants', 'ipl', 'cricket', 't20',
];

const RELATED_MARKETS_LIMIT = 50;
const DIRECT_SEARCH_LIMIT = 100;

export interface MarketSelection {
    markets: MarketRecord[];
    usedFallback: boolean;
}

function searchableText(market: MarketRecord): string {
    return [market.question, market.slug ?? '', market.eventSlug ?? ''].join(' ').toLowerCase();
}

export function classifyCricket(market: MarketRecord): boolean {
    const text = searchableText(market);
    return CRICKET_KEYWORDS.some(keyword => text.includes(keyword));
}

/**
 * Markets whose text contains the term, or both sides of an "a vs b" term in either order
 */
export function filterByTerm(markets: readonly MarketRecord[], term: string): MarketRecord[] {
    const lowerTerm = term.toLowerCase();
    let teams: [string, string] | null = null;
    if (lowerTerm.includes(' vs ')) {
        const [first, second] = lowerTerm.split(' vs ');
        teams = [first.trim(), second.trim()];
    }

    return markets.filter(market => {
        const text = searchableText(market);
        if (text.includes(lowerTerm)) return true;
        return teams !== null && text.includes(teams[0]) && text.includes(teams[1]);
    });
}

/**
 * Apply a search term, falling back to the whole set when nothing matches
 */
export function selectMarkets(markets: MarketRecord[], term?: string): MarketSelection {
    if (!term) {
        return { markets, usedFallback: false };
    }

    const matching = filterByTerm(markets, term);
    if (matching.length === 0) {
        logger.warn(`No markets found matching search term: '${term}'`);
        logger.info('Showing all available cricket markets instead.');
        return { markets, usedFallback: true };
    }

    return { markets: matching, usedFallback: false };
}

/**
 * Keep the first record per id and drop closed markets
 */
export function dedupeActive(markets: readonly MarketRecord[]): MarketRecord[] {
    const seen = new Set<string>();
    const unique: MarketRecord[] = [];

    for (const market of markets) {
        if (seen.has(market.id)) continue;
        seen.add(market.id);
        if (market.closed) continue;
        unique.push(market);
    }

    return unique;
}

function parseTime(value: string | undefined): number | null {
    if (!value) return null;
    const time = Date.parse(value);
    return isNaN(time) ? null : time;
}

/**
 * Ascending by end date; markets without one go last
 */
export function sortByEndDate(markets: readonly MarketRecord[]): MarketRecord[] {
    return [...markets].sort((a, b) => (a.endDate ?? '9999-12-31').localeCompare(b.endDate ?? '9999-12-31'));
}

/**
 * Latest game start first; missing or unparsable start times go last
 */
export function sortByGameStartDesc(markets: readonly MarketRecord[]): MarketRecord[] {
    return [...markets].sort((a, b) => {
        const timeA = parseTime(a.gameStartTime);
        const timeB = parseTime(b.gameStartTime);
        if (timeA === null && timeB === null) return 0;
        if (timeA === null) return 1;
        if (timeB === null) return -1;
        return timeB - timeA;
    });
}

export class CricketMarketDiscovery {
    private source: MarketDataSource;
    private referenceIds: string[];

    constructor(source: MarketDataSource, referenceIds: string[] = config.referenceMarketIds) {
        this.source = source;
        this.referenceIds = referenceIds;
    }

    /**
     * Related markets of the reference ids plus keyword-matched markets from the listing,
     * deduplicated by id in first-seen order, closed markets removed
     */
    async discoverMarkets(): Promise<MarketRecord[]> {
        logger.info('Searching for cricket markets via Gamma API...');
        const collected: MarketRecord[] = [];

        for (const marketId of this.referenceIds) {
            const related = await this.source.getRelatedMarkets(marketId, RELATED_MARKETS_LIMIT, 0);
            if (related.length > 0) {
                logger.info(`Found ${related.length} cricket markets related to ID ${marketId}`);
            }
            collected.push(...related);
        }

        logger.info('Trying direct search for cricket markets via Gamma API...');
        const listed = await this.source.listMarkets(DIRECT_SEARCH_LIMIT);
        logger.debug(`Found ${listed.length} total markets in direct search`);
        const cricketMarkets = listed.filter(classifyCricket);
        logger.info(`Found ${cricketMarkets.length} potential cricket markets through direct search.`);
        collected.push(...cricketMarkets);

        logger.debug(`Total markets found before filtering: ${collected.length}`);
        const unique = dedupeActive(collected);
        logger.debug(`Unique active markets after filtering: ${unique.length}`);
        return unique;
    }

    /**
     * Overlay each market's detail record and put markets starting at or after `now` first.
     * Markets without a parsable start time, or whose detail fetch failed, follow in their original order.
     * Markets whose game already started are dropped.
     */
    async enrichWithDetails(markets: readonly MarketRecord[], now: Date = new Date()): Promise<MarketRecord[]> {
        const upcoming: MarketRecord[] = [];
        const others: MarketRecord[] = [];

        for (const market of markets) {
            const detail = await this.source.getMarket(market.id);
            if (!detail) {
                others.push(market);
                continue;
            }

            const merged = mergeMarket(market, detail);
            const startTime = parseTime(merged.gameStartTime);
            if (startTime === null) {
                if (merged.gameStartTime) {
                    logger.debug(`Could not parse gameStartTime: ${merged.gameStartTime}`);
                }
                others.push(merged);
            } else if (startTime >= now.getTime()) {
                upcoming.push(merged);
            } else {
                logger.debug(`Match for market ${merged.id} started at ${merged.gameStartTime}, skipping`);
            }
        }

        logger.debug(`Markets with upcoming start: ${upcoming.length}`);
        return [...upcoming, ...others];
    }
}
