/**
 * Bookmaker page scraper
 * Reads match odds from a bookmaker's event listing markup
 */

import * as cheerio from 'cheerio';
import { logger } from '../../logger.js';
import { createHttpClient, describeHttpError, HttpClient } from '../../http-client.js';
import { detectOddsFormat } from '../odds-converter.js';
import type { MatchFixture, OddsQuote, QuoteSource } from '../types.js';

export interface BookmakerSite {
    name: string;
    url: string;
}

export const DEFAULT_BOOKMAKER: BookmakerSite = {
    name: 'Bet365',
    url: 'https://www.bet365.com/#/AC/B13/C1/D50/E2/F163/',
};

const BROWSER_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
    'Accept-Language': 'en-US,en;q=0.9',
    'Accept': 'text/html',
};

/**
 * Find the fixture's first two odds in `.event-item` blocks
 */
export function parseEventOdds(html: string, match: MatchFixture, source: string): OddsQuote | null {
    const $ = cheerio.load(html);
    let quote: OddsQuote | null = null;

    $('.event-item').each((_, element) => {
        const title = $(element).find('.event-name').first().text().trim();
        if (!title.includes(match.teamA) || !title.includes(match.teamB)) return;

        const odds = $(element).find('.odds').map((__, el) => $(el).text().trim()).get();
        if (odds.length < 2) return;

        const teamAFormat = detectOddsFormat(odds[0]);
        const teamBFormat = detectOddsFormat(odds[1]);
        if (!teamAFormat || !teamBFormat) {
            logger.debug(`Unrecognised odds on ${source}`, { odds: odds.slice(0, 2) });
            return;
        }

        quote = {
            source,
            teamA: match.teamA,
            teamAOdds: odds[0],
            teamAFormat,
            teamB: match.teamB,
            teamBOdds: odds[1],
            teamBFormat,
            synthetic: false,
        };
        return false;
    });

    return quote;
}

export class BookmakerScraper implements QuoteSource {
    readonly name: string;
    private readonly site: BookmakerSite;
    private client: HttpClient;

    constructor(site: BookmakerSite = DEFAULT_BOOKMAKER, client?: HttpClient) {
        this.site = site;
        this.name = site.name;
        this.client = client ?? createHttpClient();
    }

    async fetchQuotes(match: MatchFixture): Promise<OddsQuote[]> {
        try {
            const response = await this.client.get(this.site.url, { headers: BROWSER_HEADERS });
            if (typeof response.data !== 'string') {
                logger.warn(`Unexpected response body from ${this.site.name}`);
                return [];
            }

            const quote = parseEventOdds(response.data, match, this.site.name);
            if (!quote) {
                logger.info(`No odds for ${match.teamA} vs ${match.teamB} on ${this.site.name}`);
                return [];
            }
            return [quote];
        } catch (error) {
            logger.warn(`Failed to access ${this.site.name}: ${describeHttpError(error)}`);
            return [];
        }
    }
}
