/**
 * The Odds API client
 * Head-to-head bookmaker prices for IPL fixtures
 */

import { config } from '../../config.js';
import { logger } from '../../logger.js';
import { createHttpClient, describeHttpError, HttpClient } from '../../http-client.js';
import { asArray, asOddsText, asRecord, asString } from '../payload.js';
import { normalizeTeamName } from '../team-names.js';
import type { MatchFixture, OddsQuote, QuoteSource } from '../types.js';

const SPORT_KEY = 'cricket_ipl';
const REGIONS = 'us,uk,eu,au';

export class OddsApiClient implements QuoteSource {
    readonly name = 'The Odds API';
    private client: HttpClient;
    private readonly apiKey: string;

    constructor(apiKey: string = config.oddsApiKey, client?: HttpClient) {
        this.apiKey = apiKey;
        this.client = client ?? createHttpClient(config.oddsApiHost);
    }

    async fetchQuotes(match: MatchFixture): Promise<OddsQuote[]> {
        if (!this.apiKey) {
            logger.warn('ODDS_API_KEY not set; skipping odds API');
            return [];
        }

        try {
            const response = await this.client.get(`/v4/sports/${SPORT_KEY}/odds/`, {
                params: {
                    apiKey: this.apiKey,
                    regions: REGIONS,
                    markets: 'h2h',
                },
            });
            const quotes = extractQuotes(response.data, match);
            logger.info(`Odds API returned ${quotes.length} quote(s) for ${match.teamA} vs ${match.teamB}`);
            return quotes;
        } catch (error) {
            logger.error(`Error fetching from odds API: ${describeHttpError(error)}`);
            return [];
        }
    }
}

/**
 * Pull one decimal quote per bookmaker h2h market for the fixture, in either home/away order
 * and on the fixture's UTC date
 */
export function extractQuotes(data: unknown, match: MatchFixture): OddsQuote[] {
    const teamA = normalizeTeamName(match.teamA);
    const teamB = normalizeTeamName(match.teamB);
    const quotes: OddsQuote[] = [];

    for (const rawEvent of asArray(data)) {
        const event = asRecord(rawEvent);
        const home = normalizeTeamName(asString(event.home_team));
        const away = normalizeTeamName(asString(event.away_team));
        const isFixture = (home === teamA && away === teamB) || (home === teamB && away === teamA);
        if (!isFixture) continue;

        const commenceTime = asString(event.commence_time);
        if (commenceTime.slice(0, 10) !== match.date) continue;

        for (const rawBookmaker of asArray(event.bookmakers)) {
            const bookmaker = asRecord(rawBookmaker);
            const source = asString(bookmaker.title, asString(bookmaker.key, 'Unknown bookmaker'));

            for (const rawMarket of asArray(bookmaker.markets)) {
                const market = asRecord(rawMarket);
                if (market.key !== 'h2h') continue;

                let teamAOdds: string | null = null;
                let teamBOdds: string | null = null;
                for (const rawOutcome of asArray(market.outcomes)) {
                    const outcome = asRecord(rawOutcome);
                    const team = normalizeTeamName(asString(outcome.name));
                    if (team === teamA) {
                        teamAOdds = asOddsText(outcome.price);
                    } else if (team === teamB) {
                        teamBOdds = asOddsText(outcome.price);
                    }
                }

                if (teamAOdds && teamBOdds) {
                    quotes.push({
                        source,
                        teamA: match.teamA,
                        teamAOdds,
                        teamAFormat: 'decimal',
                        teamB: match.teamB,
                        teamBOdds,
                        teamBFormat: 'decimal',
                        synthetic: false,
                    });
                }
            }
        }
    }

    return quotes;
}
