/**
 * Odds Analyzer
 * Averages implied probabilities across bookmakers into a win prediction
 */

import { logger, errorMeta } from '../logger.js';
import { impliedProbability, OddsParseError, toDecimal } from './odds-converter.js';
import type { MatchFixture, MatchPrediction, OddsQuote, QuoteAnalysis, QuoteSource } from './types.js';

export interface QuoteCollection {
    quotes: OddsQuote[];
    synthetic: boolean;
}

/**
 * Fixed stand-in quotes used only when no source produced anything
 */
export function sampleQuotes(match: MatchFixture): OddsQuote[] {
    const base = { teamA: match.teamA, teamB: match.teamB, synthetic: true };
    return [
        { ...base, source: 'Sample Bookmaker 1', teamAOdds: '1.90', teamAFormat: 'decimal', teamBOdds: '2.10', teamBFormat: 'decimal' },
        { ...base, source: 'Sample Bookmaker 2', teamAOdds: '4/5', teamAFormat: 'fractional', teamBOdds: '11/10', teamBFormat: 'fractional' },
        { ...base, source: 'Sample Bookmaker 3', teamAOdds: '1.85', teamAFormat: 'decimal', teamBOdds: '2.05', teamBFormat: 'decimal' },
    ];
}

function safeDecimal(raw: string, format: string, source: string): number | null {
    try {
        return toDecimal(raw, format);
    } catch (error) {
        if (error instanceof OddsParseError) {
            logger.warn(`Skipping odds from ${source}: ${error.message}`);
            return null;
        }
        throw error;
    }
}

export function analyzeQuote(quote: OddsQuote): QuoteAnalysis {
    const teamADecimalOdds = safeDecimal(quote.teamAOdds, quote.teamAFormat, quote.source);
    const teamBDecimalOdds = safeDecimal(quote.teamBOdds, quote.teamBFormat, quote.source);
    return {
        ...quote,
        teamADecimalOdds,
        teamBDecimalOdds,
        teamAImpliedProbability: impliedProbability(teamADecimalOdds),
        teamBImpliedProbability: impliedProbability(teamBDecimalOdds),
    };
}

function mean(values: readonly (number | null)[]): number | null {
    const present = values.filter((value): value is number => value !== null);
    if (present.length === 0) return null;
    return present.reduce((sum, value) => sum + value, 0) / present.length;
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

/**
 * Prediction from a set of quotes; null when there are no quotes or no usable probability
 */
export function analyzeOdds(match: MatchFixture, quotes: readonly OddsQuote[]): MatchPrediction | null {
    if (quotes.length === 0) {
        logger.warn('No odds data available for analysis');
        return null;
    }

    const detailedOdds = quotes.map(analyzeQuote);
    const avgA = mean(detailedOdds.map(q => q.teamAImpliedProbability));
    const avgB = mean(detailedOdds.map(q => q.teamBImpliedProbability));
    if (avgA === null || avgB === null) {
        logger.warn('No usable implied probabilities in collected odds');
        return null;
    }

    const pctA = avgA * 100;
    const pctB = avgB * 100;
    const teamAWins = avgA > avgB;

    return {
        match: `${match.teamA} vs ${match.teamB}`,
        date: match.date,
        platformsAnalyzed: detailedOdds.length,
        teamA: match.teamA,
        teamAWinPct: round2(pctA),
        teamB: match.teamB,
        teamBWinPct: round2(pctB),
        predictedWinner: teamAWins ? match.teamA : match.teamB,
        winProbability: round2(teamAWins ? pctA : pctB),
        synthetic: quotes.some(q => q.synthetic),
        detailedOdds,
    };
}

export class OddsAnalyzer {
    private readonly sources: QuoteSource[];

    constructor(sources: QuoteSource[]) {
        this.sources = sources;
    }

    /**
     * Query each source in turn; fall back to the sample quotes only when all come back empty
     */
    async collectQuotes(match: MatchFixture): Promise<QuoteCollection> {
        logger.info(`Analyzing odds for ${match.teamA} vs ${match.teamB} on ${match.date}`);
        const quotes: OddsQuote[] = [];

        for (const source of this.sources) {
            try {
                const fetched = await source.fetchQuotes(match);
                quotes.push(...fetched.filter(quote => !quote.synthetic));
            } catch (error) {
                logger.error(`Quote source ${source.name} failed`, errorMeta(error));
            }
        }

        if (quotes.length === 0) {
            logger.warn('Using sample data as no odds could be collected');
            return { quotes: sampleQuotes(match), synthetic: true };
        }

        return { quotes, synthetic: false };
    }

    async run(match: MatchFixture): Promise<MatchPrediction | null> {
        const collection = await this.collectQuotes(match);
        return analyzeOdds(match, collection.quotes);
    }
}
