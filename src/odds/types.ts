/**
 * Types for bookmaker odds analysis
 */

export type OddsFormat = 'decimal' | 'fractional' | 'american';

export interface MatchFixture {
    teamA: string;
    teamB: string;
    date: string; // YYYY-MM-DD
}

/**
 * One bookmaker's quote for a two-way match
 */
export interface OddsQuote {
    source: string;
    teamA: string;
    teamAOdds: string;
    teamAFormat: OddsFormat;
    teamB: string;
    teamBOdds: string;
    teamBFormat: OddsFormat;
    synthetic: boolean;
}

export interface QuoteAnalysis extends OddsQuote {
    teamADecimalOdds: number | null;
    teamBDecimalOdds: number | null;
    teamAImpliedProbability: number | null;
    teamBImpliedProbability: number | null;
}

export interface MatchPrediction {
    match: string;
    date: string;
    platformsAnalyzed: number;
    teamA: string;
    teamAWinPct: number;
    teamB: string;
    teamBWinPct: number;
    predictedWinner: string;
    winProbability: number;
    synthetic: boolean;
    detailedOdds: QuoteAnalysis[];
}

/**
 * Anything that can supply quotes for a fixture
 */
export interface QuoteSource {
    readonly name: string;
    fetchQuotes(match: MatchFixture): Promise<OddsQuote[]>;
}
