import { describe, it, expect } from '@jest/globals';
import { formatPrediction } from '../reporting/prediction-report.js';
import type { MatchPrediction } from '../odds/types.js';

const prediction: MatchPrediction = {
    match: 'Mumbai Indians vs Chennai Super Kings',
    date: '2026-04-12',
    platformsAnalyzed: 1,
    teamA: 'Mumbai Indians',
    teamAWinPct: 60,
    teamB: 'Chennai Super Kings',
    teamBWinPct: 43.48,
    predictedWinner: 'Mumbai Indians',
    winProbability: 60,
    synthetic: false,
    detailedOdds: [
        {
            source: 'Bookie One',
            teamA: 'Mumbai Indians',
            teamAOdds: '-150',
            teamAFormat: 'american',
            teamB: 'Chennai Super Kings',
            teamBOdds: '+130',
            teamBFormat: 'american',
            synthetic: false,
            teamADecimalOdds: 1.6667,
            teamBDecimalOdds: 2.3,
            teamAImpliedProbability: 0.6,
            teamBImpliedProbability: 0.4348,
        },
    ],
};

describe('formatPrediction', () => {
    it('renders the odds summary and the predicted winner', () => {
        expect(formatPrediction(prediction)).toBe(
            [
                '',
                '='.repeat(50),
                'MATCH ANALYSIS: Mumbai Indians vs Chennai Super Kings on 2026-04-12',
                '='.repeat(50),
                '',
                'Platforms analyzed: 1',
                '',
                'Odds Summary:',
                '  Bookie One: Mumbai Indians @ -150 vs Chennai Super Kings @ +130',
                '',
                'Implied Win Probabilities:',
                '  Mumbai Indians: 60%',
                '  Chennai Super Kings: 43.48%',
                '',
                'PREDICTION:',
                'Based on the analysis of betting odds, Mumbai Indians has a 60% chance of winning, ' +
                    'while Chennai Super Kings has a 43.48% chance.',
            ].join('\n')
        );
    });

    it('flags sample data', () => {
        const lines = formatPrediction({ ...prediction, synthetic: true }).split('\n');
        expect(lines[5]).toBe('WARNING: SAMPLE DATA. No bookmaker odds could be collected; figures below are not real.');
    });
});
