import type { MatchPrediction } from '../odds/types.js';

const RULE = '='.repeat(50);

export function formatPrediction(result: MatchPrediction): string {
    const lines: string[] = [
        '',
        RULE,
        `MATCH ANALYSIS: ${result.match} on ${result.date}`,
        RULE,
    ];

    if (result.synthetic) {
        lines.push('', 'WARNING: SAMPLE DATA. No bookmaker odds could be collected; figures below are not real.');
    }

    lines.push('', `Platforms analyzed: ${result.platformsAnalyzed}`, '', 'Odds Summary:');
    for (const quote of result.detailedOdds) {
        lines.push(`  ${quote.source}: ${quote.teamA} @ ${quote.teamAOdds} vs ${quote.teamB} @ ${quote.teamBOdds}`);
    }

    lines.push(
        '',
        'Implied Win Probabilities:',
        `  ${result.teamA}: ${result.teamAWinPct}%`,
        `  ${result.teamB}: ${result.teamBWinPct}%`,
        ''
    );

    const winnerIsA = result.predictedWinner === result.teamA;
    const opponent = winnerIsA ? result.teamB : result.teamA;
    const opponentPct = winnerIsA ? result.teamBWinPct : result.teamAWinPct;
    lines.push(
        'PREDICTION:',
        `Based on the analysis of betting odds, ${result.predictedWinner} has a ${result.winProbability}% chance of winning, ` +
        `while ${opponent} has a ${opponentPct}% chance.`
    );

    return lines.join('\n');
}
