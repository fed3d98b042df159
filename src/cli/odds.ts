#!/usr/bin/env node
/**
 * IPL Odds Analyzer
 * Predicts the winner of a fixture from the matches file by averaging bookmaker odds.
 *
 * Usage: node dist/cli/odds.js <match number>
 */

import path from 'path';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { readMatchesFile, selectMatch } from '../odds/match-file.js';
import { OddsAnalyzer } from '../odds/odds-analyzer.js';
import { BookmakerScraper } from '../odds/sources/bookmaker-scraper.js';
import { OddsApiClient } from '../odds/sources/odds-api-client.js';
import { formatPrediction } from '../reporting/prediction-report.js';
import { parseMatchNumber } from './args.js';
import { runMain } from './runtime.js';

async function main(): Promise<number> {
    const matches = readMatchesFile(path.resolve(process.cwd(), config.matchesFile));
    if (!matches || matches.length === 0) {
        console.log('No matches found. Please check the matches file.');
        return 1;
    }

    const arg = parseMatchNumber(process.argv.slice(2));
    if (!arg.ok) {
        if (arg.reason === 'missing') {
            console.log('Please provide the match number as a command line argument.');
            console.log('For example: ipl-odds 1');
        } else {
            console.log('Invalid match number. Please provide an integer.');
        }
        return 1;
    }

    const match = selectMatch(matches, arg.matchNumber);
    if (!match) {
        console.log(`Invalid match number. Please provide a number between 1 and ${matches.length}.`);
        return 1;
    }

    const analyzer = new OddsAnalyzer([new BookmakerScraper(), new OddsApiClient()]);
    const prediction = await analyzer.run(match);
    if (!prediction) {
        logger.warn(`Could not produce a prediction for ${match.teamA} vs ${match.teamB}`);
        return 1;
    }

    console.log(formatPrediction(prediction));
    return 0;
}

runMain('IPL Odds Analyzer', main);
