/**
 * Match list file
 * One fixture per line: "<Team A> vs. <Team B> YYYY.MM.DD"
 */

import fs from 'fs';
import { logger, errorMeta } from '../logger.js';
import type { MatchFixture } from './types.js';

/**
 * Parse one line; null when it does not describe a fixture
 */
export function parseMatchLine(line: string): MatchFixture | null {
    const text = line.trim();
    const lastSpace = text.lastIndexOf(' ');
    if (lastSpace === -1) return null;

    const teams = text.slice(0, lastSpace).trim();
    const date = text.slice(lastSpace + 1).trim().replace(/\./g, '-');
    const parts = teams.split(' vs. ');
    if (parts.length !== 2) return null;

    const [teamA, teamB] = parts.map(part => part.trim());
    if (!teamA || !teamB || !/^\d{4}-\d{2}-\d{2}$/.test(date)) return null;

    return { teamA, teamB, date };
}

export function parseMatches(content: string): MatchFixture[] {
    const matches: MatchFixture[] = [];

    for (const line of content.split(/\r?\n/)) {
        if (line.trim() === '') continue;
        const match = parseMatchLine(line);
        if (match) {
            matches.push(match);
        } else {
            logger.warn(`Invalid match format: ${line.trim()}`);
        }
    }

    return matches;
}

/**
 * Read fixtures from disk; null when the file cannot be read
 */
export function readMatchesFile(filePath: string): MatchFixture[] | null {
    try {
        const content = fs.readFileSync(filePath, 'utf-8');
        return parseMatches(content);
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            logger.error(`The file ${filePath} was not found.`);
        } else {
            logger.error(`Error reading matches from file ${filePath}`, errorMeta(error));
        }
        return null;
    }
}

/**
 * Pick a fixture by its 1-based position in the file
 */
export function selectMatch(matches: readonly MatchFixture[], matchNumber: number): MatchFixture | null {
    const index = matchNumber - 1;
    if (!Number.isInteger(matchNumber) || index < 0 || index >= matches.length) return null;
    return matches[index];
}
