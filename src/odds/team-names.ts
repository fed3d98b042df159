/**
 * IPL team name normalization
 */

import teamAliases from '../data/ipl-teams.json';

const ALIAS_TO_TEAM = new Map<string, string>();
for (const [fullName, aliases] of Object.entries(teamAliases)) {
    ALIAS_TO_TEAM.set(fullName.toLowerCase(), fullName);
    for (const alias of aliases) {
        ALIAS_TO_TEAM.set(alias.toLowerCase(), fullName);
    }
}

/**
 * Map a bookmaker's spelling of a team to its full name; unknown names pass through trimmed
 */
export function normalizeTeamName(name: string): string {
    const trimmed = name.trim();
    return ALIAS_TO_TEAM.get(trimmed.toLowerCase()) ?? trimmed;
}

