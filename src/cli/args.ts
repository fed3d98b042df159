/**
 * Command-line argument parsing for the entry points
 */

export interface SearchArgs {
    searchTerm?: string;
}

/**
 * `--search "<term>"` or `--search=<term>`; anything else is ignored
 */
export function parseSearchArgs(argv: readonly string[]): SearchArgs {
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--search') {
            const term = argv[i + 1]?.trim();
            return term ? { searchTerm: term } : {};
        }
        if (arg.startsWith('--search=')) {
            const term = arg.slice('--search='.length).trim();
            return term ? { searchTerm: term } : {};
        }
    }
    return {};
}

export type MatchNumberArg =
    | { ok: true; matchNumber: number }
    | { ok: false; reason: 'missing' | 'not-an-integer' };

/**
 * First positional argument as a 1-based match number
 */
export function parseMatchNumber(argv: readonly string[]): MatchNumberArg {
    const raw = argv[0];
    if (raw === undefined || raw.trim() === '') {
        return { ok: false, reason: 'missing' };
    }
    if (!/^-?\d+$/.test(raw.trim())) {
        return { ok: false, reason: 'not-an-integer' };
    }
    return { ok: true, matchNumber: parseInt(raw, 10) };
}

/**
 * Menu input: 0 exits, 1..count selects, anything else is invalid
 */
export type MenuChoice =
    | { kind: 'exit' }
    | { kind: 'select'; index: number }
    | { kind: 'invalid'; message: string };

export function parseMenuChoice(input: string, count: number): MenuChoice {
    const text = input.trim();
    if (text === '0') return { kind: 'exit' };
    if (!/^-?\d+$/.test(text)) {
        return { kind: 'invalid', message: 'Invalid input. Please enter a number.' };
    }
    const index = parseInt(text, 10) - 1;
    if (index < 0 || index >= count) {
        return { kind: 'invalid', message: 'Invalid selection.' };
    }
    return { kind: 'select', index };
}
