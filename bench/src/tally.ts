import type { GameResult } from '@opener-lab/engine';
import type { Starter, StarterSummary, StarterTally } from './protocol.js';
import { solvedTurns } from './protocol.js';

// ============================================================================
// Tally Operations
// ============================================================================

/** Create an empty tally for a starter */
export function createTally(starter: Starter): StarterTally {
    return {
        starter,
        tries: [0, 0, 0, 0, 0, 0],
        failed: 0,
        contradictions: 0,
    };
}

/** Count one finished game into a tally */
export function recordGame(tally: StarterTally, result: GameResult): void {
    const turns = solvedTurns(result.outcome);
    if (turns !== null && turns >= 1 && turns <= tally.tries.length) {
        tally.tries[turns - 1]++;
        return;
    }

    tally.failed++;
    if (result.outcome.kind === 'failed' && result.outcome.reason === 'contradiction') {
        tally.contradictions++;
    }
}

/** Fold two tallies of the same starter into a new one */
export function mergeTallies(a: StarterTally, b: StarterTally): StarterTally {
    if (a.starter !== b.starter) {
        throw new Error(`Cannot merge tallies of different starters: ${a.starter} and ${b.starter}`);
    }
    return {
        starter: a.starter,
        tries: [
            a.tries[0] + b.tries[0],
            a.tries[1] + b.tries[1],
            a.tries[2] + b.tries[2],
            a.tries[3] + b.tries[3],
            a.tries[4] + b.tries[4],
            a.tries[5] + b.tries[5],
        ],
        failed: a.failed + b.failed,
        contradictions: a.contradictions + b.contradictions,
    };
}

// ============================================================================
// Summaries
// ============================================================================

/** Convert a tally to its result row */
export function summarizeTally(tally: StarterTally): StarterSummary {
    const solved = tally.tries.reduce((sum, n) => sum + n, 0);
    const totalGames = solved + tally.failed;
    const totalTries = tally.tries.reduce((sum, n, i) => sum + n * (i + 1), 0);

    return {
        starter: tally.starter,
        failed: tally.failed,
        tries: [...tally.tries],
        totalGames,
        contradictions: tally.contradictions,
        successRate: totalGames > 0 ? (solved / totalGames) * 100 : 0,
        avgTries: solved > 0 ? totalTries / solved : 0,
    };
}

/** Sort summaries: highest success rate, then fewest average tries, then starter */
export function sortSummaries(summaries: StarterSummary[]): StarterSummary[] {
    return [...summaries].sort((a, b) => {
        // Higher success rate = better
        if (a.successRate !== b.successRate) return b.successRate - a.successRate;
        // Fewer tries = better
        if (a.avgTries !== b.avgTries) return a.avgTries - b.avgTries;
        return a.starter < b.starter ? -1 : a.starter > b.starter ? 1 : 0;
    });
}
