import { fileURLToPath } from 'node:url';
import type { GameOutcome, GameResult } from '@opener-lab/engine';
import type { StarterSummary } from '../src/protocol.js';

/** Word list shared with the engine tests */
export const FIXTURE_WORDS_FILE = fileURLToPath(new URL('../../engine/test/fixtures/words.txt', import.meta.url));

/** Small list whose sweeps finish quickly */
export const SMALL_LIST = ['CRANE', 'SLATE', 'TRACE', 'BRAVE', 'GRAPE', 'SHALE', 'STALE', 'PLANE'];

export function gameResult(starter: string, outcome: GameOutcome): GameResult {
    return { starter, target: 'CRANE', guesses: [], turns: [], outcome };
}

export function summary(starter: string, successRate: number, avgTries: number): StarterSummary {
    return { starter, failed: 0, tries: [0, 0, 0, 0, 0, 0], totalGames: 0, contradictions: 0, successRate, avgTries };
}
