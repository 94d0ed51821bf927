import type { CandidateSet, GuessResult } from './types.js';
import { computeFeedback, patternKey } from './evaluator.js';

/**
 * Keeps the candidates that would have produced `feedback` for `guess`,
 * in their original order.
 */
export function filterCandidates(candidates: CandidateSet, guess: string, feedback: GuessResult): string[] {
    const expected = patternKey(feedback);
    return candidates.filter((word) => patternKey(computeFeedback(guess, word)) === expected);
}
