import type { GuessResult, LetterResult } from './types.js';

/**
 * Evaluates a guess against a target word.
 * Returns an array of LetterResults indicating correct/present/absent for each letter.
 *
 * Algorithm:
 * 1. First pass: mark all correct letters, consuming them from the target
 * 2. Second pass: mark present letters while unconsumed occurrences remain
 *
 * Words are compared exactly; callers normalise case when loading the list.
 */
export function computeFeedback(guess: string, target: string): GuessResult {
    if (guess.length !== target.length) {
        throw new Error(`Guess length (${guess.length}) must match target length (${target.length})`);
    }

    const result: LetterResult[] = new Array<LetterResult>(guess.length).fill('absent');
    const unconsumed = new Map<string, number>();

    // First pass: mark correct letters, count the rest of the target
    for (let i = 0; i < guess.length; i++) {
        if (guess[i] === target[i]) {
            result[i] = 'correct';
        } else {
            unconsumed.set(target[i], (unconsumed.get(target[i]) ?? 0) + 1);
        }
    }

    // Second pass: mark present letters
    for (let i = 0; i < guess.length; i++) {
        if (result[i] === 'correct') continue;

        const letter = guess[i];
        const remaining = unconsumed.get(letter) ?? 0;

        if (remaining > 0) {
            result[i] = 'present';
            unconsumed.set(letter, remaining - 1);
        }
    }

    return result;
}

/**
 * Checks if a guess result indicates a solved word (all correct)
 */
export function isSolved(result: GuessResult): boolean {
    return result.every((r) => r === 'correct');
}

const KEY_CHARS: Record<LetterResult, string> = {
    correct: 'G',
    present: 'Y',
    absent: 'B',
};

/**
 * Hashable form of a pattern, e.g. `GYBBG`. Used as a partition key.
 */
export function patternKey(result: GuessResult): string {
    let key = '';
    for (const r of result) key += KEY_CHARS[r];
    return key;
}
