import type { GuessResult, KnowledgeState } from './types.js';

const WORD_LENGTH = 5;

/** Knowledge at the start of a game */
export function createKnowledge(): KnowledgeState {
    return {
        knownLetters: new Set(),
        knownPositions: new Array<string | null>(WORD_LENGTH).fill(null),
        excludedLetters: new Set(),
        wrongPositions: new Map(),
    };
}

/**
 * Folds one guess and its feedback into the knowledge state.
 * This is a pure function - it returns a new state object.
 *
 * A letter marked absent at one position may be correct or present at another
 * position of the same guess, so it is only excluded when not known; a letter
 * that becomes known leaves the excluded set.
 */
export function updateKnowledge(knowledge: KnowledgeState, guess: string, feedback: GuessResult): KnowledgeState {
    const knownLetters = new Set(knowledge.knownLetters);
    const knownPositions = [...knowledge.knownPositions];
    const excludedLetters = new Set(knowledge.excludedLetters);
    const wrongPositions = new Map<string, ReadonlySet<number>>(knowledge.wrongPositions);

    for (let i = 0; i < feedback.length; i++) {
        const letter = guess[i];
        switch (feedback[i]) {
            case 'correct':
                knownPositions[i] = letter;
                knownLetters.add(letter);
                excludedLetters.delete(letter);
                break;
            case 'present': {
                knownLetters.add(letter);
                excludedLetters.delete(letter);
                const positions = new Set<number>(wrongPositions.get(letter));
                positions.add(i);
                wrongPositions.set(letter, positions);
                break;
            }
            case 'absent':
                if (!knownLetters.has(letter)) {
                    excludedLetters.add(letter);
                }
                break;
        }
    }

    return { knownLetters, knownPositions, excludedLetters, wrongPositions };
}

/**
 * Distinct letters of `word` neither confirmed present nor confirmed absent.
 */
export function countNewLetters(word: string, knowledge: KnowledgeState): number {
    let count = 0;
    for (const letter of new Set(word)) {
        if (!knowledge.knownLetters.has(letter) && !knowledge.excludedLetters.has(letter)) count++;
    }
    return count;
}

/** Distinct letters of `word` already confirmed present */
export function countKnownLetters(word: string, knowledge: KnowledgeState): number {
    let count = 0;
    for (const letter of new Set(word)) {
        if (knowledge.knownLetters.has(letter)) count++;
    }
    return count;
}
