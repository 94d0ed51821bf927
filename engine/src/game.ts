import type {
    CandidateSet,
    GameResult,
    HistoryEntry,
    SelectOptions,
    SolveOptions,
    SolverState,
} from './types.js';
import { computeFeedback, isSolved } from './evaluator.js';
import { filterCandidates } from './filter.js';
import { createKnowledge, updateKnowledge } from './knowledge.js';
import { selectGuess } from './selector.js';

export const MAX_TURNS = 6;

/**
 * Creates the state of a fresh game: every word is still a candidate
 */
export function createSolverState(words: CandidateSet): SolverState {
    return {
        candidates: [...words],
        knowledge: createKnowledge(),
        turns: [],
        outcome: null,
    };
}

/**
 * Plays one turn against `target` and returns the updated state.
 * This is a pure function - it returns a new state object.
 *
 * An empty candidate set after filtering means feedback and filtering disagree;
 * the game is classified as failed instead of throwing, so batch runs carry on.
 */
export function playTurn(
    state: SolverState,
    target: string,
    allWords: CandidateSet,
    options: SolveOptions = {}
): SolverState {
    if (state.outcome) {
        return state;
    }

    const maxTurns = options.maxTurns ?? MAX_TURNS;
    const turn = state.turns.length + 1;
    const guess = selectGuess(state.candidates, allWords, turn, state.knowledge, options);
    const feedback = computeFeedback(guess, target);
    const knowledge = updateKnowledge(state.knowledge, guess, feedback);

    if (isSolved(feedback)) {
        return {
            candidates: state.candidates,
            knowledge,
            turns: [...state.turns, { guess, feedback, remaining: state.candidates.length }],
            outcome: { kind: 'solved', turns: turn },
        };
    }

    const candidates = filterCandidates(state.candidates, guess, feedback);
    const turns = [...state.turns, { guess, feedback, remaining: candidates.length }];

    if (candidates.length === 0) {
        return { candidates, knowledge, turns, outcome: { kind: 'failed', reason: 'contradiction' } };
    }

    return {
        candidates,
        knowledge,
        turns,
        outcome: turn >= maxTurns ? { kind: 'failed', reason: 'exhausted' } : null,
    };
}

/**
 * Simulates a whole game against `target`, optionally opening with a fixed starter.
 */
export function solveGame(target: string, allWords: CandidateSet, options: SolveOptions = {}): GameResult {
    let state = createSolverState(allWords);

    while (!state.outcome) {
        state = playTurn(state, target, allWords, options);
    }

    return {
        starter: options.starter ?? null,
        target,
        guesses: state.turns.map((t) => t.guess),
        turns: [...state.turns],
        outcome: state.outcome,
    };
}

/**
 * Rebuilds a game from guesses a player already made and the feedback they got.
 */
export function replayHistory(words: CandidateSet, history: readonly HistoryEntry[]): SolverState {
    let state = createSolverState(words);

    for (const { guess, feedback } of history) {
        if (state.outcome) break;

        const knowledge = updateKnowledge(state.knowledge, guess, feedback);
        if (isSolved(feedback)) {
            state = {
                ...state,
                knowledge,
                turns: [...state.turns, { guess, feedback, remaining: state.candidates.length }],
                outcome: { kind: 'solved', turns: state.turns.length + 1 },
            };
            continue;
        }

        const candidates = filterCandidates(state.candidates, guess, feedback);
        state = {
            candidates,
            knowledge,
            turns: [...state.turns, { guess, feedback, remaining: candidates.length }],
            outcome: candidates.length === 0 ? { kind: 'failed', reason: 'contradiction' } : null,
        };
    }

    return state;
}

/**
 * Suggests the next word for a player who has entered `history` so far.
 * Throws ContradictionError when no word fits the history.
 */
export function suggestNext(
    words: CandidateSet,
    history: readonly HistoryEntry[],
    options: SelectOptions = {}
): string {
    const state = replayHistory(words, history);
    if (state.outcome?.kind === 'solved') {
        return history[history.length - 1].guess;
    }
    return selectGuess(state.candidates, words, state.turns.length + 1, state.knowledge, options);
}
