import { describe, it, expect } from 'vitest';
import {
    MAX_TURNS,
    createSolverState,
    playTurn,
    replayHistory,
    solveGame,
    suggestNext,
} from '../src/game.js';
import { computeFeedback, patternKey } from '../src/evaluator.js';
import { parseFeedback } from '../src/feedbackFormat.js';
import { ContradictionError } from '../src/errors.js';
import { loadFixtureWords } from './fixtures.js';

const WORDS = loadFixtureWords();

describe('createSolverState', () => {
    it('starts with every word as a candidate', () => {
        const state = createSolverState(WORDS);
        expect(state.candidates).toEqual(WORDS);
        expect(state.candidates).not.toBe(WORDS);
        expect(state.turns).toEqual([]);
        expect(state.outcome).toBeNull();
    });
});

describe('playTurn', () => {
    it('returns a new state without modifying the old one', () => {
        const state = createSolverState(WORDS);
        const next = playTurn(state, 'CRANE', WORDS, { starter: 'SLATE' });

        expect(state.turns).toHaveLength(0);
        expect(state.candidates).toHaveLength(WORDS.length);
        expect(next.turns).toHaveLength(1);
        expect(next.turns[0].guess).toBe('SLATE');
        expect(next.candidates).toHaveLength(10);
        expect(next.outcome).toBeNull();
    });

    it('leaves a finished game alone', () => {
        const solved = solveGame('CRANE', WORDS, { starter: 'CRANE' });
        expect(solved.outcome).toEqual({ kind: 'solved', turns: 1 });

        let state = createSolverState(WORDS);
        state = playTurn(state, 'CRANE', WORDS, { starter: 'CRANE' });
        expect(playTurn(state, 'CRANE', WORDS)).toBe(state);
    });
});

describe('solveGame', () => {
    it('solves CRANE opening with SLATE', () => {
        const result = solveGame('CRANE', WORDS, { starter: 'SLATE' });

        expect(result.starter).toBe('SLATE');
        expect(result.target).toBe('CRANE');
        expect(result.guesses).toEqual(['SLATE', 'PRICE', 'SNAKE', 'CRANE']);
        expect(result.turns.map((t) => patternKey(t.feedback))).toEqual(['BBGBG', 'BGBYG', 'BYGBG', 'GGGGG']);
        expect(result.turns.map((t) => t.remaining)).toEqual([10, 2, 1, 1]);
        expect(result.outcome).toEqual({ kind: 'solved', turns: 4 });
    });

    it('picks its own opening without a starter', () => {
        const result = solveGame('CRANE', WORDS);
        expect(result.starter).toBeNull();
        expect(result.guesses).toEqual(['SLATE', 'PRICE', 'SNAKE', 'CRANE']);
    });

    it('solves in one when the starter is the target', () => {
        const result = solveGame('PLANE', WORDS, { starter: 'PLANE' });
        expect(result.guesses).toEqual(['PLANE']);
        expect(result.outcome).toEqual({ kind: 'solved', turns: 1 });
    });

    it('fails as exhausted when turns run out', () => {
        const result = solveGame('CRANE', WORDS, { starter: 'SLATE', maxTurns: 2 });
        expect(result.guesses).toEqual(['SLATE', 'PRICE']);
        expect(result.outcome).toEqual({ kind: 'failed', reason: 'exhausted' });
    });

    it('fails as a contradiction when the target is not in the list', () => {
        const result = solveGame('CRANK', WORDS, { starter: 'SLATE' });
        expect(result.guesses).toEqual(['SLATE', 'BRICK']);
        expect(result.turns.map((t) => t.remaining)).toEqual([5, 0]);
        expect(result.outcome).toEqual({ kind: 'failed', reason: 'contradiction' });
    });

    it('solves every fixture word within the turn limit or reports why not', () => {
        for (const target of WORDS.slice(0, 12)) {
            const result = solveGame(target, WORDS, { starter: 'SLATE' });
            expect(result.turns.length).toBeLessThanOrEqual(MAX_TURNS);
            if (result.outcome.kind === 'solved') {
                expect(result.guesses[result.guesses.length - 1]).toBe(target);
                expect(result.outcome.turns).toBe(result.guesses.length);
            }
        }
    });

    it('records the feedback each guess gets from the target', () => {
        const result = solveGame('CRANE', WORDS, { starter: 'SLATE' });
        for (const turn of result.turns) {
            expect(turn.feedback).toEqual(computeFeedback(turn.guess, 'CRANE'));
        }
    });
});

describe('replayHistory', () => {
    it('rebuilds candidates and knowledge from played turns', () => {
        const state = replayHistory(WORDS, [{ guess: 'SLATE', feedback: parseFeedback('BBGBG') }]);
        expect(state.candidates).toEqual([
            'CRANE', 'BRAVE', 'GRAPE', 'GRADE', 'FRAME', 'CRAZE', 'DRAPE', 'GRACE', 'AWAKE', 'QUAKE',
        ]);
        expect([...state.knowledge.knownLetters].sort()).toEqual(['A', 'E']);
        expect(state.outcome).toBeNull();
    });

    it('marks a history ending in all-correct as solved', () => {
        const state = replayHistory(WORDS, [
            { guess: 'SLATE', feedback: parseFeedback('BBGBG') },
            { guess: 'CRANE', feedback: parseFeedback('GGGGG') },
        ]);
        expect(state.outcome).toEqual({ kind: 'solved', turns: 2 });
    });

    it('reports a contradiction when nothing fits', () => {
        const state = replayHistory(WORDS, [{ guess: 'SLATE', feedback: parseFeedback('GGGGB') }]);
        expect(state.candidates).toEqual([]);
        expect(state.outcome).toEqual({ kind: 'failed', reason: 'contradiction' });
    });
});

describe('suggestNext', () => {
    it('suggests the best probe after one guess', () => {
        expect(suggestNext(WORDS, [{ guess: 'SLATE', feedback: parseFeedback('BBGBG') }])).toBe('PRICE');
    });

    it('uses the starter for an empty history', () => {
        expect(suggestNext(WORDS, [], { starter: 'CRANE' })).toBe('CRANE');
    });

    it('repeats the winning guess of a solved history', () => {
        expect(suggestNext(WORDS, [{ guess: 'PLANE', feedback: parseFeedback('GGGGG') }])).toBe('PLANE');
    });

    it('throws when no word fits the history', () => {
        expect(() => suggestNext(WORDS, [{ guess: 'SLATE', feedback: parseFeedback('GGGGB') }])).toThrow(
            ContradictionError
        );
    });
});
