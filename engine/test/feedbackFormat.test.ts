import { describe, it, expect } from 'vitest';
import { parseFeedback, formatFeedback } from '../src/feedbackFormat.js';
import { FeedbackFormatError } from '../src/errors.js';
import type { GuessResult } from '../src/types.js';

const GYBBB: GuessResult = ['correct', 'present', 'absent', 'absent', 'absent'];

describe('parseFeedback', () => {
    it('reads tile letters', () => {
        expect(parseFeedback('GYBBB')).toEqual(GYBBB);
    });

    it('ignores case, spaces, commas and dashes', () => {
        expect(parseFeedback(' g, y-b b b ')).toEqual(GYBBB);
    });

    it('reads digits', () => {
        expect(parseFeedback('21000')).toEqual(GYBBB);
    });

    it('reads emoji tiles, white or black for absent', () => {
        expect(parseFeedback('🟩🟨⬛⬛⬜')).toEqual(GYBBB);
    });

    it('reads colour words', () => {
        expect(parseFeedback('green yellow black grey gray')).toEqual(GYBBB);
    });

    it('rejects too few tiles', () => {
        expect(() => parseFeedback('GYBB')).toThrow(FeedbackFormatError);
    });

    it('rejects unknown tiles and keeps the raw input', () => {
        try {
            parseFeedback('GYBXB');
            expect.fail('expected parseFeedback to throw');
        } catch (err) {
            expect(err).toBeInstanceOf(FeedbackFormatError);
            expect(err).toHaveProperty('input', 'GYBXB');
            expect(err).toHaveProperty('message', 'Invalid feedback format: GYBXB');
        }
    });
});

describe('formatFeedback', () => {
    it('renders tiles as G/Y/B', () => {
        expect(formatFeedback(['absent', 'absent', 'correct', 'absent', 'correct'])).toBe('BBGBG');
    });

    it('is read back by parseFeedback', () => {
        expect(parseFeedback(formatFeedback(GYBBB))).toEqual(GYBBB);
    });
});
