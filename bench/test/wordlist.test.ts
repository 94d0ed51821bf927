import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parseWordList, loadWordList } from '../src/wordlist.js';
import { DEFAULT_WORDS_FILE } from '../src/config.js';
import { WordListError } from '../src/errors.js';
import { FIXTURE_WORDS_FILE } from './helpers.js';

describe('parseWordList', () => {
    it('upper-cases words and skips blanks and comments', () => {
        expect(parseWordList('# openers\nslate\n\n  Crane  \r\nTRACE\n')).toEqual(['SLATE', 'CRANE', 'TRACE']);
    });

    it('keeps the first occurrence of a repeated word', () => {
        expect(parseWordList('SLATE\nCRANE\nslate\n')).toEqual(['SLATE', 'CRANE']);
    });

    it('rejects malformed words with their line number', () => {
        try {
            parseWordList('SLATE\nCRAN\n');
            expect.fail('expected parseWordList to throw');
        } catch (err) {
            expect(err).toBeInstanceOf(WordListError);
            expect(err).toHaveProperty('line', 2);
            expect(err).toHaveProperty('message', 'Invalid word "CRAN" on line 2: expected 5 letters A-Z');
        }
    });

    it('rejects letters outside A-Z', () => {
        expect(() => parseWordList('CAFÉS\n')).toThrow(WordListError);
    });

    it('rejects an empty list', () => {
        expect(() => parseWordList('# nothing here\n\n')).toThrow('Word list is empty');
    });
});

describe('loadWordList', () => {
    it('reads a list from disk', async () => {
        const words = await loadWordList(FIXTURE_WORDS_FILE);
        expect(words).toHaveLength(108);
        expect(words.slice(0, 3)).toEqual(['SLATE', 'CRANE', 'TRACE']);
    });

    it('loads the bundled list', async () => {
        const words = await loadWordList(DEFAULT_WORDS_FILE);
        expect(words.length).toBeGreaterThan(300);
        expect(words[0]).toBe('SLATE');
    });

    it('wraps read failures', async () => {
        const missing = join(tmpdir(), 'opener-lab-missing', 'words.txt');
        await expect(loadWordList(missing)).rejects.toThrow(`Cannot read word list ${missing}`);
        await expect(loadWordList(missing)).rejects.toBeInstanceOf(WordListError);
    });
});
