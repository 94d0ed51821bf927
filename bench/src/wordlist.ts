import { readFile } from 'node:fs/promises';
import { WordListError } from './errors.js';

const WORD_PATTERN = /^[A-Z]{5}$/;

/**
 * Parses a word list: one word per line, blank lines and `#` comments ignored.
 * Words are upper-cased and de-duplicated keeping the first occurrence, since
 * the guess selector depends on list order.
 */
export function parseWordList(text: string): string[] {
    const words: string[] = [];
    const seen = new Set<string>();
    const lines = text.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
        const raw = lines[i].trim();
        if (raw === '' || raw.startsWith('#')) continue;

        const word = raw.toUpperCase();
        if (!WORD_PATTERN.test(word)) {
            throw new WordListError(`Invalid word "${raw}" on line ${i + 1}: expected 5 letters A-Z`, i + 1);
        }
        if (!seen.has(word)) {
            seen.add(word);
            words.push(word);
        }
    }

    if (words.length === 0) {
        throw new WordListError('Word list is empty');
    }
    return words;
}

/** Reads and validates a word list file */
export async function loadWordList(path: string): Promise<string[]> {
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new WordListError(`Cannot read word list ${path}: ${reason}`, null, { cause: err });
    }
    return parseWordList(text);
}
