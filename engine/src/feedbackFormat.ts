import type { GuessResult, LetterResult } from './types.js';
import { FeedbackFormatError } from './errors.js';
import { patternKey } from './evaluator.js';

const WORD_LENGTH = 5;

const TILE_CODES: Record<string, LetterResult> = {
    G: 'correct',
    Y: 'present',
    B: 'absent',
};

const DIGIT_CODES: Record<string, string> = { '2': 'G', '1': 'Y', '0': 'B' };

const EMOJI_CODES: Record<string, string> = {
    '🟩': 'G',
    '🟨': 'Y',
    '⬛': 'B',
    '⬜': 'B',
};

const COLOUR_WORDS: [string, string][] = [
    ['GREEN', 'G'],
    ['YELLOW', 'Y'],
    ['BLACK', 'B'],
    ['GRAY', 'B'],
    ['GREY', 'B'],
];

function toResult(tiles: string): GuessResult {
    const result: LetterResult[] = [];
    for (const tile of tiles) {
        const code = TILE_CODES[tile];
        if (code === undefined) throw new FeedbackFormatError(tiles);
        result.push(code);
    }
    return result;
}

function isTileString(text: string): boolean {
    return text.length === WORD_LENGTH && /^[GYB]+$/.test(text);
}

/**
 * Reads feedback typed by a player. Accepted forms:
 * - tile letters: `GYBBB`
 * - digits: `21000` (2 = correct, 1 = present, 0 = absent)
 * - emoji: `🟩🟨⬛⬛⬜`
 * - colour words: `green yellow black grey gray`
 *
 * Case, spaces, commas and dashes are ignored.
 */
export function parseFeedback(input: string): GuessResult {
    const cleaned = input.trim().toUpperCase().replace(/[\s,-]/g, '');

    if (isTileString(cleaned)) {
        return toResult(cleaned);
    }

    if (/^[012]{5}$/.test(cleaned)) {
        return toResult([...cleaned].map((d) => DIGIT_CODES[d]).join(''));
    }

    const emojiTiles = [...cleaned]
        .map((ch) => EMOJI_CODES[ch])
        .filter((tile): tile is string => tile !== undefined)
        .join('');
    if (emojiTiles.length > 0 && isTileString(emojiTiles)) {
        return toResult(emojiTiles);
    }

    let spelled = cleaned;
    for (const [word, tile] of COLOUR_WORDS) {
        spelled = spelled.split(word).join(tile);
    }
    if (isTileString(spelled)) {
        return toResult(spelled);
    }

    throw new FeedbackFormatError(input);
}

/** Renders a result as `G`/`Y`/`B` tiles */
export function formatFeedback(result: GuessResult): string {
    return patternKey(result);
}
