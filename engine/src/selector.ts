import type {
    CandidateSet,
    KnowledgeState,
    RankedGuess,
    Regime,
    SelectOptions,
    SelectorConfig,
} from './types.js';
import { computeFeedback, patternKey } from './evaluator.js';
import { evaluatePartition } from './partition.js';
import { countKnownLetters, countNewLetters } from './knowledge.js';
import { ContradictionError } from './errors.js';

/**
 * Default thresholds. Every "first N words" limit reads the word list in its
 * given order, so results depend on how the dictionary is sorted.
 */
export const DEFAULT_SELECTOR_CONFIG: Readonly<SelectorConfig> = {
    eliminationThreshold: 15,
    answerFocusThreshold: 6,
    endgameSize: 2,
    lateTurn: 5,
    pairScanLimit: 200,
    eliminationScanLimit: 800,
    eliminationMinNewLetters: 3,
    eliminationMinPool: 50,
    eliminationPoolCap: 150,
    explorationScanLimit: 600,
    explorationMinNewLetters: 2,
    explorationPoolCap: 100,
    answerPoolMin: 50,
    answerExtensionScanLimit: 100,
};

/** Picks the evaluation strategy for a candidate set of the given size */
export function selectRegime(size: number, config: SelectorConfig = DEFAULT_SELECTOR_CONFIG): Regime {
    if (size > config.eliminationThreshold) return 'elimination';
    if (size > config.answerFocusThreshold) return 'exploration';
    return 'answer';
}

/** Number of candidates containing each letter, counted once per word */
export function letterFrequencies(candidates: CandidateSet): Map<string, number> {
    const freq = new Map<string, number>();
    for (const word of candidates) {
        for (const letter of new Set(word)) {
            freq.set(letter, (freq.get(letter) ?? 0) + 1);
        }
    }
    return freq;
}

export function frequencyScore(word: string, freq: ReadonlyMap<string, number>): number {
    let score = 0;
    for (const letter of new Set(word)) {
        score += freq.get(letter) ?? 0;
    }
    return score;
}

/**
 * With two candidates left, finds a non-candidate whose feedback differs
 * between them, so the next turn is certain. Returns null when none of the
 * scanned words separates the pair.
 */
export function findSplitter(
    first: string,
    second: string,
    allWords: CandidateSet,
    config: SelectorConfig = DEFAULT_SELECTOR_CONFIG
): string | null {
    for (const word of allWords.slice(0, config.pairScanLimit)) {
        if (word === first || word === second) continue;
        if (patternKey(computeFeedback(word, first)) !== patternKey(computeFeedback(word, second))) {
            return word;
        }
    }
    return null;
}

function eliminationSet(
    candidates: CandidateSet,
    scanned: string[],
    knowledge: KnowledgeState,
    config: SelectorConfig
): string[] {
    let pool = scanned.filter((word) => countNewLetters(word, knowledge) >= config.eliminationMinNewLetters);

    // Too few words with fresh letters: fall back to anything sharing a letter with the candidates
    if (pool.length < config.eliminationMinPool) {
        const freq = letterFrequencies(candidates);
        pool = scanned.filter((word) => frequencyScore(word, freq) > 0);
    }

    return pool.slice(0, config.eliminationPoolCap);
}

function explorationSet(scanned: string[], knowledge: KnowledgeState, config: SelectorConfig): string[] {
    return scanned
        .map((word) => ({ word, fresh: countNewLetters(word, knowledge) }))
        .filter(({ fresh }) => fresh >= config.explorationMinNewLetters)
        .sort((a, b) => b.fresh - a.fresh)
        .slice(0, config.explorationPoolCap)
        .map(({ word }) => word);
}

function answerSet(candidates: CandidateSet, allWords: CandidateSet, config: SelectorConfig): string[] {
    const pool = [...candidates];
    if (pool.length >= config.answerPoolMin) return pool;

    const included = new Set(pool);
    for (const word of allWords.slice(0, config.answerExtensionScanLimit)) {
        if (!included.has(word)) {
            included.add(word);
            pool.push(word);
        }
    }
    return pool;
}

/**
 * Words worth scoring for the current candidate set:
 * - elimination: non-candidates probing at least three unseen letters
 * - exploration: non-candidates ranked by unseen letters
 * - answer: the candidates themselves, padded from the head of the list
 */
export function buildEvaluationSet(
    candidates: CandidateSet,
    allWords: CandidateSet,
    knowledge: KnowledgeState,
    config: SelectorConfig = DEFAULT_SELECTOR_CONFIG,
    lookup: ReadonlySet<string> = new Set(candidates)
): string[] {
    switch (selectRegime(candidates.length, config)) {
        case 'elimination': {
            const scanned = allWords.slice(0, config.eliminationScanLimit).filter((w) => !lookup.has(w));
            return eliminationSet(candidates, scanned, knowledge, config);
        }
        case 'exploration': {
            const scanned = allWords.slice(0, config.explorationScanLimit).filter((w) => !lookup.has(w));
            return explorationSet(scanned, knowledge, config);
        }
        case 'answer':
            return answerSet(candidates, allWords, config);
    }
}

/**
 * Minimax score of one guess (lower is better). The worst-case bucket dominates;
 * the bonuses favour new letters while the space is large and committing to a
 * candidate once it is small or turns run short.
 */
export function scoreGuess(
    word: string,
    candidates: CandidateSet,
    turn: number,
    knowledge: KnowledgeState,
    config: SelectorConfig = DEFAULT_SELECTOR_CONFIG,
    lookup: ReadonlySet<string> = new Set(candidates)
): RankedGuess {
    const metrics = evaluatePartition(word, candidates, lookup);
    const size = candidates.length;
    const newLetters = countNewLetters(word, knowledge);
    const knownLetterCount = countKnownLetters(word, knowledge);
    const largeSpace = size > config.answerFocusThreshold;

    let explorationBonus = 0;
    if (!metrics.isCandidateAnswer && largeSpace) {
        explorationBonus = -newLetters * 0.5 + knownLetterCount * 0.3;
    }

    let answerBonus = 0;
    if (metrics.isCandidateAnswer) {
        answerBonus = size <= config.endgameSize || turn >= config.lateTurn ? -1.0 : 2.0;
    } else if (largeSpace) {
        answerBonus = -0.5;
    }

    return {
        ...metrics,
        word,
        newLetters,
        knownLetterCount,
        finalScore: metrics.maxBucket + metrics.avgBucket / 1000 + answerBonus + explorationBonus,
    };
}

function compareRanked(a: RankedGuess, b: RankedGuess): number {
    if (a.finalScore !== b.finalScore) return a.finalScore - b.finalScore;
    if (a.maxBucket !== b.maxBucket) return a.maxBucket - b.maxBucket;
    if (a.avgBucket !== b.avgBucket) return a.avgBucket - b.avgBucket;
    return a.word < b.word ? -1 : a.word > b.word ? 1 : 0;
}

/**
 * Scores the evaluation set and returns it best first.
 */
export function rankGuesses(
    candidates: CandidateSet,
    allWords: CandidateSet,
    turn: number,
    knowledge: KnowledgeState,
    config: SelectorConfig = DEFAULT_SELECTOR_CONFIG
): RankedGuess[] {
    const lookup = new Set(candidates);
    return buildEvaluationSet(candidates, allWords, knowledge, config, lookup)
        .map((word) => scoreGuess(word, candidates, turn, knowledge, config, lookup))
        .sort(compareRanked);
}

/**
 * Chooses the next guess. In order of precedence:
 * 1. a single candidate is forced
 * 2. the configured starter opens turn 1
 * 3. two candidates are split by a probe word when one exists
 * 4. otherwise the best-ranked word of the regime's evaluation set
 */
export function selectGuess(
    candidates: CandidateSet,
    allWords: CandidateSet,
    turn: number,
    knowledge: KnowledgeState,
    options: SelectOptions = {}
): string {
    const config = options.config ?? DEFAULT_SELECTOR_CONFIG;

    if (candidates.length === 0) {
        throw new ContradictionError();
    }

    if (candidates.length === 1) {
        return candidates[0];
    }

    if (turn === 1 && options.starter) {
        return options.starter;
    }

    if (candidates.length === 2) {
        return findSplitter(candidates[0], candidates[1], allWords, config) ?? candidates[0];
    }

    const [best] = rankGuesses(candidates, allWords, turn, knowledge, config);
    return best ? best.word : candidates[0];
}
