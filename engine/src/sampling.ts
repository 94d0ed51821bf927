import type { CandidateSet } from './types.js';

/**
 * djb2 hash of a run label, so a sweep can be named (`--seed weekly`)
 * instead of numbered. Always a non-negative 32-bit integer.
 */
export function seedFromString(text: string): number {
    let hash = 5381;
    for (let i = 0; i < text.length; i++) {
        hash = ((hash << 5) + hash) ^ text.charCodeAt(i);
    }
    return hash >>> 0;
}

/** Seeded generator of floats in [0, 1); one instance per target draw */
export function mulberry32(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Draws `count` distinct target words with a partial Fisher-Yates shuffle.
 * The same words and seed always give the same targets, in the same order.
 * `count` is clamped to the size of the list.
 *
 * @example
 * ```ts
 * const targets = sampleTargets(words, 100, 12345);
 * ```
 */
export function sampleTargets(words: CandidateSet, count: number, seed: number): string[] {
    const pool = [...words];
    const take = Math.max(0, Math.min(count, pool.length));
    const random = mulberry32(seed);

    for (let i = 0; i < take; i++) {
        const j = i + Math.floor(random() * (pool.length - i));
        const picked = pool[j];
        pool[j] = pool[i];
        pool[i] = picked;
    }

    return pool.slice(0, take);
}
