import type { CandidateSet, PartitionMetrics } from './types.js';
import { computeFeedback, patternKey } from './evaluator.js';

/**
 * Groups candidates by the feedback `guess` would receive if each were the target.
 */
export function partitionCandidates(guess: string, candidates: CandidateSet): Map<string, string[]> {
    const buckets = new Map<string, string[]>();

    for (const word of candidates) {
        const key = patternKey(computeFeedback(guess, word));
        const bucket = buckets.get(key);
        if (bucket) {
            bucket.push(word);
        } else {
            buckets.set(key, [word]);
        }
    }

    return buckets;
}

/**
 * Minimax metrics for a guess:
 * - maxBucket: candidates left in the worst case
 * - avgBucket: mean bucket size (candidates per bucket)
 * - eliminationScore: candidates removed on average
 *
 * `lookup` lets callers evaluating many guesses share one membership set.
 */
export function evaluatePartition(
    guess: string,
    candidates: CandidateSet,
    lookup?: ReadonlySet<string>
): PartitionMetrics {
    if (candidates.length === 0) {
        return { maxBucket: 0, avgBucket: 0, isCandidateAnswer: false, eliminationScore: 0, bucketCount: 0 };
    }

    const buckets = partitionCandidates(guess, candidates);

    let maxBucket = 0;
    for (const bucket of buckets.values()) {
        if (bucket.length > maxBucket) maxBucket = bucket.length;
    }
    const avgBucket = candidates.length / buckets.size;

    return {
        maxBucket,
        avgBucket,
        isCandidateAnswer: lookup ? lookup.has(guess) : candidates.includes(guess),
        eliminationScore: candidates.length - avgBucket,
        bucketCount: buckets.size,
    };
}
