import { sampleTargets, solveGame } from '@opener-lab/engine';
import type { CandidateSet, SelectorConfig } from '@opener-lab/engine';
import type { BenchConfig } from './config.js';
import { resolveSelectorConfig } from './config.js';
import type { StarterSummary, StarterTally, SweepEvent } from './protocol.js';
import {
    createBudgetExhaustedEvent,
    createCheckpointEvent,
    createCheckpointFailedEvent,
    createStarterDoneEvent,
    createSweepDoneEvent,
} from './protocol.js';
import type { ResultSink } from './results.js';
import { ResultsWriteError } from './errors.js';
import { createTally, mergeTallies, recordGame, sortSummaries, summarizeTally } from './tally.js';

const LEADERS_SHOWN = 5;

export interface SweepHooks {
    sink: ResultSink;
    onEvent?: (event: SweepEvent) => void;
    /** Clock in milliseconds, for the time budget */
    now?: () => number;
}

export interface SweepReport {
    summaries: StarterSummary[];
    targets: string[];
    startersEvaluated: number;
    startersSkipped: number;
    finalPath: string;
}

/** Starters to evaluate: the configured list, or every word, cut to `limit` */
export function selectStarters(words: CandidateSet, config: Pick<BenchConfig, 'starters' | 'limit'>): string[] {
    const starters = config.starters ?? [...words];
    return config.limit !== undefined ? starters.slice(0, config.limit) : starters;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}

/**
 * Plays `starter` against every target. Each shard of targets fills its own
 * tally and the shard tallies are merged, so shards could run on separate workers.
 */
export function evaluateStarter(
    starter: string,
    targets: readonly string[],
    words: CandidateSet,
    selector: SelectorConfig,
    shardSize: number
): StarterTally {
    const shardTallies = chunk(targets, shardSize).map((shard) => {
        const local = createTally(starter);
        for (const target of shard) {
            recordGame(local, solveGame(target, words, { starter, config: selector }));
        }
        return local;
    });

    return shardTallies.reduce(mergeTallies, createTally(starter));
}

/**
 * Evaluates every starter against one shared, seeded draw of targets.
 * Intermediate results are written every `saveInterval` starters; a failed
 * checkpoint is reported and the sweep continues.
 */
export async function runSweep(words: CandidateSet, config: BenchConfig, hooks: SweepHooks): Promise<SweepReport> {
    const emit = hooks.onEvent ?? (() => undefined);
    const now = hooks.now ?? Date.now;
    const selector = resolveSelectorConfig(config);

    const targets = sampleTargets(words, config.targets, config.seed);
    const starters = selectStarters(words, config);
    const startedAt = now();
    const summaries: StarterSummary[] = [];
    let skipped = 0;

    for (let i = 0; i < starters.length; i++) {
        if (config.timeBudgetMs !== undefined && now() - startedAt >= config.timeBudgetMs) {
            skipped = starters.length - i;
            emit(createBudgetExhaustedEvent(i, skipped));
            break;
        }

        const tally = evaluateStarter(starters[i], targets, words, selector, config.shardSize);
        const summary = summarizeTally(tally);
        summaries.push(summary);
        emit(createStarterDoneEvent(i + 1, starters.length, summary));

        if ((i + 1) % config.saveInterval === 0) {
            const sorted = sortSummaries(summaries);
            try {
                const path = await hooks.sink.writeCheckpoint(sorted);
                emit(createCheckpointEvent(path, sorted.slice(0, LEADERS_SHOWN)));
            } catch (err) {
                emit(createCheckpointFailedEvent(err));
            }
        }
    }

    const sorted = sortSummaries(summaries);
    let finalPath: string;
    try {
        finalPath = await hooks.sink.writeFinal(sorted);
    } catch (err) {
        throw new ResultsWriteError(sorted, err);
    }

    emit(createSweepDoneEvent(finalPath, sorted, summaries.length * targets.length));

    return {
        summaries: sorted,
        targets,
        startersEvaluated: summaries.length,
        startersSkipped: skipped,
        finalPath,
    };
}
