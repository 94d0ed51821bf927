import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ResultsPath, StarterSummary } from './protocol.js';

/** Settings that identify a run in its file names */
export interface RunLabel {
    targets: number;
    seed: number;
}

/** Where a sweep writes its sorted results */
export interface ResultSink {
    writeCheckpoint(summaries: StarterSummary[]): Promise<ResultsPath>;
    writeFinal(summaries: StarterSummary[]): Promise<ResultsPath>;
}

const CSV_HEADER = [
    'starter_word',
    'failed',
    'tries_6',
    'tries_5',
    'tries_4',
    'tries_3',
    'tries_2',
    'tries_1',
    'total_games',
    'success_rate',
    'avg_tries',
    'contradictions',
].join(',');

// ============================================================================
// Formatting
// ============================================================================

/** Local time as yyyy-mm-dd_HH-MM-SS */
export function formatTimestamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
    return `${day}_${time}`;
}

/** e.g. `results_final_targets100_seed12345_2026-10-19_08-30-00.csv` */
export function resultsFilename(prefix: string, label: RunLabel, date: Date): string {
    return `${prefix}_targets${label.targets}_seed${label.seed}_${formatTimestamp(date)}.csv`;
}

/** One CSV row per starter, hardest-turn counts first */
export function toCsv(summaries: StarterSummary[]): string {
    const rows = summaries.map((s) =>
        [
            s.starter,
            s.failed,
            s.tries[5],
            s.tries[4],
            s.tries[3],
            s.tries[2],
            s.tries[1],
            s.tries[0],
            s.totalGames,
            s.successRate.toFixed(1),
            s.avgTries.toFixed(2),
            s.contradictions,
        ].join(',')
    );
    return [CSV_HEADER, ...rows].join('\n') + '\n';
}

// ============================================================================
// Sinks
// ============================================================================

/**
 * Writes CSV files under `outDir`. Both file names are fixed when the sink is
 * created, so checkpoints overwrite one intermediate file.
 */
export function createFileSink(outDir: string, label: RunLabel, now: Date = new Date()): ResultSink {
    const intermediatePath = join(outDir, resultsFilename('results_intermediate', label, now));
    const finalPath = join(outDir, resultsFilename('results_final', label, now));

    async function write(path: string, summaries: StarterSummary[]): Promise<ResultsPath> {
        await mkdir(outDir, { recursive: true });
        await writeFile(path, toCsv(summaries), 'utf8');
        return path;
    }

    return {
        writeCheckpoint: (summaries) => write(intermediatePath, summaries),
        writeFinal: (summaries) => write(finalPath, summaries),
    };
}

// ============================================================================
// Testing Utilities
// ============================================================================

/** Keeps written results in memory */
export interface MemorySink extends ResultSink {
    checkpoints: StarterSummary[][];
    final: StarterSummary[] | null;
}

export function createMemorySink(): MemorySink {
    const sink: MemorySink = {
        checkpoints: [],
        final: null,
        writeCheckpoint: async (summaries) => {
            sink.checkpoints.push(summaries);
            return `memory:checkpoint-${sink.checkpoints.length}`;
        },
        writeFinal: async (summaries) => {
            sink.final = summaries;
            return 'memory:final';
        },
    };
    return sink;
}
