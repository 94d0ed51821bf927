// Types
export type {
    Starter,
    ResultsPath,
    StarterTally,
    StarterSummary,
    SweepEvent,
    SweepEventType,
} from './protocol.js';
export type { BenchConfig, BenchConfigInput } from './config.js';
export type { ResultSink, RunLabel, MemorySink } from './results.js';
export type { SweepHooks, SweepReport } from './sweep.js';
export type { Logger, MemoryLogger } from './logger.js';

// Errors
export { WordListError, ConfigError, ResultsWriteError } from './errors.js';

// Configuration and input
export { benchConfigSchema, loadConfig, resolveSelectorConfig, DEFAULT_WORDS_FILE } from './config.js';
export { parseWordList, loadWordList } from './wordlist.js';

// Tabulation
export { createTally, recordGame, mergeTallies, summarizeTally, sortSummaries } from './tally.js';

// Sweep
export { selectStarters, evaluateStarter, runSweep } from './sweep.js';

// Output
export { formatTimestamp, resultsFilename, toCsv, createFileSink, createMemorySink } from './results.js';
export { formatSummary, formatDistribution, createConsoleReporter } from './reporter.js';
export { consoleLogger, createMemoryLogger } from './logger.js';
export { createProgram, parseHistoryEntry, describeOutcome } from './program.js';
