import type { ZodError } from 'zod';
import type { StarterSummary } from './protocol.js';

/** A word list that cannot be used: unreadable, empty, or holding a malformed word */
export class WordListError extends Error {
    /** 1-based line of the offending entry, when there is one */
    readonly line: number | null;

    constructor(message: string, line: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'WordListError';
        this.line = line;
    }
}

/** Invalid settings from flags or the environment */
export class ConfigError extends Error {
    constructor(error: ZodError) {
        super(
            error.issues
                .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
                .join('; ')
        );
        this.name = 'ConfigError';
    }
}

/** The final results could not be written; the computed rows are kept on the error */
export class ResultsWriteError extends Error {
    readonly summaries: StarterSummary[];

    constructor(summaries: StarterSummary[], cause: unknown) {
        super(`Error saving final results: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
        this.name = 'ResultsWriteError';
        this.summaries = summaries;
    }
}
