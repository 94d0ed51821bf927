import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DEFAULT_SELECTOR_CONFIG, seedFromString } from '@opener-lab/engine';
import type { SelectorConfig } from '@opener-lab/engine';
import { ConfigError } from './errors.js';

/** Word list shipped with the bench */
export const DEFAULT_WORDS_FILE = fileURLToPath(new URL('../data/words.txt', import.meta.url));

const count = z.number().int().min(1);

/** An integer, or a text label hashed into one */
const seedSchema = z
    .union([z.number().int(), z.string().trim().min(1)])
    .transform((value) => {
        if (typeof value === 'number') return value;
        return /^-?\d+$/.test(value) ? Number(value) : seedFromString(value);
    });

const selectorOverridesSchema = z
    .object({
        eliminationThreshold: count,
        answerFocusThreshold: count,
        endgameSize: count,
        lateTurn: count,
        pairScanLimit: count,
        eliminationScanLimit: count,
        eliminationMinNewLetters: count,
        eliminationMinPool: count,
        eliminationPoolCap: count,
        explorationScanLimit: count,
        explorationMinNewLetters: count,
        explorationPoolCap: count,
        answerPoolMin: count,
        answerExtensionScanLimit: count,
    })
    .partial()
    .strict();

export const benchConfigSchema = z.object({
    wordsFile: z.string().min(1).default(DEFAULT_WORDS_FILE),
    /** Random targets every starter is played against */
    targets: count.default(100),
    seed: seedSchema.default(12345),
    /** Write intermediate results every N starters */
    saveInterval: count.default(10),
    outDir: z.string().min(1).default('results'),
    starters: z
        .array(z.string().regex(/^[A-Za-z]{5}$/, 'starter must be 5 letters A-Z'))
        .min(1, 'at least one starter is required')
        .transform((words) => words.map((w) => w.toUpperCase()))
        .optional(),
    /** Only evaluate the first N starters */
    limit: count.optional(),
    /** No new starter begins after this many milliseconds */
    timeBudgetMs: count.optional(),
    /** Targets accumulated per local tally before merging */
    shardSize: count.default(25),
    selector: selectorOverridesSchema.default({}),
});

export type BenchConfig = z.infer<typeof benchConfigSchema>;
export type BenchConfigInput = z.input<typeof benchConfigSchema>;

const envSchema = z.object({
    OPENER_WORDS: z.string().min(1).optional(),
    OPENER_TARGETS: z.coerce.number().optional(),
    OPENER_SEED: z.string().min(1).optional(),
    OPENER_OUT_DIR: z.string().min(1).optional(),
});

type Env = Record<string, string | undefined>;

/**
 * Resolves settings: defaults, then environment variables, then explicit overrides.
 * Overrides left undefined do not mask the environment.
 * Throws ConfigError listing every invalid field.
 */
export function loadConfig(overrides: BenchConfigInput = {}, env: Env = process.env): BenchConfig {
    const parsedEnv = envSchema.safeParse(env);
    if (!parsedEnv.success) {
        throw new ConfigError(parsedEnv.error);
    }

    const input: BenchConfigInput = {
        wordsFile: parsedEnv.data.OPENER_WORDS,
        targets: parsedEnv.data.OPENER_TARGETS,
        seed: parsedEnv.data.OPENER_SEED,
        outDir: parsedEnv.data.OPENER_OUT_DIR,
    };
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) Object.assign(input, { [key]: value });
    }

    const result = benchConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigError(result.error);
    }
    return result.data;
}

/** Selector thresholds with the configured overrides applied */
export function resolveSelectorConfig(config: BenchConfig): SelectorConfig {
    return { ...DEFAULT_SELECTOR_CONFIG, ...config.selector };
}
