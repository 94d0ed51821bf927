import { Command } from 'commander';
import { z } from 'zod';
import {
    ContradictionError,
    formatFeedback,
    parseFeedback,
    rankGuesses,
    replayHistory,
    solveGame,
    suggestNext,
} from '@opener-lab/engine';
import type { GameResult, HistoryEntry } from '@opener-lab/engine';
import { loadConfig, resolveSelectorConfig } from './config.js';
import { ConfigError } from './errors.js';
import type { Logger } from './logger.js';
import { createConsoleReporter } from './reporter.js';
import { createFileSink } from './results.js';
import { runSweep } from './sweep.js';
import { loadWordList } from './wordlist.js';

interface SweepOptions {
    words?: string;
    targets?: number;
    seed?: string;
    saveInterval?: number;
    out?: string;
    starters?: string[];
    limit?: number;
    budget?: number;
    shardSize?: number;
}

interface SolveCommandOptions {
    words?: string;
    starter?: string;
}

interface SuggestOptions {
    words?: string;
    top: string;
}

const suggestOptionsSchema = z.object({
    top: z.coerce.number().int().min(1),
});

const WORD_PATTERN = /^[A-Z]{5}$/;
const LIST_REMAINING_UP_TO = 20;

const parseInteger = (value: string) => Number.parseInt(value, 10);
const parseList = (value: string) => value.split(',').map((w) => w.trim()).filter((w) => w.length > 0);

function normalizeWord(raw: string, role: string): string {
    const word = raw.trim().toUpperCase();
    if (!WORD_PATTERN.test(word)) {
        throw new Error(`${role} must be 5 letters A-Z: ${raw}`);
    }
    return word;
}

/** Reads `SLATE=BBGBG` (or `SLATE:🟩⬛⬛🟨⬛`) into a history entry */
export function parseHistoryEntry(text: string): HistoryEntry {
    const separator = text.search(/[=:]/);
    if (separator < 0) {
        throw new Error(`Expected GUESS=FEEDBACK, got: ${text}`);
    }
    return {
        guess: normalizeWord(text.slice(0, separator), 'Guess'),
        feedback: parseFeedback(text.slice(separator + 1)),
    };
}

/** Final line of a solved or failed game */
export function describeOutcome(result: GameResult): string {
    const { outcome } = result;
    switch (outcome.kind) {
        case 'solved':
            return `Solved in ${outcome.turns} tries!`;
        case 'failed':
            return outcome.reason === 'contradiction'
                ? 'Failed: no candidate words remained'
                : `Failed to solve in ${result.turns.length} tries!`;
    }
}

/**
 * Builds the command-line interface. Output goes through `logger`.
 */
export function createProgram(logger: Logger): Command {
    const program = new Command();

    program
        .name('opener-lab')
        .description('Benchmark opening words for a 5-letter word-guessing game');

    program
        .command('sweep')
        .description('Simulate games for every starter and rank them')
        .option('--words <file>', 'word list, one word per line')
        .option('--targets <n>', 'random targets per starter', parseInteger)
        .option('--seed <seed>', 'seed for the target draw, a number or a label to hash')
        .option('--save-interval <n>', 'write intermediate results every n starters', parseInteger)
        .option('--out <dir>', 'directory for result files')
        .option('--starters <csv>', 'only evaluate these starters', parseList)
        .option('--limit <n>', 'only evaluate the first n starters', parseInteger)
        .option('--budget <ms>', 'stop starting new starters after this many milliseconds', parseInteger)
        .option('--shard-size <n>', 'targets per local tally', parseInteger)
        .action(async (options: SweepOptions) => {
            const config = loadConfig({
                wordsFile: options.words,
                targets: options.targets,
                seed: options.seed,
                saveInterval: options.saveInterval,
                outDir: options.out,
                starters: options.starters,
                limit: options.limit,
                timeBudgetMs: options.budget,
                shardSize: options.shardSize,
            });
            const words = await loadWordList(config.wordsFile);

            logger.info(`Loaded ${words.length} words from ${config.wordsFile}`);
            logger.info(`Targets per starter: ${Math.min(config.targets, words.length)}, seed: ${config.seed}, save interval: ${config.saveInterval}`);

            await runSweep(words, config, {
                sink: createFileSink(config.outDir, config),
                onEvent: createConsoleReporter(logger),
            });
        });

    program
        .command('solve')
        .description('Solve one target word and show every guess')
        .argument('<target>', 'secret word')
        .option('--words <file>', 'word list, one word per line')
        .option('--starter <word>', 'opening guess')
        .action(async (rawTarget: string, options: SolveCommandOptions) => {
            const config = loadConfig({ wordsFile: options.words });
            const words = await loadWordList(config.wordsFile);
            const target = normalizeWord(rawTarget, 'Target');
            const starter = options.starter === undefined ? undefined : normalizeWord(options.starter, 'Starter');

            if (!words.includes(target)) {
                logger.warn(`${target} is not in the word list; solving anyway`);
            }

            const result = solveGame(target, words, { starter, config: resolveSelectorConfig(config) });
            result.turns.forEach((turn, i) => {
                logger.info(`Guess ${i + 1}: ${turn.guess} ${formatFeedback(turn.feedback)} (${turn.remaining} remaining)`);
            });
            logger.info(describeOutcome(result));
        });

    program
        .command('suggest')
        .description('Suggest the next word from guesses already played')
        .argument('[history...]', 'played guesses as GUESS=FEEDBACK, e.g. SLATE=BBGBG')
        .option('--words <file>', 'word list, one word per line')
        .option('--top <n>', 'ranked alternatives to list', '8')
        .action(async (entries: string[], options: SuggestOptions) => {
            const parsedOptions = suggestOptionsSchema.safeParse(options);
            if (!parsedOptions.success) {
                throw new ConfigError(parsedOptions.error);
            }
            const { top } = parsedOptions.data;

            const config = loadConfig({ wordsFile: options.words });
            const words = await loadWordList(config.wordsFile);
            const selector = resolveSelectorConfig(config);
            const history = entries.map(parseHistoryEntry);
            const state = replayHistory(words, history);

            const { outcome } = state;
            if (outcome?.kind === 'solved') {
                logger.info(`Solved in ${outcome.turns} tries: ${history[history.length - 1].guess}`);
                return;
            }

            if (state.candidates.length === 0) {
                throw new ContradictionError('No valid words remaining; check the feedback entered');
            }

            logger.info(`Possible words remaining: ${state.candidates.length}`);
            if (state.candidates.length <= LIST_REMAINING_UP_TO) {
                logger.info(`Remaining possibilities: ${state.candidates.join(', ')}`);
            }

            const turn = history.length + 1;
            if (state.candidates.length > 2) {
                for (const ranked of rankGuesses(state.candidates, words, turn, state.knowledge, selector).slice(0, top)) {
                    const marker = ranked.isCandidateAnswer ? ' [ANSWER]' : '';
                    logger.info(
                        `  ${ranked.word}: max=${ranked.maxBucket}, avg=${ranked.avgBucket.toFixed(1)}, ` +
                        `new=${ranked.newLetters}, known=${ranked.knownLetterCount}, score=${ranked.finalScore.toFixed(3)}${marker}`
                    );
                }
            }

            logger.info(`Suggested word: ${suggestNext(words, history, { config: selector })}`);
        });

    return program;
}
