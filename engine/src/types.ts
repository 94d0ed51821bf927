/** Result of evaluating a single letter in a guess */
export type LetterResult = 'correct' | 'present' | 'absent';

/** Result of evaluating a full guess against a target word */
export type GuessResult = readonly LetterResult[];

/** Ordered words still consistent with every feedback seen in a game */
export type CandidateSet = readonly string[];

/**
 * Everything learned about the secret word so far.
 * Treated as an immutable value: updates return a fresh state.
 */
export interface KnowledgeState {
    /** Letters confirmed somewhere in the target */
    knownLetters: ReadonlySet<string>;
    /** Letters confirmed at a position (correct feedback only) */
    knownPositions: readonly (string | null)[];
    /** Letters confirmed absent; never overlaps knownLetters */
    excludedLetters: ReadonlySet<string>;
    /** Positions a present letter is known not to occupy */
    wrongPositions: ReadonlyMap<string, ReadonlySet<number>>;
}

/** Metrics of splitting a candidate set by the feedback one guess would produce */
export interface PartitionMetrics {
    maxBucket: number;
    avgBucket: number;
    isCandidateAnswer: boolean;
    eliminationScore: number;
    bucketCount: number;
}

export type Regime = 'elimination' | 'exploration' | 'answer';

/** Hand-tuned thresholds of the guess selector */
export interface SelectorConfig {
    eliminationThreshold: number;
    answerFocusThreshold: number;
    endgameSize: number;
    lateTurn: number;
    pairScanLimit: number;
    eliminationScanLimit: number;
    eliminationMinNewLetters: number;
    eliminationMinPool: number;
    eliminationPoolCap: number;
    explorationScanLimit: number;
    explorationMinNewLetters: number;
    explorationPoolCap: number;
    answerPoolMin: number;
    answerExtensionScanLimit: number;
}

export interface SelectOptions {
    /** Opening word forced on turn 1 */
    starter?: string;
    config?: SelectorConfig;
}

/** A scored member of the evaluation set */
export interface RankedGuess extends PartitionMetrics {
    word: string;
    newLetters: number;
    knownLetterCount: number;
    finalScore: number;
}

export type FailureReason = 'exhausted' | 'contradiction';

export type GameOutcome =
    | { kind: 'solved'; turns: number }
    | { kind: 'failed'; reason: FailureReason };

export interface TurnRecord {
    guess: string;
    feedback: GuessResult;
    /** Candidates left after this turn's feedback */
    remaining: number;
}

/** State of a single simulated game */
export interface SolverState {
    candidates: CandidateSet;
    knowledge: KnowledgeState;
    turns: readonly TurnRecord[];
    outcome: GameOutcome | null;
}

export interface SolveOptions extends SelectOptions {
    maxTurns?: number;
}

export interface GameResult {
    starter: string | null;
    target: string;
    guesses: string[];
    turns: TurnRecord[];
    outcome: GameOutcome;
}

/** A guess and the feedback it received, as entered by a player */
export interface HistoryEntry {
    guess: string;
    feedback: GuessResult;
}
