// Types
export type {
    LetterResult,
    GuessResult,
    CandidateSet,
    KnowledgeState,
    PartitionMetrics,
    Regime,
    SelectorConfig,
    SelectOptions,
    RankedGuess,
    FailureReason,
    GameOutcome,
    TurnRecord,
    SolverState,
    SolveOptions,
    GameResult,
    HistoryEntry,
} from './types.js';

// Errors
export { ContradictionError, FeedbackFormatError } from './errors.js';

// Feedback
export { computeFeedback, isSolved, patternKey } from './evaluator.js';
export { parseFeedback, formatFeedback } from './feedbackFormat.js';

// Candidate filtering and partitions
export { filterCandidates } from './filter.js';
export { partitionCandidates, evaluatePartition } from './partition.js';

// Knowledge
export { createKnowledge, updateKnowledge, countNewLetters, countKnownLetters } from './knowledge.js';

// Guess selection
export {
    DEFAULT_SELECTOR_CONFIG,
    selectRegime,
    letterFrequencies,
    frequencyScore,
    findSplitter,
    buildEvaluationSet,
    scoreGuess,
    rankGuesses,
    selectGuess,
} from './selector.js';

// Game loop
export {
    MAX_TURNS,
    createSolverState,
    playTurn,
    solveGame,
    replayHistory,
    suggestNext,
} from './game.js';

// Sampling
export { seedFromString, mulberry32, sampleTargets } from './sampling.js';
