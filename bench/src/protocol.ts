import type { GameOutcome } from '@opener-lab/engine';

// ============================================================================
// Keys
// ============================================================================

/** Opening word under evaluation */
export type Starter = string;

/** Path of a written results file */
export type ResultsPath = string;

// ============================================================================
// Tallies
// ============================================================================

/** Per-starter game counts, local to whoever plays the games */
export interface StarterTally {
    starter: Starter;
    /** tries[i] = games solved in i + 1 turns */
    tries: [number, number, number, number, number, number];
    failed: number;
    /** failed games whose candidate set emptied */
    contradictions: number;
}

/** Tabulated result row for one starter */
export interface StarterSummary {
    starter: Starter;
    failed: number;
    tries: [number, number, number, number, number, number];
    totalGames: number;
    /** failed games whose candidate set emptied */
    contradictions: number;
    successRate: number;       // percent, 0-100
    avgTries: number;          // mean over solved games, 0 if none
}

// ============================================================================
// Sweep Events
// ============================================================================

export interface StarterDoneEvent {
    type: 'STARTER_DONE';
    index: number;             // 1-based
    total: number;
    summary: StarterSummary;
}

export interface CheckpointEvent {
    type: 'CHECKPOINT';
    path: ResultsPath;
    leaders: StarterSummary[];
}

export interface CheckpointFailedEvent {
    type: 'CHECKPOINT_FAILED';
    message: string;
}

export interface BudgetExhaustedEvent {
    type: 'BUDGET_EXHAUSTED';
    evaluated: number;
    skipped: number;
}

export interface SweepDoneEvent {
    type: 'SWEEP_DONE';
    path: ResultsPath;
    summaries: StarterSummary[];
    gamesPlayed: number;
}

/** Union of everything a sweep reports while running */
export type SweepEvent =
    | StarterDoneEvent
    | CheckpointEvent
    | CheckpointFailedEvent
    | BudgetExhaustedEvent
    | SweepDoneEvent;

export type SweepEventType = SweepEvent['type'];

// ============================================================================
// Helper Functions
// ============================================================================

/** Turn count of a game, or null when it failed */
export function solvedTurns(outcome: GameOutcome): number | null {
    return outcome.kind === 'solved' ? outcome.turns : null;
}

/** Create starter-done event helper */
export function createStarterDoneEvent(index: number, total: number, summary: StarterSummary): StarterDoneEvent {
    return { type: 'STARTER_DONE', index, total, summary };
}

/** Create checkpoint event helper */
export function createCheckpointEvent(path: ResultsPath, leaders: StarterSummary[]): CheckpointEvent {
    return { type: 'CHECKPOINT', path, leaders };
}

/** Create failed-checkpoint event helper */
export function createCheckpointFailedEvent(error: unknown): CheckpointFailedEvent {
    return { type: 'CHECKPOINT_FAILED', message: error instanceof Error ? error.message : String(error) };
}

/** Create budget event helper */
export function createBudgetExhaustedEvent(evaluated: number, skipped: number): BudgetExhaustedEvent {
    return { type: 'BUDGET_EXHAUSTED', evaluated, skipped };
}

/** Create sweep-done event helper */
export function createSweepDoneEvent(
    path: ResultsPath,
    summaries: StarterSummary[],
    gamesPlayed: number
): SweepDoneEvent {
    return { type: 'SWEEP_DONE', path, summaries, gamesPlayed };
}
