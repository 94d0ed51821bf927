import type { StarterSummary, SweepEvent } from './protocol.js';
import type { Logger } from './logger.js';

const FINAL_LEADERS_SHOWN = 20;

/** `SLATE: 98.0% success, 3.61 avg tries` */
export function formatSummary(summary: StarterSummary): string {
    return `${summary.starter}: ${summary.successRate.toFixed(1)}% success, ${summary.avgTries.toFixed(2)} avg tries`;
}

/** `1:0, 2:3, 3:40, 4:45, 5:10, 6:2, Failed:2 (contradictions:1)` */
export function formatDistribution(summary: StarterSummary): string {
    const turns = summary.tries.map((n, i) => `${i + 1}:${n}`).join(', ');
    const contradictions = summary.contradictions > 0 ? ` (contradictions:${summary.contradictions})` : '';
    return `${turns}, Failed:${summary.failed}${contradictions}`;
}

function logLeaders(logger: Logger, heading: string, leaders: StarterSummary[]): void {
    logger.info(heading);
    leaders.forEach((summary, i) => logger.info(`  ${i + 1}. ${formatSummary(summary)}`));
}

/**
 * Renders sweep events as console progress lines.
 */
export function createConsoleReporter(logger: Logger): (event: SweepEvent) => void {
    return (event) => {
        switch (event.type) {
            case 'STARTER_DONE':
                logger.info(`[${event.index}/${event.total}] ${formatSummary(event.summary)} (${formatDistribution(event.summary)})`);
                break;
            case 'CHECKPOINT':
                logger.info(`Results saved to ${event.path}`);
                logLeaders(logger, `Current top ${event.leaders.length} starters:`, event.leaders);
                break;
            case 'CHECKPOINT_FAILED':
                logger.warn(`Error saving results: ${event.message}`);
                break;
            case 'BUDGET_EXHAUSTED':
                logger.warn(`Time budget exhausted after ${event.evaluated} starters; ${event.skipped} skipped`);
                break;
            case 'SWEEP_DONE':
                logger.info(`Final results saved to ${event.path} (${event.gamesPlayed} games)`);
                logLeaders(logger, 'Top starter words:', event.summaries.slice(0, FINAL_LEADERS_SHOWN));
                break;
        }
    };
}
