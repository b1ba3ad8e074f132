import { createLogger } from '../logger.js';
import type { MonthlyCounter } from '../state/records.js';

// ============================================================================
// Postloop: Monthly Post Budget
// Counts confirmed publishes per calendar month against a ceiling.
// Rollover is lazy: a new month is noticed at the next check.
// ============================================================================

const log = createLogger('Budget');

export type BudgetCheck =
    | { allowed: true; counter: MonthlyCounter }
    | { allowed: false; counter: MonthlyCounter; count: number; ceiling: number };

/**
 * Counter for `monthKey`: unchanged when it already tracks that month, zeroed otherwise.
 */
export function rollover(counter: MonthlyCounter, monthKey: string): MonthlyCounter {
    if (counter.month_key === monthKey) return counter;
    log.info(`New month ${monthKey}, resetting post count (was ${counter.count} for ${counter.month_key})`);
    return { month_key: monthKey, count: 0 };
}

/**
 * Gate check. Never increments; the returned counter is already rolled over.
 */
export function checkBudget(counter: MonthlyCounter, monthKey: string, ceiling: number): BudgetCheck {
    const current = rollover(counter, monthKey);
    if (current.count >= ceiling) {
        return { allowed: false, counter: current, count: current.count, ceiling };
    }
    return { allowed: true, counter: current };
}

/**
 * Record one confirmed publish.
 */
export function recordPublish(counter: MonthlyCounter, monthKey: string): MonthlyCounter {
    const current = rollover(counter, monthKey);
    return { month_key: current.month_key, count: current.count + 1 };
}

export function budgetSummary(counter: MonthlyCounter, ceiling: number): string {
    return `${counter.count}/${ceiling} posts in ${counter.month_key}`;
}
