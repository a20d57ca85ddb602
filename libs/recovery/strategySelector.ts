/**
 * Rebound Strategy Selector
 *
 * Scores catalog candidates against the attempt history and picks one.
 * Never fails: when every candidate's retry budget is spent, a terminal
 * escalation is returned instead.
 */

import { logger } from '../logging/logger.js';
import { RecoveryStrategy } from './recoveryTypes.js';

export interface SelectionTuning {
    /** Per-attempt discount applied to success probability */
    readonly attemptDiscount: number;
    /** Seconds of estimated time worth one point of probability */
    readonly timeWeight: number;
}

export const DEFAULT_SELECTION_TUNING: SelectionTuning = Object.freeze({
    attemptDiscount: 0.9,
    timeWeight: 1000
});

export interface SelectionContext {
    readonly toolName: string;
    readonly attemptCount: number;
}

/**
 * Success probability discounted for the failures already seen.
 */
export function adjustedProbability(
    strategy: RecoveryStrategy,
    attemptCount: number,
    tuning: SelectionTuning = DEFAULT_SELECTION_TUNING
): number {
    return strategy.successProbability * Math.pow(tuning.attemptDiscount, attemptCount - 1);
}

/**
 * Time is a minor tie-breaker next to the adjusted probability.
 */
export function scoreStrategy(
    strategy: RecoveryStrategy,
    attemptCount: number,
    tuning: SelectionTuning = DEFAULT_SELECTION_TUNING
): number {
    return adjustedProbability(strategy, attemptCount, tuning) - strategy.estimatedTimeSeconds / tuning.timeWeight;
}

/**
 * Terminal strategy returned once autonomous recovery is exhausted.
 */
export function exhaustedStrategy(toolName: string): RecoveryStrategy {
    return Object.freeze({
        action: 'escalate_to_human',
        actionParameters: Object.freeze({
            message: `All recovery strategies exhausted for ${toolName}`,
            urgency: 'high'
        }),
        maxAttempts: 1,
        backoffMultiplier: 1.0,
        successProbability: 0.9,
        estimatedTimeSeconds: 300
    });
}

/**
 * Select the best strategy for the current attempt.
 *
 * 1. Drop candidates whose maxAttempts is below the attempt count.
 * 2. None left → terminal escalation.
 * 3. Highest score wins; ties keep catalog order.
 */
export function selectStrategy(
    strategies: readonly RecoveryStrategy[],
    context: SelectionContext,
    tuning: SelectionTuning = DEFAULT_SELECTION_TUNING
): RecoveryStrategy {
    const { toolName, attemptCount } = context;
    const viable = strategies.filter(s => attemptCount <= s.maxAttempts);

    if (viable.length === 0) {
        logger.warn({ toolName, attemptCount }, 'Recovery strategies exhausted');
        return exhaustedStrategy(toolName);
    }

    let best: RecoveryStrategy | undefined;
    let bestScore = Number.NEGATIVE_INFINITY;
    for (const candidate of viable) {
        const score = scoreStrategy(candidate, attemptCount, tuning);
        if (score > bestScore) {
            best = candidate;
            bestScore = score;
        }
    }

    return best ?? exhaustedStrategy(toolName);
}
