/**
 * Rebound Recovery Runner
 *
 * Drives an injected ToolRunner through the engine's decisions until the
 * run succeeds or recovery stops. Rebound never executes tools itself;
 * the runner implementation belongs to the tool-execution layer.
 *
 * Steps per failure:
 * 1. Evaluate the failure with the current attempt count
 * 2. Apply the chosen action (wait, rewrite parameters, switch tool)
 * 3. Stop on degradation, escalation or abort
 *
 * A run that runs out of untried tools or of attempts escalates its last
 * incident with high urgency before it returns `exhausted`.
 */

import { logger } from '../logging/logger.js';
import { describeFailure } from './errorClassifier.js';
import { RecoveryEngine } from './recoveryEngine.js';
import { constraintsFromStrategy } from './toolDirectory.js';
import {
    EscalationRecord,
    FailureContext,
    RecoveryAction,
    RecoveryStrategy,
    ToolParameters
} from './recoveryTypes.js';

export interface ToolRunRequest {
    readonly tool: string;
    readonly target: string;
    readonly parameters: ToolParameters;
}

/**
 * Tool-execution collaborator. Rejects with the tool's error on failure.
 */
export interface ToolRunner<T> {
    run(request: ToolRunRequest): Promise<T>;
}

export type RecoveryRunStatus = 'succeeded' | 'degraded' | 'escalated' | 'aborted' | 'exhausted';

export interface RecoveryInfo {
    readonly recoveryApplied: boolean;
    readonly attemptsMade: number;
    readonly strategiesUsed: readonly RecoveryAction[];
    readonly lastStrategy?: RecoveryAction;
}

export interface RecoveryRunResult<T> {
    readonly status: RecoveryRunStatus;
    readonly output?: T;
    /** Tool and parameters of the last attempt */
    readonly tool: string;
    readonly parameters: ToolParameters;
    readonly recoveryInfo: RecoveryInfo;
    readonly incidents: readonly FailureContext[];
    readonly escalation?: EscalationRecord;
}

export interface RecoveryRunOptions {
    /** Upper bound on tool invocations across every strategy */
    readonly maxTotalAttempts?: number;
    readonly sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function numericParameter(strategy: RecoveryStrategy, name: string): number | undefined {
    const value = strategy.actionParameters[name];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Backoff delay in seconds before the retry following `attemptCount`:
 * initial_delay × multiplier^(attempt − 1), capped at max_delay.
 */
export function computeBackoffDelay(strategy: RecoveryStrategy, attemptCount: number): number {
    const initial = numericParameter(strategy, 'initial_delay') ?? 1;
    const max = numericParameter(strategy, 'max_delay') ?? Number.POSITIVE_INFINITY;
    const delay = initial * Math.pow(strategy.backoffMultiplier, Math.max(0, attemptCount - 1));
    return Math.min(delay, max);
}

export async function runWithRecovery<T>(
    engine: RecoveryEngine,
    request: ToolRunRequest,
    runner: ToolRunner<T>,
    options: RecoveryRunOptions = {}
): Promise<RecoveryRunResult<T>> {
    const maxTotalAttempts = options.maxTotalAttempts ?? engine.config.maxTotalAttempts;
    const sleep = options.sleep ?? defaultSleep;

    let tool = request.tool;
    let parameters: ToolParameters = { ...request.parameters };
    let attemptCount = 1;
    let attemptsMade = 0;
    const strategiesUsed: RecoveryAction[] = [];
    const incidents: FailureContext[] = [];
    const triedTools = new Set<string>([tool]);

    const finish = (
        status: RecoveryRunStatus,
        extra: { output?: T; escalation?: EscalationRecord } = {}
    ): RecoveryRunResult<T> => {
        const lastStrategy = strategiesUsed[strategiesUsed.length - 1];
        logger.info({
            tool,
            target: request.target,
            status,
            attemptsMade,
            strategiesUsed
        }, 'Recovery run finished');

        return {
            status,
            ...extra,
            tool,
            parameters,
            recoveryInfo: {
                recoveryApplied: strategiesUsed.length > 0,
                attemptsMade,
                strategiesUsed: [...strategiesUsed],
                ...(lastStrategy ? { lastStrategy } : {})
            },
            incidents: [...incidents]
        };
    };

    const exhaust = (summary: string): RecoveryRunResult<T> => {
        const lastIncident = incidents[incidents.length - 1];
        if (!lastIncident) {
            return finish('exhausted');
        }
        return finish('exhausted', { escalation: engine.escalate(lastIncident, 'high', summary) });
    };

    while (attemptsMade < maxTotalAttempts) {
        attemptsMade++;

        try {
            const output = await runner.run({ tool, target: request.target, parameters });
            return finish('succeeded', { output });
        } catch (error) {
            const decision = engine.evaluateFailure(tool, describeFailure(error), {
                target: request.target,
                parameters,
                attemptCount
            });
            const { strategy, incident } = decision;
            incidents.push(incident);
            strategiesUsed.push(strategy.action);

            switch (strategy.action) {
                case 'retry_with_backoff':
                    await sleep(computeBackoffDelay(strategy, attemptCount) * 1000);
                    attemptCount++;
                    continue;

                case 'retry_with_reduced_scope':
                case 'adjust_parameters':
                    parameters = engine.adjustParameters(tool, incident.errorKind, parameters);
                    attemptCount++;
                    continue;

                case 'switch_tool': {
                    const alternative = engine.getAlternative(tool, constraintsFromStrategy(strategy), triedTools);
                    if (!alternative) {
                        logger.warn({ tool, errorKind: incident.errorKind, triedTools: [...triedTools] }, 'No untried alternative tool available');
                        return exhaust(`No untried alternative tool for ${tool}`);
                    }
                    tool = alternative;
                    triedTools.add(tool);
                    // A substitute tool starts a new logical operation.
                    attemptCount = 1;
                    continue;
                }

                case 'graceful_degradation':
                    return finish('degraded');

                case 'escalate_to_human':
                    return finish('escalated', decision.escalation ? { escalation: decision.escalation } : {});

                case 'abort':
                    return finish('aborted');
            }
        }
    }

    return exhaust(`Attempt limit of ${maxTotalAttempts} reached for ${tool}`);
}
