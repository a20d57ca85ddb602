/**
 * Rebound Recovery Engine
 *
 * Facade invoked by the tool-execution layer on every failed run:
 * classify → record → select → (escalate).
 *
 * The engine holds no state of its own beyond the injected ledger; the
 * catalog, substitution directory and parameter deltas are frozen tables.
 */

import crypto from 'crypto';
import { getToolLogger } from '../logging/logger.js';
import { ReboundError, sanitizeErrorMessage } from '../errors/sanitizer.js';
import { validate } from '../validation/zod-middleware.js';
import {
    FailureInputSchema,
    FailureRunContextSchema,
    ToolNameSchema
} from '../validation/schema.js';
import { DEFAULT_ENGINE_CONFIG, EngineConfig } from '../config/engineConfig.js';
import { classifyError } from './errorClassifier.js';
import { strategiesFor } from './recoveryCatalog.js';
import { selectStrategy, SelectionTuning } from './strategySelector.js';
import { alternativesFor, ConstraintFlag } from './toolDirectory.js';
import { frozenCopy } from './frozen.js';
import { adjustParameters } from './parameterAdjustment.js';
import { HostResourceProbe, ResourceProbe } from './resourceProbe.js';
import { IncidentLedger } from './incidentLedger.js';
import {
    buildEscalation,
    EscalationSink,
    LoggingEscalationSink,
    publishEscalation
} from './escalationReporter.js';
import {
    ErrorKind,
    EscalationRecord,
    FailureContext,
    FailureInput,
    FailureRunContext,
    IncidentStatistics,
    isUrgency,
    RecoveryStrategy,
    ToolParameters,
    Urgency
} from './recoveryTypes.js';

export interface RecoveryEngineOptions {
    readonly config?: EngineConfig;
    readonly ledger?: IncidentLedger;
    readonly probe?: ResourceProbe;
    readonly sink?: EscalationSink;
    readonly clock?: () => Date;
    readonly idGenerator?: () => string;
}

/**
 * Outcome of one failure evaluation.
 */
export interface RecoveryDecision {
    readonly incident: FailureContext;
    readonly strategy: RecoveryStrategy;
    /** Present when the selected action is escalate_to_human */
    readonly escalation?: EscalationRecord;
}

export class RecoveryEngine {
    public readonly config: EngineConfig;
    public readonly ledger: IncidentLedger;
    private readonly probe: ResourceProbe;
    private readonly sink: EscalationSink;
    private readonly clock: () => Date;
    private readonly idGenerator: () => string;
    private readonly tuning: SelectionTuning;

    constructor(options: RecoveryEngineOptions = {}) {
        this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
        this.ledger = options.ledger ?? new IncidentLedger(this.config.ledgerCapacity);
        this.probe = options.probe ?? new HostResourceProbe();
        this.sink = options.sink ?? new LoggingEscalationSink();
        this.clock = options.clock ?? (() => new Date());
        this.idGenerator = options.idGenerator ?? (() => crypto.randomUUID());
        this.tuning = Object.freeze({
            attemptDiscount: this.config.attemptDiscount,
            timeWeight: this.config.timeWeight
        });
    }

    /**
     * Classify a failure, record it, and choose the next recovery step.
     *
     * @throws ReboundError (INPUT) on an empty tool name, attemptCount < 1
     *         or parameters that cannot be copied
     */
    evaluateFailure(tool: string, failure: FailureInput, context: FailureRunContext = {}): RecoveryDecision {
        const toolName = validate(ToolNameSchema, tool, 'RecoveryEngine:Tool');
        const input = validate(FailureInputSchema, failure, 'RecoveryEngine:Failure');
        const run = validate(FailureRunContextSchema, context, 'RecoveryEngine:Context');
        const toolLogger = getToolLogger(toolName, run.target);

        const parameters = this.ownParameters(run.parameters);
        const errorKind = classifyError(input.message, input.exceptionKind);

        const incident: FailureContext = Object.freeze({
            incidentId: this.idGenerator(),
            toolName,
            target: run.target,
            parameters,
            errorKind,
            errorMessage: sanitizeErrorMessage(input.message),
            attemptCount: run.attemptCount,
            timestamp: this.clock().toISOString(),
            ...(input.stackTrace ? { stackTrace: input.stackTrace } : {}),
            systemResources: frozenCopy(this.probe.capture()),
            previousIncidentIds: Object.freeze(this.ledger.lineage(toolName, run.target))
        });

        this.ledger.append(incident);

        const strategy = selectStrategy(
            strategiesFor(errorKind),
            { toolName, attemptCount: run.attemptCount },
            this.tuning
        );

        toolLogger.warn({
            incidentId: incident.incidentId,
            errorKind,
            attemptCount: run.attemptCount,
            action: strategy.action
        }, `${errorKind} - Applying ${strategy.action}`);

        if (strategy.action !== 'escalate_to_human') {
            return Object.freeze({ incident, strategy });
        }

        const urgency = isUrgency(strategy.actionParameters.urgency) ? strategy.actionParameters.urgency : 'medium';
        const summary = typeof strategy.actionParameters.message === 'string'
            ? strategy.actionParameters.message
            : undefined;
        const escalation = this.escalate(incident, urgency, summary);

        return Object.freeze({ incident, strategy, escalation });
    }

    /**
     * Decision-only view of evaluateFailure.
     */
    handleFailure(tool: string, failure: FailureInput, context: FailureRunContext = {}): RecoveryStrategy {
        return this.evaluateFailure(tool, failure, context).strategy;
    }

    /**
     * Build an escalation record for an incident and publish it to the sink.
     */
    escalate(incident: FailureContext, urgency: Urgency = 'medium', summary?: string): EscalationRecord {
        const record = buildEscalation(incident, urgency, this.ledger, summary, this.config.escalationHistory);
        publishEscalation(this.sink, record);
        return record;
    }

    adjustParameters(tool: string, kind: ErrorKind, params: ToolParameters): Record<string, unknown> {
        return adjustParameters(tool, kind, params);
    }

    /**
     * Best substitute under the constraints, skipping any tool in `exclude`.
     */
    getAlternative(
        tool: string,
        constraints: Iterable<ConstraintFlag> = [],
        exclude: Iterable<string> = []
    ): string | undefined {
        const skip = new Set(exclude);
        return alternativesFor(tool, constraints).find(alt => !skip.has(alt));
    }

    /**
     * Incidents keep their own deep copy so later caller mutation cannot
     * reach the ledger, and freezing never touches caller objects.
     */
    private ownParameters(parameters: ToolParameters): ToolParameters {
        try {
            return frozenCopy(parameters);
        } catch (error) {
            throw new ReboundError(
                'Tool parameters must be plain data',
                { keys: Object.keys(parameters) },
                'INPUT',
                { cause: error, contextLabel: 'RecoveryEngine:Context' }
            );
        }
    }

    getStatistics(): IncidentStatistics {
        return this.ledger.statistics(this.clock(), {
            recentWindowSeconds: this.config.recentWindowSeconds,
            recentLimit: this.config.recentLimit
        });
    }
}
