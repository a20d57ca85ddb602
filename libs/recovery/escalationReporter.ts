/**
 * Rebound Escalation Reporter
 *
 * Builds the structured record handed to a human operator once autonomous
 * recovery is exhausted. Delivery belongs to an external sink; this module
 * only builds and publishes the record.
 */

import { logger } from '../logging/logger.js';
import { deepFreeze } from './frozen.js';
import { IncidentLedger } from './incidentLedger.js';
import {
    ErrorKind,
    EscalationRecord,
    FailureContext,
    Urgency
} from './recoveryTypes.js';

export const DEFAULT_ESCALATION_HISTORY = 5;

/**
 * Remediation hints per error kind.
 */
const HUMAN_SUGGESTIONS: Readonly<Record<ErrorKind, (tool: string) => readonly string[]>> = {
    timeout: () => [
        'Confirm the target responds to a manual probe',
        'Raise the per-call timeout or lower concurrency',
        'Schedule the run outside the target\'s peak hours'
    ],
    permission_denied: () => [
        'Retry with elevated privileges',
        'Check file and directory permissions',
        'Check group membership of the runner account'
    ],
    network_unreachable: () => [
        'Check network connectivity from the runner',
        'Verify the target is reachable',
        'Review firewall rules'
    ],
    rate_limited: () => [
        'Wait before retrying',
        'Lower the scan rate',
        'Check the API or WAF rate limits for the target'
    ],
    tool_not_found: (tool) => [
        `Install ${tool} with the package manager`,
        `Check that ${tool} is on PATH`,
        'Verify the tool installation'
    ],
    invalid_parameters: (tool) => [
        `Check the ${tool} version against the parameters in use`,
        'Review the failing parameters in the incident context'
    ],
    resource_exhausted: () => [
        'Free memory or disk space on the runner',
        'Lower concurrency for this campaign'
    ],
    authentication_failed: () => [
        'Provide valid credentials for the target',
        'Check whether the token or session has expired'
    ],
    target_unreachable: () => [
        'Verify the target hostname resolves',
        'Confirm the target is in scope and online'
    ],
    parsing_error: (tool) => [
        `Check the ${tool} output format flags`,
        'Inspect the raw tool output'
    ],
    unknown: () => [
        'Review error details and logs'
    ]
};

export function suggestionsFor(kind: ErrorKind, tool: string): readonly string[] {
    return HUMAN_SUGGESTIONS[kind](tool);
}

/**
 * Build the escalation record for an incident.
 *
 * recentErrors holds the messages of up to `historyLimit` prior incidents
 * of the same lineage that the ledger still retains.
 */
export function buildEscalation(
    context: FailureContext,
    urgency: Urgency,
    ledger: IncidentLedger,
    summary?: string,
    historyLimit: number = DEFAULT_ESCALATION_HISTORY
): EscalationRecord {
    const retained = context.previousIncidentIds
        .map(id => ledger.get(id))
        .filter((incident): incident is FailureContext => incident !== undefined)
        .map(incident => incident.errorMessage);
    const recentErrors = historyLimit > 0 ? retained.slice(-historyLimit) : [];

    return deepFreeze({
        incidentId: context.incidentId,
        timestamp: context.timestamp,
        tool: context.toolName,
        target: context.target,
        errorKind: context.errorKind,
        errorMessage: context.errorMessage,
        attemptCount: context.attemptCount,
        urgency,
        summary: summary ?? `${context.errorKind} on ${context.toolName} against ${context.target}`,
        suggestedActions: [...suggestionsFor(context.errorKind, context.toolName)],
        context: {
            parameters: structuredClone(context.parameters),
            systemResources: structuredClone(context.systemResources),
            recentErrors
        }
    });
}

/**
 * External delivery target: notification, ticketing or log collector.
 */
export interface EscalationSink {
    publish(record: EscalationRecord): void;
}

/**
 * Default sink: writes the record to the operational log.
 */
export class LoggingEscalationSink implements EscalationSink {
    publish(record: EscalationRecord): void {
        logger.error({ escalation: record }, `HUMAN ESCALATION REQUIRED: ${record.tool} [${record.urgency}]`);
    }
}

/**
 * Hand a record to a sink. A failing sink is logged; the decision stands.
 */
export function publishEscalation(sink: EscalationSink, record: EscalationRecord): boolean {
    try {
        sink.publish(record);
        return true;
    } catch (error) {
        logger.error({
            incidentId: record.incidentId,
            error: error instanceof Error ? error.message : String(error)
        }, 'Escalation sink failed to publish record');
        return false;
    }
}
