/**
 * Rebound Recovery Types
 *
 * Shared vocabulary for classification, strategy selection and escalation.
 * Every failure maps to exactly one ErrorKind; behaviour per kind lives in
 * lookup tables keyed by the kind, never on the kind itself.
 */

export const ERROR_KINDS = [
    'timeout',
    'permission_denied',
    'network_unreachable',
    'rate_limited',
    'tool_not_found',
    'invalid_parameters',
    'resource_exhausted',
    'authentication_failed',
    'target_unreachable',
    'parsing_error',
    'unknown'
] as const;

export type ErrorKind = typeof ERROR_KINDS[number];

export const RECOVERY_ACTIONS = [
    'retry_with_backoff',
    'retry_with_reduced_scope',
    'switch_tool',
    'adjust_parameters',
    'escalate_to_human',
    'graceful_degradation',
    'abort'
] as const;

export type RecoveryAction = typeof RECOVERY_ACTIONS[number];

export const URGENCIES = ['low', 'medium', 'high'] as const;

export type Urgency = typeof URGENCIES[number];

/**
 * Exception tags are more reliable than message text and short-circuit
 * pattern matching.
 */
export type ExceptionKind = 'timeout' | 'permission' | 'connectivity' | 'not_found';

export type ParameterValue = string | number | boolean;

export type ToolParameters = Readonly<Record<string, unknown>>;

/**
 * Action template with its success/cost estimate and retry budget.
 */
export interface RecoveryStrategy {
    readonly action: RecoveryAction;
    readonly actionParameters: Readonly<Record<string, ParameterValue>>;
    /** Highest attempt count this strategy still applies to (≥ 1) */
    readonly maxAttempts: number;
    /** Delay growth between retries (≥ 1.0) */
    readonly backoffMultiplier: number;
    /** Estimated chance of recovery on a first failure, in [0, 1] */
    readonly successProbability: number;
    readonly estimatedTimeSeconds: number;
}

/**
 * Best-effort host reading. Missing fields mean the reading failed.
 */
export type ResourceSnapshot =
    | {
        readonly status: 'available';
        /** CPU utilisation from time counters, not load */
        readonly cpuPercent?: number;
        readonly memoryPercent?: number;
        readonly diskPercent?: number;
        /** 1, 5 and 15 minute run-queue averages */
        readonly loadAverage?: readonly [number, number, number];
        readonly activeProcessCount?: number;
    }
    | { readonly status: 'unavailable'; readonly reason: string };

/**
 * Immutable record of one observed failure.
 * Prior incidents of the same tool+target lineage are referenced by id
 * into the ledger.
 */
export interface FailureContext {
    readonly incidentId: string;
    readonly toolName: string;
    readonly target: string;
    readonly parameters: ToolParameters;
    readonly errorKind: ErrorKind;
    /** Sanitized error text */
    readonly errorMessage: string;
    readonly attemptCount: number;
    /** ISO-8601 */
    readonly timestamp: string;
    /** Diagnostic only */
    readonly stackTrace?: string;
    readonly systemResources: ResourceSnapshot;
    readonly previousIncidentIds: readonly string[];
}

/**
 * Raw failure as reported by the tool-execution layer.
 */
export interface FailureInput {
    readonly message: string;
    readonly exceptionKind?: ExceptionKind;
    readonly stackTrace?: string;
}

/**
 * Execution context of the failed run.
 */
export interface FailureRunContext {
    readonly target?: string;
    readonly parameters?: ToolParameters;
    readonly attemptCount?: number;
}

export interface EscalationRecord {
    readonly incidentId: string;
    readonly timestamp: string;
    readonly tool: string;
    readonly target: string;
    readonly errorKind: ErrorKind;
    readonly errorMessage: string;
    readonly attemptCount: number;
    readonly urgency: Urgency;
    readonly summary: string;
    readonly suggestedActions: readonly string[];
    readonly context: {
        readonly parameters: ToolParameters;
        readonly systemResources: ResourceSnapshot;
        /** Messages of up to the last few prior incidents in the lineage */
        readonly recentErrors: readonly string[];
    };
}

export interface RecentIncident {
    readonly incidentId: string;
    readonly tool: string;
    readonly errorKind: ErrorKind;
    readonly timestamp: string;
}

export interface IncidentStatistics {
    readonly total: number;
    readonly byKind: Readonly<Partial<Record<ErrorKind, number>>>;
    readonly byTool: Readonly<Record<string, number>>;
    readonly recentCount: number;
    readonly recent: readonly RecentIncident[];
}

export function isUrgency(value: unknown): value is Urgency {
    return typeof value === 'string' && URGENCIES.some(u => u === value);
}
