/**
 * Rebound Recovery Library
 *
 * Exports for the failure classification and recovery engine.
 */

// Shared Types
export type {
    ErrorKind,
    RecoveryAction,
    Urgency,
    ExceptionKind,
    ParameterValue,
    ToolParameters,
    RecoveryStrategy,
    ResourceSnapshot,
    FailureContext,
    FailureInput,
    FailureRunContext,
    EscalationRecord,
    RecentIncident,
    IncidentStatistics
} from './recoveryTypes.js';
export { ERROR_KINDS, RECOVERY_ACTIONS, URGENCIES, isUrgency } from './recoveryTypes.js';

// Classification
export { classifyError, exceptionKindOf, describeFailure } from './errorClassifier.js';

// Catalog and Selection
export { RECOVERY_CATALOG, strategiesFor } from './recoveryCatalog.js';
export type { SelectionTuning, SelectionContext } from './strategySelector.js';
export {
    DEFAULT_SELECTION_TUNING,
    adjustedProbability,
    scoreStrategy,
    exhaustedStrategy,
    selectStrategy
} from './strategySelector.js';

// Tool Substitution
export type { ToolTag, ConstraintFlag, ToolDirectory } from './toolDirectory.js';
export {
    TOOL_DIRECTORY,
    CONSTRAINT_EXCLUSIONS,
    loadToolDirectory,
    alternativesFor,
    getAlternative,
    constraintsFromStrategy
} from './toolDirectory.js';

// Parameter Adjustment
export type { ParameterDelta } from './parameterAdjustment.js';
export {
    TOOL_PARAMETER_DELTAS,
    GENERIC_PARAMETER_DELTAS,
    deltaFor,
    adjustParameters
} from './parameterAdjustment.js';

// Ledger, Probe and Escalation
export type { StatisticsOptions } from './incidentLedger.js';
export { IncidentLedger, DEFAULT_LEDGER_CAPACITY } from './incidentLedger.js';
export type { ResourceProbe } from './resourceProbe.js';
export { HostResourceProbe } from './resourceProbe.js';
export type { EscalationSink } from './escalationReporter.js';
export {
    buildEscalation,
    suggestionsFor,
    publishEscalation,
    LoggingEscalationSink
} from './escalationReporter.js';

// Engine and Runner
export type { RecoveryEngineOptions, RecoveryDecision } from './recoveryEngine.js';
export { RecoveryEngine } from './recoveryEngine.js';
export type {
    ToolRunRequest,
    ToolRunner,
    RecoveryRunStatus,
    RecoveryInfo,
    RecoveryRunResult,
    RecoveryRunOptions
} from './recoveryRunner.js';
export { runWithRecovery, computeBackoffDelay } from './recoveryRunner.js';

// Configuration
export type { EngineConfig } from '../config/engineConfig.js';
export { loadEngineConfig, DEFAULT_ENGINE_CONFIG } from '../config/engineConfig.js';
