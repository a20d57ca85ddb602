/**
 * Rebound Recovery Catalog
 *
 * ErrorKind → candidate strategies in declared preference order.
 * Built once at module load and frozen; nothing mutates it afterwards.
 */

import { ErrorKind, RecoveryStrategy } from './recoveryTypes.js';

function strategy(template: RecoveryStrategy): RecoveryStrategy {
    return Object.freeze({
        ...template,
        actionParameters: Object.freeze({ ...template.actionParameters })
    });
}

function entry(templates: RecoveryStrategy[]): readonly RecoveryStrategy[] {
    return Object.freeze(templates.map(strategy));
}

export const RECOVERY_CATALOG: Readonly<Record<ErrorKind, readonly RecoveryStrategy[]>> = Object.freeze({
    timeout: entry([
        {
            action: 'retry_with_backoff',
            actionParameters: { initial_delay: 5, max_delay: 60 },
            maxAttempts: 3,
            backoffMultiplier: 2.0,
            successProbability: 0.7,
            estimatedTimeSeconds: 30
        },
        {
            action: 'retry_with_reduced_scope',
            actionParameters: { reduce_threads: true, reduce_timeout: true },
            maxAttempts: 2,
            backoffMultiplier: 1.0,
            successProbability: 0.8,
            estimatedTimeSeconds: 45
        },
        {
            action: 'switch_tool',
            actionParameters: { prefer_faster_tools: true },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 0.6,
            estimatedTimeSeconds: 60
        }
    ]),
    permission_denied: entry([
        {
            action: 'escalate_to_human',
            actionParameters: { message: 'Privilege escalation required', urgency: 'medium' },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 0.9,
            estimatedTimeSeconds: 300
        },
        {
            action: 'switch_tool',
            actionParameters: { require_no_privileges: true },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 0.5,
            estimatedTimeSeconds: 30
        }
    ]),
    network_unreachable: entry([
        {
            action: 'retry_with_backoff',
            actionParameters: { initial_delay: 10, max_delay: 120 },
            maxAttempts: 3,
            backoffMultiplier: 2.0,
            successProbability: 0.6,
            estimatedTimeSeconds: 60
        },
        {
            action: 'switch_tool',
            actionParameters: { prefer_offline_tools: true },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 0.4,
            estimatedTimeSeconds: 30
        }
    ]),
    rate_limited: entry([
        {
            action: 'retry_with_backoff',
            actionParameters: { initial_delay: 30, max_delay: 300 },
            maxAttempts: 5,
            backoffMultiplier: 1.5,
            successProbability: 0.9,
            estimatedTimeSeconds: 180
        },
        {
            action: 'adjust_parameters',
            actionParameters: { reduce_rate: true, increase_delays: true },
            maxAttempts: 2,
            backoffMultiplier: 1.0,
            successProbability: 0.8,
            estimatedTimeSeconds: 120
        }
    ]),
    tool_not_found: entry([
        {
            action: 'switch_tool',
            actionParameters: { find_equivalent: true },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 0.7,
            estimatedTimeSeconds: 15
        },
        {
            action: 'escalate_to_human',
            actionParameters: { message: 'Tool installation required', urgency: 'low' },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 0.9,
            estimatedTimeSeconds: 600
        }
    ]),
    invalid_parameters: entry([
        {
            action: 'adjust_parameters',
            actionParameters: { use_defaults: true, remove_invalid: true },
            maxAttempts: 3,
            backoffMultiplier: 1.0,
            successProbability: 0.8,
            estimatedTimeSeconds: 10
        },
        {
            action: 'switch_tool',
            actionParameters: { simpler_interface: true },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 0.6,
            estimatedTimeSeconds: 30
        }
    ]),
    resource_exhausted: entry([
        {
            action: 'retry_with_reduced_scope',
            actionParameters: { reduce_memory: true, reduce_threads: true },
            maxAttempts: 2,
            backoffMultiplier: 1.0,
            successProbability: 0.7,
            estimatedTimeSeconds: 60
        },
        {
            action: 'retry_with_backoff',
            actionParameters: { initial_delay: 60, max_delay: 300 },
            maxAttempts: 2,
            backoffMultiplier: 2.0,
            successProbability: 0.5,
            estimatedTimeSeconds: 180
        }
    ]),
    authentication_failed: entry([
        {
            action: 'escalate_to_human',
            actionParameters: { message: 'Authentication credentials required', urgency: 'high' },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 0.9,
            estimatedTimeSeconds: 300
        },
        {
            action: 'switch_tool',
            actionParameters: { no_auth_required: true },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 0.4,
            estimatedTimeSeconds: 30
        }
    ]),
    target_unreachable: entry([
        {
            action: 'retry_with_backoff',
            actionParameters: { initial_delay: 15, max_delay: 180 },
            maxAttempts: 3,
            backoffMultiplier: 2.0,
            successProbability: 0.6,
            estimatedTimeSeconds: 90
        },
        {
            action: 'graceful_degradation',
            actionParameters: { skip_target: true, continue_with_others: true },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 1.0,
            estimatedTimeSeconds: 5
        }
    ]),
    parsing_error: entry([
        {
            action: 'adjust_parameters',
            actionParameters: { change_output_format: true, add_parsing_flags: true },
            maxAttempts: 2,
            backoffMultiplier: 1.0,
            successProbability: 0.7,
            estimatedTimeSeconds: 20
        },
        {
            action: 'switch_tool',
            actionParameters: { better_output_format: true },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 0.6,
            estimatedTimeSeconds: 30
        }
    ]),
    unknown: entry([
        {
            action: 'retry_with_backoff',
            actionParameters: { initial_delay: 5, max_delay: 30 },
            maxAttempts: 2,
            backoffMultiplier: 2.0,
            successProbability: 0.3,
            estimatedTimeSeconds: 45
        },
        {
            action: 'escalate_to_human',
            actionParameters: { message: 'Unknown error encountered', urgency: 'medium' },
            maxAttempts: 1,
            backoffMultiplier: 1.0,
            successProbability: 0.9,
            estimatedTimeSeconds: 300
        }
    ])
});

/**
 * Candidate strategies for an error kind, in declared preference order.
 */
export function strategiesFor(kind: ErrorKind): readonly RecoveryStrategy[] {
    return RECOVERY_CATALOG[kind];
}
