/**
 * Rebound Parameter Adjustment
 *
 * Per-tool, per-kind parameter deltas with a generic fallback keyed only by
 * ErrorKind. Adjustment never mutates its input: delta keys overwrite,
 * every other original key passes through.
 */

import { logger } from '../logging/logger.js';
import { ERROR_KINDS, ErrorKind, ParameterValue, ToolParameters } from './recoveryTypes.js';

export type ParameterDelta = Readonly<Record<string, ParameterValue>>;

type DeltaTable = Readonly<Partial<Record<ErrorKind, ParameterDelta>>>;

function table(deltas: Partial<Record<ErrorKind, Record<string, ParameterValue>>>): DeltaTable {
    const frozen: Partial<Record<ErrorKind, ParameterDelta>> = {};
    for (const kind of ERROR_KINDS) {
        const delta = deltas[kind];
        if (delta) {
            frozen[kind] = Object.freeze({ ...delta });
        }
    }
    return Object.freeze(frozen);
}

const NO_DELTA: ParameterDelta = Object.freeze({});

export const TOOL_PARAMETER_DELTAS: Readonly<Record<string, DeltaTable>> = Object.freeze({
    nmap: table({
        timeout: { timing: '-T2', reduce_ports: true },
        rate_limited: { timing: '-T1', delay: '1000ms' },
        resource_exhausted: { max_parallelism: '10' }
    }),
    gobuster: table({
        timeout: { threads: '10', timeout: '30s' },
        rate_limited: { threads: '5', 'rate-limit': '10' },
        resource_exhausted: { threads: '5' }
    }),
    nuclei: table({
        timeout: { concurrency: '10', timeout: '30' },
        rate_limited: { 'rate-limit': '10', concurrency: '5' },
        resource_exhausted: { concurrency: '5' }
    }),
    feroxbuster: table({
        timeout: { threads: '10', timeout: '30' },
        rate_limited: { threads: '5', 'rate-limit': '10' },
        resource_exhausted: { threads: '5' }
    }),
    ffuf: table({
        timeout: { threads: '10', timeout: '30' },
        rate_limited: { threads: '5', rate: '10' },
        resource_exhausted: { threads: '5' }
    })
});

/**
 * Used when a tool has no delta of its own for the kind.
 * Kinds absent here have no generic delta.
 */
export const GENERIC_PARAMETER_DELTAS: DeltaTable = table({
    timeout: { timeout: '60', threads: '5' },
    rate_limited: { delay: '2s', threads: '3' },
    resource_exhausted: { threads: '3', memory_limit: '1G' }
});

/**
 * Resolve the delta for a tool and kind. Empty when no rule applies.
 */
export function deltaFor(tool: string, kind: ErrorKind): ParameterDelta {
    const specific = Object.hasOwn(TOOL_PARAMETER_DELTAS, tool)
        ? TOOL_PARAMETER_DELTAS[tool]?.[kind]
        : undefined;
    return specific ?? GENERIC_PARAMETER_DELTAS[kind] ?? NO_DELTA;
}

/**
 * Return a new parameter map with the delta for (tool, kind) applied.
 */
export function adjustParameters(
    tool: string,
    kind: ErrorKind,
    originalParams: ToolParameters
): Record<string, unknown> {
    const delta = deltaFor(tool, kind);
    const adjusted: Record<string, unknown> = { ...originalParams, ...delta };

    if (Object.keys(delta).length > 0) {
        logger.info({ tool, errorKind: kind, adjustments: delta }, 'Parameters adjusted');
    }

    return adjusted;
}
