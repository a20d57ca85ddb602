import { z } from 'zod';
import { logger } from '../logging/logger.js';
import { validate } from '../validation/zod-middleware.js';

/**
 * Engine configuration, read from the environment once at startup.
 * Every value has a default; a value that is present but invalid fails
 * the load instead of silently falling back.
 */

const intFromEnv = (fallback: number, min: number) =>
    z.coerce.number().int().min(min).default(fallback);

export const EngineConfigSchema = z.object({
    REBOUND_LEDGER_CAPACITY: intFromEnv(1000, 1),
    REBOUND_ATTEMPT_DISCOUNT: z.coerce.number().gt(0).max(1).default(0.9),
    REBOUND_TIME_WEIGHT: z.coerce.number().positive().default(1000),
    REBOUND_RECENT_WINDOW_SECONDS: intFromEnv(3600, 1),
    REBOUND_RECENT_LIMIT: intFromEnv(10, 1),
    REBOUND_ESCALATION_HISTORY: intFromEnv(5, 0),
    REBOUND_MAX_TOTAL_ATTEMPTS: intFromEnv(10, 1)
});

export interface EngineConfig {
    readonly ledgerCapacity: number;
    readonly attemptDiscount: number;
    readonly timeWeight: number;
    readonly recentWindowSeconds: number;
    readonly recentLimit: number;
    readonly escalationHistory: number;
    readonly maxTotalAttempts: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
    ledgerCapacity: 1000,
    attemptDiscount: 0.9,
    timeWeight: 1000,
    recentWindowSeconds: 3600,
    recentLimit: 10,
    escalationHistory: 5,
    maxTotalAttempts: 10
});

/**
 * Empty strings count as unset so that `VAR=` keeps the default.
 */
function presentOnly(env: NodeJS.ProcessEnv): Record<string, string> {
    const result: Record<string, string> = {};
    for (const key of Object.keys(EngineConfigSchema.shape)) {
        const value = env[key]?.trim();
        if (value) result[key] = value;
    }
    return result;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const parsed = validate(EngineConfigSchema, presentOnly(env), 'EngineConfig', 'CONFIG');

    const config: EngineConfig = Object.freeze({
        ledgerCapacity: parsed.REBOUND_LEDGER_CAPACITY,
        attemptDiscount: parsed.REBOUND_ATTEMPT_DISCOUNT,
        timeWeight: parsed.REBOUND_TIME_WEIGHT,
        recentWindowSeconds: parsed.REBOUND_RECENT_WINDOW_SECONDS,
        recentLimit: parsed.REBOUND_RECENT_LIMIT,
        escalationHistory: parsed.REBOUND_ESCALATION_HISTORY,
        maxTotalAttempts: parsed.REBOUND_MAX_TOTAL_ATTEMPTS
    });

    logger.info({ config }, 'Engine configuration loaded');
    return config;
}
