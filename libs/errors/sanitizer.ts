import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Error wrapping for the engine boundary.
 * Internal details are logged once, with an errorId for correlation,
 * and never copied into the public message.
 */

export type ReboundErrorCategory = 'INPUT' | 'CONFIG' | 'INTERNAL';

const MAX_MESSAGE_LENGTH = 2000;

export class ReboundError extends Error {
    public readonly errorId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: ReboundErrorCategory = 'INTERNAL',
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'ReboundError';
        this.errorId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        logger.error({
            errorId: this.errorId,
            category: this.category,
            contextLabel: this.contextLabel,
            internalDetails
        }, publicMessage);
    }
}

/**
 * Remove credential fragments from raw tool output before it is stored
 * in an incident or handed to an escalation sink.
 */
export function sanitizeErrorMessage(message: string): string {
    return message
        .replace(/password[=:]\s*\S+/gi, 'password=[REDACTED]')
        .replace(/token[=:]\s*\S+/gi, 'token=[REDACTED]')
        .replace(/key[=:]\s*\S+/gi, 'key=[REDACTED]')
        .replace(/secret[=:]\s*\S+/gi, 'secret=[REDACTED]')
        .substring(0, MAX_MESSAGE_LENGTH);
}
