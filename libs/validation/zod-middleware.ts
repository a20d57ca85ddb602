import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { ReboundError, ReboundErrorCategory } from '../errors/sanitizer.js';

/**
 * Validation helper for every value crossing into the engine.
 * Returns the parsed value or throws a ReboundError listing each issue.
 */
export function validate<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    data: unknown,
    context: string,
    category: ReboundErrorCategory = 'INPUT'
): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input validation failure");

        throw new ReboundError(
            `Validation Violation in ${context}: ${JSON.stringify(errorDetails)}`,
            { errors: errorDetails },
            category,
            { contextLabel: context }
        );
    }

    return result.data;
}

/**
 * Factory for reusable validators bound to one schema.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
