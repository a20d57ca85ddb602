import { z } from 'zod';

/**
 * Schemas for values handed to the engine by the tool-execution layer.
 */

export const ExceptionKindSchema = z.enum(['timeout', 'permission', 'connectivity', 'not_found']);

export const ToolNameSchema = z.string().trim().min(1).max(128);

export const FailureInputSchema = z.object({
    message: z.string(),
    exceptionKind: ExceptionKindSchema.optional(),
    stackTrace: z.string().optional()
});

export const FailureRunContextSchema = z.object({
    target: z.string().min(1).default('unknown'),
    parameters: z.record(z.string(), z.unknown()).default({}),
    attemptCount: z.number().int().min(1).default(1)
});
