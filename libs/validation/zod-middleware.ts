import type { ZodType, ZodTypeDef } from 'zod';
import { InputValidationError } from '../errors/workflowErrors.js';
import { logger } from '../logging/logger.js';

/**
 * Returns the parsed value or throws InputValidationError.
 * Only issue paths and messages are logged, never the payload.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({ context, errors: errorDetails }, 'Input validation failure');

        throw new InputValidationError(context, errorDetails);
    }

    return result.data;
}

/**
 * Factory for context-bound validators.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
