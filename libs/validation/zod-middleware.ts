import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    path: string;
    message: string;
}

/**
 * Rejected boundary input. Carries issue paths and messages, never the
 * submitted values.
 */
export class InputValidationError extends Error {
    readonly statusCode = 400;

    constructor(readonly context: string, readonly issues: ValidationIssue[]) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'InputValidationError';
    }
}

/**
 * Fail-closed validation of untrusted input.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);
    if (result.success) {
        return result.data;
    }

    const issues = result.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message
    }));

    logger.warn({ context, errors: issues }, "Input validation failure");
    throw new InputValidationError(context, issues);
}

/**
 * Bind a schema once, validate many times.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) =>
    (data: unknown, contextLabel: string): T => validate(schema, data, contextLabel);
