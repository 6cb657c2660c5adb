import { z, ZodTypeAny } from 'zod';
import { logger } from '../logging/logger.js';

export interface ValidationIssue {
    path: string;
    message: string;
}

export class ValidationError extends Error {
    constructor(public readonly context: string, public readonly issues: ValidationIssue[]) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationError';
    }
}

export type SafeValidation<T> =
    | { success: true; data: T }
    | { success: false; issues: ValidationIssue[] };

export function describeIssues(error: z.ZodError): ValidationIssue[] {
    return error.issues.map(e => ({
        path: e.path.join('.'),
        message: e.message
    }));
}

/**
 * Non-throwing variant for callers that render failures in-band.
 */
export function safeValidate<S extends ZodTypeAny>(schema: S, data: unknown): SafeValidation<z.output<S>> {
    const result = schema.safeParse(data);
    if (result.success) {
        return { success: true, data: result.data };
    }
    return { success: false, issues: describeIssues(result.error) };
}

/**
 * Validation function that throws a strictly typed error on failure.
 * Used for fail-closed boundaries such as configuration.
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown, context: string): z.output<S> {
    const result = safeValidate(schema, data);

    if (!result.success) {
        // Values are not logged: inputs may carry credentials.
        logger.warn({
            context,
            errors: result.issues,
        }, "Input Validation Failure");

        throw new ValidationError(context, result.issues);
    }

    return result.data;
}

/**
 * Factory for creating reusable validators.
 */
export const createValidator = <S extends ZodTypeAny>(schema: S) => {
    return (data: unknown, contextLabel: string): z.output<S> => validate(schema, data, contextLabel);
};
