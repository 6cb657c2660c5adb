import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Internal errors are wrapped in a generic message plus a unique incidentId
 * for log correlation. The raw cause is logged, never returned to callers.
 */

export class GatewayError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'SEC' | 'OPS' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage);
        this.name = 'GatewayError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

function readStringField(value: object, field: 'message' | 'stack' | 'code'): string | undefined {
    const candidate: unknown = Reflect.get(value, field);
    return typeof candidate === 'string' ? candidate : undefined;
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized GatewayError.
     */
    sanitize: (err: unknown, contextLabel: string): GatewayError => {
        if (err instanceof GatewayError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let sqlState: string | undefined;

        if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object') {
            originalErrorMessage = readStringField(err, 'message');
            originalErrorStack = readStringField(err, 'stack');
            sqlState = readStringField(err, 'code');
        } else {
            originalErrorMessage = String(err);
        }

        return new GatewayError(
            `An internal system error occurred. Please contact support with ID: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            'OPS',
            { cause: err, contextLabel, sqlState }
        );
    }
};

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
