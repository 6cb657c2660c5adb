import type { Request, NextFunction } from 'express';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { internalFault, signatureRejected } from '../errors/taxonomy.js';
import type { WebhookStats } from '../observability/webhookStats.js';
import { composeRejection } from '../response/responseComposer.js';
import { sendEnvelope } from './envelope.js';
import { GatewayResponse, requestLogger } from './request-context.js';

/**
 * body-parser marks its errors with a `type` such as 'entity.too.large'.
 */
function bodyParserErrorType(err: unknown): string | null {
    if (typeof err !== 'object' || err === null) return null;
    const type: unknown = Reflect.get(err, 'type');
    const status: unknown = Reflect.get(err, 'status');
    if (typeof type === 'string' && typeof status === 'number' && status >= 400 && status < 500) {
        return type;
    }
    return null;
}

/**
 * Last handler: whatever escaped the pipeline still leaves as an envelope.
 */
export function createErrorHandler(stats: WebhookStats) {
    return (err: unknown, req: Request, res: GatewayResponse, next: NextFunction): void => {
        if (res.headersSent) {
            next(err);
            return;
        }

        const parserError = bodyParserErrorType(err);
        if (parserError) {
            requestLogger(req, res).warn({ parserError }, 'Request body rejected by parser');
            const message = parserError === 'entity.too.large' ? 'Request body too large' : 'Invalid request body';
            sendEnvelope(res, composeRejection(signatureRejected('MALFORMED_BODY', message)), stats);
            return;
        }

        const fault = ErrorSanitizer.sanitize(err, 'WebhookApi:UnhandledError');
        sendEnvelope(res, composeRejection(internalFault(fault.incidentId)), stats);
    };
}
