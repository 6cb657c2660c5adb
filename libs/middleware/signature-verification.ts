import type { Request, NextFunction } from 'express';
import type { WebhookStats } from '../observability/webhookStats.js';
import { composeRejection } from '../response/responseComposer.js';
import { verifyNotificationBody } from '../signature/notificationVerification.js';
import { SignatureVerifier } from '../signature/signatureVerifier.js';
import { sendEnvelope } from './envelope.js';
import { GatewayResponse } from './request-context.js';

/**
 * Signature gate. Expects the body as raw bytes (express.raw) and hands the same
 * bytes to the route through res.locals.notification.
 */
export function createSignatureMiddleware(verifier: SignatureVerifier, stats: WebhookStats) {
    return (req: Request, res: GatewayResponse, next: NextFunction): void => {
        const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
        const result = verifyNotificationBody(rawBody, verifier);

        if (!result.ok) {
            sendEnvelope(res, composeRejection(result.rejection, result.batchId), stats);
            return;
        }

        res.locals.notification = result.value;
        next();
    };
}
