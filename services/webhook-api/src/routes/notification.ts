import express, { Router, Request, NextFunction } from 'express';
import { signatureRejected } from '../../../../libs/errors/taxonomy.js';
import { sendEnvelope } from '../../../../libs/middleware/envelope.js';
import { GatewayResponse, requestLogger } from '../../../../libs/middleware/request-context.js';
import { createSignatureMiddleware } from '../../../../libs/middleware/signature-verification.js';
import type { WebhookStats } from '../../../../libs/observability/webhookStats.js';
import { BatchProcessor } from '../../../../libs/processing/batchProcessor.js';
import { composeBatchResponse, composeRejection } from '../../../../libs/response/responseComposer.js';
import { SignatureVerifier } from '../../../../libs/signature/signatureVerifier.js';
import { NotificationBatchSchema } from '../../../../libs/validation/schema.js';
import { safeValidate } from '../../../../libs/validation/zod-middleware.js';

export const NOTIFICATION_PATH = '/webhook/bank-notification';

export interface NotificationRouteDependencies {
    signatureVerifier: SignatureVerifier;
    batchProcessor: BatchProcessor;
    stats: WebhookStats;
    bodyLimit: string;
}

export function createNotificationRouter(deps: NotificationRouteDependencies): Router {
    const router = Router();

    router.post(
        NOTIFICATION_PATH,
        // Raw bytes for every content type: the signature gate parses them itself.
        express.raw({ type: () => true, limit: deps.bodyLimit }),
        createSignatureMiddleware(deps.signatureVerifier, deps.stats),
        async (req: Request, res: GatewayResponse, next: NextFunction): Promise<void> => {
            try {
                const notification = res.locals.notification;
                if (!notification) {
                    throw new Error('Notification reached the route without passing the signature gate');
                }

                const payload: unknown = JSON.parse(notification.rawBody.toString('utf8'));
                const batch = safeValidate(NotificationBatchSchema, payload);
                if (!batch.success) {
                    const detail = batch.issues.map(issue => `${issue.path}: ${issue.message}`).join(', ');
                    requestLogger(req, res).warn({ batchId: notification.header.batchId, errors: batch.issues },
                        'Malformed notification batch');
                    sendEnvelope(res, composeRejection(
                        signatureRejected('MALFORMED_BODY', `Malformed batch: ${detail}`),
                        notification.header.batchId
                    ), deps.stats);
                    return;
                }

                const result = await deps.batchProcessor.processBatch({
                    sourceAppId: batch.data.sourceAppId,
                    batchId: batch.data.batchId,
                    timestamp: batch.data.timestamp,
                    records: batch.data.data
                });
                deps.stats.recordBatch(result);

                sendEnvelope(res, composeBatchResponse(result), deps.stats);
            } catch (error) {
                next(error);
            }
        }
    );

    return router;
}
