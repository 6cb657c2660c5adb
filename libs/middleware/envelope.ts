import type { Response } from 'express';
import type { WebhookStats } from '../observability/webhookStats.js';
import type { NotificationResponse } from '../response/responseComposer.js';

/**
 * Webhook outcomes travel in-band: the transport status is always 200.
 */
export function sendEnvelope(res: Response, envelope: NotificationResponse, stats: WebhookStats): void {
    stats.recordResponse(envelope.code);
    res.status(200).json(envelope);
}
