import type { Request, NextFunction } from 'express';
import { admissionRejected } from '../errors/taxonomy.js';
import { UNKNOWN_CLIENT } from '../network/clientAddress.js';
import type { WebhookStats } from '../observability/webhookStats.js';
import { FixedWindowRateLimiter, rateLimitHeaders } from '../ratelimit/rateLimiter.js';
import { composeRejection } from '../response/responseComposer.js';
import { sendEnvelope } from './envelope.js';
import { GatewayResponse, requestLogger } from './request-context.js';

/**
 * First gate. Counts the request against the caller's window and attaches the
 * accounting headers to whatever response follows.
 */
export function createRateLimitMiddleware(limiter: FixedWindowRateLimiter, stats: WebhookStats) {
    return async (req: Request, res: GatewayResponse, next: NextFunction): Promise<void> => {
        try {
            const callerId = res.locals.callerAddress ?? UNKNOWN_CLIENT;
            const decision = await limiter.check(callerId);
            res.locals.rateLimit = decision;
            res.set(rateLimitHeaders(decision));

            if (!decision.allowed) {
                requestLogger(req, res).warn({ count: decision.count, limit: decision.limit }, 'Gate: rate limited');
                sendEnvelope(res, composeRejection(admissionRejected('RATE_LIMITED', 'Rate limit exceeded')), stats);
                return;
            }

            next();
        } catch (error) {
            next(error);
        }
    };
}
