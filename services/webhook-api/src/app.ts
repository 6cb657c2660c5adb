import express, { Express } from 'express';
import { DedupIndex } from '../../../libs/dedup/dedupIndex.js';
import { createErrorHandler } from '../../../libs/middleware/error-handler.js';
import { createNetworkFilterMiddleware } from '../../../libs/middleware/network-filter.js';
import { createRateLimitMiddleware } from '../../../libs/middleware/rate-limit.js';
import { createRequestContextMiddleware } from '../../../libs/middleware/request-context.js';
import { NetworkFilter } from '../../../libs/network/networkFilter.js';
import { WebhookStats } from '../../../libs/observability/webhookStats.js';
import { BatchProcessor } from '../../../libs/processing/batchProcessor.js';
import { FixedWindowRateLimiter } from '../../../libs/ratelimit/rateLimiter.js';
import { SignatureVerifier } from '../../../libs/signature/signatureVerifier.js';
import { createAdminRouter } from './routes/admin.js';
import { createHealthRouter } from './routes/health.js';
import { createNotificationRouter } from './routes/notification.js';

export const SERVICE_VERSION = '1.0.0';

export interface AppDependencies {
    rateLimiter: FixedWindowRateLimiter;
    networkFilter: NetworkFilter;
    signatureVerifier: SignatureVerifier;
    batchProcessor: BatchProcessor;
    dedupIndex: DedupIndex;
    stats: WebhookStats;
    bodyLimit: string;
}

/**
 * Gate order: rate limiter, network filter, then the signature gate on the webhook
 * route only. /health and /metrics are mounted before the gates.
 */
export function createApp(deps: AppDependencies): Express {
    const app = express();
    app.disable('x-powered-by');

    app.use(createRequestContextMiddleware());
    app.use(createHealthRouter({ stats: deps.stats, rateLimiter: deps.rateLimiter, version: SERVICE_VERSION }));

    app.use(createRateLimitMiddleware(deps.rateLimiter, deps.stats));
    app.use(createNetworkFilterMiddleware(deps.networkFilter, deps.stats));

    app.use(createNotificationRouter(deps));
    app.use('/admin', createAdminRouter(deps.dedupIndex));

    app.use(createErrorHandler(deps.stats));

    return app;
}
