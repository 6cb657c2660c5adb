import { Router } from 'express';
import type { WebhookStats } from '../../../../libs/observability/webhookStats.js';
import type { FixedWindowRateLimiter } from '../../../../libs/ratelimit/rateLimiter.js';

export interface HealthRouteDependencies {
    stats: WebhookStats;
    rateLimiter: FixedWindowRateLimiter;
    version: string;
}

/**
 * Liveness and counters. Mounted ahead of every gate.
 */
export function createHealthRouter(deps: HealthRouteDependencies): Router {
    const router = Router();

    router.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            version: deps.version
        });
    });

    router.get('/metrics', (_req, res) => {
        res.json({
            ...deps.stats.snapshot(),
            rateLimiter: {
                store: deps.rateLimiter.storeKind,
                degradedDecisions: deps.rateLimiter.degradedCount
            }
        });
    });

    return router;
}
