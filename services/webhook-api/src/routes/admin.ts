import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ErrorSanitizer } from '../../../../libs/errors/sanitizer.js';
import { DedupIndex } from '../../../../libs/dedup/dedupIndex.js';
import { logger } from '../../../../libs/logging/logger.js';
import { safeValidate } from '../../../../libs/validation/zod-middleware.js';

export const CleanupQuerySchema = z.object({
    days_to_keep: z.coerce.number().int().min(1).default(30),
});

function sendFault(res: Response, error: unknown, contextLabel: string): void {
    const fault = ErrorSanitizer.sanitize(error, contextLabel);
    res.status(503).json({ error: fault.publicMessage, incidentId: fault.incidentId });
}

/**
 * Operator endpoints over the processed-transaction index.
 */
export function createAdminRouter(dedupIndex: DedupIndex): Router {
    const router = Router();

    router.get('/processed-transactions/stats', async (_req: Request, res: Response) => {
        try {
            const stats = await dedupIndex.stats();
            res.json({
                status: 'ok',
                stats: {
                    ...stats,
                    oldestClaimedAt: stats.oldestClaimedAt?.toISOString() ?? null,
                    newestClaimedAt: stats.newestClaimedAt?.toISOString() ?? null
                }
            });
        } catch (error) {
            sendFault(res, error, 'Admin:DedupStats');
        }
    });

    router.post('/processed-transactions/cleanup', async (req: Request, res: Response) => {
        const query = safeValidate(CleanupQuerySchema, req.query);
        if (!query.success) {
            res.status(400).json({ error: 'Invalid days_to_keep', issues: query.issues });
            return;
        }

        try {
            const result = await dedupIndex.cleanup(query.data.days_to_keep);
            logger.info({ deleted: result.deleted, daysToKeep: result.daysToKeep }, 'Admin: dedup cleanup');
            res.json({
                status: 'ok',
                deleted: result.deleted,
                cutoff: result.cutoff.toISOString(),
                daysToKeep: result.daysToKeep
            });
        } catch (error) {
            sendFault(res, error, 'Admin:DedupCleanup');
        }
    });

    return router;
}
