import { LRUCache } from 'lru-cache';
import { logger } from '../logging/logger.js';
import { describeError } from '../errors/sanitizer.js';
import { onDependencyFault } from '../policy/failurePolicy.js';
import { TimeoutError, withTimeout } from '../utils/withTimeout.js';
import { DedupClaim, DedupStore, DedupStoreStats } from './dedupStore.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export type ClaimResult = 'CLAIMED' | 'DUPLICATE';

export class DedupUnavailableError extends Error {
    constructor(public readonly transactionId: string, cause: unknown) {
        super('Duplicate index unavailable', { cause });
        this.name = 'DedupUnavailableError';
    }
}

export interface DedupIndexOptions {
    retentionDays: number;
    timeoutMs: number;
    maxCachedEntries: number;
}

export interface DedupIndexStats extends DedupStoreStats {
    cachedEntries: number;
    inflight: number;
    retentionDays: number;
}

export interface CleanupResult {
    deleted: number;
    cutoff: Date;
    daysToKeep: number;
}

/**
 * Membership index of applied transaction identities.
 *
 * The store row is claimed before the business effect runs, so a crash between the
 * two leaves the identity claimed and the transaction is never applied twice.
 * Claims still in flight in this process are tracked in `inflight`; a second claim
 * for the same identity sees it synchronously and is reported as a duplicate.
 * A claim that timed out may still land in the store; until it settles (and is
 * released if it did land) the identity is in `settling` and further claims fail
 * as unavailable rather than duplicate.
 */
export class DedupIndex {
    private readonly cache: LRUCache<string, string>;
    private readonly inflight = new Set<string>();
    private readonly settling = new Set<string>();

    constructor(
        private readonly store: DedupStore,
        private readonly options: DedupIndexOptions,
        private readonly clock: () => number = Date.now
    ) {
        this.cache = new LRUCache<string, string>({ max: options.maxCachedEntries });
    }

    private get retentionMs(): number {
        return this.options.retentionDays * DAY_MS;
    }

    /**
     * Loads identities inside the retention window into memory.
     */
    async warm(): Promise<number> {
        const now = this.clock();
        const entries = await withTimeout(
            this.store.loadSince(new Date(now - this.retentionMs)),
            this.options.timeoutMs,
            'dedup.loadSince'
        );

        let loaded = 0;
        for (const entry of entries) {
            const ttl = entry.claimedAt.getTime() + this.retentionMs - now;
            if (ttl <= 0) continue;
            this.cache.set(entry.transactionId, entry.batchId, { ttl });
            loaded++;
        }

        logger.info({ loaded, retentionDays: this.options.retentionDays }, 'DedupIndex: warmed from store');
        return loaded;
    }

    isKnown(transactionId: string): boolean {
        return this.inflight.has(transactionId) || this.cache.has(transactionId);
    }

    /**
     * Reserves the identity. Throws DedupUnavailableError when the store cannot answer.
     */
    async claim(claim: DedupClaim): Promise<ClaimResult> {
        const { transactionId, batchId } = claim;
        if (this.isKnown(transactionId)) {
            return 'DUPLICATE';
        }
        if (this.settling.has(transactionId)) {
            throw new DedupUnavailableError(transactionId, new Error('Earlier claim has not settled'));
        }

        this.inflight.add(transactionId);
        const pending = this.store.claim(claim);
        let claimed: boolean;
        try {
            claimed = await withTimeout(pending, this.options.timeoutMs, 'dedup.claim');
        } catch (error) {
            if (onDependencyFault('dedupIndex', error, { transactionId, batchId }) === 'ALLOW') {
                // Admitted without a confirmed claim; a late row belongs to this attempt.
                return 'CLAIMED';
            }
            this.inflight.delete(transactionId);
            if (error instanceof TimeoutError) {
                void this.releaseLateClaim(pending, claim);
            }
            throw new DedupUnavailableError(transactionId, error);
        }

        if (!claimed) {
            this.inflight.delete(transactionId);
            this.cache.set(transactionId, batchId, { ttl: this.retentionMs });
            return 'DUPLICATE';
        }

        return 'CLAIMED';
    }

    /**
     * Waits out a claim the caller already reported as unavailable. If the insert
     * landed anyway the row is deleted, since no effect ran for it.
     */
    private async releaseLateClaim(pending: Promise<boolean>, claim: DedupClaim): Promise<void> {
        const { transactionId, batchId } = claim;
        this.settling.add(transactionId);
        try {
            let landed: boolean;
            try {
                landed = await pending;
            } catch (error) {
                logger.warn({ transactionId, batchId, error: describeError(error) }, 'DedupIndex: timed-out claim failed in store');
                return;
            }
            if (!landed) return;

            try {
                await withTimeout(this.store.release(transactionId, batchId), this.options.timeoutMs, 'dedup.release');
                logger.warn({ transactionId, batchId }, 'DedupIndex: released claim that landed after timeout');
            } catch (error) {
                logger.error({ transactionId, batchId, error: describeError(error) },
                    'DedupIndex: late claim not released, identity stays claimed until reconciled');
            }
        } finally {
            this.settling.delete(transactionId);
        }
    }

    /**
     * Records a successfully applied transaction. The claim row already blocks
     * replays, so a failed status update is logged and not surfaced.
     */
    async commit(transactionId: string, batchId: string): Promise<void> {
        this.inflight.delete(transactionId);
        this.cache.set(transactionId, batchId, { ttl: this.retentionMs });

        try {
            await withTimeout(
                this.store.markProcessed(transactionId, batchId),
                this.options.timeoutMs,
                'dedup.markProcessed'
            );
        } catch (error) {
            logger.warn({ transactionId, batchId, error: describeError(error) },
                'DedupIndex: claim left in CLAIMED state after successful effect');
        }
    }

    /**
     * Drops a claim whose effect failed.
     */
    async release(transactionId: string, batchId: string): Promise<void> {
        try {
            await withTimeout(
                this.store.release(transactionId, batchId),
                this.options.timeoutMs,
                'dedup.release'
            );
        } catch (error) {
            logger.error({ transactionId, batchId, error: describeError(error) },
                'DedupIndex: release failed, identity stays claimed until reconciled');
        } finally {
            this.inflight.delete(transactionId);
        }
    }

    /**
     * Leaves the claim row in place without an outcome. The identity stays known so
     * the transaction is not attempted again before an operator reconciles it.
     */
    abandon(transactionId: string, batchId: string): void {
        this.inflight.delete(transactionId);
        this.cache.set(transactionId, batchId, { ttl: this.retentionMs });
    }

    /**
     * Deletes identities older than `daysToKeep` and rebuilds the in-memory view.
     */
    async cleanup(daysToKeep: number): Promise<CleanupResult> {
        const cutoff = new Date(this.clock() - daysToKeep * DAY_MS);
        const deleted = await withTimeout(
            this.store.purgeBefore(cutoff),
            this.options.timeoutMs,
            'dedup.purgeBefore'
        );

        this.cache.clear();
        await this.warm();

        logger.info({ deleted, cutoff: cutoff.toISOString(), daysToKeep }, 'DedupIndex: cleanup completed');
        return { deleted, cutoff, daysToKeep };
    }

    prune(): void {
        this.cache.purgeStale();
    }

    async stats(): Promise<DedupIndexStats> {
        const stored = await withTimeout(this.store.stats(), this.options.timeoutMs, 'dedup.stats');
        return {
            ...stored,
            cachedEntries: this.cache.size,
            inflight: this.inflight.size,
            retentionDays: this.options.retentionDays
        };
    }
}
