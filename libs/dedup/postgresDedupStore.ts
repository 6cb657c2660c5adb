import { Queryable } from '../db/index.js';
import { DedupClaim, DedupEntry, DedupStatus, DedupStore, DedupStoreStats } from './dedupStore.js';

interface EntryRow {
    transaction_id: string;
    batch_id: string;
    status: DedupStatus;
    claimed_at: Date;
}

interface StatsRow {
    total: number;
    processed: number;
    claimed: number;
    oldest: Date | null;
    newest: Date | null;
}

/**
 * processed_transactions backed store. Uniqueness is enforced by the primary key,
 * so concurrent claims from several gateway instances resolve in the database.
 */
export class PostgresDedupStore implements DedupStore {
    constructor(private readonly db: Queryable) { }

    async claim(claim: DedupClaim): Promise<boolean> {
        const result = await this.db.query<{ transaction_id: string }>(
            `INSERT INTO processed_transactions
                (transaction_id, batch_id, source_app_id, batch_timestamp, status)
             VALUES ($1, $2, $3, $4, 'CLAIMED')
             ON CONFLICT (transaction_id) DO NOTHING
             RETURNING transaction_id`,
            [claim.transactionId, claim.batchId, claim.sourceAppId, claim.batchTimestamp]
        );
        return result.rows.length === 1;
    }

    async markProcessed(transactionId: string, batchId: string): Promise<void> {
        await this.db.query(
            `UPDATE processed_transactions
             SET status = 'PROCESSED', processed_at = NOW()
             WHERE transaction_id = $1 AND batch_id = $2`,
            [transactionId, batchId]
        );
    }

    async release(transactionId: string, batchId: string): Promise<void> {
        await this.db.query(
            `DELETE FROM processed_transactions
             WHERE transaction_id = $1 AND batch_id = $2 AND status = 'CLAIMED'`,
            [transactionId, batchId]
        );
    }

    async loadSince(since: Date): Promise<DedupEntry[]> {
        const result = await this.db.query<EntryRow>(
            `SELECT transaction_id, batch_id, status, claimed_at
             FROM processed_transactions
             WHERE claimed_at >= $1`,
            [since]
        );
        return result.rows.map(row => ({
            transactionId: row.transaction_id,
            batchId: row.batch_id,
            status: row.status,
            claimedAt: row.claimed_at
        }));
    }

    async purgeBefore(cutoff: Date): Promise<number> {
        const result = await this.db.query(
            'DELETE FROM processed_transactions WHERE claimed_at < $1',
            [cutoff]
        );
        return result.rowCount ?? 0;
    }

    async stats(): Promise<DedupStoreStats> {
        const result = await this.db.query<StatsRow>(
            `SELECT COUNT(*)::int AS total,
                    COUNT(*) FILTER (WHERE status = 'PROCESSED')::int AS processed,
                    COUNT(*) FILTER (WHERE status = 'CLAIMED')::int AS claimed,
                    MIN(claimed_at) AS oldest,
                    MAX(claimed_at) AS newest
             FROM processed_transactions`
        );
        const row = result.rows[0];
        return {
            total: row?.total ?? 0,
            processed: row?.processed ?? 0,
            claimed: row?.claimed ?? 0,
            oldestClaimedAt: row?.oldest ?? null,
            newestClaimedAt: row?.newest ?? null
        };
    }
}
