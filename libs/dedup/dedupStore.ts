export type DedupStatus = 'CLAIMED' | 'PROCESSED';

export interface DedupClaim {
    transactionId: string;
    batchId: string;
    sourceAppId: string;
    batchTimestamp: string;
}

export interface DedupEntry {
    transactionId: string;
    batchId: string;
    status: DedupStatus;
    claimedAt: Date;
}

export interface DedupStoreStats {
    total: number;
    processed: number;
    /** Rows whose effect never reported back: candidates for reconciliation. */
    claimed: number;
    oldestClaimedAt: Date | null;
    newestClaimedAt: Date | null;
}

/**
 * Durable record of transaction identities, keyed by transactionId.
 */
export interface DedupStore {
    /** Atomically inserts the identity. False when it already exists. */
    claim(claim: DedupClaim): Promise<boolean>;
    markProcessed(transactionId: string, batchId: string): Promise<void>;
    /** Removes a claim whose effect failed, so the transaction can be retried. */
    release(transactionId: string, batchId: string): Promise<void>;
    loadSince(since: Date): Promise<DedupEntry[]>;
    purgeBefore(cutoff: Date): Promise<number>;
    stats(): Promise<DedupStoreStats>;
}
