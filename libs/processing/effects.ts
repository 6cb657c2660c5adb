import { setTimeout as sleep } from 'timers/promises';
import { logger } from '../logging/logger.js';
import { CanonicalFields } from '../validation/schema.js';
import { Transaction, TransactionKind, TRANSACTION_TYPES } from './transaction.js';

export interface EffectResult {
    status: `${TransactionKind}_processed`;
    accountBalanceUpdated: boolean;
    notificationSent: boolean;
}

/**
 * Downstream business effect of one transaction. Opaque to the pipeline: it either
 * resolves with a result or rejects with a reason.
 */
export type TransactionEffect = (transaction: Transaction, batch: CanonicalFields) => Promise<EffectResult>;

/**
 * Stand-in effect: waits `latencyMs` and reports a deterministic result by type.
 */
export function createSimulatedEffect(latencyMs: number): TransactionEffect {
    return async (transaction, batch) => {
        if (latencyMs > 0) {
            await sleep(latencyMs);
        }

        const kind = TRANSACTION_TYPES[transaction.transactionType];
        logger.debug({
            transactionId: transaction.transactionId,
            batchId: batch.batchId,
            kind
        }, 'Effect: simulated business logic completed');

        return {
            status: `${kind}_processed`,
            accountBalanceUpdated: true,
            notificationSent: true
        };
    };
}
