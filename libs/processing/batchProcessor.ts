import { logger } from '../logging/logger.js';
import { describeError } from '../errors/sanitizer.js';
import { DedupIndex } from '../dedup/dedupIndex.js';
import { TimeoutError, withTimeout } from '../utils/withTimeout.js';
import { CanonicalFields } from '../validation/schema.js';
import { TransactionEffect } from './effects.js';
import { FailedTransaction, ProcessingOutcome, toFailedTransaction } from './outcome.js';
import { NotificationBatch } from './transaction.js';
import { readTransactionId, validateTransaction } from './transactionValidator.js';

export interface BatchResult {
    batchId: string;
    processedCount: number;
    failedCount: number;
    /** One entry per record, in input order. */
    outcomes: ProcessingOutcome[];
    failedTransactions: FailedTransaction[];
    allSucceeded: boolean;
}

export interface BatchProcessorOptions {
    effectTimeoutMs: number;
}

/**
 * Applies every record of a verified batch independently.
 *
 * Per record: in-memory duplicate check, validation, atomic claim in the dedup
 * store, business effect, commit. A failing record never affects its siblings.
 */
export class BatchProcessor {
    constructor(
        private readonly dedup: DedupIndex,
        private readonly effect: TransactionEffect,
        private readonly options: BatchProcessorOptions,
        private readonly clock: () => number = Date.now
    ) { }

    async processBatch(batch: NotificationBatch): Promise<BatchResult> {
        const header: CanonicalFields = {
            sourceAppId: batch.sourceAppId,
            batchId: batch.batchId,
            timestamp: batch.timestamp
        };

        const outcomes = await Promise.all(batch.records.map(record => this.processRecord(record, header)));

        const failedTransactions = outcomes
            .map(toFailedTransaction)
            .filter((failed): failed is FailedTransaction => failed !== null);
        const processedCount = outcomes.length - failedTransactions.length;

        logger.info({
            batchId: batch.batchId,
            total: outcomes.length,
            processedCount,
            failedCount: failedTransactions.length
        }, 'BatchProcessor: batch completed');

        return {
            batchId: batch.batchId,
            processedCount,
            failedCount: failedTransactions.length,
            outcomes,
            failedTransactions,
            allSucceeded: failedTransactions.length === 0
        };
    }

    private async processRecord(record: unknown, header: CanonicalFields): Promise<ProcessingOutcome> {
        const batchId = header.batchId;
        const candidateId = readTransactionId(record);

        if (candidateId.length > 0 && this.dedup.isKnown(candidateId)) {
            logger.warn({ transactionId: candidateId, batchId }, 'BatchProcessor: duplicate transaction');
            return { kind: 'DUPLICATE_REJECTED', transactionId: candidateId };
        }

        const validation = validateTransaction(record);
        if (!validation.valid) {
            logger.warn({ transactionId: validation.transactionId, batchId, errors: validation.errors },
                'BatchProcessor: validation failed');
            return { kind: 'VALIDATION_FAILED', transactionId: validation.transactionId, errors: validation.errors };
        }

        const transaction = validation.transaction;
        const transactionId = transaction.transactionId;

        let claim: Awaited<ReturnType<DedupIndex['claim']>>;
        try {
            claim = await this.dedup.claim({
                transactionId,
                batchId,
                sourceAppId: header.sourceAppId,
                batchTimestamp: header.timestamp
            });
        } catch (error) {
            return { kind: 'PROCESSING_ERROR', transactionId, reason: describeError(error) };
        }

        if (claim === 'DUPLICATE') {
            logger.warn({ transactionId, batchId }, 'BatchProcessor: duplicate transaction (store)');
            return { kind: 'DUPLICATE_REJECTED', transactionId };
        }

        const startedAt = this.clock();
        try {
            const result = await withTimeout(
                this.effect(transaction, header),
                this.options.effectTimeoutMs,
                'transaction effect'
            );
            await this.dedup.commit(transactionId, batchId);
            return { kind: 'SUCCESS', transactionId, result, processingTimeMs: this.clock() - startedAt };
        } catch (error) {
            const reason = describeError(error);
            if (error instanceof TimeoutError) {
                // The effect may still complete; keep the claim so it is never applied twice.
                logger.error({ transactionId, batchId, reason }, 'BatchProcessor: effect timed out, claim kept for reconciliation');
                this.dedup.abandon(transactionId, batchId);
            } else {
                logger.error({ transactionId, batchId, reason }, 'BatchProcessor: effect failed');
                await this.dedup.release(transactionId, batchId);
            }
            return { kind: 'PROCESSING_ERROR', transactionId, reason };
        }
    }
}
