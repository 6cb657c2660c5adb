import { TransactionRejectedReason } from '../errors/taxonomy.js';
import { EffectResult } from './effects.js';

export type ProcessingOutcome =
    | { kind: 'SUCCESS'; transactionId: string; result: EffectResult; processingTimeMs: number }
    | { kind: 'DUPLICATE_REJECTED'; transactionId: string }
    | { kind: 'VALIDATION_FAILED'; transactionId: string; errors: string[] }
    | { kind: 'PROCESSING_ERROR'; transactionId: string; reason: string };

export interface FailedTransaction {
    transactionId: string;
    reason: TransactionRejectedReason;
    detail: string;
}

export function toFailedTransaction(outcome: ProcessingOutcome): FailedTransaction | null {
    switch (outcome.kind) {
        case 'SUCCESS':
            return null;
        case 'DUPLICATE_REJECTED':
            return { transactionId: outcome.transactionId, reason: 'DUPLICATE_TRANSACTION', detail: 'Duplicate transaction' };
        case 'VALIDATION_FAILED':
            return { transactionId: outcome.transactionId, reason: 'VALIDATION_FAILED', detail: outcome.errors.join(', ') };
        case 'PROCESSING_ERROR':
            return { transactionId: outcome.transactionId, reason: 'PROCESSING_ERROR', detail: outcome.reason };
    }
}
