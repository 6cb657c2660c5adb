import { PipelineRejection, rejectionCode } from '../errors/taxonomy.js';
import { BatchResult } from '../processing/batchProcessor.js';
import { ProcessingOutcome } from '../processing/outcome.js';
import { UNKNOWN_BATCH_ID } from '../signature/notificationVerification.js';

/**
 * Per-transaction result codes of the counterparty contract.
 */
export const ITEM_CODES = {
    SUCCESS: '01',
    FAILED_NO_DETAIL: '02',
    /** Reserved by the contract; never emitted. */
    FAILED_RESEND_REQUESTED: '03',
    FAILED_WITH_REASON: '04',
} as const;

export type ItemCode = typeof ITEM_CODES[keyof typeof ITEM_CODES];

export const BATCH_CODES = {
    SUCCESS: '200',
    PARTIAL_FAILURE: '400',
} as const;

export interface ResponseItem {
    transactionId: string;
    errorCode: ItemCode;
    description: string;
    additionalInfo: Record<string, unknown>;
}

export interface NotificationResponse {
    batchId: string;
    code: string;
    message: string;
    data: ResponseItem[];
}

export function composeItem(outcome: ProcessingOutcome): ResponseItem {
    switch (outcome.kind) {
        case 'SUCCESS':
            return {
                transactionId: outcome.transactionId,
                errorCode: ITEM_CODES.SUCCESS,
                description: 'Transaction processed successfully',
                additionalInfo: {}
            };
        case 'DUPLICATE_REJECTED':
            return {
                transactionId: outcome.transactionId,
                errorCode: ITEM_CODES.FAILED_NO_DETAIL,
                description: 'Duplicate transaction',
                additionalInfo: { reason: 'duplicate_transaction' }
            };
        case 'VALIDATION_FAILED':
            return {
                transactionId: outcome.transactionId,
                errorCode: ITEM_CODES.FAILED_WITH_REASON,
                description: `Validation failed: ${outcome.errors.join(', ')}`,
                additionalInfo: { validation_errors: outcome.errors }
            };
        case 'PROCESSING_ERROR':
            return {
                transactionId: outcome.transactionId,
                errorCode: ITEM_CODES.FAILED_WITH_REASON,
                description: `Processing failed: ${outcome.reason}`,
                additionalInfo: { error_detail: outcome.reason }
            };
    }
}

export function composeBatchResponse(result: BatchResult): NotificationResponse {
    return {
        batchId: result.batchId,
        code: result.allSucceeded ? BATCH_CODES.SUCCESS : BATCH_CODES.PARTIAL_FAILURE,
        message: result.allSucceeded ? 'Success' : 'Some transactions failed',
        data: result.outcomes.map(composeItem)
    };
}

/**
 * Envelope for a request stopped before batch processing.
 */
export function composeRejection(rejection: PipelineRejection, batchId: string = UNKNOWN_BATCH_ID): NotificationResponse {
    return {
        batchId,
        code: rejectionCode(rejection),
        message: rejection.message,
        data: []
    };
}
