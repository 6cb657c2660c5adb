/**
 * Rejection taxonomy for the notification pipeline.
 *
 * Each member is produced by the component that detects it and rendered into the
 * in-band response envelope. Only INTERNAL_FAULT is operator-alerting; the others
 * are routine traffic outcomes.
 */

export type AdmissionRejectedReason = 'RATE_LIMITED' | 'UNTRUSTED_NETWORK';

export type SignatureRejectedReason =
    | 'MISSING_KEY'
    | 'MISSING_SIGNATURE'
    | 'MALFORMED_BODY'
    | 'CRYPTO_MISMATCH';

export type TransactionRejectedReason =
    | 'DUPLICATE_TRANSACTION'
    | 'VALIDATION_FAILED'
    | 'PROCESSING_ERROR';

export type PipelineRejection =
    | { kind: 'ADMISSION_REJECTED'; reason: AdmissionRejectedReason; message: string }
    | { kind: 'SIGNATURE_REJECTED'; reason: SignatureRejectedReason; message: string }
    | { kind: 'INTERNAL_FAULT'; incidentId: string; message: string };

/**
 * Batch-level envelope codes for pipeline short-circuits.
 */
export const GATE_REJECTION_CODES = {
    UNTRUSTED_NETWORK: '403',
    RATE_LIMITED: '429',
    MALFORMED_BODY: '400',
    MISSING_SIGNATURE: '401',
    CRYPTO_MISMATCH: '401',
    MISSING_KEY: '401',
    INTERNAL_FAULT: '500'
} as const;

export type GateRejectionCode = typeof GATE_REJECTION_CODES[keyof typeof GATE_REJECTION_CODES];

export function rejectionCode(rejection: PipelineRejection): GateRejectionCode {
    switch (rejection.kind) {
        case 'ADMISSION_REJECTED':
        case 'SIGNATURE_REJECTED':
            return GATE_REJECTION_CODES[rejection.reason];
        case 'INTERNAL_FAULT':
            return GATE_REJECTION_CODES.INTERNAL_FAULT;
    }
}

export const admissionRejected = (reason: AdmissionRejectedReason, message: string): PipelineRejection =>
    ({ kind: 'ADMISSION_REJECTED', reason, message });

export const signatureRejected = (reason: SignatureRejectedReason, message: string): PipelineRejection =>
    ({ kind: 'SIGNATURE_REJECTED', reason, message });

export const internalFault = (incidentId: string, message = 'Internal server error'): PipelineRejection =>
    ({ kind: 'INTERNAL_FAULT', incidentId, message });

/**
 * Result of a pipeline stage. Failures carry a rejection that renders into the same
 * envelope shape as a successful batch.
 */
export type StageResult<T> =
    | { ok: true; value: T }
    | { ok: false; rejection: PipelineRejection; batchId?: string };

export const stageOk = <T>(value: T): StageResult<T> => ({ ok: true, value });

export const stageReject = <T>(rejection: PipelineRejection, batchId?: string): StageResult<T> =>
    ({ ok: false, rejection, batchId });
