import { logger } from '../logging/logger.js';
import {
    signatureRejected,
    stageOk,
    stageReject,
    StageResult
} from '../errors/taxonomy.js';
import { CanonicalFields, CanonicalFieldsSchema } from '../validation/schema.js';
import { safeValidate } from '../validation/zod-middleware.js';
import { SignatureVerifier } from './signatureVerifier.js';

export const UNKNOWN_BATCH_ID = 'unknown';

export interface VerifiedNotification {
    /** Exact bytes that were verified; downstream parsing reads these, never a re-serialization. */
    rawBody: Buffer;
    header: CanonicalFields;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBatchId(payload: Record<string, unknown>): string {
    const batchId = payload['batchId'];
    return typeof batchId === 'string' && batchId.length > 0 ? batchId : UNKNOWN_BATCH_ID;
}

/**
 * Signature gate. Rejections, in evaluation order:
 * empty body, unparsable JSON, missing signature, malformed canonical fields,
 * missing trusted key, cryptographic mismatch.
 */
export function verifyNotificationBody(
    rawBody: Buffer,
    verifier: SignatureVerifier
): StageResult<VerifiedNotification> {
    if (rawBody.length === 0) {
        logger.warn('Signature: empty request body');
        return stageReject(signatureRejected('MALFORMED_BODY', 'Empty request body'), UNKNOWN_BATCH_ID);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(rawBody.toString('utf8'));
    } catch (error: unknown) {
        logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Signature: invalid JSON');
        return stageReject(signatureRejected('MALFORMED_BODY', 'Invalid JSON format'), UNKNOWN_BATCH_ID);
    }

    if (!isPlainObject(parsed)) {
        logger.warn('Signature: JSON body is not an object');
        return stageReject(signatureRejected('MALFORMED_BODY', 'Invalid JSON format'), UNKNOWN_BATCH_ID);
    }

    const batchId = readBatchId(parsed);
    const signature = parsed['signature'];
    if (typeof signature !== 'string' || signature.length === 0) {
        logger.warn({ batchId }, 'Signature: missing signature');
        return stageReject(signatureRejected('MISSING_SIGNATURE', 'Missing signature'), batchId);
    }

    const header = safeValidate(CanonicalFieldsSchema, parsed);
    if (!header.success) {
        logger.warn({ batchId, errors: header.issues }, 'Signature: malformed signed fields');
        return stageReject(signatureRejected('MALFORMED_BODY', 'Malformed signed fields'), batchId);
    }

    if (!verifier.hasKey) {
        logger.error({ batchId }, 'Signature: trusted public key unavailable');
        return stageReject(signatureRejected('MISSING_KEY', 'Signature verification unavailable'), batchId);
    }

    if (!verifier.verify(header.data, signature)) {
        logger.warn({ batchId }, 'Signature: verification failed');
        return stageReject(signatureRejected('CRYPTO_MISMATCH', 'Signature is not valid'), batchId);
    }

    logger.info({ batchId, sourceAppId: header.data.sourceAppId }, 'Signature: verified');
    return stageOk({ rawBody, header: header.data });
}
