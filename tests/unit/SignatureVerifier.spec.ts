/**
 * Unit Tests: SignatureVerifier and the signature gate
 *
 * @see libs/signature/signatureVerifier.ts
 * @see libs/signature/notificationVerification.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { generateKeyPairSync } from 'crypto';
import { PipelineRejection } from '../../libs/errors/taxonomy.js';
import { verifyNotificationBody } from '../../libs/signature/notificationVerification.js';
import { signCanonicalFields } from '../../libs/signature/signer.js';
import { decodeBase64Strict, SignatureVerifier } from '../../libs/signature/signatureVerifier.js';
import { signedBatch, testKeyPair } from '../helpers/fakes.js';

const header = { sourceAppId: 'BANKAPP', batchId: 'BATCH-001', timestamp: '2024-05-01T10:00:00Z' };

function flipLastByte(value: string): string {
    return value.slice(0, -1) + String.fromCharCode(value.charCodeAt(value.length - 1) ^ 0x01);
}

function body(value: unknown): Buffer {
    return Buffer.from(JSON.stringify(value), 'utf8');
}

function rejectionOf(rawBody: Buffer, verifier: SignatureVerifier): { rejection: PipelineRejection; batchId?: string } {
    const result = verifyNotificationBody(rawBody, verifier);
    if (result.ok) {
        assert.fail('Expected a rejection');
    }
    return { rejection: result.rejection, batchId: result.batchId };
}

describe('SignatureVerifier', () => {
    const { publicKey, privateKey } = testKeyPair();
    const verifier = new SignatureVerifier(publicKey);

    it('accepts a signature over the canonical header', () => {
        const signature = signCanonicalFields(header, privateKey);
        assert.strictEqual(verifier.verify(header, signature), true);
    });

    it('rejects when one byte of any signed field changes', () => {
        const signature = signCanonicalFields(header, privateKey);
        for (const field of ['sourceAppId', 'batchId', 'timestamp'] as const) {
            const tampered = { ...header, [field]: flipLastByte(header[field]) };
            assert.strictEqual(verifier.verify(tampered, signature), false, field);
        }
    });

    it('rejects when one byte of the signature changes', () => {
        const decoded = Buffer.from(signCanonicalFields(header, privateKey), 'base64');
        for (const position of [0, decoded.length >> 1, decoded.length - 1]) {
            const tampered = Buffer.from(decoded);
            tampered[position] = (tampered[position] ?? 0) ^ 0x01;
            assert.strictEqual(verifier.verify(header, tampered.toString('base64')), false, `byte ${position}`);
        }
    });

    it('rejects signatures from another key', () => {
        const other = generateKeyPairSync('rsa', { modulusLength: 2048 });
        const signature = signCanonicalFields(header, other.privateKey);
        assert.strictEqual(verifier.verify(header, signature), false);
    });

    it('rejects malformed base64 uniformly', () => {
        assert.strictEqual(verifier.verify(header, 'not base64!!'), false);
        assert.strictEqual(verifier.verify(header, 'YWJj'), false);
    });

    it('fails closed without a key', () => {
        const keyless = new SignatureVerifier(null);
        assert.strictEqual(keyless.hasKey, false);
        assert.strictEqual(keyless.verify(header, signCanonicalFields(header, privateKey)), false);
    });

    it('decodes base64 strictly', () => {
        assert.deepStrictEqual(decodeBase64Strict('YWJj'), Buffer.from('abc'));
        assert.deepStrictEqual(decodeBase64Strict('YWI='), Buffer.from('ab'));
        assert.strictEqual(decodeBase64Strict('YWJ'), null);
        assert.strictEqual(decodeBase64Strict('YW$j'), null);
        assert.strictEqual(decodeBase64Strict(''), null);
    });
});

describe('verifyNotificationBody', () => {
    const { publicKey, privateKey } = testKeyPair();
    const verifier = new SignatureVerifier(publicKey);

    it('rejects an empty body', () => {
        const { rejection, batchId } = rejectionOf(Buffer.alloc(0), verifier);
        assert.deepStrictEqual(rejection, { kind: 'SIGNATURE_REJECTED', reason: 'MALFORMED_BODY', message: 'Empty request body' });
        assert.strictEqual(batchId, 'unknown');
    });

    it('rejects a body that is not JSON', () => {
        const { rejection } = rejectionOf(Buffer.from('{"batchId":'), verifier);
        assert.deepStrictEqual(rejection, { kind: 'SIGNATURE_REJECTED', reason: 'MALFORMED_BODY', message: 'Invalid JSON format' });
    });

    it('rejects JSON that is not an object', () => {
        const { rejection } = rejectionOf(body([1, 2]), verifier);
        assert.strictEqual(rejection.message, 'Invalid JSON format');
    });

    it('rejects a missing signature and keeps the batch id', () => {
        const { rejection, batchId } = rejectionOf(body({ ...header, batchId: 'B-9', data: [] }), verifier);
        assert.deepStrictEqual(rejection, { kind: 'SIGNATURE_REJECTED', reason: 'MISSING_SIGNATURE', message: 'Missing signature' });
        assert.strictEqual(batchId, 'B-9');
    });

    it('rejects signed fields that are not strings', () => {
        const { rejection, batchId } = rejectionOf(body({ ...header, batchId: 123, signature: 'YWJj' }), verifier);
        assert.deepStrictEqual(rejection, { kind: 'SIGNATURE_REJECTED', reason: 'MALFORMED_BODY', message: 'Malformed signed fields' });
        assert.strictEqual(batchId, 'unknown');
    });

    it('reports a missing trusted key distinctly', () => {
        const { rejection } = rejectionOf(body(signedBatch(privateKey)), new SignatureVerifier(null));
        assert.deepStrictEqual(rejection, { kind: 'SIGNATURE_REJECTED', reason: 'MISSING_KEY', message: 'Signature verification unavailable' });
    });

    it('rejects a forged signature', () => {
        const forged = { ...signedBatch(privateKey), batchId: 'BATCH-FORGED' };
        const { rejection, batchId } = rejectionOf(body(forged), verifier);
        assert.deepStrictEqual(rejection, { kind: 'SIGNATURE_REJECTED', reason: 'CRYPTO_MISMATCH', message: 'Signature is not valid' });
        assert.strictEqual(batchId, 'BATCH-FORGED');
    });

    it('passes the original bytes through on success', () => {
        const rawBody = body(signedBatch(privateKey));
        const result = verifyNotificationBody(rawBody, verifier);

        assert.ok(result.ok);
        assert.strictEqual(result.value.rawBody, rawBody);
        assert.deepStrictEqual(result.value.header, header);
    });
});
