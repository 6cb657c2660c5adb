import { constants, KeyObject, verify } from 'crypto';
import { logger } from '../logging/logger.js';
import { CanonicalFields } from '../validation/schema.js';
import { canonicalBytes } from './canonical.js';

export const SIGNATURE_HASH = 'sha512';
export const SIGNATURE_PADDING = constants.RSA_PKCS1_PADDING;

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Strict base64 decoding; Buffer.from silently skips invalid characters.
 */
export function decodeBase64Strict(value: string): Buffer | null {
    const compact = value.trim();
    if (compact.length === 0 || !BASE64.test(compact)) {
        return null;
    }
    return Buffer.from(compact, 'base64');
}

/**
 * SHA512withRSA (PKCS#1 v1.5) verification over the canonical batch header.
 * Every failure mode is a plain `false`.
 */
export class SignatureVerifier {
    constructor(private readonly publicKey: KeyObject | null) { }

    get hasKey(): boolean {
        return this.publicKey !== null;
    }

    verify(payload: CanonicalFields, signatureBase64: string): boolean {
        if (!this.publicKey) {
            logger.error('SignatureVerifier: no trusted public key loaded');
            return false;
        }

        const signature = decodeBase64Strict(signatureBase64);
        if (!signature) {
            return false;
        }

        try {
            return verify(
                SIGNATURE_HASH,
                canonicalBytes(payload),
                { key: this.publicKey, padding: SIGNATURE_PADDING },
                signature
            );
        } catch (error: unknown) {
            logger.warn({ error: error instanceof Error ? error.message : String(error) },
                'SignatureVerifier: verification raised');
            return false;
        }
    }
}
