import { KeyObject, sign } from 'crypto';
import { CanonicalFields } from '../validation/schema.js';
import { canonicalBytes } from './canonical.js';
import { SIGNATURE_HASH, SIGNATURE_PADDING } from './signatureVerifier.js';

/**
 * Counterparty side of the contract: base64 SHA512withRSA signature of the canonical header.
 */
export function signCanonicalFields(fields: CanonicalFields, privateKey: KeyObject): string {
    return sign(SIGNATURE_HASH, canonicalBytes(fields), { key: privateKey, padding: SIGNATURE_PADDING })
        .toString('base64');
}
