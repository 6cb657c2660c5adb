import { CanonicalFields } from '../validation/schema.js';

/**
 * Signed-field contract shared with the counterparty.
 *
 * Changing the field list or its order invalidates every signature the counterparty
 * produces; a change is a new version, never an edit of an existing one.
 */
export const CANONICAL_CONTRACTS = {
    v1: ['sourceAppId', 'batchId', 'timestamp'],
} as const satisfies Record<string, readonly (keyof CanonicalFields)[]>;

export type CanonicalVersion = keyof typeof CANONICAL_CONTRACTS;

export const CURRENT_CANONICAL_VERSION: CanonicalVersion = 'v1';

/**
 * Fields concatenated in contract order with no separators.
 */
export function canonicalString(fields: CanonicalFields, version: CanonicalVersion = CURRENT_CANONICAL_VERSION): string {
    return CANONICAL_CONTRACTS[version].map(name => fields[name]).join('');
}

export function canonicalBytes(fields: CanonicalFields, version: CanonicalVersion = CURRENT_CANONICAL_VERSION): Buffer {
    return Buffer.from(canonicalString(fields, version), 'utf8');
}
