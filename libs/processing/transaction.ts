import { CanonicalFields, TransactionRecordInput } from '../validation/schema.js';

export const TRANSACTION_TYPES = {
    C: 'credit',
    D: 'debit',
} as const;

export type TransactionType = keyof typeof TRANSACTION_TYPES;
export type TransactionKind = typeof TRANSACTION_TYPES[TransactionType];

export function isTransactionType(value: string): value is TransactionType {
    return Object.hasOwn(TRANSACTION_TYPES, value);
}

/**
 * A record that passed validation.
 */
export interface Transaction extends Omit<TransactionRecordInput, 'transactionType'> {
    transactionType: TransactionType;
}

/**
 * A verified batch. Records are left unparsed so each one is validated on its own.
 */
export interface NotificationBatch extends CanonicalFields {
    records: unknown[];
}
