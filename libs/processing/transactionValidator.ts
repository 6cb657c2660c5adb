import { TransactionRecordSchema } from '../validation/schema.js';
import { safeValidate } from '../validation/zod-middleware.js';
import { isTransactionType, Transaction, TRANSACTION_TYPES } from './transaction.js';

export const MIN_TRANSACTION_ID_LENGTH = 10;
export const MIN_ACCOUNT_NUMBER_LENGTH = 8;

export type TransactionValidation =
    | { valid: true; transaction: Transaction }
    | { valid: false; transactionId: string; errors: string[] };

/**
 * Best-effort identity of a record, read before validation. Empty when absent.
 */
export function readTransactionId(record: unknown): string {
    if (typeof record !== 'object' || record === null) return '';
    const candidate: unknown = Reflect.get(record, 'transactionId');
    return typeof candidate === 'string' ? candidate : '';
}

/**
 * Checks one record and reports every violated rule.
 */
export function validateTransaction(record: unknown): TransactionValidation {
    const parsed = safeValidate(TransactionRecordSchema, record);
    if (!parsed.success) {
        return {
            valid: false,
            transactionId: readTransactionId(record),
            errors: parsed.issues.map(issue => issue.path ? `${issue.path}: ${issue.message}` : issue.message)
        };
    }

    const input = parsed.data;
    const errors: string[] = [];

    if (input.transactionId.length < MIN_TRANSACTION_ID_LENGTH) {
        errors.push('Invalid transaction ID format');
    }
    if (!(input.amount > 0)) {
        errors.push('Transaction amount must be positive');
    }
    if (input.sourceAccountNumber.length < MIN_ACCOUNT_NUMBER_LENGTH) {
        errors.push('Invalid account number format');
    }

    const transactionType = input.transactionType;
    if (!isTransactionType(transactionType)) {
        errors.push(`Invalid transaction type. Must be one of: ${Object.keys(TRANSACTION_TYPES).join(', ')}`);
    }
    if (input.availableBalance !== null && input.availableBalance < 0) {
        errors.push('Available balance must not be negative');
    }

    if (errors.length > 0 || !isTransactionType(transactionType)) {
        return { valid: false, transactionId: input.transactionId, errors };
    }

    return { valid: true, transaction: { ...input, transactionType } };
}
