/**
 * Unit Tests: transaction record validation
 *
 * @see libs/processing/transactionValidator.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { readTransactionId, validateTransaction } from '../../libs/processing/transactionValidator.js';
import { validRecord } from '../helpers/fakes.js';

describe('validateTransaction', () => {
    it('maps a valid record to domain names', () => {
        const result = validateTransaction(validRecord());

        assert.ok(result.valid);
        assert.deepStrictEqual(result.transaction, {
            transactionId: 'TXN-0000000001',
            transactionRefNo: 'REF-1',
            sourceAccountNumber: '1234567890',
            amount: 150000,
            availableBalance: 900000,
            transactionType: 'C',
            noticeCreatedTime: null,
            transactionTime: '2024-05-01 10:00:00',
            description: 'Test credit',
            counterpartyAccountNumber: null,
            counterpartyAccountName: null,
            counterpartyBankId: null,
            counterpartyBankName: null
        });
    });

    it('reports every violated rule', () => {
        const result = validateTransaction({
            transactionId: 'SHORT',
            srcAccountNumber: '123',
            amount: 0,
            transType: 'X',
            balanceAvailable: -1
        });

        assert.deepStrictEqual(result, {
            valid: false,
            transactionId: 'SHORT',
            errors: [
                'Invalid transaction ID format',
                'Transaction amount must be positive',
                'Invalid account number format',
                'Invalid transaction type. Must be one of: C, D',
                'Available balance must not be negative'
            ]
        });
    });

    it('accepts a debit with no available balance', () => {
        const result = validateTransaction(validRecord({ transType: 'D', balanceAvailable: null }));

        assert.ok(result.valid);
        assert.strictEqual(result.transaction.transactionType, 'D');
        assert.strictEqual(result.transaction.availableBalance, null);
    });

    it('rejects lowercase type codes', () => {
        const result = validateTransaction(validRecord({ transType: 'c' }));
        assert.deepStrictEqual(result, {
            valid: false,
            transactionId: 'TXN-0000000001',
            errors: ['Invalid transaction type. Must be one of: C, D']
        });
    });

    it('treats a missing transaction id as invalid', () => {
        const { transactionId: _omitted, ...record } = validRecord();
        const result = validateTransaction(record);

        assert.deepStrictEqual(result, { valid: false, transactionId: '', errors: ['Invalid transaction ID format'] });
    });

    it('reports wrong field types', () => {
        assert.deepStrictEqual(validateTransaction(validRecord({ amount: '100' })), {
            valid: false,
            transactionId: 'TXN-0000000001',
            errors: ['amount: Expected number, received string']
        });

        const { amount: _amount, ...withoutAmount } = validRecord();
        assert.deepStrictEqual(validateTransaction(withoutAmount), {
            valid: false,
            transactionId: 'TXN-0000000001',
            errors: ['amount: Required']
        });
    });

    it('rejects records that are not objects', () => {
        assert.deepStrictEqual(validateTransaction('junk'), {
            valid: false,
            transactionId: '',
            errors: ['Expected object, received string']
        });
    });
});

describe('readTransactionId', () => {
    it('reads the id only when it is a string', () => {
        assert.strictEqual(readTransactionId({ transactionId: 'TXN-1' }), 'TXN-1');
        assert.strictEqual(readTransactionId({ transactionId: 42 }), '');
        assert.strictEqual(readTransactionId(null), '');
    });
});
