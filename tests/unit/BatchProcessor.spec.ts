/**
 * Unit Tests: BatchProcessor
 *
 * @see libs/processing/batchProcessor.ts
 */

import { describe, it, beforeEach, mock } from 'node:test';
import assert from 'node:assert';
import { setImmediate as flush } from 'timers/promises';
import { DedupIndex } from '../../libs/dedup/dedupIndex.js';
import { BatchProcessor } from '../../libs/processing/batchProcessor.js';
import { createSimulatedEffect, TransactionEffect } from '../../libs/processing/effects.js';
import { NotificationBatch } from '../../libs/processing/transaction.js';
import { FakeDedupStore, validRecord } from '../helpers/fakes.js';

const clock = () => Date.UTC(2024, 4, 1, 10, 0, 0);

function batchOf(records: unknown[], batchId = 'BATCH-001'): NotificationBatch {
    return { sourceAppId: 'BANKAPP', batchId, timestamp: '2024-05-01T10:00:00Z', records };
}

describe('BatchProcessor', () => {
    let store: FakeDedupStore;
    let dedup: DedupIndex;

    const processorWith = (effect: TransactionEffect, effectTimeoutMs = 200) =>
        new BatchProcessor(dedup, effect, { effectTimeoutMs }, clock);

    beforeEach(() => {
        store = new FakeDedupStore(clock);
        dedup = new DedupIndex(store, { retentionDays: 30, timeoutMs: 50, maxCachedEntries: 100 }, clock);
    });

    it('applies every record of a clean batch', async () => {
        const processor = processorWith(createSimulatedEffect(0));

        const result = await processor.processBatch(batchOf([
            validRecord({ transactionId: 'TXN-0000000001' }),
            validRecord({ transactionId: 'TXN-0000000002', transType: 'D' })
        ]));

        assert.strictEqual(result.allSucceeded, true);
        assert.strictEqual(result.processedCount, 2);
        assert.strictEqual(result.failedCount, 0);
        assert.deepStrictEqual(result.failedTransactions, []);
        assert.deepStrictEqual(result.outcomes, [
            {
                kind: 'SUCCESS',
                transactionId: 'TXN-0000000001',
                result: { status: 'credit_processed', accountBalanceUpdated: true, notificationSent: true },
                processingTimeMs: 0
            },
            {
                kind: 'SUCCESS',
                transactionId: 'TXN-0000000002',
                result: { status: 'debit_processed', accountBalanceUpdated: true, notificationSent: true },
                processingTimeMs: 0
            }
        ]);
        assert.strictEqual(store.rows.get('TXN-0000000001')?.status, 'PROCESSED');
    });

    it('applies a transaction repeated inside one batch once', async () => {
        const effect = mock.fn(createSimulatedEffect(0));
        const processor = processorWith(effect);

        const result = await processor.processBatch(batchOf([validRecord(), validRecord()]));

        assert.deepStrictEqual(result.outcomes.map(outcome => outcome.kind), ['SUCCESS', 'DUPLICATE_REJECTED']);
        assert.strictEqual(effect.mock.calls.length, 1);
    });

    it('rejects a replayed batch', async () => {
        const processor = processorWith(createSimulatedEffect(0));

        await processor.processBatch(batchOf([validRecord()]));
        const replay = await processor.processBatch(batchOf([validRecord()], 'BATCH-002'));

        assert.deepStrictEqual(replay.outcomes, [{ kind: 'DUPLICATE_REJECTED', transactionId: 'TXN-0000000001' }]);
        assert.deepStrictEqual(replay.failedTransactions, [
            { transactionId: 'TXN-0000000001', reason: 'DUPLICATE_TRANSACTION', detail: 'Duplicate transaction' }
        ]);
        assert.strictEqual(replay.allSucceeded, false);
    });

    it('checks duplicates before validating', async () => {
        const processor = processorWith(createSimulatedEffect(0));
        await processor.processBatch(batchOf([validRecord()]));

        const result = await processor.processBatch(batchOf([validRecord({ amount: -5 })], 'BATCH-002'));

        assert.strictEqual(result.outcomes[0]?.kind, 'DUPLICATE_REJECTED');
    });

    it('isolates a failing record from its siblings', async () => {
        const processor = processorWith(createSimulatedEffect(0));

        const result = await processor.processBatch(batchOf([
            validRecord({ transactionId: 'TXN-0000000001' }),
            validRecord({ transactionId: 'TXN-0000000002', amount: -5 })
        ]));

        assert.strictEqual(result.processedCount, 1);
        assert.strictEqual(result.failedCount, 1);
        assert.deepStrictEqual(result.outcomes[1], {
            kind: 'VALIDATION_FAILED',
            transactionId: 'TXN-0000000002',
            errors: ['Transaction amount must be positive']
        });
        assert.deepStrictEqual(result.failedTransactions, [
            { transactionId: 'TXN-0000000002', reason: 'VALIDATION_FAILED', detail: 'Transaction amount must be positive' }
        ]);
        assert.strictEqual(store.rows.has('TXN-0000000002'), false);
    });

    it('releases the claim when the effect fails', async () => {
        const processor = processorWith(async () => { throw new Error('core banking offline'); });

        const result = await processor.processBatch(batchOf([validRecord()]));

        assert.deepStrictEqual(result.outcomes, [
            { kind: 'PROCESSING_ERROR', transactionId: 'TXN-0000000001', reason: 'core banking offline' }
        ]);
        assert.strictEqual(store.rows.has('TXN-0000000001'), false);
        assert.strictEqual(dedup.isKnown('TXN-0000000001'), false);
    });

    it('keeps the claim when the effect times out', async () => {
        const processor = processorWith(() => new Promise(() => undefined), 20);

        const result = await processor.processBatch(batchOf([validRecord()]));

        assert.deepStrictEqual(result.outcomes, [{
            kind: 'PROCESSING_ERROR',
            transactionId: 'TXN-0000000001',
            reason: 'transaction effect timed out after 20ms'
        }]);
        assert.strictEqual(store.rows.get('TXN-0000000001')?.status, 'CLAIMED');
        assert.strictEqual(dedup.isKnown('TXN-0000000001'), true);
    });

    it('does not apply the effect when the dedup store is unavailable', async () => {
        const effect = mock.fn(createSimulatedEffect(0));
        const processor = processorWith(effect);
        store.failClaim = new Error('connection refused');

        const result = await processor.processBatch(batchOf([validRecord()]));

        assert.deepStrictEqual(result.outcomes, [
            { kind: 'PROCESSING_ERROR', transactionId: 'TXN-0000000001', reason: 'Duplicate index unavailable' }
        ]);
        assert.strictEqual(effect.mock.calls.length, 0);
    });

    it('applies a resent transaction whose earlier claim landed late', async () => {
        const processor = processorWith(createSimulatedEffect(0));
        let open: () => void = () => undefined;
        store.claimGate = new Promise<void>(resolve => { open = resolve; });

        const first = await processor.processBatch(batchOf([validRecord()]));
        assert.deepStrictEqual(first.outcomes, [
            { kind: 'PROCESSING_ERROR', transactionId: 'TXN-0000000001', reason: 'Duplicate index unavailable' }
        ]);

        store.claimGate = null;
        open();
        await flush();
        const resend = await processor.processBatch(batchOf([validRecord()]));

        assert.strictEqual(resend.outcomes[0]?.kind, 'SUCCESS');
        assert.strictEqual(store.rows.get('TXN-0000000001')?.status, 'PROCESSED');
    });
});
