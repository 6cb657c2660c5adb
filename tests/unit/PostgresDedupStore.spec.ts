/**
 * Unit Tests: PostgresDedupStore
 *
 * SQL shape and row mapping against a mocked query function.
 *
 * @see libs/dedup/postgresDedupStore.ts
 */

import { describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { Queryable } from '../../libs/db/index.js';
import { PostgresDedupStore } from '../../libs/dedup/postgresDedupStore.js';

function mockDb(result: { rows: unknown[]; rowCount: number | null }) {
    const query = mock.fn(async (_text: string, _params?: unknown[]) => result);
    return { query, db: { query } as unknown as Queryable };
}

describe('PostgresDedupStore', () => {
    it('claims with an insert that ignores conflicts', async () => {
        const { query, db } = mockDb({ rows: [{ transaction_id: 'TXN-0000000001' }], rowCount: 1 });
        const store = new PostgresDedupStore(db);

        const claimed = await store.claim({
            transactionId: 'TXN-0000000001',
            batchId: 'BATCH-001',
            sourceAppId: 'BANKAPP',
            batchTimestamp: '2024-05-01T10:00:00Z'
        });

        assert.strictEqual(claimed, true);
        const call = query.mock.calls[0];
        assert.match(call?.arguments[0] ?? '', /ON CONFLICT \(transaction_id\) DO NOTHING/);
        assert.match(call?.arguments[0] ?? '', /RETURNING transaction_id/);
        assert.deepStrictEqual(call?.arguments[1], ['TXN-0000000001', 'BATCH-001', 'BANKAPP', '2024-05-01T10:00:00Z']);
    });

    it('reports a conflict when no row comes back', async () => {
        const { db } = mockDb({ rows: [], rowCount: 0 });
        const store = new PostgresDedupStore(db);

        assert.strictEqual(await store.claim({
            transactionId: 'TXN-0000000001', batchId: 'B', sourceAppId: 'A', batchTimestamp: 'T'
        }), false);
    });

    it('marks processed and releases only unfinished claims', async () => {
        const { query, db } = mockDb({ rows: [], rowCount: 1 });
        const store = new PostgresDedupStore(db);

        await store.markProcessed('TXN-0000000001', 'BATCH-001');
        await store.release('TXN-0000000002', 'BATCH-001');

        assert.match(query.mock.calls[0]?.arguments[0] ?? '', /SET status = 'PROCESSED', processed_at = NOW\(\)/);
        assert.deepStrictEqual(query.mock.calls[0]?.arguments[1], ['TXN-0000000001', 'BATCH-001']);
        assert.match(query.mock.calls[1]?.arguments[0] ?? '', /DELETE FROM processed_transactions/);
        assert.match(query.mock.calls[1]?.arguments[0] ?? '', /status = 'CLAIMED'/);
    });

    it('maps loaded rows', async () => {
        const claimedAt = new Date('2024-05-01T00:00:00Z');
        const { query, db } = mockDb({
            rows: [{ transaction_id: 'TXN-0000000001', batch_id: 'B1', status: 'PROCESSED', claimed_at: claimedAt }],
            rowCount: 1
        });
        const store = new PostgresDedupStore(db);
        const since = new Date('2024-04-01T00:00:00Z');

        const entries = await store.loadSince(since);

        assert.deepStrictEqual(entries, [
            { transactionId: 'TXN-0000000001', batchId: 'B1', status: 'PROCESSED', claimedAt }
        ]);
        assert.deepStrictEqual(query.mock.calls[0]?.arguments[1], [since]);
    });

    it('returns the purge count', async () => {
        assert.strictEqual(await new PostgresDedupStore(mockDb({ rows: [], rowCount: 4 }).db).purgeBefore(new Date()), 4);
        assert.strictEqual(await new PostgresDedupStore(mockDb({ rows: [], rowCount: null }).db).purgeBefore(new Date()), 0);
    });

    it('maps statistics and defaults an empty result', async () => {
        const oldest = new Date('2024-04-01T00:00:00Z');
        const newest = new Date('2024-05-01T00:00:00Z');
        const filled = new PostgresDedupStore(mockDb({
            rows: [{ total: 5, processed: 4, claimed: 1, oldest, newest }],
            rowCount: 1
        }).db);

        assert.deepStrictEqual(await filled.stats(), {
            total: 5, processed: 4, claimed: 1, oldestClaimedAt: oldest, newestClaimedAt: newest
        });

        const empty = new PostgresDedupStore(mockDb({ rows: [], rowCount: 0 }).db);
        assert.deepStrictEqual(await empty.stats(), {
            total: 0, processed: 0, claimed: 0, oldestClaimedAt: null, newestClaimedAt: null
        });
    });
});
