/**
 * Fixed-window counter storage.
 * `increment` returns the post-increment count for the key.
 */
export interface RateCounterStore {
    readonly kind: 'shared' | 'memory';
    increment(key: string, window: { resetAt: number; ttlSeconds: number }): Promise<number>;
    close(): Promise<void>;
}

interface MemoryCounter {
    count: number;
    resetAt: number;
}

/**
 * In-process fallback. Correct within one instance only.
 * Counters whose window has ended are swept once the map grows past the threshold.
 */
export class MemoryCounterStore implements RateCounterStore {
    readonly kind = 'memory' as const;
    private readonly counters = new Map<string, MemoryCounter>();

    constructor(
        private readonly sweepThreshold: number = 1000,
        private readonly clock: () => number = Date.now
    ) { }

    async increment(key: string, window: { resetAt: number; ttlSeconds: number }): Promise<number> {
        if (this.counters.size > this.sweepThreshold) {
            this.sweep();
        }

        const counter = this.counters.get(key) ?? { count: 0, resetAt: window.resetAt };
        counter.count += 1;
        this.counters.set(key, counter);
        return counter.count;
    }

    /**
     * Removes counters whose reset time has passed. Returns the number removed.
     */
    sweep(): number {
        const nowSeconds = Math.floor(this.clock() / 1000);
        let removed = 0;
        for (const [key, counter] of this.counters) {
            if (nowSeconds >= counter.resetAt) {
                this.counters.delete(key);
                removed++;
            }
        }
        return removed;
    }

    get size(): number {
        return this.counters.size;
    }

    async close(): Promise<void> {
        this.counters.clear();
    }
}
