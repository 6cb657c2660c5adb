import { logger } from "../logging/logger.js";
import { onDependencyFault } from "../policy/failurePolicy.js";
import { RateCounterStore } from "./counterStore.js";

export interface RateLimitConfig {
    maxRequests: number;
    windowSeconds: number;
}

export interface RateLimitDecision {
    allowed: boolean;
    count: number;
    limit: number;
    remaining: number;
    /** Epoch seconds at which the current window ends. */
    resetAt: number;
    windowSeconds: number;
    /** True when the counter store faulted and the decision came from the failure policy. */
    degraded: boolean;
}

/**
 * Fixed-window limiter keyed by caller identity.
 * All requests inside [windowStart, windowStart + window) share one counter.
 */
export class FixedWindowRateLimiter {
    private degradedChecks = 0;

    constructor(
        private readonly store: RateCounterStore,
        private readonly config: RateLimitConfig,
        private readonly clock: () => number = Date.now
    ) { }

    static windowStart(nowSeconds: number, windowSeconds: number): number {
        return Math.floor(nowSeconds / windowSeconds) * windowSeconds;
    }

    static counterKey(callerId: string, windowStart: number): string {
        return `ratelimit:${callerId}:${windowStart}`;
    }

    get storeKind(): RateCounterStore['kind'] {
        return this.store.kind;
    }

    get degradedCount(): number {
        return this.degradedChecks;
    }

    async check(callerId: string): Promise<RateLimitDecision> {
        const { maxRequests, windowSeconds } = this.config;
        const nowSeconds = Math.floor(this.clock() / 1000);
        const windowStart = FixedWindowRateLimiter.windowStart(nowSeconds, windowSeconds);
        const resetAt = windowStart + windowSeconds;
        const key = FixedWindowRateLimiter.counterKey(callerId, windowStart);

        let count: number;
        try {
            count = await this.store.increment(key, { resetAt, ttlSeconds: windowSeconds * 2 });
        } catch (error) {
            this.degradedChecks++;
            const decision = onDependencyFault('rateLimiter', error, { callerId, store: this.store.kind });
            return {
                allowed: decision === 'ALLOW',
                count: 0,
                limit: maxRequests,
                remaining: maxRequests,
                resetAt,
                windowSeconds,
                degraded: true
            };
        }

        const allowed = count <= maxRequests;
        if (!allowed) {
            logger.warn({ callerId, count, limit: maxRequests, resetAt }, "RateLimit: Limit exceeded");
        }

        return {
            allowed,
            count,
            limit: maxRequests,
            remaining: Math.max(0, maxRequests - count),
            resetAt,
            windowSeconds,
            degraded: false
        };
    }
}

/**
 * Accounting headers carried by every response that passed through the limiter.
 */
export function rateLimitHeaders(decision: RateLimitDecision): Record<string, string> {
    return {
        'X-RateLimit-Limit': String(decision.limit),
        'X-RateLimit-Remaining': String(decision.remaining),
        'X-RateLimit-Reset': String(decision.resetAt),
        'X-RateLimit-Window': String(decision.windowSeconds),
    };
}
