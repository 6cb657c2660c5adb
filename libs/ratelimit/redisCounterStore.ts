import { Redis } from 'ioredis';
import { RateCounterStore } from './counterStore.js';
import { logger } from '../logging/logger.js';
import { withTimeout } from '../utils/withTimeout.js';

/**
 * INCR and EXPIRE in one server-side step, so a counter can never be left without expiry.
 */
export const INCREMENT_WITH_EXPIRY_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
redis.call('EXPIRE', KEYS[1], ARGV[1])
return count
`;

/**
 * The subset of the Redis client the counter store uses.
 */
export interface CounterScriptClient {
    eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
    ping(): Promise<string>;
    quit(): Promise<string>;
}

export function redisScriptClient(redis: Redis): CounterScriptClient {
    return {
        eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args),
        ping: () => redis.ping(),
        quit: () => redis.quit(),
    };
}

export interface RedisConnectionSettings {
    host: string;
    port: number;
    db: number;
    password?: string;
}

/**
 * Redis client tuned for a fail-open caller: no offline queue, bounded commands.
 */
export function createRedisClient(settings: RedisConnectionSettings, timeoutMs: number): Redis {
    const client = new Redis({
        host: settings.host,
        port: settings.port,
        db: settings.db,
        password: settings.password,
        connectTimeout: timeoutMs,
        commandTimeout: timeoutMs,
        maxRetriesPerRequest: 1,
        enableOfflineQueue: false,
        lazyConnect: true,
    });

    client.on('error', (error: Error) => {
        logger.warn({ error: error.message }, 'RateLimit: Redis connection error');
    });

    return client;
}

/**
 * Shared counter store backed by Redis. Safe across instances.
 */
export class RedisCounterStore implements RateCounterStore {
    readonly kind = 'shared' as const;

    constructor(
        private readonly client: CounterScriptClient,
        private readonly timeoutMs: number
    ) { }

    async increment(key: string, window: { resetAt: number; ttlSeconds: number }): Promise<number> {
        const reply = await withTimeout(
            this.client.eval(INCREMENT_WITH_EXPIRY_SCRIPT, 1, key, window.ttlSeconds),
            this.timeoutMs,
            'RateLimit:RedisIncrement'
        );

        const count = typeof reply === 'number' ? reply : Number(reply);
        if (!Number.isInteger(count)) {
            throw new Error(`Unexpected counter reply from Redis: ${String(reply)}`);
        }
        return count;
    }

    async ping(): Promise<void> {
        await withTimeout(this.client.ping(), this.timeoutMs, 'RateLimit:RedisPing');
    }

    async close(): Promise<void> {
        try {
            await this.client.quit();
        } catch (error) {
            logger.warn({ error }, 'RateLimit: Redis quit failed');
        }
    }
}
