import { logger } from '../logging/logger.js';
import { describeError } from '../errors/sanitizer.js';
import { ConfigGuard, Env } from './config-guard.js';
import { DB_CONFIG_GUARDS } from './config/db-config.js';
import { GATEWAY_CONFIG_GUARDS } from './config/gateway-config.js';
import { GatewaySettings } from './settings.js';
import { createDatabase, createPool, Database } from '../db/index.js';
import { applyMigrations } from '../db/migrate.js';
import { DedupIndex } from '../dedup/dedupIndex.js';
import { PostgresDedupStore } from '../dedup/postgresDedupStore.js';
import { NetworkFilter } from '../network/networkFilter.js';
import { WebhookStats } from '../observability/webhookStats.js';
import { BatchProcessor } from '../processing/batchProcessor.js';
import { createSimulatedEffect } from '../processing/effects.js';
import { MemoryCounterStore, RateCounterStore } from '../ratelimit/counterStore.js';
import { FixedWindowRateLimiter } from '../ratelimit/rateLimiter.js';
import { createRedisClient, RedisCounterStore, redisScriptClient } from '../ratelimit/redisCounterStore.js';
import { loadTrustedPublicKey } from '../crypto/publicKey.js';
import { SignatureVerifier } from '../signature/signatureVerifier.js';
import { withTimeout } from '../utils/withTimeout.js';

export interface GatewayComponents {
    database: Database;
    dedupIndex: DedupIndex;
    counterStore: RateCounterStore;
    rateLimiter: FixedWindowRateLimiter;
    networkFilter: NetworkFilter;
    signatureVerifier: SignatureVerifier;
    batchProcessor: BatchProcessor;
    stats: WebhookStats;
    shutdown(): Promise<void>;
}

/**
 * Shared Redis counters when configured and reachable, otherwise the in-process store.
 */
export async function createCounterStore(
    redisSettings: GatewaySettings['redis'],
    timeoutMs: number
): Promise<RateCounterStore> {
    if (!redisSettings) {
        logger.warn('RateLimit: REDIS_HOST not set, using in-process counters');
        return new MemoryCounterStore();
    }

    const redis = createRedisClient(redisSettings, timeoutMs);
    const store = new RedisCounterStore(redisScriptClient(redis), timeoutMs);
    try {
        await withTimeout(redis.connect(), timeoutMs, 'RateLimit:RedisConnect');
        await store.ping();
        logger.info({ host: redisSettings.host, port: redisSettings.port }, 'RateLimit: using Redis counters');
        return store;
    } catch (error) {
        logger.warn({ error: describeError(error) }, 'RateLimit: Redis unreachable, using in-process counters');
        redis.disconnect();
        return new MemoryCounterStore();
    }
}

/**
 * Startup sequence. Configuration violations throw ConfigurationError before any
 * connection is opened.
 */
export async function bootstrap(settings: GatewaySettings, env: Env = process.env): Promise<GatewayComponents> {
    logger.info({ env: settings.env }, 'Bootstrapping bank notification gateway');

    ConfigGuard.enforce([...DB_CONFIG_GUARDS, ...GATEWAY_CONFIG_GUARDS], env);

    const database = createDatabase(createPool(settings.database, settings.timeouts.storeMs));
    const dedupIndex = new DedupIndex(new PostgresDedupStore(database), {
        retentionDays: settings.dedup.retentionDays,
        maxCachedEntries: settings.dedup.maxCachedEntries,
        timeoutMs: settings.timeouts.storeMs
    });

    try {
        await applyMigrations(database, settings.database.migrationsDir);
        await dedupIndex.warm();
    } catch (error) {
        await database.close();
        throw error;
    }

    const counterStore = await createCounterStore(settings.redis, settings.timeouts.storeMs);
    const publicKey = await loadTrustedPublicKey(settings.bankPublicKeyFile);

    const components: GatewayComponents = {
        database,
        dedupIndex,
        counterStore,
        rateLimiter: new FixedWindowRateLimiter(counterStore, settings.rateLimit),
        networkFilter: new NetworkFilter(settings.allowedNetworks),
        signatureVerifier: new SignatureVerifier(publicKey),
        batchProcessor: new BatchProcessor(
            dedupIndex,
            createSimulatedEffect(settings.effectLatencyMs),
            { effectTimeoutMs: settings.timeouts.effectMs }
        ),
        stats: new WebhookStats(),
        shutdown: async () => {
            await counterStore.close();
            await database.close();
            logger.info('Gateway resources released');
        }
    };

    logger.info({
        counterStore: counterStore.kind,
        trustedKeyLoaded: publicKey !== null,
        trustedNetworks: components.networkFilter.networks.length
    }, 'Startup checks passed');

    return components;
}
