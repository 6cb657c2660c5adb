import { z } from 'zod';
import { Env } from './config-guard.js';
import { createValidator } from '../validation/zod-middleware.js';

const intFromEnv = (fallback: number, min = 0) =>
    z.coerce.number().int().min(min).default(fallback);

const listFromEnv = (fallback: string) =>
    z.string().default(fallback).transform(value =>
        value.split(',').map(entry => entry.trim()).filter(entry => entry.length > 0)
    );

const flagFromEnv = z.enum(['true', 'false']).default('false').transform(value => value === 'true');

/**
 * Environment schema. Unset variables take their defaults; set but invalid values
 * are a fatal configuration error.
 */
export const SettingsSchema = z.object({
    NODE_ENV: z.string().default('development'),
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: intFromEnv(8443, 1),
    BODY_LIMIT: z.string().min(1).default('1mb'),

    ALLOWED_IPS: listFromEnv('127.0.0.1,::1'),

    RATE_LIMIT_REQUESTS: intFromEnv(60, 1),
    RATE_LIMIT_WINDOW: intFromEnv(60, 1),

    REDIS_HOST: z.string().optional(),
    REDIS_PORT: intFromEnv(6379, 1),
    REDIS_DB: intFromEnv(0),
    REDIS_PASSWORD: z.string().optional(),

    BANK_PUBLIC_KEY_FILE: z.string().min(1).default('certs/bank_public.pem'),

    DB_HOST: z.string().min(1),
    DB_PORT: intFromEnv(5432, 1),
    DB_USER: z.string().min(1),
    DB_PASSWORD: z.string(),
    DB_NAME: z.string().min(1),
    DB_POOL_MAX: intFromEnv(10, 1),
    DB_SSL: flagFromEnv,
    DB_CA_CERT: z.string().optional(),
    DB_MIGRATIONS_DIR: z.string().min(1).default('db/migrations'),

    DEDUP_RETENTION_DAYS: intFromEnv(30, 1),
    DEDUP_CACHE_MAX: intFromEnv(500_000, 1),
    STORE_TIMEOUT_MS: intFromEnv(2000, 1),
    EFFECT_TIMEOUT_MS: intFromEnv(5000, 1),
    EFFECT_LATENCY_MS: intFromEnv(100),
});

export type RawSettings = z.infer<typeof SettingsSchema>;

export interface GatewaySettings {
    env: string;
    server: { host: string; port: number; bodyLimit: string };
    allowedNetworks: string[];
    rateLimit: { maxRequests: number; windowSeconds: number };
    redis: { host: string; port: number; db: number; password?: string } | null;
    bankPublicKeyFile: string;
    database: {
        host: string;
        port: number;
        user: string;
        password: string;
        database: string;
        poolMax: number;
        ssl: boolean;
        caCert?: string;
        migrationsDir: string;
    };
    dedup: { retentionDays: number; maxCachedEntries: number };
    timeouts: { storeMs: number; effectMs: number };
    effectLatencyMs: number;
}

const validateSettings = createValidator(SettingsSchema);

export function loadSettings(env: Env = process.env): GatewaySettings {
    const raw = validateSettings(env, 'Bootstrap:Settings');
    const redisHost = raw.REDIS_HOST?.trim();

    return {
        env: raw.NODE_ENV,
        server: { host: raw.HOST, port: raw.PORT, bodyLimit: raw.BODY_LIMIT },
        allowedNetworks: raw.ALLOWED_IPS,
        rateLimit: { maxRequests: raw.RATE_LIMIT_REQUESTS, windowSeconds: raw.RATE_LIMIT_WINDOW },
        redis: redisHost
            ? {
                host: redisHost,
                port: raw.REDIS_PORT,
                db: raw.REDIS_DB,
                ...(raw.REDIS_PASSWORD ? { password: raw.REDIS_PASSWORD } : {})
            }
            : null,
        bankPublicKeyFile: raw.BANK_PUBLIC_KEY_FILE,
        database: {
            host: raw.DB_HOST,
            port: raw.DB_PORT,
            user: raw.DB_USER,
            password: raw.DB_PASSWORD,
            database: raw.DB_NAME,
            poolMax: raw.DB_POOL_MAX,
            ssl: raw.DB_SSL || raw.DB_CA_CERT !== undefined,
            caCert: raw.DB_CA_CERT,
            migrationsDir: raw.DB_MIGRATIONS_DIR
        },
        dedup: { retentionDays: raw.DEDUP_RETENTION_DAYS, maxCachedEntries: raw.DEDUP_CACHE_MAX },
        timeouts: { storeMs: raw.STORE_TIMEOUT_MS, effectMs: raw.EFFECT_TIMEOUT_MS },
        effectLatencyMs: raw.EFFECT_LATENCY_MS
    };
}
