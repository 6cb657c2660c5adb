import { GuardRule } from '../config-guard.js';

const isProtectedEnv = (nodeEnv: string | undefined): boolean =>
    ['production', 'staging'].includes(nodeEnv ?? '');

/**
 * DB Configuration Guards
 * The processed-transaction index lives in PostgreSQL; connection parameters have no defaults.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD' },
    { type: 'required', name: 'DB_NAME' },

    {
        type: 'assert',
        check: (env) => !isProtectedEnv(env.NODE_ENV) || !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    },
    {
        type: 'forbidIf',
        name: 'DB_SSL_DISABLED',
        when: (env) => isProtectedEnv(env.NODE_ENV) && env.DB_SSL === 'false',
        message: 'DB_SSL=false is forbidden in production/staging',
    }
];
