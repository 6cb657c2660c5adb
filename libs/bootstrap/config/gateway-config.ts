import { GuardRule } from '../config-guard.js';

/**
 * Gateway Configuration Guards
 * Trust-boundary settings that must be explicit outside development.
 */
export const GATEWAY_CONFIG_GUARDS: GuardRule[] = [
    {
        type: 'forbidIf',
        name: 'ALLOWED_IPS',
        when: (env) => env.NODE_ENV === 'production' && (env.ALLOWED_IPS ?? '').trim() === '',
        message: 'Production requires an explicit ALLOWED_IPS list',
    },
    {
        type: 'forbidIf',
        name: 'ALLOWED_IPS_ANY',
        when: (env) => env.NODE_ENV === 'production' &&
            (env.ALLOWED_IPS ?? '').split(',').some(entry => ['0.0.0.0/0', '::/0'].includes(entry.trim())),
        message: 'Production cannot trust every address',
    },
    {
        type: 'assert',
        check: (env) => env.NODE_ENV !== 'production' || !!env.BANK_PUBLIC_KEY_FILE,
        message: 'BANK_PUBLIC_KEY_FILE must be explicitly set in production',
    }
];
