/**
 * Centralized Redaction Configuration
 * Keys that must never reach logs in clear text.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'password', '*.password',
    'secret', '*.secret',
    'key', '*.key',
    'privateKey', '*.privateKey',

    // Counterparty payload
    'signature', '*.signature',
    'srcAccountNumber', '*.srcAccountNumber',
    'sourceAccountNumber', '*.sourceAccountNumber',
    'ofsAccountNumber', '*.ofsAccountNumber',
    'counterpartyAccountNumber', '*.counterpartyAccountNumber',

    // Headers
    'req.headers.authorization',
    'req.headers.cookie'
];

export const REDACT_CENSOR = '[REDACTED]';
