#!/usr/bin/env node
import { createPrivateKey, KeyObject } from 'crypto';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { signCanonicalFields } from '../../libs/signature/signer.js';
import { CanonicalFieldsSchema } from '../../libs/validation/schema.js';
import { createValidator } from '../../libs/validation/zod-middleware.js';

const validateSignable = createValidator(CanonicalFieldsSchema.passthrough());

/**
 * Fills in `signature` for a batch using the v1 canonical header.
 * Any existing signature is replaced.
 */
export function signNotification(batch: unknown, privateKey: KeyObject): Record<string, unknown> {
    const signable = validateSignable(batch, 'Ops:SignNotification');
    const signature = signCanonicalFields({
        sourceAppId: signable.sourceAppId,
        batchId: signable.batchId,
        timestamp: signable.timestamp
    }, privateKey);

    return { ...signable, signature };
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    const [keyPath, batchPath] = process.argv.slice(2);
    if (!keyPath || !batchPath) {
        console.error('Usage: sign-notification <private-key.pem> <batch.json>');
        process.exit(2);
    }

    const privateKey = createPrivateKey(fs.readFileSync(keyPath, 'utf8'));
    const batch: unknown = JSON.parse(fs.readFileSync(batchPath, 'utf8'));
    console.log(JSON.stringify(signNotification(batch, privateKey), null, 2));
}
