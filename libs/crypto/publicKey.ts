import { createPublicKey, KeyObject } from 'crypto';
import { readFile } from 'fs/promises';
import { logger } from '../logging/logger.js';

/**
 * Loads the counterparty's RSA public key (PEM: SPKI, PKCS#1 or an X.509 certificate).
 * Returns null instead of throwing: a missing key must not crash the service,
 * it makes every signature check fail closed.
 */
export async function loadTrustedPublicKey(path: string): Promise<KeyObject | null> {
    let pem: Buffer;
    try {
        pem = await readFile(path);
    } catch (error: unknown) {
        logger.error({ path, error: error instanceof Error ? error.message : String(error) },
            'Bank public key file could not be read; signature checks will fail closed');
        return null;
    }

    try {
        const key = createPublicKey(pem);
        if (key.asymmetricKeyType !== 'rsa') {
            logger.error({ path, keyType: key.asymmetricKeyType },
                'Bank public key is not an RSA key; signature checks will fail closed');
            return null;
        }

        logger.info({ path, modulusLength: key.asymmetricKeyDetails?.modulusLength }, 'Bank public key loaded');
        return key;
    } catch (error: unknown) {
        logger.error({ path, error: error instanceof Error ? error.message : String(error) },
            'Bank public key could not be parsed; signature checks will fail closed');
        return null;
    }
}
