import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

/**
 * Development key pair for the counterparty: the gateway reads bank_public.pem,
 * sign-notification uses bank_private.pem.
 */
export function generateBankKeys(certDir: string, modulusLength = 2048): { publicKeyPath: string; privateKeyPath: string } {
    if (!fs.existsSync(certDir)) fs.mkdirSync(certDir, { recursive: true });

    const { publicKey, privateKey } = crypto.generateKeyPairSync('rsa', { modulusLength });

    const publicKeyPath = path.join(certDir, 'bank_public.pem');
    const privateKeyPath = path.join(certDir, 'bank_private.pem');
    fs.writeFileSync(publicKeyPath, publicKey.export({ format: 'pem', type: 'spki' }));
    fs.writeFileSync(privateKeyPath, privateKey.export({ format: 'pem', type: 'pkcs8' }), { mode: 0o600 });

    return { publicKeyPath, privateKeyPath };
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    const certDir = process.argv[2] ?? path.join(process.cwd(), 'certs');
    const { publicKeyPath, privateKeyPath } = generateBankKeys(certDir);
    console.log(`Public key:  ${publicKeyPath}`);
    console.log(`Private key: ${privateKeyPath}`);
}
