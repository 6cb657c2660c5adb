import { BlockList, isIP } from 'node:net';
import { logger } from '../logging/logger.js';

type AddressFamily = 'ipv4' | 'ipv6';

export interface TrustedNetwork {
    address: string;
    prefix: number;
    family: AddressFamily;
}

const IPV4_MAPPED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

/**
 * Returns the address and its family, or null when the string is not an IP literal.
 * IPv4-mapped IPv6 addresses are reduced to plain IPv4.
 */
export function normalizeAddress(raw: string): { address: string; family: AddressFamily } | null {
    const trimmed = raw.trim();
    const mapped = IPV4_MAPPED.exec(trimmed);
    const address = mapped?.[1] ?? trimmed;

    switch (isIP(address)) {
        case 4: return { address, family: 'ipv4' };
        case 6: return { address, family: 'ipv6' };
        default: return null;
    }
}

/**
 * Parses "a.b.c.d", "a.b.c.d/n", "v6" or "v6/n". A bare address is a /32 or /128.
 */
export function parseTrustedNetwork(entry: string): TrustedNetwork | null {
    const [addressPart, prefixPart, ...extra] = entry.trim().split('/');
    if (addressPart === undefined || extra.length > 0) {
        return null;
    }

    const normalized = normalizeAddress(addressPart);
    if (!normalized) {
        return null;
    }

    const maxPrefix = normalized.family === 'ipv4' ? 32 : 128;
    if (prefixPart === undefined) {
        return { ...normalized, prefix: maxPrefix };
    }

    if (!/^\d{1,3}$/.test(prefixPart)) {
        return null;
    }
    const prefix = Number(prefixPart);
    if (prefix > maxPrefix) {
        return null;
    }

    return { ...normalized, prefix };
}

/**
 * Static allow-list of trusted network prefixes, immutable after construction.
 */
export class NetworkFilter {
    private readonly blockList = new BlockList();
    public readonly networks: readonly TrustedNetwork[];

    constructor(entries: readonly string[]) {
        const networks: TrustedNetwork[] = [];

        for (const entry of entries) {
            const network = parseTrustedNetwork(entry);
            if (!network) {
                logger.warn({ entry }, 'NetworkFilter: dropping malformed trusted network entry');
                continue;
            }
            this.blockList.addSubnet(network.address, network.prefix, network.family);
            networks.push(network);
        }

        this.networks = Object.freeze(networks);
        logger.info({
            networks: this.networks.map(n => `${n.address}/${n.prefix}`)
        }, 'NetworkFilter: trusted networks loaded');
    }

    /**
     * True when the caller address falls in any trusted prefix.
     * An address that is not an IP literal is rejected.
     */
    admit(callerIp: string): boolean {
        const normalized = normalizeAddress(callerIp);
        if (!normalized) {
            logger.warn({ callerIp }, 'NetworkFilter: malformed caller address');
            return false;
        }

        return this.blockList.check(normalized.address, normalized.family);
    }
}
