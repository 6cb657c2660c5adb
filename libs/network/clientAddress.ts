import type { IncomingHttpHeaders } from 'http';

export const UNKNOWN_CLIENT = 'unknown';

function firstHeader(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

/**
 * Extracts the `for=` parameter of an RFC 7239 Forwarded header.
 * Only the first forwarded element is considered.
 */
export function parseForwardedFor(forwarded: string): string | undefined {
    const firstElement = forwarded.split(',')[0] ?? '';
    for (const part of firstElement.split(';')) {
        const [name, ...rest] = part.trim().split('=');
        if (name?.toLowerCase() === 'for' && rest.length > 0) {
            let value = rest.join('=').trim().replace(/^"|"$/g, '');
            // [v6]:port and [v6] forms
            const bracketed = /^\[([^\]]+)\](?::\d+)?$/.exec(value);
            if (bracketed?.[1]) {
                value = bracketed[1];
            }
            return value || undefined;
        }
    }
    return undefined;
}

/**
 * Caller identity used by both the rate limiter and the network filter.
 * Priority: X-Forwarded-For (first hop), X-Real-IP, Forwarded for=, transport peer.
 */
export function resolveClientAddress(headers: IncomingHttpHeaders, peerAddress: string | undefined): string {
    const forwardedFor = firstHeader(headers['x-forwarded-for'])?.split(',')[0]?.trim();
    if (forwardedFor) {
        return forwardedFor;
    }

    const realIp = firstHeader(headers['x-real-ip'])?.trim();
    if (realIp) {
        return realIp;
    }

    const forwarded = firstHeader(headers['forwarded']);
    if (forwarded) {
        const forValue = parseForwardedFor(forwarded);
        if (forValue) {
            return forValue;
        }
    }

    return peerAddress?.trim() || UNKNOWN_CLIENT;
}
