import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { getRequestLogger, Logger } from '../logging/logger.js';
import { resolveClientAddress, UNKNOWN_CLIENT } from '../network/clientAddress.js';
import type { RateLimitDecision } from '../ratelimit/rateLimiter.js';
import type { VerifiedNotification } from '../signature/notificationVerification.js';

/**
 * Per-request state shared by the gates and the routes.
 */
export type GatewayLocals = {
    requestId?: string;
    callerAddress?: string;
    rateLimit?: RateLimitDecision;
    notification?: VerifiedNotification;
};

export type GatewayResponse = Response<unknown, GatewayLocals>;

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export function requestLogger(req: Request, res: GatewayResponse): Logger {
    return getRequestLogger({
        requestId: res.locals.requestId ?? 'unassigned',
        callerAddress: res.locals.callerAddress ?? UNKNOWN_CLIENT,
        path: req.path
    });
}

/**
 * Assigns the request id and caller identity, and logs each completed request.
 */
export function createRequestContextMiddleware() {
    return (req: Request, res: GatewayResponse, next: NextFunction): void => {
        const suppliedId = req.get('x-request-id');
        const requestId = suppliedId && REQUEST_ID_PATTERN.test(suppliedId) ? suppliedId : randomUUID();

        res.locals.requestId = requestId;
        res.locals.callerAddress = resolveClientAddress(req.headers, req.socket.remoteAddress);
        res.setHeader('X-Request-Id', requestId);

        const startedAt = Date.now();
        res.on('finish', () => {
            requestLogger(req, res).info({
                method: req.method,
                status: res.statusCode,
                durationMs: Date.now() - startedAt
            }, 'Request completed');
        });

        next();
    };
}
