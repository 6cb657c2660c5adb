import type { Request, NextFunction } from 'express';
import { admissionRejected } from '../errors/taxonomy.js';
import { UNKNOWN_CLIENT } from '../network/clientAddress.js';
import { NetworkFilter } from '../network/networkFilter.js';
import type { WebhookStats } from '../observability/webhookStats.js';
import { onDependencyFault } from '../policy/failurePolicy.js';
import { composeRejection } from '../response/responseComposer.js';
import { sendEnvelope } from './envelope.js';
import { GatewayResponse, requestLogger } from './request-context.js';

export function createNetworkFilterMiddleware(filter: NetworkFilter, stats: WebhookStats) {
    return (req: Request, res: GatewayResponse, next: NextFunction): void => {
        const callerAddress = res.locals.callerAddress ?? UNKNOWN_CLIENT;

        let admitted: boolean;
        try {
            admitted = filter.admit(callerAddress);
        } catch (error) {
            admitted = onDependencyFault('networkFilter', error, { callerAddress }) === 'ALLOW';
        }

        if (!admitted) {
            requestLogger(req, res).warn('Gate: caller outside trusted networks');
            sendEnvelope(res, composeRejection(admissionRejected('UNTRUSTED_NETWORK', 'IP address not allowed')), stats);
            return;
        }

        next();
    };
}
