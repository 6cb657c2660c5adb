import { logger } from '../logging/logger.js';
import { describeError } from '../errors/sanitizer.js';

export type FailureMode = 'FAIL_OPEN' | 'FAIL_CLOSED';

export type GuardedComponent = 'rateLimiter' | 'networkFilter' | 'signatureVerifier' | 'dedupIndex';

/**
 * Behavior of each component when a dependency it relies on faults.
 * The rate limiter is not the primary trust boundary; the dedup index is the only
 * thing standing between a retried batch and a double-applied transaction.
 */
export const FAILURE_POLICY = {
    rateLimiter: 'FAIL_OPEN',
    networkFilter: 'FAIL_CLOSED',
    signatureVerifier: 'FAIL_CLOSED',
    dedupIndex: 'FAIL_CLOSED',
} as const satisfies Record<GuardedComponent, FailureMode>;

export type FailureDecision = 'ALLOW' | 'DENY';

/**
 * Resolves a dependency fault through the policy table and records it.
 */
export function onDependencyFault(
    component: GuardedComponent,
    error: unknown,
    context: Record<string, unknown> = {}
): FailureDecision {
    const mode: FailureMode = FAILURE_POLICY[component];
    const decision: FailureDecision = mode === 'FAIL_OPEN' ? 'ALLOW' : 'DENY';

    logger.warn({
        component,
        mode,
        decision,
        error: describeError(error),
        ...context
    }, 'FailurePolicy: dependency fault');

    return decision;
}
