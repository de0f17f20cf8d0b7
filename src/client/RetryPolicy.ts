/**
 * Retry Policy
 * Pure classification and decision functions plus the loop that drives them.
 *
 *   ATTEMPT → SUCCESS
 *           | RATE_LIMITED → WAIT    → ATTEMPT
 *           | SERVER_ERROR → BACKOFF → ATTEMPT
 *           | TRANSIENT    → BACKOFF → ATTEMPT
 *           | FATAL
 */

import { isAxiosError } from 'axios';
import {
    ApiRequestError,
    RateLimitedError,
    ServerError,
    TransientError,
    type RequestFailureDetails,
} from '../utils/errors.js';

export interface RetryPolicy {
    /** Total attempts, including the first */
    maxAttempts: number;
    baseDelayMs: number;
    /** Wait used on 429 when the response carries no Retry-After */
    defaultRateLimitWaitMs: number;
    /** Outcomes worth another attempt; defaults to every retryable kind */
    retryOn?: readonly RetryableKind[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    defaultRateLimitWaitMs: 1000,
};

export type AttemptOutcome =
    | { kind: 'success' }
    | { kind: 'rate_limited'; status: number; waitMs: number }
    | { kind: 'server_error'; status: number }
    | { kind: 'transient' }
    | { kind: 'fatal'; status?: number };

export type RetryableKind = 'rate_limited' | 'server_error' | 'transient';

const RETRYABLE_KINDS: readonly RetryableKind[] = ['rate_limited', 'server_error', 'transient'];

export type RetryDecision = { retry: true; delayMs: number } | { retry: false };

export type Sleep = (ms: number) => Promise<void>;

export type RetryListener = (info: {
    action: string;
    outcome: AttemptOutcome;
    attempt: number;
    delayMs: number;
}) => void;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Retry-After is whole seconds for Spotify; anything unparseable falls back to the default.
 */
export function parseRetryAfter(value: unknown, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
    const seconds = typeof value === 'number' ? value : typeof value === 'string' ? Number.parseFloat(value) : NaN;
    return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : policy.defaultRateLimitWaitMs;
}

export function classifyResponse(
    status: number,
    retryAfter?: unknown,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): AttemptOutcome {
    if (status >= 200 && status < 300) return { kind: 'success' };
    if (status === 429) return { kind: 'rate_limited', status, waitMs: parseRetryAfter(retryAfter, policy) };
    if (status >= 500) return { kind: 'server_error', status };
    return { kind: 'fatal', status };
}

/**
 * HTTP failures are classified by status; anything without a response
 * (DNS, reset socket, timeout, non-HTTP exception) is transient.
 */
export function classifyFailure(error: unknown, policy: RetryPolicy = DEFAULT_RETRY_POLICY): AttemptOutcome {
    if (isAxiosError(error) && error.response) {
        const { status, headers } = error.response;
        const outcome = classifyResponse(status, headers['retry-after'], policy);
        // A 2xx that still threw (e.g. a response transform failed) cannot be retried into success
        return outcome.kind === 'success' ? { kind: 'fatal', status } : outcome;
    }
    return { kind: 'transient' };
}

export function backoffDelay(attempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
    return policy.baseDelayMs * 2 ** attempt;
}

/**
 * @param attempt zero-based index of the attempt that just failed
 */
export function decideRetry(
    outcome: AttemptOutcome,
    attempt: number,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): RetryDecision {
    if (attempt + 1 >= policy.maxAttempts) return { retry: false };
    if (outcome.kind === 'success' || outcome.kind === 'fatal') return { retry: false };
    if (!(policy.retryOn ?? RETRYABLE_KINDS).includes(outcome.kind)) return { retry: false };

    switch (outcome.kind) {
        case 'rate_limited':
            return { retry: true, delayMs: outcome.waitMs };
        case 'server_error':
        case 'transient':
            return { retry: true, delayMs: backoffDelay(attempt, policy) };
    }
}

function toFailure(outcome: AttemptOutcome, details: Omit<RequestFailureDetails, 'status'>): Error {
    switch (outcome.kind) {
        case 'rate_limited':
            return new RateLimitedError({ ...details, status: outcome.status });
        case 'server_error':
            return new ServerError({ ...details, status: outcome.status });
        case 'transient':
            return new TransientError(details);
        case 'success':
        case 'fatal':
            return new ApiRequestError({ ...details, status: outcome.kind === 'fatal' ? outcome.status : undefined });
    }
}

export interface ExecuteOptions {
    policy?: RetryPolicy;
    sleep?: Sleep;
    onRetry?: RetryListener;
    /** Errors matching this propagate unchanged, without another attempt */
    rethrow?: (error: unknown) => boolean;
}

/**
 * Run one logical request under the policy. Never makes more than
 * policy.maxAttempts attempts; the last failure is wrapped as `cause`.
 */
export async function executeWithRetry<T>(
    action: string,
    fn: () => Promise<T>,
    options: ExecuteOptions = {},
): Promise<T> {
    const policy = options.policy ?? DEFAULT_RETRY_POLICY;
    const wait = options.sleep ?? sleep;

    for (let attempt = 0; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (options.rethrow?.(error)) {
                throw error;
            }

            const outcome = classifyFailure(error, policy);
            const decision = decideRetry(outcome, attempt, policy);

            if (!decision.retry) {
                throw toFailure(outcome, { action, attempts: attempt + 1, cause: error });
            }

            options.onRetry?.({ action, outcome, attempt, delayMs: decision.delayMs });
            await wait(decision.delayMs);
        }
    }
}
