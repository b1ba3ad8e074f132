// ============================================================================
// Postloop: Retry Utility with Circuit Breaker
// Exponential backoff for collaborator calls, plus a per-key breaker so a
// service that is down stops being hammered every cycle.
// ============================================================================

import { setTimeout as delay } from 'node:timers/promises';
import { createLogger } from './logger.js';
import { describeError, errorStatus } from './errors.js';

const log = createLogger('Retry');

export interface RetryOptions {
    /** Maximum number of attempts (default: 3) */
    maxRetries?: number;
    /** Base delay in ms, doubled each attempt (default: 1000) */
    baseDelayMs?: number;
    /** If true, don't retry on 4xx errors (default: true) */
    skipClientErrors?: boolean;
    /** Custom label for log messages */
    label?: string;
    /** Circuit breaker group key (operations sharing a key share a breaker) */
    circuitBreakerKey?: string;
    /** Stops waiting between attempts when aborted */
    signal?: AbortSignal;
}

// ---- Circuit Breaker State ----

interface BreakerState {
    failures: number;
    openedAt: number | null;
    isOpen: boolean;
}

/** Consecutive failures before the circuit opens */
export const FAILURE_THRESHOLD = 5;

/** How long the circuit stays open before allowing a probe (ms) */
export const COOLDOWN_MS = 5 * 60 * 1000;

const breakers = new Map<string, BreakerState>();

function getBreaker(key: string): BreakerState {
    let breaker = breakers.get(key);
    if (!breaker) {
        breaker = { failures: 0, openedAt: null, isOpen: false };
        breakers.set(key, breaker);
    }
    return breaker;
}

function recordSuccess(key: string): void {
    const b = getBreaker(key);
    if (b.failures > 0 || b.isOpen) {
        log.info(`Circuit breaker [${key}] reset after success`);
    }
    b.failures = 0;
    b.openedAt = null;
    b.isOpen = false;
}

function recordFailure(key: string): void {
    const b = getBreaker(key);
    b.failures++;
    if (b.failures >= FAILURE_THRESHOLD && !b.isOpen) {
        b.isOpen = true;
        b.openedAt = Date.now();
        log.warn(`Circuit breaker [${key}] OPENED after ${b.failures} consecutive failures, cooling down for ${COOLDOWN_MS / 1000}s`);
    }
}

function isCircuitOpen(key: string): boolean {
    const b = getBreaker(key);
    if (!b.isOpen) return false;

    // Cooldown elapsed: let one probe through (half-open)
    if (b.openedAt !== null && Date.now() - b.openedAt >= COOLDOWN_MS) {
        log.info(`Circuit breaker [${key}] entering HALF-OPEN state, allowing probe`);
        b.isOpen = false;
        return false;
    }

    return true;
}

function isClientError(error: unknown): number | null {
    const status = errorStatus(error);
    return status !== undefined && status >= 400 && status < 500 ? status : null;
}

/**
 * Execute an async function with exponential backoff retries.
 * Client errors (4xx) are not retried unless `skipClientErrors` is false.
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options?: RetryOptions,
): Promise<T> {
    const {
        maxRetries = 3,
        baseDelayMs = 1000,
        skipClientErrors = true,
        label = 'operation',
        circuitBreakerKey,
        signal,
    } = options ?? {};

    if (circuitBreakerKey && isCircuitOpen(circuitBreakerKey)) {
        const b = getBreaker(circuitBreakerKey);
        const remainingMs = b.openedAt !== null ? COOLDOWN_MS - (Date.now() - b.openedAt) : 0;
        throw new Error(
            `Circuit breaker [${circuitBreakerKey}] is OPEN, ${Math.ceil(remainingMs / 1000)}s remaining. Skipping ${label}.`,
        );
    }

    let lastError: unknown = new Error(`${label} failed`);

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
        try {
            const result = await fn();
            if (circuitBreakerKey) recordSuccess(circuitBreakerKey);
            return result;
        } catch (error: unknown) {
            lastError = error;

            const clientStatus = skipClientErrors ? isClientError(error) : null;
            if (clientStatus !== null) {
                // 4xx is our fault, not the service's: leave the breaker alone
                log.error(`${label}: client error (${clientStatus}), not retrying`);
                throw error;
            }

            if (attempt < maxRetries) {
                const wait = Math.pow(2, attempt - 1) * baseDelayMs;
                log.warn(`${label}: attempt ${attempt}/${maxRetries} failed, retrying in ${wait}ms...`, {
                    error: describeError(error),
                });
                await delay(wait, undefined, { signal });
            } else {
                log.error(`${label}: failed after ${maxRetries} attempts`, {
                    error: describeError(error),
                });
            }
        }
    }

    if (circuitBreakerKey) recordFailure(circuitBreakerKey);
    throw lastError;
}

/**
 * Current state of all circuit breakers (reported at shutdown).
 */
export function getCircuitBreakerStatus(): Record<string, { failures: number; isOpen: boolean; cooldownRemainingMs: number }> {
    const status: Record<string, { failures: number; isOpen: boolean; cooldownRemainingMs: number }> = {};
    for (const [key, b] of breakers) {
        const remainingMs = b.isOpen && b.openedAt !== null
            ? Math.max(0, COOLDOWN_MS - (Date.now() - b.openedAt))
            : 0;
        status[key] = { failures: b.failures, isOpen: b.isOpen, cooldownRemainingMs: remainingMs };
    }
    return status;
}

/** Test hook: forget all breaker state. */
export function resetCircuitBreakers(): void {
    breakers.clear();
}
