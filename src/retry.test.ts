import { describe, it, expect, beforeEach } from 'vitest';
import { withRetry, getCircuitBreakerStatus, resetCircuitBreakers, FAILURE_THRESHOLD } from './retry.js';
import { setLogLevel } from './logger.js';

// ============================================================================
// Retry Utility: Unit Tests
// ============================================================================

class HttpError extends Error {
    constructor(message: string, readonly status: number) {
        super(message);
    }
}

beforeEach(() => {
    setLogLevel('error');
    resetCircuitBreakers();
});

describe('withRetry', () => {
    it('returns result on first successful attempt', async () => {
        const result = await withRetry(async () => 'success');
        expect(result).toBe('success');
    });

    it('retries on failure and returns on eventual success', async () => {
        let attempts = 0;
        const result = await withRetry(async () => {
            attempts++;
            if (attempts < 3) throw new Error('transient error');
            return 'recovered';
        }, { maxRetries: 3, baseDelayMs: 1 });

        expect(result).toBe('recovered');
        expect(attempts).toBe(3);
    });

    it('throws the last error after exhausting all retries', async () => {
        let attempts = 0;
        await expect(
            withRetry(async () => {
                attempts++;
                throw new Error(`persistent error ${attempts}`);
            }, { maxRetries: 2, baseDelayMs: 1 }),
        ).rejects.toThrow('persistent error 2');
        expect(attempts).toBe(2);
    });

    it('does not retry on 4xx client errors when skipClientErrors is true', async () => {
        let attempts = 0;
        await expect(
            withRetry(async () => {
                attempts++;
                throw new HttpError('Unauthorized', 401);
            }, { maxRetries: 3, baseDelayMs: 1 }),
        ).rejects.toThrow('Unauthorized');
        expect(attempts).toBe(1);
    });

    it('retries 4xx errors when skipClientErrors is false', async () => {
        let attempts = 0;
        await expect(
            withRetry(async () => {
                attempts++;
                throw new HttpError('Bad Request', 400);
            }, { maxRetries: 2, baseDelayMs: 1, skipClientErrors: false }),
        ).rejects.toThrow('Bad Request');
        expect(attempts).toBe(2);
    });

    it('retries 5xx errors', async () => {
        let attempts = 0;
        await expect(
            withRetry(async () => {
                attempts++;
                throw new HttpError('Overloaded', 529);
            }, { maxRetries: 2, baseDelayMs: 1 }),
        ).rejects.toThrow('Overloaded');
        expect(attempts).toBe(2);
    });
});

describe('circuit breaker', () => {
    it('opens after consecutive failed operations and blocks further calls', async () => {
        for (let i = 0; i < FAILURE_THRESHOLD; i++) {
            await expect(
                withRetry(async () => { throw new Error('down'); }, { maxRetries: 1, circuitBreakerKey: 'llm' }),
            ).rejects.toThrow('down');
        }

        expect(getCircuitBreakerStatus().llm?.isOpen).toBe(true);

        let called = false;
        await expect(
            withRetry(async () => { called = true; return 'ok'; }, { circuitBreakerKey: 'llm', label: 'generate' }),
        ).rejects.toThrow('Circuit breaker [llm] is OPEN');
        expect(called).toBe(false);
    });

    it('resets the failure count after a success', async () => {
        await expect(
            withRetry(async () => { throw new Error('blip'); }, { maxRetries: 1, circuitBreakerKey: 'news' }),
        ).rejects.toThrow('blip');
        expect(getCircuitBreakerStatus().news?.failures).toBe(1);

        await withRetry(async () => 'fine', { circuitBreakerKey: 'news' });
        expect(getCircuitBreakerStatus().news).toEqual({ failures: 0, isOpen: false, cooldownRemainingMs: 0 });
    });

    it('does not count client errors against the breaker', async () => {
        await expect(
            withRetry(async () => { throw new HttpError('Forbidden', 403); }, { circuitBreakerKey: 'llm' }),
        ).rejects.toThrow('Forbidden');
        expect(getCircuitBreakerStatus().llm?.failures).toBe(0);
    });
});
