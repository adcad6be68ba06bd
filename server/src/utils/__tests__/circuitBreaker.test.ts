/**
 * Tests for the circuit breaker state machine
 */

import { CircuitBreaker, CircuitBreakerOpenError } from '../circuitBreaker.js';

class NotFound extends Error {}

function createBreaker() {
    let clock = 1_000;
    const breaker = new CircuitBreaker('test', {
        failureThreshold: 2,
        resetTimeoutMs: 5_000,
        halfOpenMaxRequests: 1,
        isFailure: error => !(error instanceof NotFound),
        now: () => clock,
    });
    return { breaker, advance: (ms: number) => { clock += ms; } };
}

const fail = (error: Error) => async (): Promise<never> => {
    throw error;
};

describe('CircuitBreaker', () => {
    it('opens after the failure threshold and fails fast', async () => {
        const { breaker } = createBreaker();
        await expect(breaker.execute(fail(new Error('down')))).rejects.toThrow('down');
        await expect(breaker.execute(fail(new Error('down')))).rejects.toThrow('down');

        const trialCall = vi.fn(async () => 'ok');
        await expect(breaker.execute(trialCall)).rejects.toBeInstanceOf(CircuitBreakerOpenError);
        expect(trialCall).not.toHaveBeenCalled();
        expect(breaker.getStatus()).toMatchObject({ state: 'OPEN', nextResetAt: '1970-01-01T00:00:06.000Z' });
    });

    it('ignores errors that are not failures', async () => {
        const { breaker } = createBreaker();
        for (let i = 0; i < 3; i++) {
            await expect(breaker.execute(fail(new NotFound('missing')))).rejects.toThrow('missing');
        }

        expect(breaker.getStatus().state).toBe('CLOSED');
    });

    it('closes again after a successful half-open trial call', async () => {
        const { breaker, advance } = createBreaker();
        await expect(breaker.execute(fail(new Error('down')))).rejects.toThrow();
        await expect(breaker.execute(fail(new Error('down')))).rejects.toThrow();

        advance(5_000);
        await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');

        expect(breaker.getStatus()).toMatchObject({ state: 'CLOSED', failures: 0 });
    });

    it('reopens when the half-open trial call fails', async () => {
        const { breaker, advance } = createBreaker();
        await expect(breaker.execute(fail(new Error('down')))).rejects.toThrow();
        await expect(breaker.execute(fail(new Error('down')))).rejects.toThrow();

        advance(5_000);
        await expect(breaker.execute(fail(new Error('still down')))).rejects.toThrow('still down');

        expect(breaker.getStatus()).toMatchObject({ state: 'OPEN', nextResetAt: '1970-01-01T00:00:11.000Z' });
    });
});
