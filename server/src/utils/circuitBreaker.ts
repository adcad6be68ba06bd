/**
 * Circuit Breaker
 *
 * Stops hammering the marketplace API while it is down. An open circuit
 * fails fast; callers treat that as a transient failure and back off.
 *
 * States:
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Circuit is tripped, requests fail fast
 * - HALF_OPEN: A limited number of trial requests decide whether to close again
 *
 * Only failures accepted by `isFailure` count towards the threshold, so a
 * burst of 404s for unknown orders never trips the circuit.
 */

import { CIRCUIT_BREAKER_CONFIG } from '../config/pipeline.js';
import { marketplaceLogger } from './logger.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

interface CircuitBreakerOptions {
    failureThreshold?: number;
    resetTimeoutMs?: number;
    halfOpenMaxRequests?: number;
    /** Decides whether a thrown error counts as a failure (default: every error) */
    isFailure?: (error: unknown) => boolean;
    /** Clock, overridable in tests */
    now?: () => number;
}

interface CircuitStatus {
    name: string;
    state: CircuitState;
    failures: number;
    successes: number;
    lastFailureAt: string | null;
    nextResetAt: string | null;
}

// ============================================
// CIRCUIT BREAKER CLASS
// ============================================

class CircuitBreaker {
    readonly name: string;
    private state: CircuitState = 'CLOSED';
    private failures = 0;
    private successes = 0;
    private lastFailureAt: number | null = null;
    private nextResetAt: number | null = null;
    private halfOpenRequests = 0;

    private readonly failureThreshold: number;
    private readonly resetTimeoutMs: number;
    private readonly halfOpenMaxRequests: number;
    private readonly isFailure: (error: unknown) => boolean;
    private readonly now: () => number;

    constructor(name: string, options: CircuitBreakerOptions = {}) {
        this.name = name;
        this.failureThreshold = options.failureThreshold ?? CIRCUIT_BREAKER_CONFIG.failureThreshold;
        this.resetTimeoutMs = options.resetTimeoutMs ?? CIRCUIT_BREAKER_CONFIG.resetTimeoutMs;
        this.halfOpenMaxRequests = options.halfOpenMaxRequests ?? CIRCUIT_BREAKER_CONFIG.halfOpenMaxRequests;
        this.isFailure = options.isFailure ?? (() => true);
        this.now = options.now ?? Date.now;
    }

    /**
     * Check if circuit allows requests
     */
    isAvailable(): boolean {
        if (this.state === 'CLOSED') {
            return true;
        }

        if (this.state === 'OPEN') {
            if (this.nextResetAt !== null && this.now() >= this.nextResetAt) {
                this.transitionTo('HALF_OPEN');
                return true;
            }
            return false;
        }

        return this.halfOpenRequests < this.halfOpenMaxRequests;
    }

    /**
     * Execute a function with circuit breaker protection
     *
     * @throws CircuitBreakerOpenError without calling `fn` while the circuit is open
     */
    async execute<T>(fn: () => Promise<T>): Promise<T> {
        if (!this.isAvailable()) {
            throw new CircuitBreakerOpenError(this.name, this.nextResetAt);
        }

        if (this.state === 'HALF_OPEN') {
            this.halfOpenRequests++;
        }

        try {
            const result = await fn();
            this.recordSuccess();
            return result;
        } catch (error) {
            if (this.isFailure(error)) {
                this.recordFailure();
            } else {
                this.recordSuccess();
            }
            throw error;
        }
    }

    private recordSuccess(): void {
        this.successes++;

        if (this.state === 'HALF_OPEN') {
            marketplaceLogger.info({ name: this.name }, 'Circuit breaker: service recovered, closing circuit');
            this.transitionTo('CLOSED');
        }

        this.failures = 0;
    }

    private recordFailure(): void {
        this.failures++;
        this.lastFailureAt = this.now();

        if (this.state === 'HALF_OPEN') {
            marketplaceLogger.warn({ name: this.name }, 'Circuit breaker: service still failing, reopening circuit');
            this.transitionTo('OPEN');
            return;
        }

        if (this.state === 'CLOSED' && this.failures >= this.failureThreshold) {
            marketplaceLogger.warn({ name: this.name, failures: this.failures }, 'Circuit breaker: threshold reached, opening circuit');
            this.transitionTo('OPEN');
        }
    }

    getStatus(): CircuitStatus {
        return {
            name: this.name,
            state: this.state,
            failures: this.failures,
            successes: this.successes,
            lastFailureAt: this.lastFailureAt === null ? null : new Date(this.lastFailureAt).toISOString(),
            nextResetAt: this.nextResetAt === null ? null : new Date(this.nextResetAt).toISOString(),
        };
    }

    private transitionTo(newState: CircuitState): void {
        const oldState = this.state;
        this.state = newState;

        if (newState === 'CLOSED') {
            this.failures = 0;
            this.successes = 0;
            this.nextResetAt = null;
            this.halfOpenRequests = 0;
        } else if (newState === 'OPEN') {
            this.nextResetAt = this.now() + this.resetTimeoutMs;
        } else {
            this.halfOpenRequests = 0;
        }

        marketplaceLogger.debug({ name: this.name, from: oldState, to: newState }, 'Circuit breaker state transition');
    }
}

// ============================================
// ERROR CLASS
// ============================================

export class CircuitBreakerOpenError extends Error {
    readonly circuitName: string;
    readonly resetAt: string | null;

    constructor(circuitName: string, resetAt: number | null) {
        super(`Circuit breaker '${circuitName}' is open`);
        this.name = 'CircuitBreakerOpenError';
        this.circuitName = circuitName;
        this.resetAt = resetAt === null ? null : new Date(resetAt).toISOString();
        Object.setPrototypeOf(this, CircuitBreakerOpenError.prototype);
    }
}

// ============================================
// CIRCUIT BREAKER REGISTRY
// ============================================

const circuitBreakers = new Map<string, CircuitBreaker>();

/**
 * Get or create a circuit breaker by name
 */
export function getCircuitBreaker(name: string, options?: CircuitBreakerOptions): CircuitBreaker {
    let breaker = circuitBreakers.get(name);
    if (!breaker) {
        breaker = new CircuitBreaker(name, options);
        circuitBreakers.set(name, breaker);
    }
    return breaker;
}

// ============================================
// EXPORTS
// ============================================

export { CircuitBreaker };
export type { CircuitBreakerOptions, CircuitStatus, CircuitState };
