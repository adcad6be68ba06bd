/**
 * Custom error classes for the order pipeline
 *
 * Every error carries the HTTP status the errorHandler answers with.
 * The pipeline also uses the class to decide an order's fate:
 * - StateRaceError          → Skipped, never retried
 * - ValidationError         → Failed, never retried
 * - TransientUpstreamError  → Failed once retries are exhausted
 * - PersistenceError        → order re-queued, status unchanged
 */

/**
 * Base interface for custom errors with HTTP status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/**
 * Authentication error - webhook signature or admin token rejected
 *
 * @example
 * throw new AuthenticationError('Webhook signature mismatch');
 */
export class AuthenticationError extends Error implements CustomError {
    override readonly name = 'AuthenticationError' as const;
    readonly statusCode = 401 as const;

    constructor(message: string = 'Unauthorized') {
        super(message);
        Object.setPrototypeOf(this, AuthenticationError.prototype);
    }
}

/**
 * Validation error - malformed input or source data that cannot be normalized
 *
 * @example
 * throw new ValidationError('Invalid webhook payload', issues);
 */
export class ValidationError extends Error implements CustomError {
    override readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * Not found error - thrown when a stored order does not exist
 */
export class NotFoundError extends Error implements CustomError {
    override readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;
    readonly resourceType: string | null;
    readonly resourceId: string | null;

    constructor(
        message: string = 'Resource not found',
        resourceType: string | null = null,
        resourceId: string | null = null
    ) {
        super(message);
        this.resourceType = resourceType;
        this.resourceId = resourceId;
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

/**
 * State race error - the order left the qualifying state between the
 * trigger and the fetch. A named outcome, not a fault.
 */
export class StateRaceError extends Error implements CustomError {
    override readonly name = 'StateRaceError' as const;
    readonly statusCode = 409 as const;
    readonly observedState: string;

    constructor(message: string, observedState: string) {
        super(message);
        this.observedState = observedState;
        Object.setPrototypeOf(this, StateRaceError.prototype);
    }
}

/**
 * Transient upstream error - network failure, 429 or 5xx that outlived its retries
 *
 * @example
 * throw new TransientUpstreamError('Marketplace timeout', 'marketplace', originalError, 4);
 */
export class TransientUpstreamError extends Error implements CustomError {
    override readonly name = 'TransientUpstreamError' as const;
    readonly statusCode = 502 as const;
    readonly serviceName: string | null;
    readonly originalError: Error | null;
    readonly attempts: number;

    constructor(
        message: string,
        serviceName: string | null = null,
        originalError: Error | null = null,
        attempts = 1
    ) {
        super(message);
        this.serviceName = serviceName;
        this.originalError = originalError;
        this.attempts = attempts;
        Object.setPrototypeOf(this, TransientUpstreamError.prototype);
    }
}

/**
 * Persistence error - the order store is unavailable
 */
export class PersistenceError extends Error implements CustomError {
    override readonly name = 'PersistenceError' as const;
    readonly statusCode = 500 as const;
    readonly originalError: Error | null;

    constructor(message: string, originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, PersistenceError.prototype);
    }
}

/**
 * Package integrity error - a staged export package failed validation
 */
export class PackageIntegrityError extends Error implements CustomError {
    override readonly name = 'PackageIntegrityError' as const;
    readonly statusCode = 422 as const;
    readonly violations: string[];

    constructor(message: string, violations: string[] = []) {
        super(message);
        this.violations = violations;
        Object.setPrototypeOf(this, PackageIntegrityError.prototype);
    }
}

/**
 * Ledger unavailable error - the dedup ledger cannot be reached.
 * Intake stops accepting instead of risking duplicates.
 */
export class LedgerUnavailableError extends Error implements CustomError {
    override readonly name = 'LedgerUnavailableError' as const;
    readonly statusCode = 503 as const;
    readonly originalError: Error | null;

    constructor(message: string = 'Dedup ledger unavailable', originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, LedgerUnavailableError.prototype);
    }
}

/**
 * Queue unavailable error - the processing queue is stopped or full
 */
export class QueueUnavailableError extends Error implements CustomError {
    override readonly name = 'QueueUnavailableError' as const;
    readonly statusCode = 500 as const;

    constructor(message: string = 'Processing queue unavailable') {
        super(message);
        Object.setPrototypeOf(this, QueueUnavailableError.prototype);
    }
}

/**
 * Deadline exceeded error - intake did not finish inside the acknowledgment window
 */
export class DeadlineExceededError extends Error implements CustomError {
    override readonly name = 'DeadlineExceededError' as const;
    readonly statusCode = 500 as const;
    readonly deadlineMs: number;

    constructor(message: string, deadlineMs: number) {
        super(message);
        this.deadlineMs = deadlineMs;
        Object.setPrototypeOf(this, DeadlineExceededError.prototype);
    }
}

export type PipelineError =
    | AuthenticationError
    | ValidationError
    | NotFoundError
    | StateRaceError
    | TransientUpstreamError
    | PersistenceError
    | PackageIntegrityError
    | LedgerUnavailableError
    | QueueUnavailableError
    | DeadlineExceededError;

/**
 * Type guard to check if an error is a custom error with statusCode
 */
export function isCustomError(error: unknown): error is CustomError {
    return (
        error instanceof Error &&
        'statusCode' in error &&
        typeof error.statusCode === 'number'
    );
}

/**
 * Type guard for the pipeline's own error classes
 */
export function isPipelineError(error: unknown): error is PipelineError {
    return (
        error instanceof AuthenticationError ||
        error instanceof ValidationError ||
        error instanceof NotFoundError ||
        error instanceof StateRaceError ||
        error instanceof TransientUpstreamError ||
        error instanceof PersistenceError ||
        error instanceof PackageIntegrityError ||
        error instanceof LedgerUnavailableError ||
        error instanceof QueueUnavailableError ||
        error instanceof DeadlineExceededError
    );
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
