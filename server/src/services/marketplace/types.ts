/**
 * Marketplace API types
 *
 * Wire shapes live in @order-bridge/shared/schemas; these are the client's
 * own option and collaborator types.
 */

import type { AxiosAdapter } from 'axios';
import type { CircuitBreaker } from '../../utils/circuitBreaker.js';
import type { Sleep } from '../../utils/async.js';

/**
 * Supplies the bearer token for marketplace API calls
 */
export interface TokenProvider {
    getAccessToken(): Promise<string>;
}

export interface MarketplaceClientOptions {
    baseUrl: string;
    tokenProvider: TokenProvider;
    timeoutMs: number;
    /** Attempts per request, including the first */
    maxAttempts: number;
    baseDelayMs: number;
    circuit?: CircuitBreaker;
    sleep?: Sleep;
    /** Replaces the HTTP transport (tests) */
    adapter?: AxiosAdapter;
}

export interface ListOrdersQuery {
    states: readonly string[];
    /** ISO timestamp */
    updatedSince: string;
    pageToken?: string | null;
}
