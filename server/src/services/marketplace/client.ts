/**
 * Marketplace API Client
 *
 * Thin axios wrapper over the two endpoints the pipeline needs:
 * - GET {resource_href}?expand=cart,delivery,payment   (order detail)
 * - GET /v1/stores/{store_id}/orders                   (order list, paginated)
 *
 * RETRY POLICY (per request):
 * - Network errors, 429 and 5xx retry with exponential backoff; 429 honours Retry-After
 * - An open circuit breaker counts as a transient failure
 * - Any other 4xx → ValidationError, not retried
 * - Exhausted attempts → TransientUpstreamError
 */

import axios, { AxiosError, isAxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import { marketplaceOrderPageSchema, type MarketplaceOrderPage } from '@order-bridge/shared/schemas';
import { ORDER_DETAIL_EXPAND } from '../../config/pipeline.js';
import { CircuitBreakerOpenError, getCircuitBreaker, type CircuitBreaker } from '../../utils/circuitBreaker.js';
import { backoffDelay, sleep as defaultSleep, type Sleep } from '../../utils/async.js';
import { TransientUpstreamError, ValidationError, toError } from '../../utils/errors.js';
import { marketplaceLogger as log } from '../../utils/logger.js';
import type { ListOrdersQuery, MarketplaceClientOptions } from './types.js';

// ============================================
// ERROR CLASSIFICATION
// ============================================

/**
 * Network failure, 429, 5xx or an open circuit
 */
export function isTransientRequestError(error: unknown): boolean {
    if (error instanceof CircuitBreakerOpenError) return true;
    if (!isAxiosError(error)) return false;
    if (error.code === AxiosError.ERR_CANCELED) return false;

    const status = error.response?.status;
    if (status === undefined) return true;
    return status === 429 || status >= 500;
}

function retryAfterMs(error: unknown): number | null {
    if (!isAxiosError(error)) return null;
    const response = error.response;
    if (!response || response.status !== 429) return null;

    const header: unknown = response.headers['retry-after'];
    const seconds = typeof header === 'string' ? Number.parseFloat(header) : typeof header === 'number' ? header : NaN;
    return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

/**
 * Shared breaker for every marketplace client in the process.
 * Only transient failures count, so a run of 404s never opens it.
 */
export const marketplaceApiCircuit: CircuitBreaker = getCircuitBreaker('marketplace_api', {
    isFailure: isTransientRequestError,
});

// ============================================
// CLIENT
// ============================================

export class MarketplaceClient {
    private readonly http: AxiosInstance;
    private readonly circuit: CircuitBreaker;
    private readonly sleep: Sleep;

    constructor(private readonly options: MarketplaceClientOptions) {
        this.http = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            adapter: options.adapter,
            headers: { Accept: 'application/json' },
        });
        this.circuit = options.circuit ?? marketplaceApiCircuit;
        this.sleep = options.sleep ?? defaultSleep;

        this.http.interceptors.request.use(async config => {
            const token = await options.tokenProvider.getAccessToken();
            config.headers.set('Authorization', `Bearer ${token}`);
            return config;
        });
    }

    /**
     * Fetch the order detail resource. The body is returned unvalidated.
     */
    async getOrder(resourceHref: string, signal?: AbortSignal): Promise<unknown> {
        const response = await this.executeWithRetry(
            'GET order detail',
            () => this.http.get<unknown>(resourceHref, { params: { expand: ORDER_DETAIL_EXPAND }, signal }),
            signal
        );
        return response.data;
    }

    /**
     * Fetch one page of a store's orders.
     *
     * @throws ValidationError when the page does not match the expected shape
     */
    async listOrders(storeId: string, query: ListOrdersQuery, signal?: AbortSignal): Promise<MarketplaceOrderPage> {
        const params: Record<string, string> = {
            states: query.states.join(','),
            updated_since: query.updatedSince,
        };
        if (query.pageToken) params.page_token = query.pageToken;

        const response = await this.executeWithRetry(
            'GET store orders',
            () => this.http.get<unknown>(`/v1/stores/${encodeURIComponent(storeId)}/orders`, { params, signal }),
            signal
        );

        const page = marketplaceOrderPageSchema.safeParse(response.data);
        if (!page.success) {
            throw new ValidationError(`Invalid order page for store ${storeId}`, page.error.issues);
        }
        return page.data;
    }

    getCircuitStatus() {
        return this.circuit.getStatus();
    }

    private async executeWithRetry<T>(
        label: string,
        requestFn: () => Promise<AxiosResponse<T>>,
        signal?: AbortSignal
    ): Promise<AxiosResponse<T>> {
        const { maxAttempts, baseDelayMs } = this.options;
        let lastError: Error | null = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            signal?.throwIfAborted();

            try {
                return await this.circuit.execute(requestFn);
            } catch (error: unknown) {
                if (signal?.aborted) throw error;

                if (!isTransientRequestError(error)) {
                    if (isAxiosError(error) && error.response) {
                        throw new ValidationError(`${label} rejected with status ${error.response.status}`, {
                            status: error.response.status,
                        });
                    }
                    throw error;
                }

                lastError = toError(error);
                if (attempt === maxAttempts) break;

                const waitMs = retryAfterMs(error) ?? backoffDelay(baseDelayMs, attempt);
                log.warn(
                    {
                        label,
                        status: isAxiosError(error) ? error.response?.status : undefined,
                        error: lastError.message,
                        waitMs,
                        attempt,
                        maxAttempts,
                    },
                    'Transient marketplace failure, retrying'
                );
                await this.sleep(waitMs, signal);
            }
        }

        throw new TransientUpstreamError(
            `${label} failed after ${maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
            'marketplace',
            lastError,
            maxAttempts
        );
    }
}
