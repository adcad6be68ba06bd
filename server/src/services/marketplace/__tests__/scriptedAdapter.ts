/**
 * Scripted axios adapter for marketplace client tests
 *
 * Each request consumes the next reply. Status >= 400 rejects the way axios'
 * own adapters do; an Error reply simulates a network failure.
 */

import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export type ScriptedReply = { status: number; data?: unknown; headers?: Record<string, string> } | Error;

export function scriptedAdapter(replies: ScriptedReply[]) {
    const requests: InternalAxiosRequestConfig[] = [];

    const adapter: AxiosAdapter = async config => {
        requests.push(config);
        const reply = replies.shift();
        if (!reply) throw new Error(`Unexpected request to ${config.url ?? ''}`);

        if (reply instanceof Error) {
            throw new AxiosError(reply.message, 'ECONNRESET', config);
        }

        const response: AxiosResponse = {
            data: reply.data ?? null,
            status: reply.status,
            statusText: String(reply.status),
            headers: reply.headers ?? {},
            config,
        };
        if (reply.status >= 400) {
            throw new AxiosError(
                `Request failed with status code ${reply.status}`,
                reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
                config,
                undefined,
                response
            );
        }
        return response;
    };

    return { adapter, requests };
}
