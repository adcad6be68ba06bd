/**
 * Token provider backed by a static access token from configuration.
 * A token-exchange implementation can replace it without touching the client.
 */

import type { TokenProvider } from './types.js';

export class StaticTokenProvider implements TokenProvider {
    constructor(private readonly token: string) {}

    async getAccessToken(): Promise<string> {
        return this.token;
    }
}
