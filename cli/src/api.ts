/**
 * API client for the Order Bridge admin API
 *
 * Handles admin token storage and HTTP requests to the pipeline server.
 * Every response body is parsed with the shared admin API schemas.
 */

import { readFileSync, writeFileSync, mkdirSync, existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';

const CONFIG_DIR = join(homedir(), '.order-bridge');
const TOKEN_FILE = join(CONFIG_DIR, 'token');
const BASE_URL = process.env.ORDER_BRIDGE_API_URL || 'http://127.0.0.1:3001';

function ensureConfigDir(): void {
  if (!existsSync(CONFIG_DIR)) {
    mkdirSync(CONFIG_DIR, { recursive: true });
  }
}

export function saveToken(token: string): void {
  ensureConfigDir();
  writeFileSync(TOKEN_FILE, token, { encoding: 'utf-8', mode: 0o600 });
}

/**
 * ORDER_BRIDGE_ADMIN_TOKEN wins over the saved token
 */
export function loadToken(): string | null {
  const fromEnv = process.env.ORDER_BRIDGE_ADMIN_TOKEN?.trim();
  if (fromEnv) return fromEnv;
  if (!existsSync(TOKEN_FILE)) return null;
  const saved = readFileSync(TOKEN_FILE, 'utf-8').trim();
  return saved.length > 0 ? saved : null;
}

export function clearToken(): void {
  rmSync(TOKEN_FILE, { force: true });
}

export function getBaseUrl(): string {
  return BASE_URL;
}

export type ApiResponse<T> =
  | { ok: true; status: number; data: T }
  | { ok: false; status: number; error: string };

const errorBodySchema = z.object({
  error: z.string(),
  type: z.string().optional(),
});

function describeFailure(status: number, body: unknown): string {
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) return `HTTP ${status}`;
  return parsed.data.type ? `${parsed.data.error} (${parsed.data.type})` : parsed.data.error;
}

export async function api<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: { method?: 'GET' | 'POST'; token?: string } = {}
): Promise<ApiResponse<T>> {
  const token = options.token || loadToken();
  if (!token) {
    console.error('No admin token. Run: bridge login <token> or set ORDER_BRIDGE_ADMIN_TOKEN');
    process.exit(1);
  }

  let res: Response;
  try {
    res = await fetch(`${BASE_URL}${path}`, {
      method: options.method || 'GET',
      headers: { Accept: 'application/json', Authorization: `Bearer ${token}` },
    });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`Connection failed: ${msg}`);
    console.error(`Is the server running at ${BASE_URL}?`);
    process.exit(1);
  }

  // Proxies and crashed servers answer with HTML
  const contentType = res.headers.get('content-type') || '';
  if (!contentType.includes('application/json')) {
    return { ok: false, status: res.status, error: `Non-JSON response (${res.status}): ${contentType}` };
  }

  const body: unknown = await res.json();
  if (!res.ok) {
    return { ok: false, status: res.status, error: describeFailure(res.status, body) };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, status: res.status, error: `Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}` };
  }
  return { ok: true, status: res.status, data: parsed.data };
}
