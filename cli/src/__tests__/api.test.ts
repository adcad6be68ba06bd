import { replayResponseSchema } from '@order-bridge/shared/schemas';
import { api } from '../api.js';
import { stripAnsi, statusColor } from '../format.js';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('api', () => {
  it('sends the bearer token and parses the body', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse(200, { channel: 'uber_eats', sourceOrderId: 'ord-1', processingStatus: 'Received', queued: true })
    );
    vi.stubGlobal('fetch', fetchMock);

    const res = await api('/api/pipeline/orders/uber_eats/ord-1/replay', replayResponseSchema, {
      method: 'POST',
      token: 'test-token',
    });

    expect(res).toEqual({
      ok: true,
      status: 200,
      data: { channel: 'uber_eats', sourceOrderId: 'ord-1', processingStatus: 'Received', queued: true },
    });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://127.0.0.1:3001/api/pipeline/orders/uber_eats/ord-1/replay');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
  });

  it('reports the server error message', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(401, { error: 'Admin token required', type: 'AuthenticationError' })));

    const res = await api('/api/pipeline/status', replayResponseSchema, { token: 'test-token' });

    expect(res).toEqual({ ok: false, status: 401, error: 'Admin token required (AuthenticationError)' });
  });

  it('rejects a body that does not match the schema', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(200, { unexpected: true })));

    const res = await api('/api/pipeline/status', replayResponseSchema, { token: 'test-token' });

    expect(res.ok).toBe(false);
    expect(res.status).toBe(200);
  });
});

describe('statusColor', () => {
  it('keeps the status text', () => {
    expect(stripAnsi(statusColor('Failed'))).toBe('Failed');
    expect(statusColor('Unknown')).toBe('Unknown');
  });
});
