import { describe, expect, it, vi } from 'vitest';
import { KisClient } from '@/providers/kis/client';
import { RateLimiter } from '@/providers/rate_limiter';

type Handler = (url: URL, init?: RequestInit) => Response;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

const TOKEN_OK: Handler = () => json({ access_token: 'tok-1', token_type: 'Bearer', expires_in: 86400 });

function kisServer(routes: Record<string, Handler>) {
  return vi.fn(async (input: string, init?: RequestInit): Promise<Response> => {
    const url = new URL(input);
    const handler = routes[url.pathname];
    if (!handler) return new Response('no route', { status: 404 });
    return handler(url, init);
  });
}

function makeClient(fetchImpl: ReturnType<typeof kisServer>, accountNo: string | null = '12345678-01'): KisClient {
  return new KisClient({
    appKey: 'test-app-key',
    appSecret: 'test-app-secret',
    accountNo,
    baseUrl: 'https://kis.test',
    timeoutMs: 1_000,
    retry: { maxRetries: 0, initialBackoffMs: 0 },
    rateLimiter: RateLimiter.perSecond('kis', 100, 4),
    fetchImpl,
  });
}

const PRICE_PATH = '/uapi/domestic-stock/v1/quotations/inquire-price';

describe('KisClient', () => {
  it('issues one token and reuses it across calls', async () => {
    const fetchImpl = kisServer({
      '/oauth2/tokenP': TOKEN_OK,
      [PRICE_PATH]: () => json({ rt_cd: '0', msg_cd: 'MCA00000', msg1: 'ok', output: { stck_prpr: '70000' } }),
    });
    const client = makeClient(fetchImpl);

    await client.fetchCurrentPrice('005930');
    const quote = await client.fetchCurrentPrice('000660');

    expect(quote).toEqual({ stck_prpr: '70000' });
    const paths = fetchImpl.mock.calls.map(([url]) => new URL(url).pathname);
    expect(paths).toEqual(['/oauth2/tokenP', PRICE_PATH, PRICE_PATH]);

    const headers = new Headers(fetchImpl.mock.calls[1]?.[1]?.headers);
    expect(headers.get('authorization')).toBe('Bearer tok-1');
    expect(headers.get('tr_id')).toBe('FHKST01010100');
    expect(headers.get('appkey')).toBe('test-app-key');
  });

  it('maps a rate-limit rejection in the body envelope', async () => {
    const fetchImpl = kisServer({
      '/oauth2/tokenP': TOKEN_OK,
      [PRICE_PATH]: () => json({ rt_cd: '1', msg_cd: 'EGW00201', msg1: 'too many requests' }),
    });
    await expect(makeClient(fetchImpl).fetchCurrentPrice('005930')).rejects.toMatchObject({
      provider: 'kis',
      reason: 'rate_limit',
      message: 'kis: FHKST01010100 rejected: [EGW00201] too many requests',
    });
  });

  it('treats other envelope rejections as api errors', async () => {
    const fetchImpl = kisServer({
      '/oauth2/tokenP': TOKEN_OK,
      [PRICE_PATH]: () => json({ rt_cd: '1', msg_cd: 'OPSQ0002', msg1: 'no such item' }),
    });
    await expect(makeClient(fetchImpl).fetchCurrentPrice('999999')).rejects.toMatchObject({ reason: 'api' });
  });

  it('reports token failures as auth errors without leaking the secret', async () => {
    const fetchImpl = kisServer({
      '/oauth2/tokenP': () => new Response('invalid appsecret test-app-secret', { status: 403 }),
    });
    const failure = makeClient(fetchImpl).fetchCurrentPrice('005930');

    await expect(failure).rejects.toMatchObject({ reason: 'auth', status: 403 });
    await expect(failure).rejects.toThrow('[REDACTED]');
    await failure.catch((error: unknown) => {
      expect(error instanceof Error ? error.message : '').not.toContain('test-app-secret');
    });
  });

  it('splits the account number into CANO and product code', async () => {
    const fetchImpl = kisServer({
      '/oauth2/tokenP': TOKEN_OK,
      '/uapi/domestic-stock/v1/trading/inquire-psbl-order': () =>
        json({ rt_cd: '0', output: { ord_psbl_cash: '1000000', max_buy_qty: '14' } }),
    });
    const orderable = await makeClient(fetchImpl).fetchOrderable('005930');

    expect(orderable).toEqual({ ord_psbl_cash: '1000000', max_buy_qty: '14' });
    const url = new URL(fetchImpl.mock.calls[1]?.[0] ?? '');
    expect(url.searchParams.get('CANO')).toBe('12345678');
    expect(url.searchParams.get('ACNT_PRDT_CD')).toBe('01');
    expect(url.searchParams.get('PDNO')).toBe('005930');
  });

  it('rejects account numbers shorter than ten digits before calling out', async () => {
    const fetchImpl = kisServer({ '/oauth2/tokenP': TOKEN_OK });
    await expect(makeClient(fetchImpl, '123').fetchIntegratedMargin('005930')).rejects.toMatchObject({
      reason: 'auth',
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
