import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InMemoryCredentialCache } from '@/lib/credentials';
import type { CredentialCache } from '@/lib/credentials';
import type { TransportRequest, TransportResponse } from '@/lib/fetch/httpTransport';
import {
  AuthenticationError,
  ConfigurationError,
  PAYMOB_TOKEN_CACHE_KEY,
  TokenManager,
} from '@/lib/paymob';
import { loggedEvents, silenceConsole } from '../helpers/console';

const HOUR_MS = 60 * 60 * 1000;
const CONFIG = { apiKey: 'test-api-key', baseUrl: 'https://accept.paymob.com' };

function buildTransport(responses: TransportResponse[] = []) {
  let issued = 0;
  const send = vi.fn<(request: TransportRequest) => Promise<TransportResponse>>(async () => {
    const next = responses.shift();
    if (next) {
      return next;
    }
    issued += 1;
    return { status: 200, body: { token: `token-${issued}` } };
  });
  return { send };
}

describe('TokenManager', () => {
  let now: number;
  let clock: { now: () => number };
  let cache: InMemoryCredentialCache;
  let consoleSpies: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    now = 10 * HOUR_MS;
    clock = { now: () => now };
    cache = new InMemoryCredentialCache(clock);
    consoleSpies = silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns a cached token without calling the transport', async () => {
    const transport = buildTransport();
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });
    await cache.set(PAYMOB_TOKEN_CACHE_KEY, 'cached-token', 60);

    await expect(manager.getToken()).resolves.toBe('cached-token');
    await expect(manager.getToken(false)).resolves.toBe('cached-token');
    expect(transport.send).not.toHaveBeenCalled();
  });

  it('requests a token from the auth endpoint with the api key', async () => {
    const transport = buildTransport();
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });

    await expect(manager.getToken()).resolves.toBe('token-1');

    expect(transport.send).toHaveBeenCalledOnce();
    expect(transport.send).toHaveBeenCalledWith({
      method: 'POST',
      url: 'https://accept.paymob.com/api/auth/tokens',
      body: { api_key: 'test-api-key' },
    });
  });

  it('caches a fresh token for 55 minutes by default', async () => {
    const transport = buildTransport();
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });

    await manager.getToken();
    now += 55 * 60 * 1000 - 1;
    await expect(cache.get(PAYMOB_TOKEN_CACHE_KEY)).resolves.toBe('token-1');
    now += 1;
    await expect(cache.get(PAYMOB_TOKEN_CACHE_KEY)).resolves.toBeNull();
  });

  it('requests exactly once and re-caches when the cached token expired', async () => {
    const transport = buildTransport();
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });
    await cache.set(PAYMOB_TOKEN_CACHE_KEY, 'stale-token', 60);
    now += 60_000;

    await expect(manager.getToken()).resolves.toBe('token-1');
    await expect(manager.getToken()).resolves.toBe('token-1');

    expect(transport.send).toHaveBeenCalledOnce();
    await expect(cache.get(PAYMOB_TOKEN_CACHE_KEY)).resolves.toBe('token-1');
  });

  it('always requests a token when refresh is forced', async () => {
    const transport = buildTransport();
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });
    await cache.set(PAYMOB_TOKEN_CACHE_KEY, 'cached-token', 600);

    await expect(manager.getToken(true)).resolves.toBe('token-1');
    await expect(manager.getToken(true)).resolves.toBe('token-2');

    expect(transport.send).toHaveBeenCalledTimes(2);
    await expect(cache.get(PAYMOB_TOKEN_CACHE_KEY)).resolves.toBe('token-2');
  });

  it('requests a new token after invalidation', async () => {
    const transport = buildTransport();
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });

    await manager.getToken();
    await manager.invalidateToken();
    await expect(manager.getToken()).resolves.toBe('token-2');

    expect(transport.send).toHaveBeenCalledTimes(2);
  });

  it('warns when more than three refreshes happen within one clock hour', async () => {
    const transport = buildTransport();
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });

    for (let index = 0; index < 4; index += 1) {
      await manager.getToken(true);
    }

    expect(loggedEvents(consoleSpies.warn)).toEqual(['token.refresh_rate_high']);
    expect(manager.refreshStats()).toEqual({ hourBucket: 10, count: 4 });
  });

  it('resets the refresh counter when the hour bucket changes', async () => {
    const transport = buildTransport();
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });

    now = 11 * HOUR_MS - 1_000;
    for (let index = 0; index < 3; index += 1) {
      await manager.getToken(true);
    }
    now = 11 * HOUR_MS;
    await manager.getToken(true);

    expect(transport.send).toHaveBeenCalledTimes(4);
    expect(loggedEvents(consoleSpies.warn)).toEqual([]);
    expect(manager.refreshStats()).toEqual({ hourBucket: 11, count: 1 });
  });

  it('does not count cache hits as refreshes', async () => {
    const transport = buildTransport();
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });

    for (let index = 0; index < 5; index += 1) {
      await manager.getToken();
    }

    expect(manager.refreshStats()).toEqual({ hourBucket: 10, count: 1 });
  });

  it('wraps transport failures in an AuthenticationError', async () => {
    const transport = {
      send: vi.fn(async (): Promise<TransportResponse> => {
        throw new Error('connect ECONNREFUSED');
      }),
    };
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });

    const error = await manager.getToken().catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect((error as AuthenticationError).message).toBe('Token request failed: connect ECONNREFUSED');
    await expect(cache.get(PAYMOB_TOKEN_CACHE_KEY)).resolves.toBeNull();
  });

  it('reports the upstream detail of a rejected token request', async () => {
    const transport = buildTransport([{ status: 401, body: { detail: 'Incorrect credentials' } }]);
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });

    await expect(manager.getToken()).rejects.toThrow('Token request failed: HTTP 401: Incorrect credentials');
  });

  it('rejects a response without a token', async () => {
    const transport = buildTransport([{ status: 200, body: { profile: { id: 7 } } }]);
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });

    const error = await manager.getToken().catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect((error as Error).message).toBe('Token request failed: No token received from Paymob API');
    expect((error as Error).message.includes('test-api-key')).toBe(false);
  });

  it('treats cache backend failures as a miss and never throws on them', async () => {
    const transport = buildTransport();
    const brokenCache: CredentialCache = {
      get: vi.fn(async () => {
        throw new Error('cache unreachable');
      }),
      set: vi.fn(async () => {
        throw new Error('cache unreachable');
      }),
      delete: vi.fn(async () => {
        throw new Error('cache unreachable');
      }),
    };
    const manager = new TokenManager({ config: CONFIG, transport, cache: brokenCache, clock });

    await expect(manager.getToken()).resolves.toBe('token-1');
    await expect(manager.invalidateToken()).resolves.toBeUndefined();

    expect(loggedEvents(consoleSpies.warn)).toEqual([
      'token.cache_read_failed',
      'token.cache_write_failed',
      'token.invalidate_failed',
    ]);
  });

  it('shares one token request between concurrent cache misses', async () => {
    let release: (response: TransportResponse) => void = () => {};
    const pending = new Promise<TransportResponse>((resolve) => {
      release = resolve;
    });
    const transport = { send: vi.fn(() => pending) };
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });

    const first = manager.getToken();
    const second = manager.getToken();
    await new Promise((resolve) => setTimeout(resolve, 0));
    release({ status: 200, body: { token: 'shared-token' } });

    await expect(Promise.all([first, second])).resolves.toEqual(['shared-token', 'shared-token']);
    expect(transport.send).toHaveBeenCalledOnce();
  });

  it('does not coalesce forced refreshes', async () => {
    const transport = buildTransport();
    const manager = new TokenManager({ config: CONFIG, transport, cache, clock });

    const tokens = await Promise.all([manager.getToken(true), manager.getToken(true)]);

    expect(tokens).toEqual(['token-1', 'token-2']);
    expect(transport.send).toHaveBeenCalledTimes(2);
  });

  it('rejects incomplete configuration at construction', () => {
    const transport = buildTransport();

    expect(() => new TokenManager({ config: { ...CONFIG, apiKey: ' ' }, transport })).toThrow(ConfigurationError);
    expect(
      () => new TokenManager({ config: { ...CONFIG, baseUrl: 'http://accept.paymob.com' }, transport }),
    ).toThrow('baseUrl must start with https://');
  });
});
