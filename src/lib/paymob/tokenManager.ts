import { systemClock } from '@/lib/credentials/types';
import type { CredentialCache, CredentialClock } from '@/lib/credentials/types';
import { InMemoryCredentialCache } from '@/lib/credentials/storage/inMemoryStore';
import { isSuccessStatus } from '@/lib/fetch/httpTransport';
import type { HttpTransport, TransportResponse } from '@/lib/fetch/httpTransport';
import { createLogger } from '@/lib/logging';
import { DEFAULT_TOKEN_TTL_SECONDS } from './config';
import type { PaymobConfig } from './config';
import { AuthenticationError, ConfigurationError, describeError } from './errors';

/**
 * Cache namespace of the Paymob bearer token. Processes sharing a cache
 * backend read each other's token under this key, so it must not change.
 */
export const PAYMOB_TOKEN_CACHE_KEY = 'paymob:auth_token';

/** Refreshes per clock hour above which a warning is logged. */
export const HIGH_REFRESH_RATE_THRESHOLD = 3;

const HOUR_MS = 60 * 60 * 1000;
const UPSTREAM_DETAIL_LIMIT = 200;

const log = createLogger('paymob_token');

export interface RefreshStats {
  hourBucket: number;
  count: number;
}

export interface TokenManagerOptions {
  config: Pick<PaymobConfig, 'apiKey' | 'baseUrl'> & Partial<Pick<PaymobConfig, 'tokenTtlSeconds'>>;
  transport: HttpTransport;
  cache?: CredentialCache;
  clock?: CredentialClock;
}

function describeUpstreamBody(body: unknown): string {
  if (typeof body === 'string') {
    return body.slice(0, UPSTREAM_DETAIL_LIMIT);
  }
  if (body && typeof body === 'object') {
    const record = body as Record<string, unknown>;
    for (const key of ['detail', 'message', 'error']) {
      const value = record[key];
      if (typeof value === 'string' && value) {
        return value.slice(0, UPSTREAM_DETAIL_LIMIT);
      }
    }
  }
  return '';
}

function extractToken(body: unknown): string | null {
  if (!body || typeof body !== 'object') {
    return null;
  }
  const token = (body as Record<string, unknown>).token;
  return typeof token === 'string' && token ? token : null;
}

/**
 * Owns the Paymob bearer token: serves it from the credential cache, requests
 * a new one on a miss or forced refresh, and tracks how often that happens.
 *
 * Cache failures are logged and treated as a miss; only the token request
 * itself can fail `getToken`, always with an `AuthenticationError`.
 */
export class TokenManager {
  private readonly apiKey: string;
  private readonly tokenUrl: string;
  private readonly tokenTtlSeconds: number;
  private readonly transport: HttpTransport;
  private readonly cache: CredentialCache;
  private readonly clock: CredentialClock;

  private refreshCount = 0;
  private refreshHourBucket = -1;
  private inflight: Promise<string> | null = null;

  constructor(options: TokenManagerOptions) {
    const apiKey = options.config.apiKey.trim();
    if (!apiKey) {
      throw new ConfigurationError('Missing required config: apiKey');
    }
    const baseUrl = options.config.baseUrl.trim().replace(/\/+$/, '');
    if (!baseUrl.startsWith('https://')) {
      throw new ConfigurationError('baseUrl must start with https://');
    }

    this.apiKey = apiKey;
    this.tokenUrl = `${baseUrl}/api/auth/tokens`;
    this.tokenTtlSeconds = options.config.tokenTtlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS;
    this.transport = options.transport;
    this.clock = options.clock ?? systemClock;
    this.cache = options.cache ?? new InMemoryCredentialCache(this.clock);
  }

  async getToken(forceRefresh = false): Promise<string> {
    if (forceRefresh) {
      return this.refresh();
    }

    const cached = await this.readCachedToken();
    if (cached) {
      log.debug('token.cache_hit');
      return cached;
    }

    // Concurrent misses share one request; forced refreshes never join it.
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  async invalidateToken(): Promise<void> {
    try {
      await this.cache.delete(PAYMOB_TOKEN_CACHE_KEY);
      log.info('token.invalidated');
    } catch (error) {
      log.warn('token.invalidate_failed', { reason: describeError(error) });
    }
  }

  refreshStats(): RefreshStats {
    return { hourBucket: this.refreshHourBucket, count: this.refreshCount };
  }

  private async refresh(): Promise<string> {
    this.trackRefresh();
    log.info('token.requesting');
    const token = await this.requestToken();
    await this.cacheToken(token);
    return token;
  }

  private trackRefresh(): void {
    const bucket = Math.floor(this.clock.now() / HOUR_MS);
    if (bucket !== this.refreshHourBucket) {
      this.refreshCount = 0;
      this.refreshHourBucket = bucket;
    }

    this.refreshCount += 1;

    if (this.refreshCount > HIGH_REFRESH_RATE_THRESHOLD) {
      log.warn('token.refresh_rate_high', { refreshesThisHour: this.refreshCount });
    }
  }

  private async requestToken(): Promise<string> {
    let response: TransportResponse;
    try {
      response = await this.transport.send({
        method: 'POST',
        url: this.tokenUrl,
        body: { api_key: this.apiKey },
      });
    } catch (error) {
      return this.fail(describeError(error), error);
    }

    if (!isSuccessStatus(response.status)) {
      const detail = describeUpstreamBody(response.body);
      return this.fail(detail ? `HTTP ${response.status}: ${detail}` : `HTTP ${response.status}`);
    }

    const token = extractToken(response.body);
    if (!token) {
      return this.fail('No token received from Paymob API');
    }

    log.info('token.obtained');
    return token;
  }

  private fail(reason: string, cause?: unknown): never {
    log.error('token.request_failed', { reason });
    throw new AuthenticationError(`Token request failed: ${reason}`, { cause });
  }

  private async readCachedToken(): Promise<string | null> {
    try {
      return await this.cache.get(PAYMOB_TOKEN_CACHE_KEY);
    } catch (error) {
      log.warn('token.cache_read_failed', { reason: describeError(error) });
      return null;
    }
  }

  private async cacheToken(token: string): Promise<void> {
    try {
      await this.cache.set(PAYMOB_TOKEN_CACHE_KEY, token, this.tokenTtlSeconds);
      log.debug('token.cached', { ttlSeconds: this.tokenTtlSeconds });
    } catch (error) {
      log.warn('token.cache_write_failed', { reason: describeError(error) });
    }
  }
}
