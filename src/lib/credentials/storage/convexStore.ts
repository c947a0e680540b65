import type { ConvexHttpClient } from 'convex/browser';
import { makeFunctionReference } from 'convex/server';
import { buildConvexHttpClient } from '@/lib/convex/client';
import { createLogger } from '@/lib/logging';
import { describeError } from '@/lib/paymob/errors';
import { systemClock } from '../types';
import type { CredentialCache, CredentialClock } from '../types';

const log = createLogger('credential_cache');

const getEntry = makeFunctionReference<
  'mutation',
  { key: string; cacheSecret: string; now: number },
  { value: string | null }
>('credentialCache:get');

const setEntry = makeFunctionReference<
  'mutation',
  { key: string; value: string; expiresAt: number; cacheSecret: string },
  { result: boolean }
>('credentialCache:set');

const removeEntry = makeFunctionReference<
  'mutation',
  { key: string; cacheSecret: string },
  { result: boolean }
>('credentialCache:remove');

interface ConvexCredentialCacheOptions {
  baseUrl: string;
  cacheSecret: string;
  authToken?: string;
  clock?: CredentialClock;
}

/**
 * Credential cache shared by every process pointed at the same Convex
 * deployment. Expiry is evaluated server-side against the caller's clock.
 */
export class ConvexCredentialCache implements CredentialCache {
  private readonly client: ConvexHttpClient;
  private readonly cacheSecret: string;
  private readonly clock: CredentialClock;

  constructor(options: ConvexCredentialCacheOptions) {
    this.client = buildConvexHttpClient({ baseUrl: options.baseUrl, authToken: options.authToken });
    this.cacheSecret = options.cacheSecret;
    this.clock = options.clock ?? systemClock;
  }

  async get(key: string): Promise<string | null> {
    try {
      const result = await this.client.mutation(getEntry, {
        key,
        cacheSecret: this.cacheSecret,
        now: this.clock.now(),
      });
      return result.value;
    } catch (error) {
      log.warn('cache.get_failed', { backend: 'convex', key, reason: describeError(error) });
      return null;
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.client.mutation(setEntry, {
        key,
        value,
        expiresAt: this.clock.now() + ttlSeconds * 1000,
        cacheSecret: this.cacheSecret,
      });
    } catch (error) {
      log.warn('cache.set_failed', { backend: 'convex', key, reason: describeError(error) });
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.mutation(removeEntry, { key, cacheSecret: this.cacheSecret });
    } catch (error) {
      log.warn('cache.delete_failed', { backend: 'convex', key, reason: describeError(error) });
    }
  }
}
