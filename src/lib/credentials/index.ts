import { resolveConvexCacheConfig } from '@/lib/convexAuth';
import { createLogger } from '@/lib/logging';
import { describeError } from '@/lib/paymob/errors';
import { InMemoryCredentialCache } from './storage/inMemoryStore';
import { JsonFileCredentialCache } from './storage/jsonFileStore';
import { ConvexCredentialCache } from './storage/convexStore';
import type { CredentialCache } from './types';

export * from './types';
export { InMemoryCredentialCache, JsonFileCredentialCache, ConvexCredentialCache };

export type CredentialCacheKind = 'convex' | 'json-file' | 'memory';

const log = createLogger('credential_cache');

let cache: CredentialCache | null = null;
let cacheKind: CredentialCacheKind | null = null;

function createCache(): CredentialCache {
  const convex = resolveConvexCacheConfig();
  if (convex) {
    try {
      const convexCache = new ConvexCredentialCache({
        baseUrl: convex.url,
        cacheSecret: convex.cacheSecret,
        authToken: convex.authToken,
      });
      cacheKind = 'convex';
      return convexCache;
    } catch (error) {
      log.warn('cache.convex_init_failed', { reason: describeError(error) });
    }
  }

  const filePath = process.env.CREDENTIAL_CACHE_PATH?.trim();
  if (filePath) {
    cacheKind = 'json-file';
    return new JsonFileCredentialCache(filePath);
  }

  cacheKind = 'memory';
  return new InMemoryCredentialCache();
}

export function getCredentialCache(): CredentialCache {
  if (!cache) {
    cache = createCache();
  }
  return cache;
}

export function getCredentialCacheKind(): CredentialCacheKind | null {
  return cacheKind;
}

export function resetCredentialCacheForTesting(): void {
  cache = null;
  cacheKind = null;
}
