export interface ConvexCacheConfig {
  url: string;
  cacheSecret: string;
  authToken?: string;
}

/**
 * Reads the Convex deployment used as the shared credential cache. Both the
 * deployment URL and the cache secret are required; without them the caller
 * falls back to a local backend.
 */
export function resolveConvexCacheConfig(env: NodeJS.ProcessEnv = process.env): ConvexCacheConfig | null {
  const url = env.CONVEX_URL?.trim();
  const cacheSecret = env.CONVEX_CREDENTIAL_CACHE_SECRET?.trim();
  if (!url || !cacheSecret) {
    return null;
  }

  const authToken = env.CONVEX_AUTH_TOKEN?.trim();
  if (authToken) {
    return { url, cacheSecret, authToken };
  }

  return { url, cacheSecret };
}
