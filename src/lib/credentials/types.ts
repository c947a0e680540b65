export interface CredentialClock {
  now(): number;
}

export interface CredentialCacheEntry {
  value: string;
  /** Absolute expiry, epoch milliseconds. */
  expiresAt: number;
}

/**
 * Key/value store with a per-entry TTL. A read of an expired entry behaves as
 * a miss and evicts it.
 */
export interface CredentialCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

export const systemClock: CredentialClock = {
  now: () => Date.now(),
};

export function isExpired(entry: CredentialCacheEntry, now: number): boolean {
  return entry.expiresAt <= now;
}
