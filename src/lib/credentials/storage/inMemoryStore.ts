import { isExpired, systemClock } from '../types';
import type { CredentialCache, CredentialCacheEntry, CredentialClock } from '../types';

export class InMemoryCredentialCache implements CredentialCache {
  private readonly map = new Map<string, CredentialCacheEntry>();
  private readonly clock: CredentialClock;

  constructor(clock: CredentialClock = systemClock) {
    this.clock = clock;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.map.get(key);
    if (!entry) {
      return null;
    }
    if (isExpired(entry, this.clock.now())) {
      this.map.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.map.set(key, { value, expiresAt: this.clock.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }
}
