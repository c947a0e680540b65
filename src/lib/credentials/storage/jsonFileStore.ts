import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from '@/lib/logging';
import { describeError } from '@/lib/paymob/errors';
import { isExpired, systemClock } from '../types';
import type { CredentialCache, CredentialCacheEntry, CredentialClock } from '../types';

const log = createLogger('credential_cache');

interface SerializedCache {
  entries: Record<string, CredentialCacheEntry>;
}

function isSerializedEntry(value: unknown): value is CredentialCacheEntry {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const candidate = value as Partial<CredentialCacheEntry>;
  return typeof candidate.value === 'string' && typeof candidate.expiresAt === 'number';
}

function parseCache(data: string): Map<string, CredentialCacheEntry> {
  const parsed = JSON.parse(data) as Partial<SerializedCache> | null;
  const entries = new Map<string, CredentialCacheEntry>();
  for (const [key, entry] of Object.entries(parsed?.entries ?? {})) {
    if (isSerializedEntry(entry)) {
      entries.set(key, { value: entry.value, expiresAt: entry.expiresAt });
    }
  }
  return entries;
}

async function readCacheFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

let temporaryCounter = 0;

// Replaced by rename: readers see the previous file or the new one, never a partial write.
async function writeCache(path: string, cache: SerializedCache) {
  temporaryCounter += 1;
  const temporaryPath = `${path}.${process.pid}.${temporaryCounter}.tmp`;
  await mkdir(dirname(path), { recursive: true });
  try {
    await writeFile(temporaryPath, JSON.stringify(cache, null, 2), { encoding: 'utf8', mode: 0o600 });
    await rename(temporaryPath, path);
  } catch (error) {
    await rm(temporaryPath, { force: true });
    throw error;
  }
}

/**
 * File-backed cache for several processes on one host. The file is re-read by
 * every operation so a token written by a sibling process is picked up.
 * Operations on one instance run one at a time.
 */
export class JsonFileCredentialCache implements CredentialCache {
  private readonly path: string;
  private readonly clock: CredentialClock;
  private operationChain: Promise<void> = Promise.resolve();

  constructor(path: string, clock: CredentialClock = systemClock) {
    this.path = path;
    this.clock = clock;
  }

  private withLock<T>(operation: () => Promise<T>): Promise<T> {
    const next = this.operationChain.then(operation);
    this.operationChain = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async load(): Promise<Map<string, CredentialCacheEntry>> {
    const data = await readCacheFile(this.path);
    return data === null ? new Map() : parseCache(data);
  }

  /** Mutations start over from an empty cache when the file cannot be parsed. */
  private async loadForUpdate(): Promise<Map<string, CredentialCacheEntry>> {
    const data = await readCacheFile(this.path);
    if (data === null) {
      return new Map();
    }
    try {
      return parseCache(data);
    } catch (error) {
      log.warn('cache.file_reset', { backend: 'json-file', reason: describeError(error) });
      return new Map();
    }
  }

  private async persist(entries: Map<string, CredentialCacheEntry>): Promise<void> {
    await writeCache(this.path, { entries: Object.fromEntries(entries) });
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.withLock(async () => {
        const entries = await this.load();
        const entry = entries.get(key);
        if (!entry) {
          return null;
        }
        if (isExpired(entry, this.clock.now())) {
          entries.delete(key);
          await this.persist(entries);
          return null;
        }
        return entry.value;
      });
    } catch (error) {
      log.warn('cache.get_failed', { backend: 'json-file', key, reason: describeError(error) });
      return null;
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await this.withLock(async () => {
        const entries = await this.loadForUpdate();
        entries.set(key, { value, expiresAt: this.clock.now() + ttlSeconds * 1000 });
        await this.persist(entries);
      });
    } catch (error) {
      log.warn('cache.set_failed', { backend: 'json-file', key, reason: describeError(error) });
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.withLock(async () => {
        const entries = await this.loadForUpdate();
        if (entries.delete(key)) {
          await this.persist(entries);
        }
      });
    } catch (error) {
      log.warn('cache.delete_failed', { backend: 'json-file', key, reason: describeError(error) });
    }
  }
}
