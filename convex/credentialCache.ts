import { mutationGeneric as mutation } from 'convex/server';
import { v } from 'convex/values';

// Shared with the client through the deployment environment; the functions are
// public, so every call must present it.
function assertCacheSecret(presented: string): void {
  const expected = process.env.CREDENTIAL_CACHE_SECRET;
  if (!expected || presented !== expected) {
    throw new Error('Credential cache access denied');
  }
}

export const get = mutation({
  args: { key: v.string(), cacheSecret: v.string(), now: v.number() },
  handler: async (ctx, { key, cacheSecret, now }) => {
    assertCacheSecret(cacheSecret);
    const entry = await ctx.db
      .query('credential_cache')
      .withIndex('by_key', (q) => q.eq('key', key))
      .first();

    if (!entry) {
      return { value: null };
    }

    const { value, expiresAt } = entry;
    if (typeof value !== 'string' || typeof expiresAt !== 'number' || expiresAt <= now) {
      await ctx.db.delete(entry._id);
      return { value: null };
    }

    return { value };
  },
});

export const set = mutation({
  args: { key: v.string(), value: v.string(), expiresAt: v.number(), cacheSecret: v.string() },
  handler: async (ctx, { key, value, expiresAt, cacheSecret }) => {
    assertCacheSecret(cacheSecret);
    const existing = await ctx.db
      .query('credential_cache')
      .withIndex('by_key', (q) => q.eq('key', key))
      .first();

    if (existing) {
      await ctx.db.patch(existing._id, { value, expiresAt });
    } else {
      await ctx.db.insert('credential_cache', { key, value, expiresAt });
    }

    return { result: true };
  },
});

export const remove = mutation({
  args: { key: v.string(), cacheSecret: v.string() },
  handler: async (ctx, { key, cacheSecret }) => {
    assertCacheSecret(cacheSecret);
    const existing = await ctx.db
      .query('credential_cache')
      .withIndex('by_key', (q) => q.eq('key', key))
      .first();

    if (existing) {
      await ctx.db.delete(existing._id);
    }

    return { result: true };
  },
});
