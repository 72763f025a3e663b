import { eq } from 'drizzle-orm';
import type { CachePayload } from '@prepscout/schemas';
import type { Db } from './client';
import { contentCache } from './schema';

/**
 * Postgres-backed page cache. Values are returned raw; callers validate them.
 * No TTL: rows live until deleted. Concurrent writes for one URL are last-writer-wins.
 */
export class DbContentCache {
  constructor(private readonly db: Db) {}

  async get(url: string): Promise<unknown> {
    const rows = await this.db
      .select({ payload: contentCache.payload })
      .from(contentCache)
      .where(eq(contentCache.url, url))
      .limit(1);
    return rows[0]?.payload ?? null;
  }

  async put(url: string, payload: CachePayload): Promise<void> {
    const now = new Date();
    await this.db
      .insert(contentCache)
      .values({ url, payload, fetchedAt: now })
      .onConflictDoUpdate({ target: contentCache.url, set: { payload, fetchedAt: now } });
  }

  async delete(url: string): Promise<void> {
    await this.db.delete(contentCache).where(eq(contentCache.url, url));
  }
}
