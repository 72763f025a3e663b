/**
 * Delete cached pages so the next run fetches everything live.
 *
 * Run: npx tsx scripts/clear-content-cache.ts
 * Set CLEAR_URL to drop a single entry instead of the whole table.
 */
import './load-env';

import { closeDb, contentCache, DbContentCache, getDb } from '@prepscout/db';

async function main() {
  const db = getDb();
  const url = process.env.CLEAR_URL?.trim();

  if (url) {
    console.log(`Deleting cache entry for ${url}…`);
    await new DbContentCache(db).delete(url);
  } else {
    console.log('Deleting content_cache…');
    await db.delete(contentCache);
  }

  console.log('Done.');
}

main()
  .finally(() => closeDb())
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
