/**
 * @prepscout/db - Postgres persistence (drizzle-orm + pg)
 */

export { getDb, closeDb, type Db } from './client';
export * from './schema';
export { DbContentCache } from './content-cache';
export { DbSearchResultSink } from './search-results';
export { isDatabaseConnectionError, DATABASE_ERROR_MESSAGE } from './db-error';
