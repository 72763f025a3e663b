import type { SearchResultRow } from '@prepscout/schemas';
import type { Db } from './client';
import { searchResults } from './schema';

export class DbSearchResultSink {
  constructor(private readonly db: Db) {}

  async append(row: SearchResultRow): Promise<void> {
    await this.db.insert(searchResults).values({
      role: row.role,
      company: row.company,
      url: row.url,
      title: row.title.slice(0, 512),
      body: row.body,
      source: row.source,
      relevanceScore: row.relevanceScore,
    });
  }
}
