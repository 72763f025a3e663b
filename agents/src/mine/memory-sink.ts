import type { SearchResultRow } from '@prepscout/schemas';
import type { SearchResultSink } from './types.js';

export class MemorySearchResultSink implements SearchResultSink {
  readonly rows: SearchResultRow[] = [];

  async append(row: SearchResultRow): Promise<void> {
    this.rows.push({ ...row });
  }
}
