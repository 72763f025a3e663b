import { pgTable, uuid, text, varchar, real, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

// Fetched pages, one row per URL. Payload is the versioned cache record.
export const contentCache = pgTable('content_cache', {
  url: text('url').primaryKey(),
  payload: jsonb('payload').$type<unknown>().notNull(),
  fetchedAt: timestamp('fetched_at', { withTimezone: true }).defaultNow().notNull(),
});

// Append-only: scored content kept for a role/company mining run.
export const searchResults = pgTable(
  'search_results',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    role: varchar('role', { length: 255 }).notNull(),
    company: varchar('company', { length: 255 }).notNull().default(''),
    url: text('url').notNull(),
    title: varchar('title', { length: 512 }).notNull(),
    body: text('body').notNull(),
    source: varchar('source', { length: 255 }).notNull(),
    relevanceScore: real('relevance_score').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    searchResultsRoleCompanyIdx: index('search_results_role_company_idx').on(
      table.role,
      table.company,
    ),
  }),
);
