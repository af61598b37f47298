import { pgTable, text, timestamp, jsonb } from 'drizzle-orm/pg-core';

export const leagueDocuments = pgTable('league_documents', {
  name: text('name').primaryKey(),
  body: jsonb('body').$type<unknown>().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

