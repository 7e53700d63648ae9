/**
 * Deal document schema - Drizzle ORM
 *
 * Deals are stored as whole JSON documents keyed by the portal's deal id.
 * Standardization and fee extraction only ever merge fields into `data`.
 */

import { pgTable, varchar, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import type { JsonObject } from '../types.js';

export const dealDocuments = pgTable('deal_documents', {
  id: varchar('id', { length: 100 }).primaryKey(),
  url: text('url'),
  data: jsonb('data').$type<JsonObject>().notNull().default({}),
  createdAt: timestamp('created_at').defaultNow(),
  updatedAt: timestamp('updated_at').defaultNow(),
}, (table) => ({
  urlIdx: index('deal_documents_url_idx').on(table.url),
}));

export type DealDocumentRow = typeof dealDocuments.$inferSelect;
export type NewDealDocumentRow = typeof dealDocuments.$inferInsert;
