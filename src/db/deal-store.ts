/**
 * Deal document storage
 *
 * The processor only needs three operations, so it talks to this interface
 * rather than to drizzle directly.
 */

import { asc, eq, gt, sql } from 'drizzle-orm';
import { dealDocuments } from './schema.js';
import type { Database } from './index.js';
import type { JsonObject, JsonValue } from '../types.js';

export interface StoredDeal {
  id: string;
  data: JsonObject;
}

export interface DealStore {
  /** Deals ordered by id, strictly after `afterId` (null = from the start) */
  listBatch(afterId: string | null, limit: number): Promise<StoredDeal[]>;
  /** Shallow-merge `patch` into the deal's document */
  updateDeal(id: string, patch: JsonObject): Promise<void>;
  /** Create the deal, or shallow-merge into it when it exists */
  upsertDeal(id: string, data: JsonObject): Promise<void>;
}

function urlOf(data: JsonObject): string | null {
  const url: JsonValue | undefined = data.url;
  return typeof url === 'string' ? url : null;
}

export class DrizzleDealStore implements DealStore {
  constructor(private readonly db: Database) {}

  async listBatch(afterId: string | null, limit: number): Promise<StoredDeal[]> {
    const rows = await this.db
      .select({ id: dealDocuments.id, data: dealDocuments.data })
      .from(dealDocuments)
      .where(afterId === null ? undefined : gt(dealDocuments.id, afterId))
      .orderBy(asc(dealDocuments.id))
      .limit(limit);

    return rows.map(row => ({ id: row.id, data: row.data }));
  }

  async updateDeal(id: string, patch: JsonObject): Promise<void> {
    // jsonb || jsonb: top-level keys of the patch replace existing ones
    await this.db
      .update(dealDocuments)
      .set({
        data: sql`${dealDocuments.data} || ${JSON.stringify(patch)}::jsonb`,
        updatedAt: new Date(),
      })
      .where(eq(dealDocuments.id, id));
  }

  async upsertDeal(id: string, data: JsonObject): Promise<void> {
    const url = urlOf(data);
    await this.db
      .insert(dealDocuments)
      .values({ id, url, data })
      .onConflictDoUpdate({
        target: dealDocuments.id,
        set: {
          data: sql`${dealDocuments.data} || ${JSON.stringify(data)}::jsonb`,
          ...(url !== null && { url }),
          updatedAt: new Date(),
        },
      });
  }
}
