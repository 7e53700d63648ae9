/**
 * Manual field overrides keyed by source URL
 *
 * The portal mislabels some documents (e.g. a commercial paper memorandum
 * listed as an official statement). Corrections live in a key-value table,
 * loaded from data/overrides.json by default, and are applied before any
 * standardization or extraction reads the record. Every applied field is
 * recorded with its previous value so the original scrape stays auditable.
 */

import fs from 'fs';
import { z } from 'zod';
import { OverrideTableError } from './errors.js';
import type {
  JsonObject,
  JsonValue,
  OverrideChange,
  OverrideEntry,
  OverrideTable,
} from './types.js';

export interface OverrideApplication<T extends JsonObject> {
  record: T;
  changes: OverrideChange[];
}

export function applyOverrides<T extends JsonObject>(
  table: OverrideTable,
  sourceId: string | null | undefined,
  record: T
): OverrideApplication<T> {
  if (!sourceId || !Object.prototype.hasOwnProperty.call(table, sourceId)) {
    return { record, changes: [] };
  }

  const entry: OverrideEntry = table[sourceId];
  const replacements: JsonObject = {};
  const changes: OverrideChange[] = [];

  for (const [field, next] of Object.entries(entry)) {
    const present = Object.prototype.hasOwnProperty.call(record, field);
    changes.push({
      field,
      previous: present ? { present: true, value: record[field] } : { present: false },
      next,
    });
    replacements[field] = next;
  }

  return { record: { ...record, ...replacements }, changes };
}

/**
 * Audit shape persisted with the document: field → value before override
 * (null when the field was absent).
 */
export function overriddenFieldsSnapshot(changes: readonly OverrideChange[]): JsonObject {
  const snapshot: JsonObject = {};
  for (const change of changes) {
    snapshot[change.field] = change.previous.present ? change.previous.value : null;
  }
  return snapshot;
}

export function describeChange(change: OverrideChange): string {
  const before = change.previous.present ? JSON.stringify(change.previous.value) : '(absent)';
  return `${change.field}: ${before} → ${JSON.stringify(change.next)}`;
}

// ============================================================
// LOADING
// ============================================================

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

const overrideFileSchema = z.object({
  description: z.string().optional(),
  overrides: z.record(z.string().min(1), z.record(z.string().min(1), jsonValueSchema)),
});

export function parseOverrideTable(data: unknown, source: string): OverrideTable {
  const parsed = overrideFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new OverrideTableError(
      source,
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data.overrides;
}

/**
 * Load the override table. A missing file means no overrides.
 */
export function loadOverrideTable(filePath: string): OverrideTable {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new OverrideTableError(filePath, [e instanceof Error ? e.message : String(e)]);
  }
  return parseOverrideTable(data, filePath);
}
