/**
 * Deal Ingest - scraped deal fields to a standardized document patch
 *
 * Overrides keyed by the deal URL are applied to the raw fields first, so a
 * corrected value goes through the same standardization as a scraped one.
 * The persisted document keeps the scraped values; the processor applies the
 * same overrides again when it reads them.
 */

import type { DealStore } from './db/deal-store.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { NameResolver } from './name-resolver.js';
import { applyOverrides, describeChange, overriddenFieldsSnapshot } from './overrides.js';
import { describeUnresolved, standardizeDeal } from './record-standardizer.js';
import {
  DEAL_SLOTS,
  type JsonObject,
  type JsonValue,
  type OverrideChange,
  type OverrideTable,
  type RawFieldRecord,
  type UnresolvedEntry,
} from './types.js';

export interface ScrapedDeal {
  id: string;
  url: string | null;
  fields: JsonObject;
}

export interface IngestDeps {
  resolver: NameResolver;
  overrides: OverrideTable;
  logger?: Logger;
}

export type IngestResult =
  | { ok: true; id: string; patch: JsonObject; warnings: UnresolvedEntry[]; changes: OverrideChange[] }
  | { ok: false; id: string; reason: 'missing_lead_managers' };

function stringList(value: JsonValue | undefined): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string => typeof v === 'string');
}

/**
 * Read the party slots and OS path out of an untyped scraped document.
 * Non-string entries are dropped.
 */
export function toRawFieldRecord(fields: JsonObject): RawFieldRecord {
  const raw: RawFieldRecord = {};
  for (const slot of DEAL_SLOTS) {
    const values = stringList(fields[slot]);
    if (values) raw[slot] = values;
  }
  const osPath = fields.os_file_path;
  if (typeof osPath === 'string' || osPath === null) raw.os_file_path = osPath;
  return raw;
}

export function ingestScrapedDeal(scraped: ScrapedDeal, deps: IngestDeps): IngestResult {
  const log = deps.logger ?? rootLogger;
  const { record: fields, changes } = applyOverrides(deps.overrides, scraped.url, scraped.fields);

  for (const change of changes) {
    log.info({ dealId: scraped.id }, `Override applied: ${describeChange(change)}`);
  }

  const result = standardizeDeal(toRawFieldRecord(fields), deps.resolver);
  if (!result.ok) {
    log.warn({ dealId: scraped.id, url: scraped.url }, 'Skipping deal without lead managers');
    return { ok: false, id: scraped.id, reason: result.reason };
  }

  for (const warning of result.warnings) {
    log.warn({ dealId: scraped.id }, describeUnresolved(warning));
  }

  // Overrides feed standardization only; the stored fields stay as scraped
  const scrapedRaw = toRawFieldRecord(scraped.fields);
  const unprocessed: JsonObject = {};
  for (const slot of DEAL_SLOTS) {
    unprocessed[slot] = [...(scrapedRaw[slot] ?? [])];
  }

  const { record } = result;
  const patch: JsonObject = {
    ...scraped.fields,
    url: scraped.url,
    lead_managers: record.lead_managers,
    co_managers: record.co_managers,
    municipal_advisors: record.municipal_advisors,
    counsels: record.counsels,
    os_file_path: scrapedRaw.os_file_path ?? null,
    unprocessed_deal_scrape: unprocessed,
  };
  if (changes.length > 0) {
    patch.override_audit = { overridden_fields: overriddenFieldsSnapshot(changes) };
  }

  return { ok: true, id: scraped.id, patch, warnings: result.warnings, changes };
}

/**
 * Ingest and persist. Returns false when the deal was skipped.
 */
export async function saveScrapedDeal(store: DealStore, scraped: ScrapedDeal, deps: IngestDeps): Promise<boolean> {
  const result = ingestScrapedDeal(scraped, deps);
  if (!result.ok) return false;
  await store.upsertDeal(result.id, result.patch);
  return true;
}
