/**
 * Record Standardizer - canonical names for every party slot of a scraped deal
 *
 * Lead managers are mandatory: downstream dedup keys on them, so a deal
 * without one is rejected outright rather than half-standardized.
 */

import { looksLikeUrl } from './entity-registry.js';
import { NameResolver } from './name-resolver.js';
import {
  DEAL_SLOTS,
  type DealSlot,
  type RawFieldRecord,
  type StandardizationResult,
  type StandardizedDealRecord,
  type UnresolvedEntry,
} from './types.js';

function nonBlank(values: readonly string[] | undefined): string[] {
  return (values ?? []).filter(v => typeof v === 'string' && v.trim().length > 0);
}

export function standardizeDeal(raw: RawFieldRecord, resolver: NameResolver): StandardizationResult {
  if (nonBlank(raw.lead_managers).length === 0) {
    return { ok: false, reason: 'missing_lead_managers' };
  }

  const record: StandardizedDealRecord = {
    lead_managers: [],
    co_managers: [],
    municipal_advisors: [],
    counsels: [],
    os_file_path: raw.os_file_path ?? null,
    unprocessed_deal_scrape: {
      lead_managers: [...(raw.lead_managers ?? [])],
      co_managers: [...(raw.co_managers ?? [])],
      municipal_advisors: [...(raw.municipal_advisors ?? [])],
      counsels: [...(raw.counsels ?? [])],
    },
  };
  const warnings: UnresolvedEntry[] = [];

  for (const slot of DEAL_SLOTS) {
    for (const value of nonBlank(raw[slot])) {
      const canonical = resolver.resolveName(value);
      if (canonical) {
        record[slot].push(canonical);
        continue;
      }

      // Keep the raw string in place so nothing is silently lost
      record[slot].push(value);
      warnings.push(unresolved(slot, value, resolver));
    }
  }

  return { ok: true, record, warnings };
}

function unresolved(slot: DealSlot, value: string, resolver: NameResolver): UnresolvedEntry {
  const suggestion = looksLikeUrl(value) ? resolver.suggestNameFromWebsite(value) : null;
  return suggestion ? { slot, value, suggestion } : { slot, value };
}

export function describeUnresolved(entry: UnresolvedEntry): string {
  const label = entry.slot.replace(/_/g, ' ').replace(/s$/, '');
  const hint = entry.suggestion ? ` (looks like ${entry.suggestion})` : '';
  return `Unknown ${label}: ${entry.value}${hint}`;
}
