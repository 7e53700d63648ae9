// Shared shapes for deal standardization, fee extraction and overrides.
// Persisted document shapes use snake_case keys, matching the deal documents
// written to the store.

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ============================================================
// ENTITIES
// ============================================================

export type EntityCategory = 'underwriter' | 'municipal_advisor' | 'law_firm';

export interface Entity {
  canonicalName: string;
  category: EntityCategory | null;
  nameVariations: ReadonlySet<string>;
  websites: ReadonlySet<string>;
}

export interface EntitySeed {
  canonicalName: string;
  category?: EntityCategory;
  nameVariations: string[];
  websites: string[];
}

export interface RegistryConflict {
  kind: 'name' | 'website';
  key: string;
  owner: string;      // entity that already holds the key
  rejected: string;   // entity whose registration tried to take it
}

export interface RegistrationResult {
  entity: Entity;
  replaced: boolean;
  conflicts: RegistryConflict[];
}

// ============================================================
// DEAL RECORDS
// ============================================================

export const DEAL_SLOTS = ['lead_managers', 'co_managers', 'municipal_advisors', 'counsels'] as const;
export type DealSlot = typeof DEAL_SLOTS[number];

/**
 * As-scraped values for one deal. Each slot holds organization names or
 * website URLs, depending on which page section produced them.
 */
export interface RawFieldRecord {
  lead_managers?: string[];
  co_managers?: string[];
  municipal_advisors?: string[];
  counsels?: string[];
  os_file_path?: string | null;
}

export interface StandardizedDealRecord {
  lead_managers: string[];
  co_managers: string[];
  municipal_advisors: string[];
  counsels: string[];
  os_file_path: string | null;
  unprocessed_deal_scrape: Record<DealSlot, string[]>;
}

export interface UnresolvedEntry {
  slot: DealSlot;
  value: string;
  suggestion?: string;
}

export type StandardizationResult =
  | { ok: true; record: StandardizedDealRecord; warnings: UnresolvedEntry[] }
  | { ok: false; reason: 'missing_lead_managers' };

// ============================================================
// FEES
// ============================================================

export type FeePatternName =
  | 'fee_noun_of_amount'
  | 'fee_noun_is_amount'
  | 'will_pay_fee'
  | 'amount_of_fee_noun'
  | 'amount_as_compensation';

export type DuplicatePolicy = 'keep-all' | 'dedupe-page-amount';

export interface FeeCandidate {
  page: number;             // 1-based page number
  pattern: FeePatternName;
  raw: string;              // matched digits as they appear in the text
  amount: number;
}

export interface FeeBreakdown {
  amounts: number[];
  candidates: FeeCandidate[];
  are_amounts_identical: boolean;
  is_dupe_review_completed: boolean;
  duplicate_policy: DuplicatePolicy;
  collapsed_duplicates: number;
}

export interface FeeExtractionResult {
  total: number;
  scrape_success: true;
  scrape_breakdown: FeeBreakdown;
}

export type FeeExtraction =
  | { status: 'found'; result: FeeExtractionResult }
  | { status: 'not_found'; reason: 'empty_document' | 'no_candidates' };

// ============================================================
// OVERRIDES
// ============================================================

export type OverrideEntry = Record<string, JsonValue>;
export type OverrideTable = Record<string, OverrideEntry>;

export type PreviousValue =
  | { present: true; value: JsonValue }
  | { present: false };

export interface OverrideChange {
  field: string;
  previous: PreviousValue;
  next: JsonValue;
}

// ============================================================
// PARTIES
// ============================================================

export interface ExtractedParties {
  underwriter_lead_left: string | null;
  underwriter_all: string[];
}
