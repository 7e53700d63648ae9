/**
 * Fee Extractor - underwriting / purchaser discount amounts from official statements
 *
 * Official statements state the underwriter's compensation in a handful of
 * recurring phrasings. Each phrasing gets one pattern; every pattern runs over
 * every page and every match becomes a candidate. Candidates are then
 * reconciled into one reportable total:
 * - all candidates equal → that amount
 * - otherwise → the sum, flagged for human review
 *
 * Overlapping patterns can match the same mention twice (e.g. "discount of
 * $X of underwriters' discount"). That is kept by default; the
 * 'dedupe-page-amount' policy collapses identical (page, amount) pairs first.
 */

import type {
  DuplicatePolicy,
  FeeCandidate,
  FeeExtraction,
  FeeExtractionResult,
  FeePatternName,
} from './types.js';

// Digits with optional thousands separators and decimals, captured without "$"
const AMOUNT = String.raw`(\d[\d,]*(?:\.\d+)?)`;
const DOLLAR = String.raw`\$\s*`;

// underwriting / underwriter(s)('s) / purchaser(s)('s)
const PARTY = String.raw`(?:underwriting|underwriter|purchaser)(?:s|['’]s|s['’])?`;

// "underwriting discount", "underwriters' compensation", "purchaser's fee"
const FEE_NOUN = String.raw`${PARTY}\s+(?:compensation|discount|fees?|expenses)`;

export const FEE_PATTERNS: ReadonlyArray<{ name: FeePatternName; pattern: RegExp }> = [
  // "underwriting discount of $1,444.00"; free text may sit between the noun and "of"
  {
    name: 'fee_noun_of_amount',
    pattern: new RegExp(String.raw`${FEE_NOUN}\s+(?:[^$]*?\s+)?of\s+${DOLLAR}${AMOUNT}`, 'gi'),
  },
  // "The Underwriters' compensation ... will be $50,000"
  {
    name: 'fee_noun_is_amount',
    pattern: new RegExp(String.raw`${FEE_NOUN}[^$]*?\b(?:is|will\s+be)\s+${DOLLAR}${AMOUNT}`, 'gi'),
  },
  // "will pay the Underwriters a fee ... $12,500"; first dollar figure after the obligation
  {
    name: 'will_pay_fee',
    pattern: new RegExp(
      String.raw`will\s+(?:also\s+)?pay\s+the\s+(?:underwriters?|purchasers?)\s+a\s+fee.*?${DOLLAR}${AMOUNT}`,
      'gis'
    ),
  },
  // "$725,500.00 of Underwriter's discount"
  {
    name: 'amount_of_fee_noun',
    pattern: new RegExp(String.raw`${DOLLAR}${AMOUNT}\s+of\s+${PARTY}\s+(?:discount|fees|expenses)`, 'gi'),
  },
  // "$98,000 as compensation for underwriting"
  {
    name: 'amount_as_compensation',
    pattern: new RegExp(String.raw`${DOLLAR}${AMOUNT}\s+as\s+compensation\s+for\s+(?:underwriting|purchasing)`, 'gi'),
  },
];

/**
 * Parse a matched amount into integer cents.
 * "1,444.00" → 144400. Returns null for anything that is not a plain number.
 */
export function parseAmountCents(raw: string): number | null {
  const cleaned = raw.replace(/,/g, '');
  const match = cleaned.match(/^(\d+)(?:\.(\d+))?$/);
  if (!match) return null;

  const whole = Number(match[1]);
  const fraction = match[2] ?? '';
  const cents = Number((fraction + '00').slice(0, 2));
  const roundUp = fraction.length > 2 && fraction.charAt(2) >= '5' ? 1 : 0;

  const total = whole * 100 + cents + roundUp;
  return Number.isSafeInteger(total) ? total : null;
}

const toDollars = (cents: number): number => cents / 100;

interface CentsCandidate extends FeeCandidate {
  cents: number;
}

export function findFeeCandidates(pages: readonly string[]): CentsCandidate[] {
  const candidates: CentsCandidate[] = [];

  pages.forEach((text, i) => {
    if (!text) return;
    for (const { name, pattern } of FEE_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        const raw = match[1];
        const cents = parseAmountCents(raw);
        // Unparseable amount: drop this candidate, keep the rest
        if (cents === null) continue;
        candidates.push({ page: i + 1, pattern: name, raw, amount: toDollars(cents), cents });
      }
    }
  });

  return candidates;
}

function collapseDuplicates(candidates: CentsCandidate[]): CentsCandidate[] {
  const seen = new Set<string>();
  return candidates.filter(c => {
    const key = `${c.page}:${c.cents}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export interface ExtractFeesOptions {
  duplicatePolicy?: DuplicatePolicy;
}

/**
 * Extract the underwriting fee from a document's text, one string per page.
 */
export function extractFees(pages: readonly string[], options: ExtractFeesOptions = {}): FeeExtraction {
  const duplicatePolicy = options.duplicatePolicy ?? 'keep-all';

  if (pages.every(p => !p || !p.trim())) {
    return { status: 'not_found', reason: 'empty_document' };
  }

  const found = findFeeCandidates(pages);
  if (found.length === 0) {
    return { status: 'not_found', reason: 'no_candidates' };
  }

  const kept = duplicatePolicy === 'dedupe-page-amount' ? collapseDuplicates(found) : found;
  const first = kept[0].cents;
  const identical = kept.every(c => c.cents === first);
  const totalCents = identical ? first : kept.reduce((sum, c) => sum + c.cents, 0);

  const result: FeeExtractionResult = {
    total: toDollars(totalCents),
    scrape_success: true,
    scrape_breakdown: {
      amounts: kept.map(c => c.amount),
      candidates: kept.map(({ cents: _cents, ...candidate }) => candidate),
      are_amounts_identical: identical,
      is_dupe_review_completed: identical,
      duplicate_policy: duplicatePolicy,
      collapsed_duplicates: found.length - kept.length,
    },
  };

  return { status: 'found', result };
}
