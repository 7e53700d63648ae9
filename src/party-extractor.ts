/**
 * Underwriter / purchaser names from official statement text
 *
 * Handles the two phrasings the underwriting section uses to name the
 * syndicate:
 * - "The Bonds are being purchased by X, Y and Z ..."
 * - "... by X and Y (collectively, the "Underwriters")"
 *
 * Within each segment, organization names are capitalized runs that carry a
 * financial-firm keyword. Order of first appearance is kept, so the first
 * name is the lead (left) underwriter.
 */

import { NameResolver } from './name-resolver.js';
import type { ExtractedParties } from './types.js';

// Defined terms and role words that look like names but are not firms
const EXCLUDED_NAMES = new Set([
  'authority', 'underwriter', 'underwriters', 'purchaser', 'purchasers',
  'representative', 'the representative', 'the obligated group representative',
  'issuer', 'the issuer', 'obligated group', 'bond counsel', 'llc', 'inc.',
  'bonds', 'the bonds', 'series', 'city', 'county', 'state',
]);

// Keywords that indicate a firm (must have at least one)
const FIRM_KEYWORDS = [
  'Securities', 'Capital', 'Markets', 'Financial', 'Bank', 'Banc', 'Brokers',
  'Investment', 'Partners', 'Advisors', 'Group', 'Company',
  'LLC', 'L.L.C.', 'Inc.', 'Incorporated', 'LLP', 'N.A.', '& Co',
  'Morgan', 'Goldman', 'Stanley', 'Citigroup', 'Barclays', 'BofA', 'Ziegler',
  'Jefferies', 'Stifel', 'Raymond James', 'Wells Fargo', 'Piper Sandler',
  'Siebert', 'Ramirez', 'Loop', 'RBC', 'UBS', 'Truist', 'KeyBanc',
];

// Whole-word match, so "Bank" does not fire on "Bankruptcy"
const FIRM_KEYWORD_PATTERNS = FIRM_KEYWORDS.map(
  keyword => new RegExp(`(?<![A-Za-z])${keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}(?![A-Za-z])`, 'i')
);

// A capitalized word: "Morgan", "J.P.", "RBC", "O'Connor", "Fifth"
const WORD = String.raw`(?:[A-Z][A-Za-z0-9.'’-]*|&)`;
// Runs of capitalized words, allowing "of" between them ("Bank of America")
// and a trailing ", LLC" / ", Inc." style suffix.
const ORG_PATTERN = new RegExp(
  String.raw`${WORD}(?:\s+(?:of\s+)?${WORD})*(?:,\s*(?:LLC|L\.L\.C\.|Inc\.|Incorporated|LLP|N\.A\.))?`,
  'g'
);

// The segment ends at a parenthetical, at a period that starts a new sentence,
// or at the end of the page. Periods inside names ("J.P.", "& Co.") do not end it.
const SENTENCE_START = String.raw`(?:The|This|Each|Such|Under|Pursuant|In|If|See|Its|Their)\b`;
const PURCHASED_BY = new RegExp(
  String.raw`are\s+being\s+purchased\s+(?:from\s+[^,]{1,80}?\s+)?by\s+([\s\S]{1,600}?)(?:\(|\.\s+(?=${SENTENCE_START})|$)`,
  'gi'
);
const DEFINED_TERM = /([^()]{1,600}?)\(\s*(?:collectively,?\s+)?(?:each,?\s+an?\s+["“”]?\s*(?:Underwriter|Purchaser)\s*["“”]?\s+and\s+)?(?:the\s+)?["“”]\s*(?:Underwriters?|Purchasers?|Representatives?)\s*["“”]\s*\)/gi;

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Check if a candidate looks like a firm rather than a defined term
 */
export function isLikelyFirm(name: string): boolean {
  const cleaned = name.trim();
  if (cleaned.length < 3) return false;
  if (EXCLUDED_NAMES.has(cleaned.toLowerCase())) return false;
  if (/\d{4,}/.test(cleaned)) return false;  // "Series 2024A"

  return FIRM_KEYWORD_PATTERNS.some(pattern => pattern.test(cleaned));
}

function cleanCandidate(raw: string): string {
  return raw
    .replace(/^(?:and|&)\s+/i, '')
    .replace(/^The\s+(?=(?:Bonds|Notes|Series)\b)/, '')
    .replace(/[,;:]+$/, '')
    .trim();
}

/**
 * Organization names in a text segment, in order of appearance
 */
export function findOrganizationNames(segment: string): string[] {
  const names: string[] = [];
  for (const match of normalizeWhitespace(segment).matchAll(ORG_PATTERN)) {
    const candidate = cleanCandidate(match[0]);
    if (isLikelyFirm(candidate)) {
      names.push(candidate);
    }
  }
  return names;
}

function syndicateSegments(text: string): string[] {
  const segments: Array<{ index: number; text: string }> = [];

  for (const match of text.matchAll(PURCHASED_BY)) {
    segments.push({ index: match.index ?? 0, text: match[1] });
  }

  for (const match of text.matchAll(DEFINED_TERM)) {
    // Only the part after the last "by" names the firms
    const before = match[1];
    const byIndex = before.search(/\bby\s+(?![\s\S]*\bby\s)/i);
    segments.push({
      index: match.index ?? 0,
      text: byIndex >= 0 ? before.slice(byIndex + 2) : before,
    });
  }

  return segments.sort((a, b) => a.index - b.index).map(s => s.text);
}

export function extractParties(pages: readonly string[]): ExtractedParties {
  const seen = new Set<string>();
  const all: string[] = [];

  for (const page of pages) {
    if (!page) continue;
    for (const segment of syndicateSegments(page)) {
      for (const name of findOrganizationNames(segment)) {
        if (seen.has(name)) continue;
        seen.add(name);
        all.push(name);
      }
    }
  }

  return {
    underwriter_lead_left: all.length > 0 ? all[0] : null,
    underwriter_all: all,
  };
}

/**
 * Map extracted names to canonical names where the registry knows them
 */
export function standardizeParties(parties: ExtractedParties, resolver: NameResolver): ExtractedParties {
  const all: string[] = [];
  for (const name of parties.underwriter_all) {
    const canonical = resolver.resolveName(name) ?? name;
    if (!all.includes(canonical)) all.push(canonical);
  }
  return {
    underwriter_lead_left: all.length > 0 ? all[0] : null,
    underwriter_all: all,
  };
}
