/**
 * Name Resolver - maps raw scraped names and URLs to canonical entity names
 *
 * Lookups are exact matches on the cleaned key. An unresolvable identifier
 * returns null; the caller decides how to surface it.
 */

import { EntityRegistry, looksLikeUrl, normalizeDomain } from './entity-registry.js';
import type { Entity } from './types.js';

// TLDs dropped when deriving a display name from a bare domain
const COMMON_TLDS = /\.(com|org|net|edu|gov|co\.uk|io)$/;

export class NameResolver {
  constructor(private readonly registry: EntityRegistry) {}

  /**
   * Resolve a raw name. URL-looking input goes to the domain index only,
   * so "www.gs.com" never matches a name variant spelled the same way.
   */
  resolveName(raw: string | null | undefined): string | null {
    if (!raw || !raw.trim()) return null;

    if (looksLikeUrl(raw)) {
      return this.resolveWebsite(raw);
    }

    return this.registry.canonicalForName(raw.trim());
  }

  resolveWebsite(rawUrl: string | null | undefined): string | null {
    const domain = normalizeDomain(rawUrl);
    if (!domain) return null;
    return this.registry.canonicalForDomain(domain);
  }

  /**
   * Full entity for a name or website (website tried first)
   */
  lookupEntity(identifier: string | null | undefined): Entity | null {
    const canonical = this.resolveWebsite(identifier) ?? this.resolveName(identifier);
    return canonical ? this.registry.get(canonical) : null;
  }

  /**
   * Display name guessed from a domain, e.g. "https://acme-capital.com/team"
   * → "Acme Capital". Only used to annotate unresolved entries.
   */
  suggestNameFromWebsite(rawUrl: string | null | undefined): string | null {
    const domain = normalizeDomain(rawUrl);
    if (!domain) return null;

    const label = domain.replace(COMMON_TLDS, '').split('.')[0];
    if (!label) return null;

    return label
      .replace(/[-_]+/g, ' ')
      .trim()
      .split(/\s+/)
      .map(word => word.charAt(0).toUpperCase() + word.slice(1))
      .join(' ');
  }
}
