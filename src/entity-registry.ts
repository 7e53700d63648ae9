/**
 * Entity Registry
 *
 * Canonical organizations (underwriters, municipal advisors, law firms) with
 * their known name variations and website domains, plus the two resolution
 * indexes derived from them:
 * - variant name → canonical name
 * - normalized domain → canonical name
 *
 * Seed data lives in data/entities.json so it can be extended without
 * touching the lookup logic.
 */

import fs from 'fs';
import { z } from 'zod';
import { RegistryConflictError, RegistryDataError } from './errors.js';
import type {
  Entity,
  EntityCategory,
  EntitySeed,
  RegistrationResult,
  RegistryConflict,
} from './types.js';

interface ResolutionIndex {
  readonly entities: ReadonlyMap<string, Entity>;
  readonly names: ReadonlyMap<string, string>;
  readonly domains: ReadonlyMap<string, string>;
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Reduce a URL to its lower-cased host: no scheme, no leading "www.",
 * no port, path, query or fragment.
 *
 * "HTTPS://www.PiperSandler.com/about?x=1" → "pipersandler.com"
 */
export function normalizeDomain(url: string | null | undefined): string | null {
  if (!url) return null;

  const host = url
    .trim()
    .toLowerCase()
    .replace(SCHEME_PATTERN, '')
    .replace(/^www\./, '')
    .split(/[/?#]/)[0]
    .replace(/:\d*$/, '')
    .replace(/\.+$/, '');

  return host.length > 0 ? host : null;
}

export function looksLikeUrl(raw: string): boolean {
  const value = raw.trimStart();
  return SCHEME_PATTERN.test(value) || /^www\./i.test(value);
}

export interface RegisterOptions {
  category?: EntityCategory;
  // Throw instead of skipping keys owned by another entity
  strict?: boolean;
}

export class EntityRegistry {
  private index: ResolutionIndex = {
    entities: new Map(),
    names: new Map(),
    domains: new Map(),
  };

  constructor(private readonly strict = false) {}

  /**
   * Add or replace an entity.
   *
   * Re-registering a canonical name replaces its variants and websites and
   * purges index entries it no longer lists. A variant or domain already
   * owned by a different entity is a conflict: it stays with its owner and is
   * reported (or thrown, in strict mode, leaving the registry untouched).
   */
  register(
    canonicalName: string,
    nameVariations: readonly string[],
    websiteUrls: readonly string[],
    options: RegisterOptions = {}
  ): RegistrationResult {
    const canonical = canonicalName.trim();
    if (!canonical) {
      throw new RegistryDataError('register', ['canonical name must not be empty']);
    }

    const variants = new Set<string>([canonical]);
    for (const name of nameVariations) {
      const cleaned = name.trim();
      if (cleaned) variants.add(cleaned);
    }

    const websites = new Set<string>();
    for (const url of websiteUrls) {
      const domain = normalizeDomain(url);
      if (domain) websites.add(domain);
    }

    const current = this.index;
    const conflicts: RegistryConflict[] = [];

    for (const name of variants) {
      const owner = current.names.get(name);
      if (owner !== undefined && owner !== canonical) {
        conflicts.push({ kind: 'name', key: name, owner, rejected: canonical });
      }
    }
    for (const domain of websites) {
      const owner = current.domains.get(domain);
      if (owner !== undefined && owner !== canonical) {
        conflicts.push({ kind: 'website', key: domain, owner, rejected: canonical });
      }
    }

    const strict = options.strict ?? this.strict;
    if (strict && conflicts.length > 0) {
      throw new RegistryConflictError(canonical, conflicts);
    }

    const rejectedNames = new Set(conflicts.filter(c => c.kind === 'name').map(c => c.key));
    const rejectedDomains = new Set(conflicts.filter(c => c.kind === 'website').map(c => c.key));

    const previous = current.entities.get(canonical);
    const entity: Entity = {
      canonicalName: canonical,
      category: options.category ?? previous?.category ?? null,
      nameVariations: new Set([...variants].filter(n => !rejectedNames.has(n))),
      websites: new Set([...websites].filter(d => !rejectedDomains.has(d))),
    };

    // Build the next snapshot, then swap it in whole
    const entities = new Map(current.entities);
    const names = new Map(current.names);
    const domains = new Map(current.domains);

    if (previous) {
      for (const name of previous.nameVariations) {
        if (names.get(name) === canonical) names.delete(name);
      }
      for (const domain of previous.websites) {
        if (domains.get(domain) === canonical) domains.delete(domain);
      }
    }

    entities.set(canonical, entity);
    for (const name of entity.nameVariations) names.set(name, canonical);
    for (const domain of entity.websites) domains.set(domain, canonical);

    this.index = { entities, names, domains };

    return { entity, replaced: previous !== undefined, conflicts };
  }

  get(canonicalName: string): Entity | null {
    return this.index.entities.get(canonicalName) ?? null;
  }

  has(canonicalName: string): boolean {
    return this.index.entities.has(canonicalName);
  }

  entities(): Entity[] {
    return [...this.index.entities.values()];
  }

  get size(): number {
    return this.index.entities.size;
  }

  canonicalForName(name: string): string | null {
    return this.index.names.get(name) ?? null;
  }

  canonicalForDomain(domain: string): string | null {
    return this.index.domains.get(domain) ?? null;
  }
}

// ============================================================
// SEED LOADING
// ============================================================

const entitySeedSchema = z.object({
  canonicalName: z.string().min(1),
  category: z.enum(['underwriter', 'municipal_advisor', 'law_firm']).optional(),
  nameVariations: z.array(z.string()),
  websites: z.array(z.string()),
});

const registryFileSchema = z.object({
  entities: z.array(entitySeedSchema),
});

export interface LoadedRegistry {
  registry: EntityRegistry;
  conflicts: RegistryConflict[];
}

export function createRegistry(seeds: readonly EntitySeed[], options: { strict?: boolean } = {}): LoadedRegistry {
  const registry = new EntityRegistry(options.strict ?? false);
  const conflicts: RegistryConflict[] = [];

  for (const seed of seeds) {
    const result = registry.register(seed.canonicalName, seed.nameVariations, seed.websites, {
      category: seed.category,
    });
    conflicts.push(...result.conflicts);
  }

  return { registry, conflicts };
}

export function parseRegistryData(data: unknown, source: string): EntitySeed[] {
  const parsed = registryFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new RegistryDataError(
      source,
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data.entities;
}

/**
 * Load the registry from a JSON seed file ({ "entities": [...] })
 */
export function loadRegistry(filePath: string, options: { strict?: boolean } = {}): LoadedRegistry {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new RegistryDataError(filePath, [e instanceof Error ? e.message : String(e)]);
  }
  return createRegistry(parseRegistryData(data, filePath), options);
}
