/**
 * Resolution Tiers
 * Each tier either returns a match with its confidence or null.
 * The resolver runs them in order and keeps the first match.
 */

import type { EntityMatch, ResolutionMethod, ResolutionTier } from "../types.js";
import { normalizeForExactMatch, normalizeWebsite } from "./normalize.js";
import { nameSimilarity } from "./similarity.js";

export const EXACT_WEBSITE_CONFIDENCE = 1.0;
export const EXACT_NAME_CONFIDENCE = 0.95;

/**
 * Organization search provider consumed by the resolver
 */
export interface OrganizationSearchProvider {
  findByWebsite(domain: string): Promise<EntityMatch[]>;
  searchByName(name: string): Promise<EntityMatch[]>;
}

export interface TierMatch {
  canonicalId: string;
  confidence: number;
  matchedName: string;
  method: Exclude<ResolutionMethod, "unresolved">;
}

/**
 * Per-resolution inputs shared by every tier
 */
export interface ResolutionContext {
  name: string;
  /** Normalized host, null when no usable website was given */
  domain: string | null;
  threshold: number;
  provider: OrganizationSearchProvider;
  /** Name search shared by the name tiers; only a successful result is reused */
  searchByName(): Promise<EntityMatch[]>;
}

export interface Tier {
  tier: ResolutionTier;
  label: string;
  run(context: ResolutionContext): Promise<TierMatch | null>;
}

export function createResolutionContext(
  provider: OrganizationSearchProvider,
  name: string,
  website: string | undefined,
  threshold: number
): ResolutionContext {
  let results: EntityMatch[] | undefined;

  return {
    name,
    domain: normalizeWebsite(website),
    threshold,
    provider,
    async searchByName() {
      if (results) return results;
      const found = await provider.searchByName(name);
      results = found;
      return found;
    },
  };
}

// ============ Tier 1: exact website ============

export const exactWebsiteTier: Tier = {
  tier: 1,
  label: "exact_website",
  async run({ domain, provider }) {
    if (!domain) return null;

    const matches = await provider.findByWebsite(domain);
    const match = matches.find(
      (m) => m.website === undefined || normalizeWebsite(m.website) === domain
    );
    if (!match) return null;

    return {
      canonicalId: match.id,
      confidence: EXACT_WEBSITE_CONFIDENCE,
      matchedName: match.name,
      method: "exact_website",
    };
  },
};

// ============ Tier 2: exact name ============

export const exactNameTier: Tier = {
  tier: 2,
  label: "exact_name",
  async run(context) {
    const target = normalizeForExactMatch(context.name);
    const matches = await context.searchByName();
    const match = matches.find((m) => normalizeForExactMatch(m.name) === target);
    if (!match) return null;

    return {
      canonicalId: match.id,
      confidence: EXACT_NAME_CONFIDENCE,
      matchedName: match.name,
      method: "exact_name",
    };
  },
};

// ============ Tier 3: fuzzy name ============

export const fuzzyNameTier: Tier = {
  tier: 3,
  label: "fuzzy_name",
  async run(context) {
    const matches = await context.searchByName();

    let best: { match: EntityMatch; score: number } | null = null;
    for (const match of matches) {
      const score = nameSimilarity(context.name, match.name);
      if (!best || score > best.score) {
        best = { match, score };
      }
    }

    if (!best || best.score < context.threshold) return null;

    return {
      canonicalId: best.match.id,
      confidence: best.score,
      matchedName: best.match.name,
      method: "fuzzy_name",
    };
  },
};

export const DEFAULT_TIERS: readonly Tier[] = [exactWebsiteTier, exactNameTier, fuzzyNameTier];
