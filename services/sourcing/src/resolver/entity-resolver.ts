/**
 * Entity Resolver
 * Maps a loosely specified organization (name + optional website) to a
 * canonical provider id. Lookup failures never throw: an input nobody could
 * match comes back unresolved and flagged for manual handling.
 */

import pLimit from "p-limit";
import { logger, ResolutionMissError, withTimeout, type ChildLogger } from "@sourcer/core";
import type { CacheTier } from "../cache/index.js";
import type { ResolvedEntity } from "../types.js";
import { normalizeCompanyName, normalizeWebsite } from "./normalize.js";
import {
  DEFAULT_TIERS,
  createResolutionContext,
  type OrganizationSearchProvider,
  type Tier,
} from "./tiers.js";

export interface SeedOrganization {
  name: string;
  website?: string;
}

export interface EntityResolverOptions {
  threshold: number;
  tierTimeoutMs: number;
  concurrency: number;
  /** Organization-lookup cache; successful resolutions only */
  cache?: CacheTier<ResolvedEntity>;
  tiers?: readonly Tier[];
}

export interface ResolveOptions {
  threshold?: number;
  bypassCache?: boolean;
}

export function unresolvedEntity(name: string, website?: string): ResolvedEntity {
  return {
    queryName: name,
    website,
    canonicalId: null,
    confidence: 0,
    tier: null,
    method: "unresolved",
    needsManualResolution: true,
  };
}

/**
 * Lookup-cache key: normalized name, plus the host when one was given
 */
export function lookupKey(name: string, website?: string): string | null {
  const normalized = normalizeCompanyName(name);
  if (!normalized) return null;
  const domain = normalizeWebsite(website);
  return domain ? `${normalized}|${domain}` : normalized;
}

export class EntityResolver {
  private readonly log: ChildLogger;
  private readonly tiers: readonly Tier[];

  constructor(
    private readonly provider: OrganizationSearchProvider,
    private readonly options: EntityResolverOptions
  ) {
    this.log = logger.child({ component: "resolver" });
    this.tiers = options.tiers ?? DEFAULT_TIERS;
  }

  /**
   * Resolve one organization, stopping at the first tier that matches
   */
  async resolve(name: string, website?: string, options: ResolveOptions = {}): Promise<ResolvedEntity> {
    if (!name.trim()) {
      this.log.debug("Skipping blank organization name");
      return unresolvedEntity(name, website);
    }

    const key = lookupKey(name, website);
    const cache = options.bypassCache ? undefined : this.options.cache;

    if (cache && key) {
      const cached = await cache.get(key);
      if (cached.status !== "miss") {
        this.log.debug("Organization lookup served from cache", { name, key });
        return { ...cached.payload, queryName: name, website };
      }
    }

    const threshold = options.threshold ?? this.options.threshold;
    const context = createResolutionContext(this.provider, name, website, threshold);

    for (const tier of this.tiers) {
      try {
        const match = await withTimeout(
          tier.run(context),
          this.options.tierTimeoutMs,
          `Resolver tier ${tier.tier} (${tier.label})`
        );
        if (!match) continue;

        const resolved: ResolvedEntity = {
          queryName: name,
          website,
          canonicalId: match.canonicalId,
          confidence: match.confidence,
          tier: tier.tier,
          method: match.method,
          matchedName: match.matchedName,
          needsManualResolution: false,
        };

        this.log.info("Organization resolved", {
          name,
          canonicalId: match.canonicalId,
          tier: tier.tier,
          confidence: match.confidence,
        });

        // Only hits are cached: a miss is worth retrying next run
        if (this.options.cache && key) {
          await this.options.cache.set(key, resolved);
        }
        return resolved;
      } catch (error) {
        this.log.warn("Resolver tier failed, falling through", {
          name,
          tier: tier.tier,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const miss = new ResolutionMissError(name, { website });
    this.log.info(miss.message, { code: miss.code });
    return unresolvedEntity(name, website);
  }

  /**
   * Resolve many organizations with bounded parallelism.
   * Output has one entry per input, in input order.
   */
  async resolveMany(seeds: readonly SeedOrganization[], options: ResolveOptions = {}): Promise<ResolvedEntity[]> {
    const limit = pLimit(this.options.concurrency);

    return Promise.all(
      seeds.map((seed) => limit(() => this.resolve(seed.name, seed.website, options)))
    );
  }
}
