/**
 * Pipeline Wiring
 * Builds cache tiers, resolver and session store around the given backends and providers
 */

import { CacheNamespaces, CacheTier, type CacheBackend } from "../cache/index.js";
import type { PipelineSettings } from "../config.js";
import type { CandidateProvider, OrganizationProvider } from "../providers/index.js";
import { EntityResolver, type OrganizationSearchProvider } from "../resolver/index.js";
import type { CandidateScorer } from "../scoring/index.js";
import { SessionStore, type SessionBackend } from "../session/index.js";
import {
  CandidatePreviewListSchema,
  CandidateProfileSchema,
  OrganizationRecordSchema,
  ResolvedEntitySchema,
  type CandidatePreview,
  type CandidateProfile,
  type OrganizationRecord,
  type ResolvedEntity,
} from "../types.js";
import type { EnrichmentPolicy } from "./enrichment-policy.js";
import { SourcingPipeline, type PipelineCaches } from "./pipeline.js";

export interface PipelineWiring {
  settings: PipelineSettings;
  cacheBackend: CacheBackend;
  sessionBackend: SessionBackend;
  search: OrganizationSearchProvider;
  candidates: CandidateProvider;
  organizations: OrganizationProvider;
  scorer: CandidateScorer;
  enrichmentPolicy?: EnrichmentPolicy;
  /** Clock for cache ages and session timestamps */
  now?: () => Date;
}

export interface WiredPipeline {
  pipeline: SourcingPipeline;
  store: SessionStore;
  resolver: EntityResolver;
  caches: PipelineCaches & { organizationLookups: CacheTier<ResolvedEntity> };
}

export function createPipeline(wiring: PipelineWiring): WiredPipeline {
  const { settings, cacheBackend, now } = wiring;
  const { freshness } = settings;

  const caches = {
    candidates: new CacheTier<CandidateProfile>(CacheNamespaces.CANDIDATES, cacheBackend, freshness.candidate, {
      schema: CandidateProfileSchema,
      now,
    }),
    organizations: new CacheTier<OrganizationRecord>(
      CacheNamespaces.ORGANIZATIONS,
      cacheBackend,
      freshness.organization,
      { schema: OrganizationRecordSchema, now }
    ),
    previews: new CacheTier<CandidatePreview[]>(CacheNamespaces.PREVIEWS, cacheBackend, freshness.preview, {
      schema: CandidatePreviewListSchema,
      now,
    }),
    organizationLookups: new CacheTier<ResolvedEntity>(
      CacheNamespaces.ORGANIZATION_LOOKUPS,
      cacheBackend,
      freshness.organizationLookup,
      { schema: ResolvedEntitySchema, now }
    ),
  };

  const resolver = new EntityResolver(wiring.search, {
    threshold: settings.resolver.threshold,
    tierTimeoutMs: settings.resolver.tierTimeoutMs,
    concurrency: settings.concurrency,
    cache: caches.organizationLookups,
  });

  const store = new SessionStore(wiring.sessionBackend, {
    candidateIdCap: settings.candidateIdCap,
    retentionDays: settings.sessionRetentionDays,
    now,
  });

  const pipeline = new SourcingPipeline({
    store,
    resolver,
    candidates: wiring.candidates,
    organizations: wiring.organizations,
    scorer: wiring.scorer,
    caches,
    settings,
    enrichmentPolicy: wiring.enrichmentPolicy,
  });

  return { pipeline, store, resolver, caches };
}
