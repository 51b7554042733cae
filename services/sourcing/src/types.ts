/**
 * Sourcing Domain Types
 * Provider-neutral shapes shared by the cache, resolver, session store and pipeline
 */

import { z } from "zod";

// ============================================================
// ORGANIZATIONS
// ============================================================

export const RESOLUTION_METHODS = ["exact_website", "exact_name", "fuzzy_name", "unresolved"] as const;
export type ResolutionMethod = (typeof RESOLUTION_METHODS)[number];

export const ResolvedEntitySchema = z.object({
  queryName: z.string(),
  website: z.string().optional(),
  canonicalId: z.string().nullable(),
  confidence: z.number().min(0).max(1),
  tier: z.union([z.literal(1), z.literal(2), z.literal(3)]).nullable(),
  method: z.enum(RESOLUTION_METHODS),
  matchedName: z.string().optional(),
  needsManualResolution: z.boolean(),
});

/**
 * Outcome of resolving one loosely specified organization.
 * Unresolved inputs are kept with `canonicalId: null` and `confidence: 0`.
 */
export type ResolvedEntity = z.infer<typeof ResolvedEntitySchema>;
export type ResolutionTier = 1 | 2 | 3;

/** A search hit from the organization search provider */
export interface EntityMatch {
  id: string;
  name: string;
  website?: string;
}

export const OrganizationRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  website: z.string().optional(),
  industry: z.string().optional(),
  sizeRange: z.string().optional(),
  employeeCount: z.number().optional(),
  foundedYear: z.number().optional(),
  country: z.string().optional(),
  description: z.string().optional(),
});

export type OrganizationRecord = z.infer<typeof OrganizationRecordSchema>;

// ============================================================
// CANDIDATES
// ============================================================

export const ExperienceEntrySchema = z.object({
  organizationId: z.string().optional(),
  organizationName: z.string().optional(),
  title: z.string().optional(),
  startYear: z.number().optional(),
  endYear: z.number().optional(),
  current: z.boolean(),
});

export type ExperienceEntry = z.infer<typeof ExperienceEntrySchema>;

export const CandidateProfileSchema = z.object({
  id: z.string(),
  fullName: z.string().optional(),
  headline: z.string().optional(),
  location: z.string().optional(),
  title: z.string().optional(),
  managementLevel: z.string().optional(),
  totalExperienceMonths: z.number().optional(),
  skills: z.array(z.string()),
  experience: z.array(ExperienceEntrySchema),
});

/** Full (metered) candidate record */
export type CandidateProfile = z.infer<typeof CandidateProfileSchema>;

export const CandidatePreviewSchema = z.object({
  id: z.string(),
  fullName: z.string().optional(),
  headline: z.string().optional(),
  title: z.string().optional(),
  organizationId: z.string().optional(),
  location: z.string().optional(),
});

/** Free preview record */
export type CandidatePreview = z.infer<typeof CandidatePreviewSchema>;

export const CandidatePreviewListSchema = z.array(CandidatePreviewSchema);

export type RecordSource = "cache" | "fresh";

export interface CandidateRecord {
  id: string;
  profile: CandidateProfile;
  cacheAgeDays: number;
  source: RecordSource;
  /** Served from cache past the fresh window */
  stale: boolean;
  /** Organizations enriched for this record */
  organizations: OrganizationRecord[];
}

// ============================================================
// CREDITS
// ============================================================

/**
 * Per-run counters, derived only from cache hit/miss decisions
 */
export interface CreditLedger {
  /** Paid candidate fetches */
  fetched: number;
  /** Candidates served from cache */
  cached: number;
  /** Candidates not attempted (cancellation) */
  skipped: number;
  enrichmentFetched: number;
  enrichmentCached: number;
}

export const CreditLedgerSchema = z.object({
  fetched: z.number().int().min(0),
  cached: z.number().int().min(0),
  skipped: z.number().int().min(0),
  enrichmentFetched: z.number().int().min(0),
  enrichmentCached: z.number().int().min(0),
});

export function emptyLedger(): CreditLedger {
  return { fetched: 0, cached: 0, skipped: 0, enrichmentFetched: 0, enrichmentCached: 0 };
}

export function addLedgers(a: CreditLedger, b: CreditLedger): CreditLedger {
  return {
    fetched: a.fetched + b.fetched,
    cached: a.cached + b.cached,
    skipped: a.skipped + b.skipped,
    enrichmentFetched: a.enrichmentFetched + b.enrichmentFetched,
    enrichmentCached: a.enrichmentCached + b.enrichmentCached,
  };
}
