/**
 * Pipeline Settings
 * Tunables for the sourcing pipeline, validated from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "@sourcer/core";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const settingsEnvSchema = z.object({
  SOURCING_CONCURRENCY: positiveInt(5),
  SOURCING_PREVIEW_CAP: positiveInt(100),
  SOURCING_CANDIDATE_ID_CAP: positiveInt(1000),
  SOURCING_ORGANIZATION_LIMIT: positiveInt(25),
  SOURCING_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),

  CACHE_CANDIDATE_FRESH_DAYS: positiveInt(3),
  CACHE_CANDIDATE_STALE_DAYS: positiveInt(90),
  CACHE_ORGANIZATION_DAYS: positiveInt(30),
  CACHE_LOOKUP_DAYS: positiveInt(30),
  CACHE_PREVIEW_DAYS: positiveInt(7),

  RESOLVER_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  RESOLVER_TIER_TIMEOUT_MS: positiveInt(10_000),

  ENRICHMENT_MIN_START_YEAR: z.coerce.number().int().default(2020),
  SESSION_RETENTION_DAYS: positiveInt(90),
});

/**
 * Two freshness thresholds: within `freshDays` an entry is reused as-is,
 * within `staleDays` the caller may still accept it, beyond that it is a miss.
 */
export interface FreshnessPolicy {
  freshDays: number;
  staleDays: number;
}

export interface PipelineSettings {
  concurrency: number;
  previewCap: number;
  candidateIdCap: number;
  organizationLimit: number;
  retryBackoffMs: number;

  freshness: {
    candidate: FreshnessPolicy;
    organization: FreshnessPolicy;
    organizationLookup: FreshnessPolicy;
    preview: FreshnessPolicy;
  };

  resolver: {
    threshold: number;
    tierTimeoutMs: number;
  };

  enrichmentMinStartYear: number;
  sessionRetentionDays: number;
}

/**
 * Load and validate pipeline settings
 */
export function loadPipelineSettings(source: NodeJS.ProcessEnv = process.env): PipelineSettings {
  const parseResult = settingsEnvSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Pipeline settings validation failed:\n${errors}`);
  }

  const env = parseResult.data;

  if (env.CACHE_CANDIDATE_STALE_DAYS < env.CACHE_CANDIDATE_FRESH_DAYS) {
    throw new ConfigError("CACHE_CANDIDATE_STALE_DAYS must not be shorter than CACHE_CANDIDATE_FRESH_DAYS", {
      freshDays: env.CACHE_CANDIDATE_FRESH_DAYS,
      staleDays: env.CACHE_CANDIDATE_STALE_DAYS,
    });
  }

  return {
    concurrency: env.SOURCING_CONCURRENCY,
    previewCap: env.SOURCING_PREVIEW_CAP,
    candidateIdCap: env.SOURCING_CANDIDATE_ID_CAP,
    organizationLimit: env.SOURCING_ORGANIZATION_LIMIT,
    retryBackoffMs: env.SOURCING_RETRY_BACKOFF_MS,

    // Single-threshold classes use the same value twice: no stale grace
    freshness: {
      candidate: {
        freshDays: env.CACHE_CANDIDATE_FRESH_DAYS,
        staleDays: env.CACHE_CANDIDATE_STALE_DAYS,
      },
      organization: { freshDays: env.CACHE_ORGANIZATION_DAYS, staleDays: env.CACHE_ORGANIZATION_DAYS },
      organizationLookup: { freshDays: env.CACHE_LOOKUP_DAYS, staleDays: env.CACHE_LOOKUP_DAYS },
      preview: { freshDays: env.CACHE_PREVIEW_DAYS, staleDays: env.CACHE_PREVIEW_DAYS },
    },

    resolver: {
      threshold: env.RESOLVER_THRESHOLD,
      tierTimeoutMs: env.RESOLVER_TIER_TIMEOUT_MS,
    },

    enrichmentMinStartYear: env.ENRICHMENT_MIN_START_YEAR,
    sessionRetentionDays: env.SESSION_RETENTION_DAYS,
  };
}

let settingsInstance: PipelineSettings | null = null;

/**
 * Get pipeline settings (cached)
 */
export function getPipelineSettings(): PipelineSettings {
  if (!settingsInstance) {
    settingsInstance = loadPipelineSettings();
  }
  return settingsInstance;
}

/**
 * Reset settings (for testing)
 */
export function resetPipelineSettings(): void {
  settingsInstance = null;
}
