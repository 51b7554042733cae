/**
 * Enrichment Policy
 * Decides which experience entries are worth a paid organization fetch
 */

import type { ExperienceEntry } from "../types.js";

export type EnrichmentPolicy = (entry: ExperienceEntry) => boolean;

/**
 * Enrich organizations of roles that started in or after `minStartYear`.
 * A role without a known start year is enriched.
 */
export function recentExperiencePolicy(minStartYear: number): EnrichmentPolicy {
  return (entry) =>
    entry.organizationId !== undefined &&
    (entry.startYear === undefined || entry.startYear >= minStartYear);
}

/**
 * Distinct organization ids the policy accepts, in experience order
 */
export function organizationsToEnrich(
  experience: readonly ExperienceEntry[],
  policy: EnrichmentPolicy
): string[] {
  const ids = new Set<string>();
  for (const entry of experience) {
    if (entry.organizationId && policy(entry)) {
      ids.add(entry.organizationId);
    }
  }
  return [...ids];
}
