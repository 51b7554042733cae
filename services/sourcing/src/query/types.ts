/**
 * Query Builder Types
 */

import type { EsNode } from "@sourcer/coresignal";
import type { ResolvedEntity } from "../types.js";

export const SEARCH_STRATEGIES = ["strict", "balanced", "broad"] as const;
export type SearchStrategy = (typeof SEARCH_STRATEGIES)[number];

export function isSearchStrategy(value: string): value is SearchStrategy {
  return SEARCH_STRATEGIES.some((s) => s === value);
}

export type FilterKind = "organization" | "department" | "role" | "location" | "seniority";

export interface QueryClause {
  filter: FilterKind;
  /** Provider search DSL for this clause alone */
  node: EsNode;
  /** One-line human description */
  summary: string;
}

/**
 * Structured query: every clause is tagged with the filter it came from,
 * and placed either in `required` (eliminates) or `boosts` (ranks).
 */
export interface StructuredQuery {
  strategy: SearchStrategy;
  required: QueryClause[];
  boosts: QueryClause[];
}

/**
 * Filters that are never optional
 */
export interface RequiredFilters {
  organizations: readonly ResolvedEntity[];
  /** Hard filter once supplied */
  department?: string;
}

/**
 * Filters whose placement depends on the strategy
 */
export interface OptionalFilters {
  roles?: readonly string[];
  location?: string;
  seniority?: string;
}

/** Filter set stored with a session and replayed at preview time */
export interface SearchFilters extends OptionalFilters {
  department?: string;
}
