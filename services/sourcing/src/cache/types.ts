/**
 * Cache Types
 */

export interface CacheEntry<T> {
  key: string;
  payload: T;
  fetchedAt: Date;
  accessCount: number;
  lastAccessedAt: Date | null;
}

export type CacheMissReason = "absent" | "expired" | "unavailable";

/**
 * Result of a cache read. Callers branch on `status`:
 * fresh reuse, stale reuse at the caller's discretion, or fetch on miss.
 */
export type CacheLookup<T> =
  | { status: "fresh"; payload: T; ageDays: number }
  | { status: "stale"; payload: T; ageDays: number }
  | { status: "miss"; reason: CacheMissReason };

/**
 * Persisted layer behind the in-process map. Implementations may throw;
 * the cache tier turns every failure into a miss.
 */
export interface CacheBackend {
  read(namespace: string, key: string): Promise<CacheEntry<unknown> | null>;
  write(namespace: string, entry: CacheEntry<unknown>): Promise<void>;
  touch(namespace: string, key: string, accessCount: number, lastAccessedAt: Date): Promise<void>;
  /** Delete entries fetched before `cutoff`; returns how many went */
  sweep(namespace: string, cutoff: Date): Promise<number>;
}

export interface CacheStats {
  hits: number;
  staleHits: number;
  misses: number;
  writes: number;
  failures: number;
}

/** Cache namespaces, one per entity class */
export const CacheNamespaces = {
  CANDIDATES: "candidates",
  ORGANIZATIONS: "organizations",
  ORGANIZATION_LOOKUPS: "organization_lookups",
  PREVIEWS: "previews",
} as const;

export type CacheNamespace = (typeof CacheNamespaces)[keyof typeof CacheNamespaces];
