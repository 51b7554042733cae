export { CacheTier, ageInDays, type CacheTierOptions } from "./cache-tier.js";
export { SupabaseCacheBackend, MemoryCacheBackend } from "./backends.js";
export {
  CacheNamespaces,
  type CacheNamespace,
  type CacheBackend,
  type CacheEntry,
  type CacheLookup,
  type CacheMissReason,
  type CacheStats,
} from "./types.js";
