/**
 * @sourcer/db
 * Database client and repositories for the sourcing pipeline
 */

// Supabase client
export {
  getSupabase,
  isSupabaseConfigured,
  resetSupabase,
} from "./supabase.js";

// Types
export * from "./types.js";

// Repositories
export { cacheRepo, sessionRepo } from "./repositories/index.js";
