/**
 * Database Types
 * Row shapes for the cache and session tables
 */

import { z } from "zod";

// ============================================================
// TABLE NAMES
// ============================================================

export const Tables = {
  CACHE_ENTRIES: "cache_entries",
  SEARCH_SESSIONS: "search_sessions",
} as const;

export type TableName = (typeof Tables)[keyof typeof Tables];

// ============================================================
// ROW SCHEMAS (what you get from database)
// ============================================================

export const CacheEntryRowSchema = z.object({
  namespace: z.string(),
  key: z.string(),
  payload: z.unknown(),
  fetched_at: z.string(),
  access_count: z.number().int().nonnegative(),
  last_accessed_at: z.string().nullable(),
});

export type CacheEntryRow = z.infer<typeof CacheEntryRowSchema>;

export const SESSION_STAGES = [
  "discovery",
  "preview",
  "collection",
  "evaluation",
  "completed",
  "failed",
] as const;

export type SessionStage = (typeof SESSION_STAGES)[number];

export const SearchSessionRowSchema = z.object({
  session_id: z.string(),
  stage: z.enum(SESSION_STAGES),
  discovered_entities: z.array(z.unknown()),
  candidate_ids: z.array(z.string()),
  pagination_offset: z.number().int(),
  stage_metadata: z.record(z.unknown()),
  version: z.number().int().nonnegative(),
  created_at: z.string(),
  updated_at: z.string(),
  expires_at: z.string().nullable(),
});

export type SearchSessionRow = z.infer<typeof SearchSessionRowSchema>;

// ============================================================
// INSERT / UPDATE TYPES
// ============================================================

export interface CacheEntryUpsert {
  namespace: string;
  key: string;
  payload: unknown;
  fetched_at: string;
  access_count?: number;
  last_accessed_at?: string | null;
}

export type SearchSessionInsert = SearchSessionRow;

export type SearchSessionUpdate = Omit<SearchSessionRow, "session_id" | "created_at">;

export interface SessionListOptions {
  limit?: number;
  activeOnly?: boolean;
}
