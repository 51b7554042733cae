/**
 * Cache Repository
 * Read/write operations for the cache_entries table
 */

import { DatabaseError } from "@sourcer/core";
import { getSupabase } from "../supabase.js";
import {
  CacheEntryRowSchema,
  Tables,
  type CacheEntryRow,
  type CacheEntryUpsert,
} from "../types.js";
import { parseRow } from "./rows.js";

const TABLE = Tables.CACHE_ENTRIES;

export async function get(namespace: string, key: string): Promise<CacheEntryRow | null> {
  const supabase = getSupabase();
  const { data, error } = await supabase
    .from(TABLE)
    .select()
    .eq("namespace", namespace)
    .eq("key", key)
    .maybeSingle();

  if (error) {
    throw new DatabaseError(`[CacheRepo] Get error: ${error.message}`, TABLE, "get", error);
  }

  return data === null ? null : parseRow(CacheEntryRowSchema, data, TABLE, "get");
}

export async function upsert(entry: CacheEntryUpsert): Promise<void> {
  const supabase = getSupabase();
  const { error } = await supabase
    .from(TABLE)
    .upsert(
      {
        access_count: 0,
        last_accessed_at: null,
        ...entry,
      },
      { onConflict: "namespace,key" }
    );

  if (error) {
    throw new DatabaseError(`[CacheRepo] Upsert error: ${error.message}`, TABLE, "upsert", error);
  }
}

/**
 * Record a read: bump access_count and last_accessed_at
 */
export async function touch(
  namespace: string,
  key: string,
  accessCount: number,
  lastAccessedAt: string
): Promise<void> {
  const supabase = getSupabase();
  const { error } = await supabase
    .from(TABLE)
    .update({ access_count: accessCount, last_accessed_at: lastAccessedAt })
    .eq("namespace", namespace)
    .eq("key", key);

  if (error) {
    throw new DatabaseError(`[CacheRepo] Touch error: ${error.message}`, TABLE, "touch", error);
  }
}

/**
 * TTL sweep: delete entries fetched before the cutoff
 */
export async function deleteFetchedBefore(namespace: string, cutoff: string): Promise<number> {
  const supabase = getSupabase();
  const { error, count } = await supabase
    .from(TABLE)
    .delete({ count: "exact" })
    .eq("namespace", namespace)
    .lt("fetched_at", cutoff);

  if (error) {
    throw new DatabaseError(`[CacheRepo] Sweep error: ${error.message}`, TABLE, "sweep", error);
  }

  return count ?? 0;
}

export const cacheRepo = {
  get,
  upsert,
  touch,
  deleteFetchedBefore,
};
