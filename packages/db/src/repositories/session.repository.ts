/**
 * Session Repository
 * CRUD operations for the search_sessions table
 */

import { DatabaseError } from "@sourcer/core";
import { getSupabase } from "../supabase.js";
import {
  SearchSessionRowSchema,
  Tables,
  type SearchSessionInsert,
  type SearchSessionRow,
  type SearchSessionUpdate,
  type SessionListOptions,
} from "../types.js";
import { parseRow, parseRows } from "./rows.js";

const TABLE = Tables.SEARCH_SESSIONS;

export async function create(row: SearchSessionInsert): Promise<SearchSessionRow> {
  const supabase = getSupabase();
  const { data, error } = await supabase
    .from(TABLE)
    .insert(row)
    .select()
    .single();

  if (error) {
    throw new DatabaseError(`[SessionRepo] Create error: ${error.message}`, TABLE, "create", error);
  }

  return parseRow(SearchSessionRowSchema, data, TABLE, "create");
}

export async function get(sessionId: string): Promise<SearchSessionRow | null> {
  const supabase = getSupabase();
  const { data, error } = await supabase
    .from(TABLE)
    .select()
    .eq("session_id", sessionId)
    .maybeSingle();

  if (error) {
    throw new DatabaseError(`[SessionRepo] Get error: ${error.message}`, TABLE, "get", error);
  }

  return data === null ? null : parseRow(SearchSessionRowSchema, data, TABLE, "get");
}

/**
 * Compare-and-set update on the version column.
 * Returns false when another writer bumped the version first.
 */
export async function update(
  sessionId: string,
  data: SearchSessionUpdate,
  expectedVersion: number
): Promise<boolean> {
  const supabase = getSupabase();
  const { data: rows, error } = await supabase
    .from(TABLE)
    .update(data)
    .eq("session_id", sessionId)
    .eq("version", expectedVersion)
    .select("session_id");

  if (error) {
    throw new DatabaseError(`[SessionRepo] Update error: ${error.message}`, TABLE, "update", error);
  }

  return Array.isArray(rows) && rows.length > 0;
}

export async function remove(sessionId: string): Promise<boolean> {
  const supabase = getSupabase();
  const { error, count } = await supabase
    .from(TABLE)
    .delete({ count: "exact" })
    .eq("session_id", sessionId);

  if (error) {
    throw new DatabaseError(`[SessionRepo] Delete error: ${error.message}`, TABLE, "delete", error);
  }

  return (count ?? 0) > 0;
}

export async function list(options: SessionListOptions = {}): Promise<SearchSessionRow[]> {
  const supabase = getSupabase();
  let query = supabase
    .from(TABLE)
    .select()
    .order("created_at", { ascending: false })
    .limit(options.limit ?? 50);

  if (options.activeOnly) {
    query = query.not("stage", "in", "(completed,failed)");
  }

  const { data, error } = await query;

  if (error) {
    throw new DatabaseError(`[SessionRepo] List error: ${error.message}`, TABLE, "list", error);
  }

  return parseRows(SearchSessionRowSchema, data, TABLE, "list");
}

/**
 * Retention sweep: delete sessions whose expires_at has passed
 */
export async function deleteExpired(now: string): Promise<number> {
  const supabase = getSupabase();
  const { error, count } = await supabase
    .from(TABLE)
    .delete({ count: "exact" })
    .lt("expires_at", now);

  if (error) {
    throw new DatabaseError(`[SessionRepo] Expire error: ${error.message}`, TABLE, "expire", error);
  }

  return count ?? 0;
}

export const sessionRepo = {
  create,
  get,
  update,
  remove,
  list,
  deleteExpired,
};
