/**
 * Session Backends
 * Row-level persistence for session state: Supabase, or memory for tests
 * and credential-less runs.
 */

import {
  sessionRepo,
  type SearchSessionRow,
  type SearchSessionUpdate,
  type SessionListOptions,
} from "@sourcer/db";

export interface SessionBackend {
  insert(row: SearchSessionRow): Promise<void>;
  get(sessionId: string): Promise<SearchSessionRow | null>;
  /** Compare-and-set on `version`; false when the stored version moved on */
  update(sessionId: string, data: SearchSessionUpdate, expectedVersion: number): Promise<boolean>;
  remove(sessionId: string): Promise<boolean>;
  list(options: SessionListOptions): Promise<SearchSessionRow[]>;
  deleteExpired(now: Date): Promise<number>;
}

// ============ Supabase ============

export class SupabaseSessionBackend implements SessionBackend {
  async insert(row: SearchSessionRow): Promise<void> {
    await sessionRepo.create(row);
  }

  get(sessionId: string): Promise<SearchSessionRow | null> {
    return sessionRepo.get(sessionId);
  }

  update(sessionId: string, data: SearchSessionUpdate, expectedVersion: number): Promise<boolean> {
    return sessionRepo.update(sessionId, data, expectedVersion);
  }

  remove(sessionId: string): Promise<boolean> {
    return sessionRepo.remove(sessionId);
  }

  list(options: SessionListOptions): Promise<SearchSessionRow[]> {
    return sessionRepo.list(options);
  }

  deleteExpired(now: Date): Promise<number> {
    return sessionRepo.deleteExpired(now.toISOString());
  }
}

// ============ Memory ============

export class MemorySessionBackend implements SessionBackend {
  private readonly rows = new Map<string, SearchSessionRow>();

  async insert(row: SearchSessionRow): Promise<void> {
    if (this.rows.has(row.session_id)) {
      throw new Error(`Session ${row.session_id} already exists`);
    }
    this.rows.set(row.session_id, structuredClone(row));
  }

  async get(sessionId: string): Promise<SearchSessionRow | null> {
    const row = this.rows.get(sessionId);
    return row ? structuredClone(row) : null;
  }

  async update(sessionId: string, data: SearchSessionUpdate, expectedVersion: number): Promise<boolean> {
    const row = this.rows.get(sessionId);
    if (!row || row.version !== expectedVersion) return false;
    this.rows.set(sessionId, structuredClone({ ...row, ...data }));
    return true;
  }

  async remove(sessionId: string): Promise<boolean> {
    return this.rows.delete(sessionId);
  }

  async list(options: SessionListOptions): Promise<SearchSessionRow[]> {
    return [...this.rows.values()]
      .filter((row) => !options.activeOnly || (row.stage !== "completed" && row.stage !== "failed"))
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .slice(0, options.limit ?? 50)
      .map((row) => structuredClone(row));
  }

  async deleteExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const [id, row] of this.rows) {
      if (row.expires_at && new Date(row.expires_at) < now) {
        this.rows.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /** Overwrite a stored row as-is, bypassing every check (tests) */
  putRaw(row: SearchSessionRow): void {
    this.rows.set(row.session_id, structuredClone(row));
  }
}
