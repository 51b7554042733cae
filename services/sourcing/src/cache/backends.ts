/**
 * Cache Backends
 * Supabase-backed persistence and an in-memory stand-in
 */

import { cacheRepo, type CacheEntryRow } from "@sourcer/db";
import type { CacheBackend, CacheEntry } from "./types.js";

// ============ Supabase ============

function fromRow(row: CacheEntryRow): CacheEntry<unknown> {
  return {
    key: row.key,
    payload: row.payload,
    fetchedAt: new Date(row.fetched_at),
    accessCount: row.access_count,
    lastAccessedAt: row.last_accessed_at ? new Date(row.last_accessed_at) : null,
  };
}

export class SupabaseCacheBackend implements CacheBackend {
  async read(namespace: string, key: string): Promise<CacheEntry<unknown> | null> {
    const row = await cacheRepo.get(namespace, key);
    return row ? fromRow(row) : null;
  }

  async write(namespace: string, entry: CacheEntry<unknown>): Promise<void> {
    await cacheRepo.upsert({
      namespace,
      key: entry.key,
      payload: entry.payload,
      fetched_at: entry.fetchedAt.toISOString(),
      access_count: entry.accessCount,
      last_accessed_at: entry.lastAccessedAt?.toISOString() ?? null,
    });
  }

  async touch(namespace: string, key: string, accessCount: number, lastAccessedAt: Date): Promise<void> {
    await cacheRepo.touch(namespace, key, accessCount, lastAccessedAt.toISOString());
  }

  async sweep(namespace: string, cutoff: Date): Promise<number> {
    return cacheRepo.deleteFetchedBefore(namespace, cutoff.toISOString());
  }
}

// ============ Memory ============

export class MemoryCacheBackend implements CacheBackend {
  private readonly entries = new Map<string, CacheEntry<unknown>>();

  private static id(namespace: string, key: string): string {
    return `${namespace}:${key}`;
  }

  async read(namespace: string, key: string): Promise<CacheEntry<unknown> | null> {
    const entry = this.entries.get(MemoryCacheBackend.id(namespace, key));
    return entry ? { ...entry } : null;
  }

  async write(namespace: string, entry: CacheEntry<unknown>): Promise<void> {
    this.entries.set(MemoryCacheBackend.id(namespace, entry.key), { ...entry });
  }

  async touch(namespace: string, key: string, accessCount: number, lastAccessedAt: Date): Promise<void> {
    const entry = this.entries.get(MemoryCacheBackend.id(namespace, key));
    if (entry) {
      entry.accessCount = accessCount;
      entry.lastAccessedAt = lastAccessedAt;
    }
  }

  async sweep(namespace: string, cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (id.startsWith(`${namespace}:`) && entry.fetchedAt < cutoff) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /** Raw view of a stored entry (tests) */
  peek(namespace: string, key: string): CacheEntry<unknown> | undefined {
    return this.entries.get(MemoryCacheBackend.id(namespace, key));
  }
}
