/**
 * Cache Tier
 *
 * Three layers, consulted in order:
 *   1. in-process memory map
 *   2. persisted backend (Supabase, or memory in tests)
 *   3. the caller's fresh fetch, on a miss
 *
 * A backend outage never reaches the caller: reads degrade to a miss,
 * writes degrade to memory only. Both are logged as CacheUnavailableError.
 */

import { CacheUnavailableError, logger, type ChildLogger } from "@sourcer/core";
import type { FreshnessPolicy } from "../config.js";
import type { CacheBackend, CacheEntry, CacheLookup, CacheStats } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CacheTierOptions<T> {
  /** Validates payloads coming back from the backend */
  schema: { parse: (data: unknown) => T };
  now?: () => Date;
}

export function ageInDays(fetchedAt: Date, now: Date): number {
  return Math.max(0, (now.getTime() - fetchedAt.getTime()) / DAY_MS);
}

export class CacheTier<T> {
  private readonly memory = new Map<string, CacheEntry<T>>();
  private readonly counters: CacheStats = { hits: 0, staleHits: 0, misses: 0, writes: 0, failures: 0 };
  private readonly log: ChildLogger;
  private readonly schema: { parse: (data: unknown) => T };
  private readonly now: () => Date;

  constructor(
    readonly namespace: string,
    private readonly backend: CacheBackend,
    private readonly policy: FreshnessPolicy,
    options: CacheTierOptions<T>
  ) {
    this.log = logger.child({ component: "cache", namespace });
    this.schema = options.schema;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Look up `key`. Every hit (fresh or stale) bumps the access counters.
   */
  async get(key: string, policy: FreshnessPolicy = this.policy): Promise<CacheLookup<T>> {
    let entry = this.memory.get(key);

    if (!entry) {
      let stored: CacheEntry<unknown> | null;
      try {
        stored = await this.backend.read(this.namespace, key);
      } catch (error) {
        this.reportUnavailable("read", error);
        this.counters.misses++;
        return { status: "miss", reason: "unavailable" };
      }

      if (stored) {
        entry = this.decode(stored);
        if (entry) this.memory.set(key, entry);
      }
    }

    if (!entry) {
      this.counters.misses++;
      return { status: "miss", reason: "absent" };
    }

    const now = this.now();
    const ageDays = ageInDays(entry.fetchedAt, now);

    if (ageDays >= policy.staleDays) {
      this.counters.misses++;
      return { status: "miss", reason: "expired" };
    }

    await this.recordAccess(entry, now);

    if (ageDays < policy.freshDays) {
      this.counters.hits++;
      return { status: "fresh", payload: entry.payload, ageDays };
    }

    this.counters.staleHits++;
    return { status: "stale", payload: entry.payload, ageDays };
  }

  /**
   * Store a freshly fetched payload. Last write wins.
   */
  async set(key: string, payload: T): Promise<void> {
    const entry: CacheEntry<T> = {
      key,
      payload,
      fetchedAt: this.now(),
      accessCount: 0,
      lastAccessedAt: null,
    };

    this.memory.set(key, entry);
    this.counters.writes++;

    try {
      await this.backend.write(this.namespace, entry);
    } catch (error) {
      this.reportUnavailable("write", error);
    }
  }

  /**
   * TTL sweep: drop entries past the stale window from both layers
   */
  async sweep(): Promise<number> {
    const cutoff = new Date(this.now().getTime() - this.policy.staleDays * DAY_MS);

    for (const [key, entry] of this.memory) {
      if (entry.fetchedAt < cutoff) this.memory.delete(key);
    }

    try {
      return await this.backend.sweep(this.namespace, cutoff);
    } catch (error) {
      this.reportUnavailable("sweep", error);
      return 0;
    }
  }

  stats(): CacheStats {
    return { ...this.counters };
  }

  private decode(stored: CacheEntry<unknown>): CacheEntry<T> | undefined {
    try {
      return { ...stored, payload: this.schema.parse(stored.payload) };
    } catch (error) {
      this.log.warn("Discarding unreadable cache entry", {
        key: stored.key,
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private async recordAccess(entry: CacheEntry<T>, now: Date): Promise<void> {
    entry.accessCount++;
    entry.lastAccessedAt = now;

    try {
      await this.backend.touch(this.namespace, entry.key, entry.accessCount, now);
    } catch (error) {
      this.reportUnavailable("touch", error);
    }
  }

  private reportUnavailable(operation: string, cause: unknown): void {
    this.counters.failures++;
    const error = new CacheUnavailableError(this.namespace, operation, cause);
    this.log.warn(error.message, {
      operation,
      cause: cause instanceof Error ? cause.message : String(cause),
    });
  }
}
