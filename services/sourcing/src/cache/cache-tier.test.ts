import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { CacheTier } from "./cache-tier.js";
import { MemoryCacheBackend } from "./backends.js";
import type { CacheBackend, CacheEntry } from "./types.js";

const NOW = new Date("2026-01-15T00:00:00.000Z");
const DAY_MS = 24 * 60 * 60 * 1000;
const CANDIDATE_POLICY = { freshDays: 3, staleDays: 90 };

const PayloadSchema = z.object({ name: z.string() });
type Payload = z.infer<typeof PayloadSchema>;

function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY_MS);
}

function entry(key: string, payload: unknown, fetchedDaysAgo: number): CacheEntry<unknown> {
  return { key, payload, fetchedAt: daysAgo(fetchedDaysAgo), accessCount: 0, lastAccessedAt: null };
}

function makeTier(backend: CacheBackend): CacheTier<Payload> {
  return new CacheTier<Payload>("candidates", backend, CANDIDATE_POLICY, {
    schema: PayloadSchema,
    now: () => NOW,
  });
}

class UnreachableBackend implements CacheBackend {
  async read(): Promise<CacheEntry<unknown> | null> {
    throw new Error("connection refused");
  }
  async write(): Promise<void> {
    throw new Error("connection refused");
  }
  async touch(): Promise<void> {
    throw new Error("connection refused");
  }
  async sweep(): Promise<number> {
    throw new Error("connection refused");
  }
}

describe("CacheTier", () => {
  it("reuses an entry inside the fresh window without an external call", async () => {
    const backend = new MemoryCacheBackend();
    await backend.write("candidates", entry("c-1", { name: "Dana" }, 2));
    const tier = makeTier(backend);
    const fetchFresh = vi.fn(async (): Promise<Payload> => ({ name: "fetched" }));

    const lookup = await tier.get("c-1");
    const payload = lookup.status === "miss" ? await fetchFresh() : lookup.payload;

    expect(lookup).toEqual({ status: "fresh", payload: { name: "Dana" }, ageDays: 2 });
    expect(payload).toEqual({ name: "Dana" });
    expect(fetchFresh).not.toHaveBeenCalled();
  });

  it("reports stale entries between the two thresholds", async () => {
    const backend = new MemoryCacheBackend();
    await backend.write("candidates", entry("c-1", { name: "Dana" }, 10));
    const tier = makeTier(backend);

    const lookup = await tier.get("c-1");

    expect(lookup).toEqual({ status: "stale", payload: { name: "Dana" }, ageDays: 10 });
    expect(tier.stats().staleHits).toBe(1);
  });

  it("forces a miss past the stale threshold", async () => {
    const backend = new MemoryCacheBackend();
    await backend.write("candidates", entry("c-1", { name: "Dana" }, 100));
    const tier = makeTier(backend);

    expect(await tier.get("c-1")).toEqual({ status: "miss", reason: "expired" });
  });

  it("applies a caller-supplied policy per lookup", async () => {
    const backend = new MemoryCacheBackend();
    await backend.write("candidates", entry("c-1", { name: "Dana" }, 10));
    const tier = makeTier(backend);

    expect(await tier.get("c-1", { freshDays: 7, staleDays: 7 })).toEqual({
      status: "miss",
      reason: "expired",
    });
  });

  it("misses on absent keys", async () => {
    const tier = makeTier(new MemoryCacheBackend());

    expect(await tier.get("nobody")).toEqual({ status: "miss", reason: "absent" });
    expect(tier.stats().misses).toBe(1);
  });

  it("counts every hit on the stored entry", async () => {
    const backend = new MemoryCacheBackend();
    await backend.write("candidates", entry("c-1", { name: "Dana" }, 1));
    const tier = makeTier(backend);

    await tier.get("c-1");
    await tier.get("c-1");

    expect(backend.peek("candidates", "c-1")).toMatchObject({
      accessCount: 2,
      lastAccessedAt: NOW,
    });
    expect(tier.stats().hits).toBe(2);
  });

  it("writes through to the backend", async () => {
    const backend = new MemoryCacheBackend();
    const tier = makeTier(backend);

    await tier.set("c-2", { name: "Robin" });

    expect(backend.peek("candidates", "c-2")).toMatchObject({
      payload: { name: "Robin" },
      fetchedAt: NOW,
      accessCount: 0,
    });
    expect(await tier.get("c-2")).toEqual({ status: "fresh", payload: { name: "Robin" }, ageDays: 0 });
  });

  it("degrades a backend outage to a miss and a memory-only write", async () => {
    const tier = makeTier(new UnreachableBackend());

    expect(await tier.get("c-1")).toEqual({ status: "miss", reason: "unavailable" });

    await expect(tier.set("c-1", { name: "Dana" })).resolves.toBeUndefined();
    expect(await tier.get("c-1")).toEqual({ status: "fresh", payload: { name: "Dana" }, ageDays: 0 });
    // read, write, touch
    expect(tier.stats().failures).toBe(3);
  });

  it("treats an unreadable stored payload as absent", async () => {
    const backend = new MemoryCacheBackend();
    await backend.write("candidates", entry("c-1", { full_name: 42 }, 1));
    const tier = makeTier(backend);

    expect(await tier.get("c-1")).toEqual({ status: "miss", reason: "absent" });
  });

  it("sweeps entries past the stale window", async () => {
    const backend = new MemoryCacheBackend();
    await backend.write("candidates", entry("old", { name: "A" }, 120));
    await backend.write("candidates", entry("new", { name: "B" }, 5));
    await backend.write("organizations", entry("old", { name: "C" }, 120));
    const tier = makeTier(backend);

    expect(await tier.sweep()).toBe(1);
    expect(backend.peek("candidates", "old")).toBeUndefined();
    expect(backend.peek("candidates", "new")).toBeDefined();
    expect(backend.peek("organizations", "old")).toBeDefined();
  });
});
