import { describe, it, expect, vi } from "vitest";
import { CacheTier, MemoryCacheBackend } from "../cache/index.js";
import { ResolvedEntitySchema, type EntityMatch, type ResolvedEntity } from "../types.js";
import { EntityResolver } from "./entity-resolver.js";
import type { OrganizationSearchProvider } from "./tiers.js";

const ACME: EntityMatch = { id: "1001", name: "Acme", website: "acme.com" };
const ACME_GLOBAL: EntityMatch = { id: "1002", name: "Acme Global", website: "acmeglobal.com" };

function makeProvider(overrides: Partial<OrganizationSearchProvider> = {}) {
  return {
    findByWebsite: vi.fn<OrganizationSearchProvider["findByWebsite"]>(
      overrides.findByWebsite ?? (async () => [])
    ),
    searchByName: vi.fn<OrganizationSearchProvider["searchByName"]>(
      overrides.searchByName ?? (async () => [])
    ),
  };
}

function makeResolver(provider: OrganizationSearchProvider, cache?: CacheTier<ResolvedEntity>) {
  return new EntityResolver(provider, {
    threshold: 0.85,
    tierTimeoutMs: 50,
    concurrency: 2,
    cache,
  });
}

function makeLookupCache(): CacheTier<ResolvedEntity> {
  return new CacheTier<ResolvedEntity>(
    "organization_lookups",
    new MemoryCacheBackend(),
    { freshDays: 30, staleDays: 30 },
    { schema: ResolvedEntitySchema }
  );
}

describe("EntityResolver", () => {
  it("resolves by website at tier 1 without a name search", async () => {
    const provider = makeProvider({ findByWebsite: async () => [ACME] });
    const resolver = makeResolver(provider);

    const entity = await resolver.resolve("Acme", "https://www.acme.com/");

    expect(entity).toEqual({
      queryName: "Acme",
      website: "https://www.acme.com/",
      canonicalId: "1001",
      confidence: 1.0,
      tier: 1,
      method: "exact_website",
      matchedName: "Acme",
      needsManualResolution: false,
    });
    expect(provider.findByWebsite).toHaveBeenCalledWith("acme.com");
    expect(provider.searchByName).not.toHaveBeenCalled();
  });

  it("falls to the fuzzy tier when no exact name matches", async () => {
    const provider = makeProvider({ searchByName: async () => [ACME, ACME_GLOBAL] });
    const resolver = makeResolver(provider);

    const entity = await resolver.resolve("Acme Inc");

    expect(entity).toMatchObject({ canonicalId: "1001", tier: 3, confidence: 0.9, method: "fuzzy_name" });
    // tiers 2 and 3 share one search
    expect(provider.searchByName).toHaveBeenCalledTimes(1);
    expect(provider.findByWebsite).not.toHaveBeenCalled();
  });

  it("accepts a case and whitespace insensitive exact name at tier 2", async () => {
    const provider = makeProvider({ searchByName: async () => [ACME, ACME_GLOBAL] });
    const resolver = makeResolver(provider);

    const entity = await resolver.resolve("  acme   GLOBAL ");

    expect(entity).toMatchObject({ canonicalId: "1002", tier: 2, confidence: 0.95, method: "exact_name" });
  });

  it("keeps an unmatched organization with zero confidence", async () => {
    const resolver = makeResolver(makeProvider());

    const entity = await resolver.resolve("Qwxzy Corp");

    expect(entity).toEqual({
      queryName: "Qwxzy Corp",
      website: undefined,
      canonicalId: null,
      confidence: 0,
      tier: null,
      method: "unresolved",
      needsManualResolution: true,
    });
  });

  it("rejects fuzzy matches below the threshold", async () => {
    const provider = makeProvider({ searchByName: async () => [{ id: "7", name: "Initech" }] });
    const resolver = makeResolver(provider);

    const entity = await resolver.resolve("Initrode");

    expect(entity.canonicalId).toBeNull();
  });

  it("returns a blank name unresolved without calling any tier", async () => {
    const provider = makeProvider();
    const resolver = makeResolver(provider);

    const entity = await resolver.resolve("   ", "acme.com");

    expect(entity.needsManualResolution).toBe(true);
    expect(provider.findByWebsite).not.toHaveBeenCalled();
    expect(provider.searchByName).not.toHaveBeenCalled();
  });

  it("treats a timed-out tier as a failure and falls through", async () => {
    const provider = makeProvider({
      findByWebsite: () => new Promise<EntityMatch[]>(() => {}),
      searchByName: async () => [ACME],
    });
    const resolver = makeResolver(provider);

    const entity = await resolver.resolve("Acme", "acme.com");

    expect(entity).toMatchObject({ canonicalId: "1001", tier: 2, method: "exact_name" });
  });

  it("retries a failed name search in the fuzzy tier", async () => {
    const provider = makeProvider();
    provider.searchByName
      .mockRejectedValueOnce(new Error("upstream 503"))
      .mockResolvedValueOnce([ACME]);
    const resolver = makeResolver(provider);

    const entity = await resolver.resolve("Acme Inc");

    expect(entity).toMatchObject({ canonicalId: "1001", tier: 3 });
    expect(provider.searchByName).toHaveBeenCalledTimes(2);
  });

  it("never loses an input even when every lookup fails", async () => {
    const provider = makeProvider({
      findByWebsite: async () => {
        throw new Error("connection reset");
      },
      searchByName: async () => {
        throw new Error("connection reset");
      },
    });
    const resolver = makeResolver(provider);
    const seeds = [{ name: "Acme", website: "acme.com" }, { name: "" }, { name: "Globex" }];

    const entities = await resolver.resolveMany(seeds);

    expect(entities.map((e) => e.queryName)).toEqual(["Acme", "", "Globex"]);
    expect(entities.every((e) => e.canonicalId === null && e.confidence === 0)).toBe(true);
  });

  it("serves repeated lookups from the cache and leaves misses uncached", async () => {
    const cache = makeLookupCache();
    const provider = makeProvider({
      searchByName: async (name) => (name.startsWith("Acme") ? [ACME] : []),
    });
    const first = makeResolver(provider, cache);
    await first.resolveMany([{ name: "Acme" }, { name: "Qwxzy Corp" }]);
    expect(provider.searchByName).toHaveBeenCalledTimes(2);

    const second = makeResolver(provider, cache);
    const [acme, qwxzy] = await second.resolveMany([{ name: "Acme, Inc." }, { name: "Qwxzy Corp" }]);

    expect(acme).toMatchObject({ queryName: "Acme, Inc.", canonicalId: "1001", tier: 2 });
    expect(qwxzy.canonicalId).toBeNull();
    // only the miss went back to the provider
    expect(provider.searchByName).toHaveBeenCalledTimes(3);
  });

  it("skips the cache when asked to bypass it", async () => {
    const cache = makeLookupCache();
    const provider = makeProvider({ searchByName: async () => [ACME] });
    const resolver = makeResolver(provider, cache);

    await resolver.resolve("Acme");
    await resolver.resolve("Acme", undefined, { bypassCache: true });

    expect(provider.searchByName).toHaveBeenCalledTimes(2);
  });
});
