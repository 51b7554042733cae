import { describe, it, expect } from "vitest";
import {
  ExternalFetchError,
  InvalidPaginationRequestError,
  InvalidStageTransitionError,
} from "@sourcer/core";
import {
  FakeCandidateProvider,
  FakeScorer,
  TEST_NOW,
  candidateIds,
  createTestPipeline,
  profileFor,
  type TestPipeline,
} from "../testing/fakes.js";
import type { ResolvedEntity } from "../types.js";
import { mergeEntities } from "./pipeline.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const SEEDS = [{ name: "Acme", website: "acme.com" }, { name: "Qwxzy Corp" }];

async function startedSession(t: TestPipeline, bypassCache = false): Promise<string> {
  const run = await t.pipeline.start({ seeds: SEEDS, filters: { roles: ["ML Engineer"] }, bypassCache });
  return run.sessionId;
}

describe("SourcingPipeline", () => {
  describe("start", () => {
    it("keeps unresolved seeds and appends every matching id", async () => {
      const t = createTestPipeline();

      const run = await t.pipeline.start({ seeds: SEEDS, filters: { roles: ["ML Engineer"] } });

      expect(run.entities.map((e) => [e.queryName, e.canonicalId, e.confidence])).toEqual([
        ["Acme", "1001", 1],
        ["Qwxzy Corp", null, 0],
      ]);
      expect(run.preview).toMatchObject({ status: "ok", totalIds: 120, previews: [], fromCache: false });

      const session = await t.store.read(run.sessionId);
      expect(session.stage).toBe("collection");
      expect(session.candidateIds).toEqual(candidateIds(120));
      expect(session.discoveredEntities).toHaveLength(2);
      expect(session.paginationOffset).toBe(0);
    });

    it("fails the session when the id search keeps failing, without throwing", async () => {
      const candidates = new FakeCandidateProvider(candidateIds(10));
      candidates.searchError = new ExternalFetchError("search down");
      const t = createTestPipeline({ candidates });

      const run = await t.pipeline.start({ seeds: SEEDS });

      expect(run.preview).toEqual({
        status: "failed",
        error: { code: "EXTERNAL_FETCH_FAILURE", message: "search down" },
      });
      expect(candidates.searchCalls).toBe(2);
      const session = await t.store.read(run.sessionId);
      expect(session.stage).toBe("failed");
      expect(session.stageMetadata.failure).toMatchObject({ stage: "preview", code: "EXTERNAL_FETCH_FAILURE" });
    });

    it("fails the preview when no organization resolved", async () => {
      const t = createTestPipeline();

      const run = await t.pipeline.start({ seeds: [{ name: "Qwxzy Corp" }] });

      expect(run.preview).toEqual({
        status: "failed",
        error: { code: "VALIDATION_ERROR", message: "At least one organization is required to build a query" },
      });
      expect(t.candidates.searchCalls).toBe(0);
    });

    it("moves on to collection when only the preview records fail", async () => {
      const candidates = new FakeCandidateProvider(candidateIds(10));
      candidates.previewError = new ExternalFetchError("preview down");
      const t = createTestPipeline({ candidates });

      const run = await t.pipeline.start({ seeds: SEEDS });

      expect(run.preview).toMatchObject({
        status: "ok",
        totalIds: 10,
        previews: [],
        fromCache: false,
        previewError: { code: "EXTERNAL_FETCH_FAILURE", message: "preview down" },
      });
      expect(candidates.searchCalls).toBe(1);
      expect(candidates.previewCalls).toBe(2);
      const session = await t.store.read(run.sessionId);
      expect(session.stage).toBe("collection");
      expect(session.candidateIds).toEqual(candidateIds(10));
      expect(session.stageMetadata.preview).toMatchObject({
        totalIds: 10,
        previewIds: [],
        error: { code: "EXTERNAL_FETCH_FAILURE", message: "preview down" },
      });
    });
  });

  describe("collect", () => {
    it("returns a partial trailing page", async () => {
      const t = createTestPipeline();
      const sessionId = await startedSession(t);

      const result = await t.pipeline.collect(sessionId, { startIndex: 100, count: 50 });

      expect(result.records.map((r) => r.id)).toEqual(candidateIds(120).slice(100));
      expect(result.nextOffset).toBe(120);
      expect(result.remaining).toBe(0);
      expect(result.summary).toBe("20 of 20 collected, 0 failed");
    });

    it("rejects a window that starts past the known ids and leaves the session alone", async () => {
      const t = createTestPipeline();
      const sessionId = await startedSession(t);

      await expect(t.pipeline.collect(sessionId, { startIndex: 150, count: 50 })).rejects.toBeInstanceOf(
        InvalidPaginationRequestError
      );
      await expect(t.pipeline.collect(sessionId, { startIndex: 0, count: 0 })).rejects.toBeInstanceOf(
        InvalidPaginationRequestError
      );
      expect((await t.store.read(sessionId)).stage).toBe("collection");
    });

    it("visits every id exactly once when following the returned offset", async () => {
      const t = createTestPipeline();
      const sessionId = await startedSession(t);
      const seen: string[] = [];

      for (;;) {
        const result = await t.pipeline.collect(sessionId, { count: 50 });
        seen.push(...result.records.map((r) => r.id));
        if (result.remaining === 0) break;
      }

      expect(seen).toEqual(candidateIds(120));
      expect([...t.candidates.fetched].sort()).toEqual([...candidateIds(120)].sort());
      expect((await t.store.read(sessionId)).paginationOffset).toBe(120);
    });

    it("returns records in id order whatever order the fetches settle in", async () => {
      const t = createTestPipeline({ settings: { concurrency: 5 } });
      const sessionId = await startedSession(t);
      t.candidates.delays.set("c1", 30);
      t.candidates.delays.set("c2", 15);

      const result = await t.pipeline.collect(sessionId, { startIndex: 0, count: 5 });

      expect(result.records.map((r) => r.id)).toEqual(["c1", "c2", "c3", "c4", "c5"]);
    });

    it("retries a failed fetch once, then reports the item", async () => {
      const t = createTestPipeline();
      const sessionId = await startedSession(t);
      t.candidates.failures.set("c3", 1);
      t.candidates.failures.set("c4", 2);

      const result = await t.pipeline.collect(sessionId, { startIndex: 0, count: 5 });

      expect(result.records.map((r) => r.id)).toEqual(["c1", "c2", "c3", "c5"]);
      expect(result.failures).toEqual([
        { id: "c4", index: 3, code: "EXTERNAL_FETCH_FAILURE", message: "provider unavailable for c4" },
      ]);
      expect(result.summary).toBe("4 of 5 collected, 1 failed");
      expect(result.ledger.fetched).toBe(4);
      expect(t.candidates.fetched.filter((id) => id === "c4")).toHaveLength(2);
    });

    it("clears a failed id once a later request collects it", async () => {
      const t = createTestPipeline();
      const sessionId = await startedSession(t);
      t.candidates.failures.set("c4", 2);

      await t.pipeline.collect(sessionId, { startIndex: 0, count: 5 });
      await t.pipeline.collect(sessionId, { startIndex: 3, count: 1 });

      const session = await t.store.read(sessionId);
      expect(session.stageMetadata.collection).toEqual({
        collectedIds: ["c1", "c2", "c3", "c5", "c4"],
        failedIds: [],
        ledger: { fetched: 5, cached: 0, skipped: 0, enrichmentFetched: 0, enrichmentCached: 0 },
        requests: 2,
      });
      expect(session.paginationOffset).toBe(5);
    });

    it("stops between batches when cancelled", async () => {
      const t = createTestPipeline({ settings: { concurrency: 2 } });
      const sessionId = await startedSession(t);
      const controller = new AbortController();
      t.candidates.onFetch = (id) => {
        if (id === "c1") controller.abort();
      };

      const result = await t.pipeline.collect(sessionId, { startIndex: 0, count: 6, signal: controller.signal });

      expect(result.cancelled).toBe(true);
      expect(result.records.map((r) => r.id)).toEqual(["c1", "c2"]);
      expect(result.ledger.skipped).toBe(4);
      expect(result.nextOffset).toBe(2);
      expect(result.summary).toBe("2 of 6 collected, 0 failed, 4 skipped (cancelled)");
      expect((await t.store.read(sessionId)).paginationOffset).toBe(2);
    });

    it("serves fresh cache entries without a paid fetch", async () => {
      const t = createTestPipeline();
      const sessionId = await startedSession(t);
      for (const id of ["c1", "c2", "c3"]) {
        await t.caches.candidates.set(id, profileFor(id, { headline: "cached" }));
      }

      const result = await t.pipeline.collect(sessionId, { startIndex: 0, count: 3 });

      expect(t.candidates.fetched).toEqual([]);
      expect(result.ledger).toEqual({ fetched: 0, cached: 3, skipped: 0, enrichmentFetched: 0, enrichmentCached: 0 });
      expect(result.records[0]).toMatchObject({ source: "cache", stale: false, cacheAgeDays: 0 });
      expect(result.records[0].profile.headline).toBe("cached");
    });

    it("serves stale entries and flags them", async () => {
      const t = createTestPipeline();
      const sessionId = await startedSession(t);
      await t.cacheBackend.write("candidates", {
        key: "c1",
        payload: profileFor("c1"),
        fetchedAt: new Date(TEST_NOW.getTime() - 10 * DAY_MS),
        accessCount: 0,
        lastAccessedAt: null,
      });

      const result = await t.pipeline.collect(sessionId, { startIndex: 0, count: 1 });

      expect(result.records[0]).toMatchObject({ source: "cache", stale: true, cacheAgeDays: 10 });
      expect(t.candidates.fetched).toEqual([]);
    });

    it("fetches through the cache when the run bypasses it", async () => {
      const t = createTestPipeline();
      await t.caches.candidates.set("c1", profileFor("c1"));
      const sessionId = await startedSession(t, true);

      const result = await t.pipeline.collect(sessionId, { startIndex: 0, count: 1 });

      expect(t.candidates.fetched).toEqual(["c1"]);
      expect(result.records[0].source).toBe("fresh");
    });

    it("enriches only recent or undated roles and reuses cached organizations", async () => {
      const t = createTestPipeline();
      const sessionId = await startedSession(t);
      t.candidates.profiles.set(
        "c1",
        profileFor("c1", {
          experience: [
            { organizationId: "A", startYear: 2022, current: true },
            { organizationId: "B", startYear: 2015, endYear: 2019, current: false },
            { organizationId: "C", current: false },
          ],
        })
      );
      t.candidates.profiles.set(
        "c2",
        profileFor("c2", { experience: [{ organizationId: "A", startYear: 2021, current: true }] })
      );

      const first = await t.pipeline.collect(sessionId, { startIndex: 0, count: 1 });
      const second = await t.pipeline.collect(sessionId, { startIndex: 1, count: 1 });

      expect(t.organizations.fetched).toEqual(["A", "C"]);
      expect(first.records[0].organizations.map((o) => o.id)).toEqual(["A", "C"]);
      expect(first.ledger.enrichmentFetched).toBe(2);
      expect(second.ledger).toMatchObject({ enrichmentFetched: 0, enrichmentCached: 1 });
    });

    it("refuses to collect before the preview stage finished", async () => {
      const t = createTestPipeline();
      await t.store.create("early", {
        stageMetadata: { run: { filters: {}, strategy: "balanced", bypassCache: false } },
      });

      await expect(t.pipeline.collect("early", { count: 10 })).rejects.toBeInstanceOf(InvalidStageTransitionError);
      expect((await t.store.read("early")).stage).toBe("discovery");
    });
  });

  describe("evaluate", () => {
    it("ranks collected candidates by score and completes the session", async () => {
      const scorer = new FakeScorer({
        c1: { score: 5, rationale: "Some gaps.", breakdown: {} },
        c2: { score: 9, rationale: "Excellent.", breakdown: {} },
        c3: { score: 7, rationale: "Good.", breakdown: {} },
      });
      const t = createTestPipeline({ scorer });
      const sessionId = await startedSession(t);
      await t.pipeline.collect(sessionId, { startIndex: 0, count: 3 });

      const result = await t.pipeline.evaluate(sessionId);

      expect(result.ranked.map((r) => [r.id, r.rank, r.score])).toEqual([
        ["c2", 1, 9],
        ["c3", 2, 7],
        ["c1", 3, 5],
      ]);
      expect(result.failures).toEqual([]);
      expect(result.ledger.cached).toBe(3);

      const session = await t.store.read(sessionId);
      expect(session.stage).toBe("completed");
      expect(session.stageMetadata.evaluation).toMatchObject({ failedIds: [] });
    });

    it("weights per-criterion scores with the rubric", async () => {
      const scorer = new FakeScorer({
        c1: { score: 6, rationale: "Mixed.", breakdown: { ml: 10, general_fit: 4 } },
      });
      const t = createTestPipeline({ scorer });
      const sessionId = await startedSession(t);
      await t.pipeline.collect(sessionId, { startIndex: 0, count: 1 });

      const result = await t.pipeline.evaluate(sessionId, {
        summary: "ML engineer",
        criteria: [{ id: "ml", text: "Production ML", weight: 50 }],
      });

      expect(result.ranked[0]).toMatchObject({ id: "c1", score: 7, overall: 6 });
    });

    it("reports a candidate the scorer keeps failing on", async () => {
      const t = createTestPipeline();
      const sessionId = await startedSession(t);
      await t.pipeline.collect(sessionId, { startIndex: 0, count: 3 });
      t.scorer.failing.add("c2");

      const result = await t.pipeline.evaluate(sessionId);

      expect(result.ranked.map((r) => r.id)).toEqual(["c1", "c3"]);
      expect(result.failures).toEqual([
        { id: "c2", index: 1, code: "EXTERNAL_FETCH_FAILURE", message: "scorer unavailable for c2" },
      ]);
      expect(t.scorer.scored.filter((id) => id === "c2")).toHaveLength(2);
    });

    it("cannot run twice", async () => {
      const t = createTestPipeline();
      const sessionId = await startedSession(t);
      await t.pipeline.collect(sessionId, { startIndex: 0, count: 1 });
      await t.pipeline.evaluate(sessionId);

      await expect(t.pipeline.evaluate(sessionId)).rejects.toBeInstanceOf(InvalidStageTransitionError);
    });
  });
});

describe("mergeEntities", () => {
  const entity = (queryName: string, canonicalId: string | null): ResolvedEntity => ({
    queryName,
    canonicalId,
    confidence: canonicalId ? 1 : 0,
    tier: canonicalId ? 1 : null,
    method: canonicalId ? "exact_website" : "unresolved",
    needsManualResolution: canonicalId === null,
  });

  it("replaces a re-resolved input and keeps the rest", () => {
    const merged = mergeEntities([entity("Acme", null), entity("Globex", "2002")], [entity("acme", "1001")]);

    expect(merged.map((e) => [e.queryName, e.canonicalId])).toEqual([
      ["acme", "1001"],
      ["Globex", "2002"],
    ]);
  });
});
