/**
 * Sourcing Pipeline - Stage Orchestrator
 * Drives one session through Discovery → Preview → Collection → Evaluation
 *
 * STAGES:
 * =======
 * discovery   resolve seed organizations (cache first), merge into the session
 * preview     build the query, fetch every matching id (free) and a capped
 *             set of preview records (free, cached), append the ids
 * collection  page through the ids on request: cache first, paid fetch on
 *             miss, enrichment of recent organizations; re-entered for
 *             every "collect more"
 * evaluation  score each collected record against the rubric, rank, complete
 *
 * Per-item failures are retried once and then reported in the stage result.
 * Session store errors abort; anything else unexpected marks the session
 * failed before it propagates.
 */

import { createHash } from "node:crypto";
import pLimit from "p-limit";
import {
  DatabaseError,
  InvalidPaginationRequestError,
  InvalidStageTransitionError,
  SessionNotFoundError,
  SessionStateCorruptionError,
  ValidationError,
  logger,
  withRetry,
  wrapError,
  type ChildLogger,
} from "@sourcer/core";
import type { CacheTier } from "../cache/index.js";
import type { PipelineSettings } from "../config.js";
import type { CandidateProvider, OrganizationProvider } from "../providers/index.js";
import { buildQuery, explainQuery, toSearchBody, type StructuredQuery } from "../query/index.js";
import type { EntityResolver, ResolveOptions, SeedOrganization } from "../resolver/index.js";
import { normalizeRubric, weightedScore, type CandidateScorer, type Requirements } from "../scoring/index.js";
import type { SessionStage, SessionState, SessionStore } from "../session/index.js";
import {
  addLedgers,
  emptyLedger,
  type CandidatePreview,
  type CandidateProfile,
  type CandidateRecord,
  type CreditLedger,
  type OrganizationRecord,
  type ResolvedEntity,
} from "../types.js";
import { organizationsToEnrich, recentExperiencePolicy, type EnrichmentPolicy } from "./enrichment-policy.js";
import {
  CollectionMetadataSchema,
  RunMetadataSchema,
  type CollectRequest,
  type CollectionMetadata,
  type CollectionResult,
  type EvaluationMetadata,
  type EvaluationResult,
  type ItemFailure,
  type PreviewResult,
  type RankedCandidate,
  type RunMetadata,
  type RunRequest,
  type RunResult,
} from "./types.js";

/** First try plus one retry */
const ITEM_ATTEMPTS = 2;

export interface PipelineCaches {
  candidates: CacheTier<CandidateProfile>;
  organizations: CacheTier<OrganizationRecord>;
  previews: CacheTier<CandidatePreview[]>;
}

export interface PipelineDependencies {
  store: SessionStore;
  resolver: EntityResolver;
  candidates: CandidateProvider;
  organizations: OrganizationProvider;
  scorer: CandidateScorer;
  caches: PipelineCaches;
  settings: PipelineSettings;
  /** Defaults to enriching roles started in or after `settings.enrichmentMinStartYear` */
  enrichmentPolicy?: EnrichmentPolicy;
}

interface CollectedItem {
  record: CandidateRecord;
  usage: CreditLedger;
}

/**
 * Errors that mean the session itself cannot be trusted or written
 */
function abortsRun(error: unknown): boolean {
  return (
    error instanceof SessionStateCorruptionError ||
    error instanceof DatabaseError ||
    error instanceof SessionNotFoundError
  );
}

/**
 * Caller mistakes: reported to the caller, the session is left as it was
 */
function isRequestError(error: unknown): boolean {
  return (
    error instanceof InvalidPaginationRequestError ||
    error instanceof InvalidStageTransitionError ||
    error instanceof ValidationError
  );
}

function describeError(error: unknown): { code: string; message: string } {
  const { code, message } = wrapError(error);
  return { code, message };
}

/**
 * Union that keeps first-seen order
 */
function mergeIds(existing: readonly string[], added: readonly string[]): string[] {
  return [...new Set([...existing, ...added])];
}

function entityKey(entity: ResolvedEntity): string {
  return `${entity.queryName.trim().toLowerCase()}|${entity.website ?? ""}`;
}

/**
 * Later resolutions of the same input replace earlier ones; everything else is kept
 */
export function mergeEntities(existing: readonly ResolvedEntity[], incoming: readonly ResolvedEntity[]): ResolvedEntity[] {
  const merged = new Map(existing.map((e) => [entityKey(e), e]));
  for (const entity of incoming) {
    merged.set(entityKey(entity), entity);
  }
  return [...merged.values()];
}

export function previewCacheKey(query: StructuredQuery, cap: number): string {
  const digest = createHash("sha256").update(JSON.stringify(toSearchBody(query))).digest("hex");
  return `${digest.slice(0, 32)}:${cap}`;
}

// ============================================================
// SOURCING PIPELINE CLASS
// ============================================================

export class SourcingPipeline {
  private readonly log: ChildLogger;
  private readonly enrichmentPolicy: EnrichmentPolicy;

  constructor(private readonly deps: PipelineDependencies) {
    this.log = logger.child({ component: "pipeline" });
    this.enrichmentPolicy =
      deps.enrichmentPolicy ?? recentExperiencePolicy(deps.settings.enrichmentMinStartYear);
  }

  /**
   * Run trigger: create the session, then run Discovery and Preview
   */
  async start(request: RunRequest): Promise<RunResult> {
    const run: RunMetadata = {
      filters: request.filters ?? {},
      strategy: request.strategy ?? "balanced",
      bypassCache: request.bypassCache ?? false,
      requirements: request.requirements,
    };

    const session = await this.deps.store.create(request.sessionId, { stageMetadata: { run } });
    this.log.info("Run started", {
      sessionId: session.sessionId,
      seeds: request.seeds.length,
      strategy: run.strategy,
      bypassCache: run.bypassCache,
    });

    const entities = await this.discover(session.sessionId, request.seeds);
    const preview = await this.preview(session.sessionId);

    return { sessionId: session.sessionId, entities, preview };
  }

  // ========================================================
  // DISCOVERY
  // ========================================================

  /**
   * Resolve every seed (one entity per seed, unresolved ones included)
   * and merge them into the session
   */
  async discover(sessionId: string, seeds: readonly SeedOrganization[]): Promise<ResolvedEntity[]> {
    return this.guard(sessionId, "discovery", async () => {
      const session = await this.requireStage(sessionId, "discovery");
      const run = this.runMetadata(session);
      const options: ResolveOptions = { bypassCache: run.bypassCache };

      const entities = await this.deps.resolver.resolveMany(seeds, options);
      const unresolved = entities.filter((e) => e.canonicalId === null);

      await this.deps.store.mergeUpdate(sessionId, (current) => ({
        stage: "preview",
        discoveredEntities: mergeEntities(current.discoveredEntities, entities),
        stageMetadata: {
          discovery: {
            total: entities.length,
            resolved: entities.length - unresolved.length,
            needsManualResolution: unresolved.map((e) => e.queryName),
          },
        },
      }));

      this.log.info("Discovery complete", {
        sessionId,
        resolved: entities.length - unresolved.length,
        unresolved: unresolved.length,
      });
      return entities;
    });
  }

  // ========================================================
  // PREVIEW
  // ========================================================

  /**
   * Build the query and fetch ids plus preview records. A query that cannot
   * be built or an id search that keeps failing fails the session; that
   * outcome is returned, not thrown. Preview records that cannot be fetched
   * leave `previews` empty and the session moves on to collection.
   */
  async preview(sessionId: string): Promise<PreviewResult> {
    return this.guard(sessionId, "preview", async () => {
      const session = await this.requireStage(sessionId, "preview");
      const run = this.runMetadata(session);
      const { settings } = this.deps;

      const organizations = session.discoveredEntities
        .filter((e) => e.canonicalId !== null)
        .sort((a, b) => b.confidence - a.confidence)
        .slice(0, settings.organizationLimit);

      let query: StructuredQuery;
      let ids: string[];
      try {
        const { department, ...optional } = run.filters;
        query = buildQuery({ organizations, department }, optional, run.strategy);
        this.log.debug("Preview query built", { sessionId, query: explainQuery(query) });

        ids = await this.withItemRetry("candidate id search", () =>
          this.deps.candidates.searchIds(query, settings.candidateIdCap)
        );
      } catch (error) {
        if (abortsRun(error)) throw error;
        await this.deps.store.fail(sessionId, error);
        return { status: "failed", error: describeError(error) };
      }

      // The ids are known from here on; preview records are an extra.
      let previews: CandidatePreview[] = [];
      let fromCache = false;
      let previewError: { code: string; message: string } | undefined;
      try {
        ({ previews, fromCache } = await this.loadPreviews(query, run.bypassCache));
      } catch (error) {
        if (abortsRun(error)) throw error;
        previewError = describeError(error);
        this.log.warn("Preview records unavailable", { sessionId, ...previewError });
      }

      const updated = await this.deps.store.appendCandidateIds(sessionId, ids);
      await this.deps.store.transition(sessionId, "collection", {
        preview: {
          query: explainQuery(query),
          totalIds: updated.candidateIds.length,
          previewIds: previews.map((p) => p.id),
          fromCache,
          ...(previewError ? { error: previewError } : {}),
        },
      });

      this.log.info("Preview complete", {
        sessionId,
        totalIds: updated.candidateIds.length,
        previews: previews.length,
        fromCache,
      });

      return {
        status: "ok",
        query,
        totalIds: updated.candidateIds.length,
        previews,
        fromCache,
        ...(previewError ? { previewError } : {}),
      };
    });
  }

  // ========================================================
  // COLLECTION
  // ========================================================

  /**
   * Collect `count` candidates starting at `startIndex` (default: the
   * session's offset). A trailing partial page is fine; a window that starts
   * past the known ids is rejected.
   */
  async collect(sessionId: string, request: CollectRequest): Promise<CollectionResult> {
    return this.guard(sessionId, "collection", async () => {
      const session = await this.requireStage(sessionId, "collection");
      const run = this.runMetadata(session);
      const { candidateIds } = session;
      const startIndex = request.startIndex ?? session.paginationOffset;
      const { count } = request;

      if (
        !Number.isInteger(startIndex) ||
        !Number.isInteger(count) ||
        startIndex < 0 ||
        count <= 0 ||
        startIndex >= candidateIds.length
      ) {
        throw new InvalidPaginationRequestError(startIndex, count, candidateIds.length);
      }

      const window = candidateIds.slice(startIndex, startIndex + count);
      const batchSize = this.deps.settings.concurrency;
      const slots = new Array<CandidateRecord | undefined>(window.length);
      const failures: ItemFailure[] = [];
      let ledger = emptyLedger();
      let processed = 0;
      let cancelled = false;

      this.log.info("Collection started", { sessionId, startIndex, requested: count, window: window.length });

      while (processed < window.length) {
        if (request.signal?.aborted) {
          cancelled = true;
          ledger.skipped += window.length - processed;
          this.log.warn("Collection cancelled", { sessionId, processed, skipped: window.length - processed });
          break;
        }

        const batch = window.slice(processed, processed + batchSize);
        const settled = await Promise.allSettled(
          batch.map((id) => this.collectCandidate(id, run.bypassCache))
        );

        settled.forEach((result, j) => {
          const position = processed + j;
          if (result.status === "fulfilled") {
            slots[position] = result.value.record;
            ledger = addLedgers(ledger, result.value.usage);
          } else {
            if (abortsRun(result.reason)) throw result.reason;
            failures.push({ id: batch[j], index: startIndex + position, ...describeError(result.reason) });
          }
        });

        processed += batch.length;
        await this.deps.store.advanceOffsetTo(sessionId, startIndex + processed);
      }

      const records = slots.filter((r): r is CandidateRecord => r !== undefined);
      const nextOffset = startIndex + processed;

      await this.deps.store.mergeUpdate(sessionId, (current) => {
        const previous = this.collectionMetadata(current);
        const collectedIds = mergeIds(previous.collectedIds, records.map((r) => r.id));
        const collected = new Set(collectedIds);
        const metadata: CollectionMetadata = {
          collectedIds,
          failedIds: mergeIds(previous.failedIds, failures.map((f) => f.id)).filter((id) => !collected.has(id)),
          ledger: addLedgers(previous.ledger, ledger),
          requests: previous.requests + 1,
        };
        return { stageMetadata: { collection: metadata } };
      });

      this.reportLedger(sessionId, "collection", ledger);

      const summary =
        `${records.length} of ${window.length} collected, ${failures.length} failed` +
        (cancelled ? `, ${ledger.skipped} skipped (cancelled)` : "");
      this.log.info("Collection batch complete", { sessionId, summary, nextOffset });

      return {
        sessionId,
        records,
        failures,
        ledger,
        startIndex,
        nextOffset,
        remaining: candidateIds.length - nextOffset,
        cancelled,
        summary,
      };
    });
  }

  // ========================================================
  // EVALUATION
  // ========================================================

  /**
   * Score every collected candidate, rank them, and complete the session.
   * Requirements default to the ones given at run start.
   */
  async evaluate(sessionId: string, requirements?: Requirements): Promise<EvaluationResult> {
    return this.guard(sessionId, "evaluation", async () => {
      const session = await this.requireStage(sessionId, "collection");
      const run = this.runMetadata(session);
      const rubric = normalizeRubric(requirements ?? run.requirements ?? { summary: "", criteria: [] });

      const collected = new Set(this.collectionMetadata(session).collectedIds);
      const ids = session.candidateIds.filter((id) => collected.has(id));

      await this.deps.store.transition(sessionId, "evaluation", {
        rubric: rubric.criteria.map((c) => ({ id: c.id, weight: c.weight })),
      });
      this.log.info("Evaluation started", { sessionId, candidates: ids.length });

      const limit = pLimit(this.deps.settings.concurrency);
      const settled = await Promise.allSettled(
        ids.map((id) =>
          limit(async () => {
            const { record, usage } = await this.collectCandidate(id, false);
            const result = await this.withItemRetry(`scoring ${id}`, () => this.deps.scorer.score(record, rubric));
            return { id, usage, result };
          })
        )
      );

      const failures: ItemFailure[] = [];
      const scored: Omit<RankedCandidate, "rank">[] = [];
      let ledger = emptyLedger();

      settled.forEach((outcome, i) => {
        const id = ids[i];
        if (outcome.status === "rejected") {
          if (abortsRun(outcome.reason)) throw outcome.reason;
          failures.push({ id, index: session.candidateIds.indexOf(id), ...describeError(outcome.reason) });
          return;
        }
        const { usage, result } = outcome.value;
        ledger = addLedgers(ledger, usage);
        scored.push({
          id,
          score: weightedScore(rubric, result.breakdown, result.score),
          overall: result.score,
          rationale: result.rationale,
          breakdown: result.breakdown,
        });
      });

      // Stable sort keeps candidate order among equal scores
      const ranked: RankedCandidate[] = scored
        .sort((a, b) => b.score - a.score)
        .map((candidate, i) => ({ ...candidate, rank: i + 1 }));

      const evaluation: EvaluationMetadata = { ranked, failedIds: failures.map((f) => f.id), ledger };
      await this.deps.store.transition(sessionId, "completed", { evaluation });

      this.reportLedger(sessionId, "evaluation", ledger);
      this.log.info("Evaluation complete", {
        sessionId,
        summary: `${ranked.length} of ${ids.length} scored, ${failures.length} failed`,
      });

      return { sessionId, ranked, failures, ledger };
    });
  }

  // ========================================================
  // PER-ITEM WORK
  // ========================================================

  /**
   * Cache first (fresh or stale), paid fetch on miss, then enrichment
   */
  private async collectCandidate(id: string, bypassCache: boolean): Promise<CollectedItem> {
    const { caches } = this.deps;
    const usage = emptyLedger();

    let profile: CandidateProfile;
    let cacheAgeDays = 0;
    let stale = false;
    let source: CandidateRecord["source"] = "fresh";

    const lookup = bypassCache ? undefined : await caches.candidates.get(id);
    if (lookup && lookup.status !== "miss") {
      profile = lookup.payload;
      cacheAgeDays = lookup.ageDays;
      stale = lookup.status === "stale";
      source = "cache";
      usage.cached++;
    } else {
      profile = await this.withItemRetry(`candidate ${id}`, () => this.deps.candidates.fetchCandidate(id));
      await caches.candidates.set(id, profile);
      usage.fetched++;
    }

    const organizations = await this.enrich(id, profile, bypassCache, usage);
    return { record: { id, profile, cacheAgeDays, source, stale, organizations }, usage };
  }

  /**
   * Organizations the policy accepts. A failed enrichment drops that
   * organization only; the candidate is still collected.
   */
  private async enrich(
    candidateId: string,
    profile: CandidateProfile,
    bypassCache: boolean,
    usage: CreditLedger
  ): Promise<OrganizationRecord[]> {
    const { caches } = this.deps;
    const organizations: OrganizationRecord[] = [];

    for (const organizationId of organizationsToEnrich(profile.experience, this.enrichmentPolicy)) {
      const lookup = bypassCache ? undefined : await caches.organizations.get(organizationId);
      if (lookup && lookup.status !== "miss") {
        organizations.push(lookup.payload);
        usage.enrichmentCached++;
        continue;
      }

      try {
        const organization = await this.withItemRetry(`organization ${organizationId}`, () =>
          this.deps.organizations.fetchOrganization(organizationId)
        );
        await caches.organizations.set(organizationId, organization);
        organizations.push(organization);
        usage.enrichmentFetched++;
      } catch (error) {
        this.log.warn("Organization enrichment failed", {
          candidateId,
          organizationId,
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return organizations;
  }

  private async loadPreviews(
    query: StructuredQuery,
    bypassCache: boolean
  ): Promise<{ previews: CandidatePreview[]; fromCache: boolean }> {
    const { caches, settings } = this.deps;
    const key = previewCacheKey(query, settings.previewCap);

    const lookup = bypassCache ? undefined : await caches.previews.get(key);
    if (lookup && lookup.status !== "miss") {
      return { previews: lookup.payload, fromCache: true };
    }

    const previews = await this.withItemRetry("candidate preview", () =>
      this.deps.candidates.preview(query, settings.previewCap)
    );
    await caches.previews.set(key, previews);
    return { previews, fromCache: false };
  }

  private withItemRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      attempts: ITEM_ATTEMPTS,
      backoffMs: this.deps.settings.retryBackoffMs,
      onRetry: (error) =>
        this.log.warn(`Retrying ${label}`, {
          reason: error instanceof Error ? error.message : String(error),
        }),
    });
  }

  // ========================================================
  // SESSION HELPERS
  // ========================================================

  /**
   * Run a stage body. Unexpected errors fail the session, then propagate.
   */
  private async guard<T>(sessionId: string, stage: SessionStage, body: () => Promise<T>): Promise<T> {
    const log = this.log.child({ sessionId, stage });
    try {
      return await body();
    } catch (error) {
      if (abortsRun(error) || isRequestError(error)) throw error;

      try {
        await this.deps.store.fail(sessionId, error);
      } catch (failError) {
        log.error("Could not record stage failure", failError);
      }
      log.error("Stage failed", error);
      throw error;
    }
  }

  private async requireStage(sessionId: string, stage: SessionStage): Promise<SessionState> {
    const session = await this.deps.store.read(sessionId);
    if (session.stage !== stage) {
      throw new InvalidStageTransitionError(sessionId, session.stage, stage);
    }
    return session;
  }

  private runMetadata(session: SessionState): RunMetadata {
    const result = RunMetadataSchema.safeParse(session.stageMetadata.run);
    if (!result.success) {
      throw new SessionStateCorruptionError(session.sessionId, "unreadable run metadata");
    }
    return result.data;
  }

  private collectionMetadata(session: SessionState): CollectionMetadata {
    const stored = session.stageMetadata.collection;
    if (stored === undefined) {
      return { collectedIds: [], failedIds: [], ledger: emptyLedger(), requests: 0 };
    }
    const result = CollectionMetadataSchema.safeParse(stored);
    if (!result.success) {
      throw new SessionStateCorruptionError(session.sessionId, "unreadable collection metadata");
    }
    return result.data;
  }

  private reportLedger(sessionId: string, stage: SessionStage, ledger: CreditLedger): void {
    const context = { sessionId, stage };
    this.log.metric("credits.fetched", ledger.fetched, context);
    this.log.metric("credits.cached", ledger.cached, context);
    this.log.metric("credits.skipped", ledger.skipped, context);
    this.log.metric("credits.enrichment_fetched", ledger.enrichmentFetched, context);
    this.log.metric("credits.enrichment_cached", ledger.enrichmentCached, context);
  }
}
