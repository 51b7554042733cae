/**
 * In-process stand-ins for the data provider and the scorer, plus a wired
 * pipeline over memory backends. Test-only.
 */

import { ExternalFetchError } from "@sourcer/core";
import { MemoryCacheBackend } from "../cache/index.js";
import { loadPipelineSettings, type PipelineSettings } from "../config.js";
import { createPipeline, type WiredPipeline } from "../pipeline/factory.js";
import type { CandidateProvider, OrganizationProvider } from "../providers/index.js";
import type { StructuredQuery } from "../query/index.js";
import type { OrganizationSearchProvider } from "../resolver/index.js";
import type { CandidateScorer, Rubric, ScoreResult } from "../scoring/index.js";
import { MemorySessionBackend } from "../session/index.js";
import type {
  CandidatePreview,
  CandidateProfile,
  CandidateRecord,
  EntityMatch,
  OrganizationRecord,
} from "../types.js";

export const TEST_NOW = new Date("2026-01-15T00:00:00.000Z");

export function candidateIds(count: number, prefix = "c"): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`);
}

export function profileFor(id: string, overrides: Partial<CandidateProfile> = {}): CandidateProfile {
  return { id, fullName: `Candidate ${id}`, skills: [], experience: [], ...overrides };
}

// ============ Organization search ============

export class FakeOrganizationSearch implements OrganizationSearchProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly byWebsite: Record<string, EntityMatch[]> = {},
    private readonly byName: Record<string, EntityMatch[]> = {}
  ) {}

  async findByWebsite(domain: string): Promise<EntityMatch[]> {
    this.calls.push(`website:${domain}`);
    return this.byWebsite[domain] ?? [];
  }

  async searchByName(name: string): Promise<EntityMatch[]> {
    this.calls.push(`name:${name}`);
    return this.byName[name] ?? [];
  }
}

// ============ Candidates ============

export class FakeCandidateProvider implements CandidateProvider {
  readonly fetched: string[] = [];
  searchCalls = 0;
  previewCalls = 0;
  /** Remaining failures per candidate id */
  readonly failures = new Map<string, number>();
  /** Milliseconds before a candidate fetch settles */
  readonly delays = new Map<string, number>();
  searchError?: Error;
  previewError?: Error;
  profiles = new Map<string, CandidateProfile>();
  onFetch?: (id: string) => void;

  constructor(
    private readonly ids: string[],
    private readonly previews: CandidatePreview[] = []
  ) {}

  async searchIds(_query: StructuredQuery, cap: number): Promise<string[]> {
    this.searchCalls++;
    if (this.searchError) throw this.searchError;
    return this.ids.slice(0, cap);
  }

  async preview(_query: StructuredQuery, limit: number): Promise<CandidatePreview[]> {
    this.previewCalls++;
    if (this.previewError) throw this.previewError;
    return this.previews.slice(0, limit);
  }

  async fetchCandidate(id: string): Promise<CandidateProfile> {
    this.fetched.push(id);
    this.onFetch?.(id);

    const delay = this.delays.get(id);
    if (delay !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    const remaining = this.failures.get(id) ?? 0;
    if (remaining > 0) {
      this.failures.set(id, remaining - 1);
      throw new ExternalFetchError(`provider unavailable for ${id}`, { itemId: id });
    }
    return this.profiles.get(id) ?? profileFor(id);
  }
}

export class FakeOrganizationProvider implements OrganizationProvider {
  readonly fetched: string[] = [];

  async fetchOrganization(id: string): Promise<OrganizationRecord> {
    this.fetched.push(id);
    return { id, name: `Organization ${id}` };
  }
}

// ============ Scorer ============

export class FakeScorer implements CandidateScorer {
  readonly scored: string[] = [];
  readonly failing = new Set<string>();

  constructor(private readonly results: Record<string, ScoreResult> = {}) {}

  async score(record: CandidateRecord, _rubric: Rubric): Promise<ScoreResult> {
    this.scored.push(record.id);
    if (this.failing.has(record.id)) {
      throw new ExternalFetchError(`scorer unavailable for ${record.id}`, { itemId: record.id });
    }
    return this.results[record.id] ?? { score: 5, rationale: "Average fit.", breakdown: {} };
  }
}

// ============ Wiring ============

export interface TestPipeline extends WiredPipeline {
  search: FakeOrganizationSearch;
  candidates: FakeCandidateProvider;
  organizations: FakeOrganizationProvider;
  scorer: FakeScorer;
  cacheBackend: MemoryCacheBackend;
  sessionBackend: MemorySessionBackend;
  settings: PipelineSettings;
}

export interface TestPipelineOptions {
  search?: FakeOrganizationSearch;
  candidates?: FakeCandidateProvider;
  scorer?: FakeScorer;
  settings?: Partial<PipelineSettings>;
}

/** Acme resolves by website; nothing else resolves */
export function acmeSearch(): FakeOrganizationSearch {
  return new FakeOrganizationSearch({ "acme.com": [{ id: "1001", name: "Acme", website: "https://acme.com" }] });
}

export function createTestPipeline(options: TestPipelineOptions = {}): TestPipeline {
  const settings: PipelineSettings = { ...loadPipelineSettings({}), retryBackoffMs: 0, ...options.settings };
  const search = options.search ?? acmeSearch();
  const candidates = options.candidates ?? new FakeCandidateProvider(candidateIds(120));
  const organizations = new FakeOrganizationProvider();
  const scorer = options.scorer ?? new FakeScorer();
  const cacheBackend = new MemoryCacheBackend();
  const sessionBackend = new MemorySessionBackend();

  const wired = createPipeline({
    settings,
    cacheBackend,
    sessionBackend,
    search,
    candidates,
    organizations,
    scorer,
    now: () => TEST_NOW,
  });

  return { ...wired, search, candidates, organizations, scorer, cacheBackend, sessionBackend, settings };
}
