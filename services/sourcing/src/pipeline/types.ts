/**
 * Pipeline Types
 * Run requests, stage results, and the metadata each stage leaves on the session
 */

import { z } from "zod";
import type { SeedOrganization } from "../resolver/index.js";
import { SEARCH_STRATEGIES, type SearchFilters, type SearchStrategy, type StructuredQuery } from "../query/index.js";
import { RequirementsSchema, type Requirements } from "../scoring/index.js";
import {
  CreditLedgerSchema,
  type CandidatePreview,
  type CandidateRecord,
  type CreditLedger,
  type ResolvedEntity,
} from "../types.js";

// ============================================================
// REQUESTS
// ============================================================

export interface RunRequest {
  seeds: SeedOrganization[];
  filters?: SearchFilters;
  requirements?: Requirements;
  strategy?: SearchStrategy;
  bypassCache?: boolean;
  /** Caller-chosen id; generated when absent */
  sessionId?: string;
}

export interface CollectRequest {
  /** Defaults to the session's pagination offset */
  startIndex?: number;
  count: number;
  /** Checked between batches; the batch in flight always finishes */
  signal?: AbortSignal;
}

// ============================================================
// RESULTS
// ============================================================

export interface ItemFailure {
  id: string;
  /** Position in the session's candidate id list */
  index: number;
  code: string;
  message: string;
}

export type PreviewResult =
  | {
      status: "ok";
      query: StructuredQuery;
      totalIds: number;
      previews: CandidatePreview[];
      fromCache: boolean;
      /** Set when the preview records could not be fetched */
      previewError?: { code: string; message: string };
    }
  | {
      status: "failed";
      error: { code: string; message: string };
    };

export interface RunResult {
  sessionId: string;
  entities: ResolvedEntity[];
  preview: PreviewResult;
}

export interface CollectionResult {
  sessionId: string;
  /** In candidate id order */
  records: CandidateRecord[];
  failures: ItemFailure[];
  ledger: CreditLedger;
  startIndex: number;
  /** Where the next "collect more" should start */
  nextOffset: number;
  /** Ids after `nextOffset` */
  remaining: number;
  cancelled: boolean;
  /** "N of M collected, K failed" */
  summary: string;
}

export interface RankedCandidate {
  id: string;
  rank: number;
  /** Rubric-weighted score, 0-10 */
  score: number;
  /** Scorer's overall score, 0-10 */
  overall: number;
  rationale: string;
  breakdown: Record<string, number>;
}

export interface EvaluationResult {
  sessionId: string;
  ranked: RankedCandidate[];
  failures: ItemFailure[];
  ledger: CreditLedger;
}

// ============================================================
// SESSION METADATA
// ============================================================

export const SearchFiltersSchema = z.object({
  department: z.string().optional(),
  roles: z.array(z.string()).optional(),
  location: z.string().optional(),
  seniority: z.string().optional(),
});

/** Written at session creation, replayed by later stages */
export const RunMetadataSchema = z.object({
  filters: SearchFiltersSchema,
  strategy: z.enum(SEARCH_STRATEGIES),
  bypassCache: z.boolean(),
  requirements: RequirementsSchema.optional(),
});

export type RunMetadata = z.infer<typeof RunMetadataSchema>;

export const CollectionMetadataSchema = z.object({
  collectedIds: z.array(z.string()),
  failedIds: z.array(z.string()),
  ledger: CreditLedgerSchema,
  requests: z.number().int().min(0),
});

export type CollectionMetadata = z.infer<typeof CollectionMetadataSchema>;

export const RankedCandidateSchema = z.object({
  id: z.string(),
  rank: z.number().int().positive(),
  score: z.number(),
  overall: z.number(),
  rationale: z.string(),
  breakdown: z.record(z.number()),
});

export const EvaluationMetadataSchema = z.object({
  ranked: z.array(RankedCandidateSchema),
  failedIds: z.array(z.string()),
  ledger: CreditLedgerSchema,
});

export type EvaluationMetadata = z.infer<typeof EvaluationMetadataSchema>;
