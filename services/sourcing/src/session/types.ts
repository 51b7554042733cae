/**
 * Session Types
 */

import type { SessionStage } from "@sourcer/db";
import type { ResolvedEntity } from "../types.js";

export type { SessionStage };

export type StageMetadata = Record<string, unknown>;

/**
 * Durable record of one pipeline run
 */
export interface SessionState {
  sessionId: string;
  stage: SessionStage;
  discoveredEntities: ResolvedEntity[];
  /** Append-only, deduplicated, capped */
  candidateIds: string[];
  /** Invariant: 0 <= paginationOffset <= candidateIds.length */
  paginationOffset: number;
  stageMetadata: StageMetadata;
  /** Bumped on every write */
  version: number;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date | null;
}

/**
 * Partial update. Top-level fields are replaced only when present;
 * `stageMetadata` keys are merged into the existing map.
 */
export interface SessionPatch {
  stage?: SessionStage;
  discoveredEntities?: ResolvedEntity[];
  stageMetadata?: StageMetadata;
}

export type PatchInput = SessionPatch | ((current: SessionState) => SessionPatch);

export interface SessionSummary {
  sessionId: string;
  stage: SessionStage;
  candidates: number;
  paginationOffset: number;
  createdAt: Date;
  updatedAt: Date;
}
