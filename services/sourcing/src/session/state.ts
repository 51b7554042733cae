/**
 * Session State Functions
 * Pure transformations and invariant checks; the store adds I/O and locking.
 */

import { z } from "zod";
import { SessionStateCorruptionError } from "@sourcer/core";
import type { SearchSessionRow, SearchSessionUpdate } from "@sourcer/db";
import { ResolvedEntitySchema } from "../types.js";
import type { SessionPatch, SessionStage, SessionState, SessionSummary } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const STAGE_ORDER: Record<SessionStage, number> = {
  discovery: 0,
  preview: 1,
  collection: 2,
  evaluation: 3,
  completed: 4,
  failed: 5,
};

export function isTerminalStage(stage: SessionStage): boolean {
  return stage === "completed" || stage === "failed";
}

/**
 * Forward only. `collection` may be re-entered for "collect more";
 * `failed` is reachable from any non-terminal stage.
 */
export function canTransition(from: SessionStage, to: SessionStage): boolean {
  if (isTerminalStage(from)) return false;
  if (to === "failed") return true;
  if (from === "collection" && to === "collection") return true;
  return STAGE_ORDER[to] > STAGE_ORDER[from];
}

/**
 * Merge a patch into a state. `stageMetadata` is merged key by key,
 * never replaced wholesale.
 */
export function applyPatch(state: SessionState, patch: SessionPatch): SessionState {
  return {
    ...state,
    stage: patch.stage ?? state.stage,
    discoveredEntities: patch.discoveredEntities ?? state.discoveredEntities,
    stageMetadata: patch.stageMetadata
      ? { ...state.stageMetadata, ...patch.stageMetadata }
      : state.stageMetadata,
  };
}

/**
 * Append ids not seen before, in first-seen order, up to `cap` in total.
 * Re-appending the same ids is a no-op.
 */
export function appendUnique(
  existing: readonly string[],
  ids: readonly string[],
  cap: number
): { candidateIds: string[]; added: number; dropped: number } {
  const seen = new Set(existing);
  const candidateIds = [...existing];
  let dropped = 0;

  for (const id of ids) {
    if (seen.has(id)) continue;
    seen.add(id);
    if (candidateIds.length >= cap) {
      dropped++;
      continue;
    }
    candidateIds.push(id);
  }

  return { candidateIds, added: candidateIds.length - existing.length, dropped };
}

export function expiryFor(createdAt: Date, retentionDays: number): Date {
  return new Date(createdAt.getTime() + retentionDays * DAY_MS);
}

/**
 * Throw SessionStateCorruptionError on any broken invariant
 */
export function assertInvariants(state: SessionState): void {
  const { sessionId, paginationOffset, candidateIds } = state;

  if (!Number.isInteger(paginationOffset) || paginationOffset < 0) {
    throw new SessionStateCorruptionError(sessionId, `invalid pagination offset ${paginationOffset}`);
  }
  if (paginationOffset > candidateIds.length) {
    throw new SessionStateCorruptionError(
      sessionId,
      `pagination offset ${paginationOffset} exceeds ${candidateIds.length} candidate ids`,
      { paginationOffset, candidateIds: candidateIds.length }
    );
  }
  if (new Set(candidateIds).size !== candidateIds.length) {
    throw new SessionStateCorruptionError(sessionId, "duplicate candidate ids");
  }
}

export function summarize(state: SessionState): SessionSummary {
  return {
    sessionId: state.sessionId,
    stage: state.stage,
    candidates: state.candidateIds.length,
    paginationOffset: state.paginationOffset,
    createdAt: state.createdAt,
    updatedAt: state.updatedAt,
  };
}

// ============ Row mapping ============

const DiscoveredEntitiesSchema = z.array(ResolvedEntitySchema);

export function toRow(state: SessionState): SearchSessionRow {
  return {
    session_id: state.sessionId,
    stage: state.stage,
    discovered_entities: state.discoveredEntities,
    candidate_ids: state.candidateIds,
    pagination_offset: state.paginationOffset,
    stage_metadata: state.stageMetadata,
    version: state.version,
    created_at: state.createdAt.toISOString(),
    updated_at: state.updatedAt.toISOString(),
    expires_at: state.expiresAt?.toISOString() ?? null,
  };
}

/** Mutable columns only */
export function toUpdate(state: SessionState): SearchSessionUpdate {
  return {
    stage: state.stage,
    discovered_entities: state.discoveredEntities,
    candidate_ids: state.candidateIds,
    pagination_offset: state.paginationOffset,
    stage_metadata: state.stageMetadata,
    version: state.version,
    updated_at: state.updatedAt.toISOString(),
    expires_at: state.expiresAt?.toISOString() ?? null,
  };
}

/**
 * Validate a stored row and turn it into a state
 */
export function fromRow(row: SearchSessionRow): SessionState {
  const entities = DiscoveredEntitiesSchema.safeParse(row.discovered_entities);
  if (!entities.success) {
    throw new SessionStateCorruptionError(row.session_id, "unreadable discovered entities", {
      issues: entities.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }

  const state: SessionState = {
    sessionId: row.session_id,
    stage: row.stage,
    discoveredEntities: entities.data,
    candidateIds: row.candidate_ids,
    paginationOffset: row.pagination_offset,
    stageMetadata: row.stage_metadata,
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    expiresAt: row.expires_at ? new Date(row.expires_at) : null,
  };

  assertInvariants(state);
  return state;
}
