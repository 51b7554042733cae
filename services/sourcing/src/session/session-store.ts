/**
 * Session State Store
 *
 * Every mutation is read-modify-write under a per-session lock, and the
 * write itself is a compare-and-set on the row version, so neither two
 * in-process writers nor a second process can silently drop an update.
 */

import { randomUUID } from "node:crypto";
import {
  DatabaseError,
  InvalidStageTransitionError,
  SessionNotFoundError,
  SessionStateCorruptionError,
  isSourcerError,
  logger,
  type ChildLogger,
} from "@sourcer/core";
import { Tables } from "@sourcer/db";
import type { SessionBackend } from "./backends.js";
import { KeyedLock } from "./keyed-lock.js";
import {
  appendUnique,
  applyPatch,
  assertInvariants,
  canTransition,
  expiryFor,
  fromRow,
  isTerminalStage,
  toRow,
  toUpdate,
} from "./state.js";
import type { PatchInput, SessionPatch, SessionStage, SessionState, StageMetadata } from "./types.js";

const MAX_WRITE_ATTEMPTS = 3;

export interface SessionStoreOptions {
  candidateIdCap: number;
  retentionDays: number;
  now?: () => Date;
}

export interface SessionListQuery {
  limit?: number;
  activeOnly?: boolean;
}

export class SessionStore {
  private readonly lock = new KeyedLock();
  private readonly log: ChildLogger;
  private readonly now: () => Date;

  constructor(
    private readonly backend: SessionBackend,
    private readonly options: SessionStoreOptions
  ) {
    this.log = logger.child({ component: "session-store" });
    this.now = options.now ?? (() => new Date());
  }

  // ============ Lifecycle ============

  async create(sessionId: string = randomUUID(), init: SessionPatch = {}): Promise<SessionState> {
    const now = this.now();
    const state: SessionState = {
      sessionId,
      stage: init.stage ?? "discovery",
      discoveredEntities: init.discoveredEntities ?? [],
      candidateIds: [],
      paginationOffset: 0,
      stageMetadata: init.stageMetadata ?? {},
      version: 1,
      createdAt: now,
      updatedAt: now,
      expiresAt: expiryFor(now, this.options.retentionDays),
    };

    await this.backend.insert(toRow(state));
    this.log.info("Session created", { sessionId, stage: state.stage });
    return state;
  }

  async read(sessionId: string): Promise<SessionState> {
    const row = await this.backend.get(sessionId);
    if (!row) {
      throw new SessionNotFoundError(sessionId);
    }
    return fromRow(row);
  }

  async clear(sessionId: string): Promise<boolean> {
    return this.lock.run(sessionId, () => this.backend.remove(sessionId));
  }

  async list(query: SessionListQuery = {}): Promise<SessionState[]> {
    const rows = await this.backend.list({ limit: query.limit, activeOnly: query.activeOnly });
    const states: SessionState[] = [];

    for (const row of rows) {
      try {
        states.push(fromRow(row));
      } catch (error) {
        if (!(error instanceof SessionStateCorruptionError)) throw error;
        this.log.error("Skipping corrupted session in listing", error, { sessionId: row.session_id });
      }
    }

    return states;
  }

  /**
   * Retention sweep
   */
  async purgeExpired(now: Date = this.now()): Promise<number> {
    const removed = await this.backend.deleteExpired(now);
    if (removed > 0) {
      this.log.info("Expired sessions purged", { removed });
    }
    return removed;
  }

  // ============ Mutations ============

  /**
   * Merge `patch` into the stored state. A function patch is evaluated
   * against the state as read under the lock.
   */
  async mergeUpdate(sessionId: string, patch: PatchInput): Promise<SessionState> {
    return this.mutate(sessionId, (state) => {
      const resolved = typeof patch === "function" ? patch(state) : patch;
      if (resolved.stage !== undefined && resolved.stage !== state.stage) {
        this.assertTransition(state, resolved.stage);
      }
      return applyPatch(state, resolved);
    });
  }

  /**
   * Append ids not already present, preserving first-seen order, up to the cap
   */
  async appendCandidateIds(sessionId: string, ids: readonly string[]): Promise<SessionState> {
    return this.mutate(sessionId, (state) => {
      const { candidateIds, added, dropped } = appendUnique(
        state.candidateIds,
        ids,
        this.options.candidateIdCap
      );

      if (dropped > 0) {
        this.log.warn("Candidate id cap reached", {
          sessionId,
          cap: this.options.candidateIdCap,
          dropped,
        });
      }
      if (added === 0) return state;
      this.log.debug("Candidate ids appended", { sessionId, added, total: candidateIds.length });

      return { ...state, candidateIds };
    });
  }

  /**
   * Move the offset forward by `n`. Overshooting the id list is a bug in the caller.
   */
  async advanceOffset(sessionId: string, n: number): Promise<SessionState> {
    return this.mutate(sessionId, (state) => {
      if (!Number.isInteger(n) || n < 0) {
        throw new SessionStateCorruptionError(sessionId, `cannot advance offset by ${n}`);
      }
      return { ...state, paginationOffset: this.checkedOffset(state, state.paginationOffset + n) };
    });
  }

  /**
   * Move the offset to `target` unless it is already further along
   */
  async advanceOffsetTo(sessionId: string, target: number): Promise<SessionState> {
    return this.mutate(sessionId, (state) => {
      if (!Number.isInteger(target) || target < 0) {
        throw new SessionStateCorruptionError(sessionId, `invalid offset target ${target}`);
      }
      const next = Math.max(state.paginationOffset, this.checkedOffset(state, target));
      return { ...state, paginationOffset: next };
    });
  }

  async transition(sessionId: string, stage: SessionStage, metadata?: StageMetadata): Promise<SessionState> {
    return this.mutate(sessionId, (state) => {
      this.assertTransition(state, stage);
      this.log.info("Stage transition", { sessionId, from: state.stage, to: stage });
      return applyPatch(state, { stage, stageMetadata: metadata });
    });
  }

  /**
   * Mark the session failed and record why. A session that already
   * finished is left as it is.
   */
  async fail(sessionId: string, error: unknown): Promise<SessionState> {
    return this.mutate(sessionId, (state) => {
      if (isTerminalStage(state.stage)) {
        this.log.warn("Ignoring failure for finished session", { sessionId, stage: state.stage });
        return state;
      }

      const failure = {
        stage: state.stage,
        code: isSourcerError(error) ? error.code : "UNKNOWN_ERROR",
        message: error instanceof Error ? error.message : String(error),
        at: this.now().toISOString(),
      };

      this.log.error("Session failed", error, { sessionId, stage: state.stage });
      return applyPatch(state, { stage: "failed", stageMetadata: { failure } });
    });
  }

  // ============ Internals ============

  private assertTransition(state: SessionState, to: SessionStage): void {
    if (!canTransition(state.stage, to)) {
      throw new InvalidStageTransitionError(state.sessionId, state.stage, to);
    }
  }

  private checkedOffset(state: SessionState, offset: number): number {
    if (offset > state.candidateIds.length) {
      throw new SessionStateCorruptionError(
        state.sessionId,
        `offset ${offset} would exceed ${state.candidateIds.length} candidate ids`,
        { offset, candidateIds: state.candidateIds.length }
      );
    }
    return offset;
  }

  /**
   * Locked read-modify-write. A lost compare-and-set (another process wrote
   * in between) re-reads and re-applies `change`.
   */
  private async mutate(
    sessionId: string,
    change: (state: SessionState) => SessionState
  ): Promise<SessionState> {
    return this.lock.run(sessionId, async () => {
      for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
        const current = await this.read(sessionId);
        const changed = change(current);
        if (changed === current) return current;

        const next: SessionState = {
          ...changed,
          version: current.version + 1,
          updatedAt: this.now(),
        };
        assertInvariants(next);

        if (await this.backend.update(sessionId, toUpdate(next), current.version)) {
          return next;
        }

        this.log.warn("Session version moved during write, retrying", {
          sessionId,
          attempt,
          expectedVersion: current.version,
        });
      }

      throw new DatabaseError(
        `[SessionStore] Gave up writing session ${sessionId} after ${MAX_WRITE_ATTEMPTS} version conflicts`,
        Tables.SEARCH_SESSIONS,
        "update"
      );
    });
  }
}
