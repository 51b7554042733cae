export { SessionStore, type SessionStoreOptions, type SessionListQuery } from "./session-store.js";
export { KeyedLock } from "./keyed-lock.js";
export { SupabaseSessionBackend, MemorySessionBackend, type SessionBackend } from "./backends.js";
export { canTransition, isTerminalStage, assertInvariants, summarize } from "./state.js";
export type {
  SessionState,
  SessionPatch,
  PatchInput,
  SessionStage,
  SessionSummary,
  StageMetadata,
} from "./types.js";
