#!/usr/bin/env node
/**
 * Sourcer CLI - Entry Point
 * Progressive candidate sourcing: discover organizations, preview the pool,
 * collect profiles in pages, then score and rank them.
 *
 * EXECUTION FLOW:
 * ===============
 * 1. Load environment variables from .env (dotenv/config)
 * 2. Parse CLI arguments (parseArgs)
 * 3. Wire the pipeline: Supabase stores when configured, memory otherwise
 * 4. Branch on the command:
 *    - "run"       → Discovery + Preview (optionally --collect / --evaluate in-process)
 *    - "collect"   → next page of a session
 *    - "evaluate"  → score and rank everything collected
 *    - "sessions"  → list sessions
 *    - "purge"     → drop expired sessions and cache entries
 *
 * USAGE:
 *   npm run sourcer -- run --seed "Acme=acme.com" --role "ML Engineer" --collect 25
 *   npm run sourcer -- collect <sessionId> --count 50
 *   npm run sourcer -- evaluate <sessionId> --criteria criteria.json
 */

import "dotenv/config";
import { readFile } from "node:fs/promises";
import { ConfigError, getBaseConfig, isSourcerError, logger } from "@sourcer/core";
import { getCoreSignalClient } from "@sourcer/coresignal";
import { isSupabaseConfigured } from "@sourcer/db";
import { MemoryCacheBackend, SupabaseCacheBackend } from "./cache/index.js";
import { getPipelineSettings } from "./config.js";
import {
  createPipeline,
  type CollectionResult,
  type EvaluationResult,
  type RunResult,
  type WiredPipeline,
} from "./pipeline/index.js";
import {
  CoreSignalCandidateProvider,
  CoreSignalOrganizationProvider,
  CoreSignalOrganizationSearch,
} from "./providers/index.js";
import { isSearchStrategy, knownSeniorityLevels, resolveSeniority, type SearchStrategy } from "./query/index.js";
import type { SeedOrganization } from "./resolver/index.js";
import {
  ClaudeScorer,
  parseRequirements,
  type CandidateScorer,
  type Requirements,
  type Rubric,
  type ScoreResult,
} from "./scoring/index.js";
import { MemorySessionBackend, SupabaseSessionBackend, summarize } from "./session/index.js";
import type { CandidateRecord } from "./types.js";

const COMMANDS = ["run", "collect", "evaluate", "sessions", "purge", "help"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

interface CliOptions {
  seeds: SeedOrganization[];
  roles: string[];
  department?: string;
  location?: string;
  seniority?: string;
  strategy: SearchStrategy;
  noCache: boolean;
  criteria?: string;
  start?: number;
  count: number;
  /** `run` only: collect this many right after the preview */
  collect?: number;
  /** `run` only: evaluate right after collecting */
  evaluate: boolean;
  limit: number;
  verbose: boolean;
}

/**
 * "Acme=acme.com" or just "Acme"
 */
function parseSeed(value: string): SeedOrganization {
  const [name, website] = value.split("=", 2);
  return website?.trim() ? { name: name.trim(), website: website.trim() } : { name: name.trim() };
}

function parseCount(flag: string, value: string | undefined): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${flag} expects a whole number, got "${value ?? ""}"`);
  }
  return parsed;
}

/**
 * Parse command line arguments
 */
function parseArgs(): { command: Command; sessionId?: string; options: CliOptions } {
  const args = process.argv.slice(2);

  let command: Command = "help";
  let sessionId: string | undefined;
  const options: CliOptions = {
    seeds: [],
    roles: [],
    strategy: "balanced",
    noCache: false,
    count: 25,
    evaluate: false,
    limit: 20,
    verbose: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (i === 0 && isCommand(arg)) {
      command = arg;
    } else if (arg === "--seed" || arg === "-s") {
      options.seeds.push(parseSeed(args[++i] ?? ""));
    } else if (arg === "--role" || arg === "-r") {
      options.roles.push(args[++i] ?? "");
    } else if (arg === "--department") {
      options.department = args[++i];
    } else if (arg === "--location" || arg === "-l") {
      options.location = args[++i];
    } else if (arg === "--seniority") {
      const seniority = args[++i] ?? "";
      if (!resolveSeniority(seniority)) {
        throw new Error(`Unknown seniority "${seniority}". Known: ${knownSeniorityLevels().join(", ")}`);
      }
      options.seniority = seniority;
    } else if (arg === "--strategy") {
      const strategy = args[++i] ?? "";
      if (!isSearchStrategy(strategy)) {
        throw new Error(`Unknown strategy "${strategy}" (strict, balanced, broad)`);
      }
      options.strategy = strategy;
    } else if (arg === "--no-cache") {
      options.noCache = true;
    } else if (arg === "--criteria") {
      options.criteria = args[++i];
    } else if (arg === "--start") {
      options.start = parseCount(arg, args[++i]);
    } else if (arg === "--count" || arg === "-n") {
      options.count = parseCount(arg, args[++i]);
    } else if (arg === "--collect") {
      options.collect = parseCount(arg, args[++i]);
    } else if (arg === "--evaluate") {
      options.evaluate = true;
    } else if (arg === "--limit") {
      options.limit = parseCount(arg, args[++i]);
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (!arg.startsWith("-") && !sessionId) {
      sessionId = arg;
    }
  }

  return { command, sessionId, options };
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
Sourcer - progressive candidate sourcing

USAGE:
  npm run sourcer -- <command> [options]

COMMANDS:
  run                     Resolve seed organizations and preview the candidate pool
  collect <sessionId>     Collect the next page of candidate profiles
  evaluate <sessionId>    Score and rank every collected candidate
  sessions                List recent sessions
  purge                   Delete expired sessions and cache entries
  help                    Show this help message

RUN OPTIONS:
  -s, --seed <name[=site]>  Seed organization, repeatable (e.g. "Acme=acme.com")
  -r, --role <title>        Role title, repeatable
      --department <name>   Department filter
  -l, --location <place>    Location filter
      --seniority <level>   junior, mid, senior, staff, manager, director...
      --strategy <name>     strict, balanced (default), broad
      --no-cache            Ignore cached lookups and profiles for this run
      --criteria <file>     JSON requirements: { "summary", "criteria": [{ id, text, weight }] }
      --collect <n>         Collect n candidates right away
      --evaluate            Evaluate right after collecting

COLLECT OPTIONS:
      --start <index>       Start index (default: the session's offset)
  -n, --count <n>           Page size (default: 25)

GENERAL:
      --limit <n>           Rows to list (sessions, ranking)
  -v, --verbose             Enable debug logging

Without SUPABASE_URL and SUPABASE_KEY sessions live in memory, so use
--collect and --evaluate to finish a run in one invocation.
`);
}

// ============================================================
// WIRING
// ============================================================

/**
 * Builds the Claude scorer on first use, so commands that never score
 * run without an Anthropic key
 */
class DeferredScorer implements CandidateScorer {
  private scorer: ClaudeScorer | null = null;

  score(record: CandidateRecord, rubric: Rubric): Promise<ScoreResult> {
    if (!this.scorer) {
      this.scorer = new ClaudeScorer();
    }
    return this.scorer.score(record, rubric);
  }
}

function wire(): WiredPipeline {
  const persistent = isSupabaseConfigured();
  if (!persistent) {
    logger.warn("Supabase is not configured; sessions and cache last for this process only");
  }

  return createPipeline({
    settings: getPipelineSettings(),
    cacheBackend: persistent ? new SupabaseCacheBackend() : new MemoryCacheBackend(),
    sessionBackend: persistent ? new SupabaseSessionBackend() : new MemorySessionBackend(),
    // Built on first request, so sessions and purge need no provider key
    search: new CoreSignalOrganizationSearch(getCoreSignalClient),
    candidates: new CoreSignalCandidateProvider(getCoreSignalClient),
    organizations: new CoreSignalOrganizationProvider(getCoreSignalClient),
    scorer: new DeferredScorer(),
  });
}

/**
 * Fail before any paid work when the run will end in scoring
 */
function assertScoringConfigured(): void {
  if (!getBaseConfig().scoring.anthropicApiKey) {
    throw new ConfigError("ANTHROPIC_API_KEY is required to evaluate candidates");
  }
}

async function loadRequirements(path: string | undefined): Promise<Requirements | undefined> {
  if (!path) return undefined;
  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  return parseRequirements(raw);
}

function requireSessionId(sessionId: string | undefined, command: Command): string {
  if (!sessionId) {
    throw new Error(`"${command}" needs a session id`);
  }
  return sessionId;
}

/**
 * Collect with Ctrl-C mapped to cancellation: the batch in flight finishes,
 * the rest of the page is skipped.
 */
async function collectWithInterrupt(
  wired: WiredPipeline,
  sessionId: string,
  startIndex: number | undefined,
  count: number
): Promise<CollectionResult> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.log("\nCancelling after the current batch...");
    controller.abort();
  };

  process.once("SIGINT", onInterrupt);
  try {
    return await wired.pipeline.collect(sessionId, { startIndex, count, signal: controller.signal });
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

// ============================================================
// OUTPUT
// ============================================================

function displayRun(result: RunResult): void {
  console.log("\n" + "=".repeat(60));
  console.log("RUN");
  console.log("=".repeat(60));
  console.log(`\nSession: ${result.sessionId}`);

  console.log("\n--- Organizations ---");
  for (const entity of result.entities) {
    const match = entity.canonicalId
      ? `${entity.canonicalId} (${entity.method}, ${(entity.confidence * 100).toFixed(0)}%)`
      : "unresolved, needs manual resolution";
    console.log(`  ${entity.queryName}: ${match}`);
  }

  const { preview } = result;
  if (preview.status === "failed") {
    console.log(`\nPreview failed: [${preview.error.code}] ${preview.error.message}`);
    return;
  }

  console.log(`\nMatching candidates: ${preview.totalIds}`);
  console.log(`Previews:            ${preview.previews.length}${preview.fromCache ? " (cached)" : ""}`);
  for (const p of preview.previews.slice(0, 10)) {
    console.log(`  ${p.id}  ${p.fullName ?? "?"}  ${p.title ?? ""}`);
  }
}

function displayCollection(result: CollectionResult): void {
  console.log("\n--- Collection ---");
  console.log(`  ${result.summary}`);
  console.log(`  Paid fetches: ${result.ledger.fetched}, cached: ${result.ledger.cached}`);
  console.log(
    `  Organizations fetched: ${result.ledger.enrichmentFetched}, cached: ${result.ledger.enrichmentCached}`
  );

  for (const record of result.records) {
    const age = record.source === "cache" ? ` [cached ${record.cacheAgeDays.toFixed(1)}d${record.stale ? ", stale" : ""}]` : "";
    console.log(`  ${record.id}  ${record.profile.fullName ?? "?"}  ${record.profile.title ?? ""}${age}`);
  }
  for (const failure of result.failures) {
    console.log(`  FAILED ${failure.id} (#${failure.index}): [${failure.code}] ${failure.message}`);
  }

  console.log(`\n  Next offset: ${result.nextOffset}, remaining: ${result.remaining}`);
}

function displayEvaluation(result: EvaluationResult, limit: number): void {
  console.log("\n--- Ranking ---");
  for (const candidate of result.ranked.slice(0, limit)) {
    console.log(`\n  #${candidate.rank} ${candidate.id}  ${candidate.score.toFixed(2)}/10`);
    console.log(`     ${candidate.rationale}`);
  }
  for (const failure of result.failures) {
    console.log(`\n  NOT SCORED ${failure.id}: [${failure.code}] ${failure.message}`);
  }
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

async function main(): Promise<void> {
  const { command, sessionId, options } = parseArgs();

  if (command === "help") {
    printHelp();
    return;
  }

  if (options.verbose) logger.setLevel("debug");
  const wired = wire();

  switch (command) {
    case "run": {
      if (options.seeds.length === 0) {
        throw new Error("run needs at least one --seed");
      }
      if (options.evaluate) assertScoringConfigured();

      const result = await wired.pipeline.start({
        seeds: options.seeds,
        filters: {
          roles: options.roles.length > 0 ? options.roles : undefined,
          department: options.department,
          location: options.location,
          seniority: options.seniority,
        },
        requirements: await loadRequirements(options.criteria),
        strategy: options.strategy,
        bypassCache: options.noCache,
      });
      displayRun(result);

      if (result.preview.status === "ok" && options.collect !== undefined && result.preview.totalIds > 0) {
        const collection = await collectWithInterrupt(wired, result.sessionId, 0, options.collect);
        displayCollection(collection);

        if (options.evaluate && !collection.cancelled) {
          displayEvaluation(await wired.pipeline.evaluate(result.sessionId), options.limit);
        }
      }
      break;
    }

    case "collect": {
      const id = requireSessionId(sessionId, command);
      displayCollection(await collectWithInterrupt(wired, id, options.start, options.count));
      break;
    }

    case "evaluate": {
      const id = requireSessionId(sessionId, command);
      assertScoringConfigured();
      const requirements = await loadRequirements(options.criteria);
      displayEvaluation(await wired.pipeline.evaluate(id, requirements), options.limit);
      break;
    }

    case "sessions": {
      const sessions = await wired.store.list({ limit: options.limit });
      console.log(`\n${sessions.length} session(s):\n`);
      for (const session of sessions.map(summarize)) {
        console.log(
          `  ${session.sessionId}  ${session.stage.padEnd(10)}  ` +
            `${session.paginationOffset}/${session.candidates} collected  ` +
            `updated ${session.updatedAt.toISOString()}`
        );
      }
      break;
    }

    case "purge": {
      const sessions = await wired.store.purgeExpired();
      const { candidates, organizations, previews, organizationLookups } = wired.caches;
      const counts = await Promise.all([
        candidates.sweep(),
        organizations.sweep(),
        previews.sweep(),
        organizationLookups.sweep(),
      ]);
      console.log(`Removed ${sessions} expired session(s) and ${counts.reduce((a, b) => a + b, 0)} cache entries`);
      break;
    }
  }
}

main().catch((error: unknown) => {
  const prefix = isSourcerError(error) ? `[${error.code}] ` : "";
  console.error(`\nFailed: ${prefix}${error instanceof Error ? error.message : String(error)}`);
  if (logger.getLevel() === "debug" && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
});
