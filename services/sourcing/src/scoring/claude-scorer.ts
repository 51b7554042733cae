/**
 * Claude Scorer
 * Scores one candidate against a rubric in a single tool-less agent turn
 */

import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import { z } from "zod";
import {
  ConfigError,
  ExternalFetchError,
  ValidationError,
  getBaseConfig,
  logger,
  type ChildLogger,
} from "@sourcer/core";
import type { CandidateRecord } from "../types.js";
import type { Rubric } from "./rubric.js";

export interface ScoreResult {
  /** Overall fit, 0-10 */
  score: number;
  rationale: string;
  /** Per-criterion scores keyed by criterion id */
  breakdown: Record<string, number>;
}

export interface CandidateScorer {
  score(record: CandidateRecord, rubric: Rubric): Promise<ScoreResult>;
}

const ScoreResponseSchema = z.object({
  score: z.number().min(0).max(10),
  rationale: z.string(),
  breakdown: z.record(z.number().min(0).max(10)).default({}),
});

const SYSTEM_PROMPT = `You are an objective, evidence-first hiring assessor.
Judge only what the profile shows. Be strict and conservative.
Answer with a single JSON object and nothing else.`;

// ============ Prompt ============

function describeExperience(record: CandidateRecord): string[] {
  const orgs = new Map(record.organizations.map((o) => [o.id, o]));

  return record.profile.experience.map((entry) => {
    const years = `${entry.startYear ?? "?"}-${entry.current ? "present" : entry.endYear ?? "?"}`;
    const org = entry.organizationId ? orgs.get(entry.organizationId) : undefined;
    const orgDetail = org
      ? ` (${[org.industry, org.sizeRange, org.country].filter(Boolean).join(", ")})`
      : "";
    return `- ${entry.title ?? "Unknown title"} at ${entry.organizationName ?? "Unknown"}${orgDetail}, ${years}`;
  });
}

export function buildScoringPrompt(record: CandidateRecord, rubric: Rubric): string {
  const { profile } = record;
  const years = profile.totalExperienceMonths !== undefined
    ? (profile.totalExperienceMonths / 12).toFixed(1)
    : "unknown";

  const lines = [
    "Candidate:",
    `- Name: ${profile.fullName ?? "N/A"}`,
    `- Headline: ${profile.headline ?? "N/A"}`,
    `- Location: ${profile.location ?? "N/A"}`,
    `- Current title: ${profile.title ?? "N/A"}`,
    `- Years of experience: ${years}`,
    `- Skills: ${profile.skills.length > 0 ? profile.skills.join(", ") : "N/A"}`,
    "Experience:",
    ...describeExperience(record),
    "",
    `Role requirements: ${rubric.summary || "N/A"}`,
    "",
    "Weighted criteria (score each 0-10):",
    ...rubric.criteria.map((c) => `- ${c.id}: ${c.text} (${c.weight}% weight)`),
    "",
    "Scale: 9-10 exceptional, 7-8 good with minor gaps, 5-6 moderate, 3-4 poor, 1-2 not recommended.",
    "",
    'Respond as {"score": <0-10>, "rationale": "<two or three sentences>", "breakdown": {"<criterion id>": <0-10>}}',
  ];

  return lines.join("\n");
}

// ============ Response ============

/**
 * Pull the JSON object out of the model's answer (which may be fenced)
 */
export function parseScoreResponse(text: string): ScoreResult {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new ValidationError("Scorer answer contains no JSON object", { field: "score" });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    throw new ValidationError("Scorer answer is not valid JSON", {
      field: "score",
      context: { reason: error instanceof Error ? error.message : String(error) },
    });
  }

  const result = ScoreResponseSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError("Scorer answer failed validation", {
      field: "score",
      context: { issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
    });
  }
  return result.data;
}

// ============ Scorer ============

export interface ClaudeScorerOptions {
  model?: string;
}

export class ClaudeScorer implements CandidateScorer {
  private readonly model: string;
  private readonly log: ChildLogger;

  constructor(options: ClaudeScorerOptions = {}) {
    const config = getBaseConfig().scoring;
    if (!config.anthropicApiKey) {
      throw new ConfigError("ANTHROPIC_API_KEY is required for candidate scoring");
    }
    this.model = options.model ?? config.model;
    this.log = logger.child({ component: "claude-scorer" });
  }

  async score(record: CandidateRecord, rubric: Rubric): Promise<ScoreResult> {
    const options: Options = {
      model: this.model,
      systemPrompt: SYSTEM_PROMPT,
      maxTurns: 1,
      allowedTools: [],
    };

    let output = "";
    for await (const message of query({ prompt: buildScoringPrompt(record, rubric), options })) {
      if (message.type === "assistant") {
        for (const block of message.message.content) {
          if (block.type === "text") {
            output += block.text;
          }
        }
      } else if (message.type === "result") {
        if (message.subtype !== "success") {
          throw new ExternalFetchError(`Scoring run ended with ${message.subtype}`, {
            itemId: record.id,
          });
        }
        if (!output) {
          output = message.result;
        }
        this.log.debug("Candidate scored", {
          candidateId: record.id,
          costUsd: message.total_cost_usd,
          durationMs: message.duration_ms,
        });
      }
    }

    return parseScoreResponse(output);
  }
}
