/**
 * Requirements Rubric
 * Up to five weighted criteria; whatever weight is left over is scored as
 * an implicit "General Fit" criterion.
 */

import { z } from "zod";
import { ValidationError } from "@sourcer/core";

export const MAX_CRITERIA = 5;
export const TOTAL_WEIGHT = 100;
export const GENERAL_FIT_ID = "general_fit";

export const CriterionSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  weight: z.number().min(0).max(TOTAL_WEIGHT),
});

export type Criterion = z.infer<typeof CriterionSchema>;

export const RequirementsSchema = z.object({
  summary: z.string().default(""),
  criteria: z.array(CriterionSchema).default([]),
});

export type Requirements = z.infer<typeof RequirementsSchema>;

/** Criteria whose weights sum to exactly 100 */
export interface Rubric {
  summary: string;
  criteria: Criterion[];
}

/**
 * Parse requirements from an untrusted source (CLI file, stored metadata)
 */
export function parseRequirements(input: unknown): Requirements {
  const result = RequirementsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ValidationError(`Invalid requirements:\n  - ${issues.join("\n  - ")}`, {
      field: "requirements",
    });
  }
  return result.data;
}

export function normalizeRubric(requirements: Requirements): Rubric {
  const { criteria } = requirements;

  if (criteria.length > MAX_CRITERIA) {
    throw new ValidationError(`At most ${MAX_CRITERIA} criteria are allowed, got ${criteria.length}`, {
      field: "criteria",
    });
  }

  const ids = new Set<string>();
  for (const criterion of criteria) {
    if (criterion.id === GENERAL_FIT_ID || ids.has(criterion.id)) {
      throw new ValidationError(`Duplicate or reserved criterion id: ${criterion.id}`, { field: "criteria" });
    }
    ids.add(criterion.id);
  }

  const total = criteria.reduce((sum, c) => sum + c.weight, 0);
  if (total > TOTAL_WEIGHT) {
    throw new ValidationError(`Criterion weights sum to ${total}, above ${TOTAL_WEIGHT}`, {
      field: "criteria",
      context: { total },
    });
  }

  const remainder = TOTAL_WEIGHT - total;
  return {
    summary: requirements.summary,
    criteria:
      remainder > 0
        ? [...criteria, { id: GENERAL_FIT_ID, text: "General Fit", weight: remainder }]
        : [...criteria],
  };
}

/**
 * Σ weight·score / Σ weight over the criteria the scorer answered.
 * Falls back to `overall` when none of them were answered.
 */
export function weightedScore(rubric: Rubric, breakdown: Record<string, number>, overall: number): number {
  let weighted = 0;
  let weights = 0;

  for (const criterion of rubric.criteria) {
    const score = breakdown[criterion.id];
    if (score === undefined || criterion.weight === 0) continue;
    weighted += criterion.weight * score;
    weights += criterion.weight;
  }

  if (weights === 0) return overall;
  return Math.round((weighted / weights) * 100) / 100;
}
