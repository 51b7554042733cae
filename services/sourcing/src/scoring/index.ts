export {
  normalizeRubric,
  parseRequirements,
  weightedScore,
  CriterionSchema,
  RequirementsSchema,
  GENERAL_FIT_ID,
  MAX_CRITERIA,
  type Criterion,
  type Requirements,
  type Rubric,
} from "./rubric.js";
export {
  ClaudeScorer,
  buildScoringPrompt,
  parseScoreResponse,
  type CandidateScorer,
  type ClaudeScorerOptions,
  type ScoreResult,
} from "./claude-scorer.js";
