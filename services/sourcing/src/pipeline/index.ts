export {
  SourcingPipeline,
  mergeEntities,
  previewCacheKey,
  type PipelineCaches,
  type PipelineDependencies,
} from "./pipeline.js";
export { createPipeline, type PipelineWiring, type WiredPipeline } from "./factory.js";
export { recentExperiencePolicy, organizationsToEnrich, type EnrichmentPolicy } from "./enrichment-policy.js";
export {
  SearchFiltersSchema,
  RunMetadataSchema,
  CollectionMetadataSchema,
  EvaluationMetadataSchema,
  RankedCandidateSchema,
  type RunRequest,
  type CollectRequest,
  type ItemFailure,
  type PreviewResult,
  type RunResult,
  type CollectionResult,
  type RankedCandidate,
  type EvaluationResult,
  type RunMetadata,
  type CollectionMetadata,
  type EvaluationMetadata,
} from "./types.js";
