export {
  EntityResolver,
  unresolvedEntity,
  lookupKey,
  type SeedOrganization,
  type EntityResolverOptions,
  type ResolveOptions,
} from "./entity-resolver.js";
export {
  DEFAULT_TIERS,
  exactWebsiteTier,
  exactNameTier,
  fuzzyNameTier,
  createResolutionContext,
  EXACT_NAME_CONFIDENCE,
  EXACT_WEBSITE_CONFIDENCE,
  type OrganizationSearchProvider,
  type ResolutionContext,
  type Tier,
  type TierMatch,
} from "./tiers.js";
export { normalizeCompanyName, normalizeWebsite, normalizeForExactMatch } from "./normalize.js";
export { nameSimilarity, levenshteinDistance } from "./similarity.js";
