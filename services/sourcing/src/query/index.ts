export {
  buildQuery,
  toSearchBody,
  explainQuery,
  clausesFor,
  organizationClause,
  departmentClause,
  roleClause,
  locationClause,
  seniorityClause,
} from "./query-builder.js";
export {
  taxonomy,
  expandLocation,
  resolveSeniority,
  roleKeywords,
  roleQueryString,
  knownSeniorityLevels,
  type SeniorityRule,
} from "./taxonomy.js";
export {
  SEARCH_STRATEGIES,
  isSearchStrategy,
  type SearchStrategy,
  type FilterKind,
  type QueryClause,
  type StructuredQuery,
  type RequiredFilters,
  type OptionalFilters,
  type SearchFilters,
} from "./types.js";
