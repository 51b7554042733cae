/**
 * Query Builder
 *
 * Placement rules:
 *   organization  always required
 *   department    required once supplied
 *   role          required under strict and balanced, boost under broad
 *   seniority     required under strict and balanced, boost under broad
 *   location      required under strict, boost otherwise
 */

import { ValidationError } from "@sourcer/core";
import type { EsNode, EsSearchBody } from "@sourcer/coresignal";
import type { ResolvedEntity } from "../types.js";
import { expandLocation, resolveSeniority, roleKeywords, roleQueryString, type MonthsRange } from "./taxonomy.js";
import type {
  FilterKind,
  OptionalFilters,
  QueryClause,
  RequiredFilters,
  SearchStrategy,
  StructuredQuery,
} from "./types.js";

type Placement = "required" | "boost";

const PLACEMENT: Record<SearchStrategy, Record<"role" | "location" | "seniority", Placement>> = {
  strict: { role: "required", location: "required", seniority: "required" },
  balanced: { role: "required", location: "boost", seniority: "required" },
  broad: { role: "boost", location: "boost", seniority: "boost" },
};

// ============ Clause builders ============

export function organizationClause(organizations: readonly ResolvedEntity[]): QueryClause {
  const filters: EsNode[] = [];
  const labels: string[] = [];
  const seenIds = new Set<string>();
  const seenNames = new Set<string>();

  for (const org of organizations) {
    if (org.canonicalId !== null) {
      if (seenIds.has(org.canonicalId)) continue;
      seenIds.add(org.canonicalId);
      filters.push({ term: { "experience.company_id": org.canonicalId } });
      labels.push(`${org.matchedName ?? org.queryName} (${org.canonicalId})`);
    } else {
      // Unresolved organizations still count, matched by name
      const name = org.queryName.trim();
      if (!name || seenNames.has(name.toLowerCase())) continue;
      seenNames.add(name.toLowerCase());
      filters.push({ match_phrase: { "experience.company_name": name } });
      labels.push(`${name} (by name)`);
    }
  }

  if (filters.length === 0) {
    throw new ValidationError("At least one organization is required to build a query", {
      field: "organizations",
    });
  }

  const companyQuery: EsNode =
    filters.length === 1 ? filters[0] : { bool: { should: filters, minimum_should_match: 1 } };

  return {
    filter: "organization",
    node: { nested: { path: "experience", query: companyQuery } },
    summary: `worked at ${labels.join(", ")}`,
  };
}

export function departmentClause(department: string): QueryClause {
  return {
    filter: "department",
    node: { term: { active_experience_department: department } },
    summary: `department is ${department}`,
  };
}

export function roleClause(roles: readonly string[]): QueryClause | null {
  const keywords = roleKeywords(roles);
  if (keywords.length === 0) return null;

  const query = roleQueryString(keywords);
  return {
    filter: "role",
    node: {
      nested: {
        path: "experience",
        query: {
          query_string: {
            query,
            default_field: "experience.title",
            default_operator: "OR",
          },
        },
      },
    },
    summary: `title matches ${query}`,
  };
}

export function locationClause(location: string): QueryClause | null {
  const patterns = expandLocation(location);
  if (patterns.length === 0) return null;

  return {
    filter: "location",
    node: {
      bool: {
        should: patterns.map((pattern) => ({ wildcard: { location_full: pattern } })),
        minimum_should_match: 1,
      },
    },
    summary: `located in ${location.trim()} (${patterns.length} pattern${patterns.length === 1 ? "" : "s"})`,
  };
}

function rangeNode(months: MonthsRange): EsNode {
  const range: EsNode = {};
  if (months.gte !== undefined) range.gte = months.gte;
  if (months.lte !== undefined) range.lte = months.lte;
  return { range: { total_experience_duration_months: range } };
}

/**
 * Management tiers match the structured level exactly. Individual-contributor
 * bands match a title keyword OR a tenure range, since the structured level
 * is filled in for only a minority of records.
 */
export function seniorityClause(seniority: string): QueryClause {
  const resolved = resolveSeniority(seniority);
  if (!resolved) {
    throw new ValidationError(`Unknown seniority level: ${seniority}`, { field: "seniority" });
  }

  const { level, rule } = resolved;

  if (rule.kind === "management") {
    return {
      filter: "seniority",
      node: { term: { active_experience_management_level: rule.level } },
      summary: `${level}: management level ${rule.level}`,
    };
  }

  const titleMatches: EsNode[] = rule.titleKeywords.map((keyword) => ({
    wildcard: { active_experience_title: `*${keyword}*` },
  }));

  return {
    filter: "seniority",
    node: {
      bool: {
        should: [...titleMatches, rangeNode(rule.months)],
        minimum_should_match: 1,
      },
    },
    summary: `${level}: title has ${rule.titleKeywords.join("/")} or tenure ${describeMonths(rule.months)}`,
  };
}

function describeMonths(months: MonthsRange): string {
  if (months.gte !== undefined && months.lte !== undefined) return `${months.gte}-${months.lte} months`;
  if (months.gte !== undefined) return `>= ${months.gte} months`;
  if (months.lte !== undefined) return `<= ${months.lte} months`;
  return "any";
}

// ============ Builder ============

/**
 * Build a structured query. Pure: same inputs, same output.
 */
export function buildQuery(
  required: RequiredFilters,
  optional: OptionalFilters = {},
  strategy: SearchStrategy = "balanced"
): StructuredQuery {
  const query: StructuredQuery = { strategy, required: [organizationClause(required.organizations)], boosts: [] };

  const department = required.department?.trim();
  if (department) {
    query.required.push(departmentClause(department));
  }

  const placement = PLACEMENT[strategy];
  const place = (kind: keyof typeof placement, clause: QueryClause | null): void => {
    if (!clause) return;
    (placement[kind] === "required" ? query.required : query.boosts).push(clause);
  };

  if (optional.roles && optional.roles.length > 0) {
    place("role", roleClause(optional.roles));
  }
  if (optional.seniority?.trim()) {
    place("seniority", seniorityClause(optional.seniority));
  }
  if (optional.location?.trim()) {
    place("location", locationClause(optional.location));
  }

  return query;
}

/**
 * Render the provider's search body
 */
export function toSearchBody(query: StructuredQuery): EsSearchBody {
  const bool: EsNode = { must: query.required.map((c) => c.node) };

  if (query.boosts.length > 0) {
    bool.should = query.boosts.map((c) => c.node);
    bool.minimum_should_match = 0;
  }

  return { query: { bool }, sort: ["_score"] };
}

/**
 * Human-readable summary of where each filter ended up
 */
export function explainQuery(query: StructuredQuery): string {
  const lines = [`strategy: ${query.strategy}`, "required:"];
  for (const clause of query.required) {
    lines.push(`  - ${clause.filter}: ${clause.summary}`);
  }
  lines.push("boosts:");
  if (query.boosts.length === 0) {
    lines.push("  (none)");
  }
  for (const clause of query.boosts) {
    lines.push(`  - ${clause.filter}: ${clause.summary}`);
  }
  return lines.join("\n");
}

export function clausesFor(query: StructuredQuery, filter: FilterKind): { required: boolean; boost: boolean } {
  return {
    required: query.required.some((c) => c.filter === filter),
    boost: query.boosts.some((c) => c.filter === filter),
  };
}
