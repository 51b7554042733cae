/**
 * Search Taxonomy
 * Seniority bands, location expansions and role keyword cleanup
 */

import { z } from "zod";
import taxonomyData from "./taxonomy.json" with { type: "json" };

const MonthsRangeSchema = z.object({
  gte: z.number().int().min(0).optional(),
  lte: z.number().int().min(0).optional(),
});

const SeniorityRuleSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("band"),
    titleKeywords: z.array(z.string().min(1)).min(1),
    months: MonthsRangeSchema,
  }),
  z.object({
    kind: z.literal("management"),
    level: z.string().min(1),
  }),
]);

const TaxonomySchema = z.object({
  seniority: z.record(SeniorityRuleSchema),
  seniorityAliases: z.record(z.string()),
  locations: z.record(z.array(z.string()).min(1)),
  broadRoleWords: z.array(z.string()),
});

export type SeniorityRule = z.infer<typeof SeniorityRuleSchema>;
export type MonthsRange = z.infer<typeof MonthsRangeSchema>;

export const taxonomy = TaxonomySchema.parse(taxonomyData);

/**
 * Seniority levels accepted as input, aliases included
 */
export function knownSeniorityLevels(): string[] {
  return [...Object.keys(taxonomy.seniority), ...Object.keys(taxonomy.seniorityAliases)].sort();
}

export function resolveSeniority(input: string): { level: string; rule: SeniorityRule } | null {
  const normalized = input.trim().toLowerCase();
  const level = taxonomy.seniorityAliases[normalized] ?? normalized;
  const rule = taxonomy.seniority[level];
  return rule ? { level, rule } : null;
}

/**
 * Wildcard patterns for a location; known metros expand to their
 * surrounding cities, anything else is matched as a substring.
 */
export function expandLocation(location: string): string[] {
  const normalized = location.trim().toLowerCase();
  if (!normalized) return [];

  for (const [metro, patterns] of Object.entries(taxonomy.locations)) {
    if (normalized.includes(metro)) return patterns;
  }

  return [`*${normalized}*`];
}

/**
 * Role keywords with over-broad seniority words removed, lowercased and deduplicated.
 * "Senior ML Engineer" becomes "ml engineer"; a bare "senior" disappears.
 */
export function roleKeywords(roles: readonly string[]): string[] {
  const broad = new Set(taxonomy.broadRoleWords);
  const keywords: string[] = [];

  for (const role of roles) {
    const words = role
      .toLowerCase()
      .replace(/"/g, "")
      .split(/\s+/)
      .filter((word) => word && !broad.has(word));
    const keyword = words.join(" ");
    if (keyword && !keywords.includes(keyword)) keywords.push(keyword);
  }

  return keywords;
}

/**
 * OR-joined query string; multi-word keywords are quoted as phrases
 */
export function roleQueryString(keywords: readonly string[]): string {
  return keywords.map((k) => (k.includes(" ") ? `"${k}"` : k)).join(" OR ");
}
