/**
 * CoreSignal API Types
 * Zod schemas for raw API responses plus normalized shapes used downstream
 */

import { z } from "zod";

// ============ Helpers ============

/** API ids arrive as numbers; everything downstream keys by string */
const IdSchema = z.union([z.number(), z.string()]).transform((v) => String(v));

const OptionalString = z.string().nullish().transform((v) => v ?? undefined);
const OptionalNumber = z.number().nullish().transform((v) => v ?? undefined);

/** Years sometimes arrive as strings ("2021") */
const YearSchema = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((v) => {
    if (v === null || v === undefined) return undefined;
    const year = typeof v === "number" ? v : parseInt(v, 10);
    return Number.isFinite(year) ? year : undefined;
  });

// ============ Company API ============

export const CompanyPreviewSchema = z
  .object({
    id: IdSchema,
    name: z.string().nullish().transform((v) => v ?? ""),
    website: OptionalString,
    industry: OptionalString,
    employees_count: OptionalNumber,
    location: OptionalString,
    _score: OptionalNumber,
  })
  .passthrough();

export type CompanyPreview = z.infer<typeof CompanyPreviewSchema>;

export const CompanyPreviewResponseSchema = z.array(CompanyPreviewSchema);

export const CompanyRecordSchema = z
  .object({
    id: IdSchema,
    name: z.string().nullish().transform((v) => v ?? ""),
    website: OptionalString,
    industry: OptionalString,
    size_range: OptionalString,
    employees_count: OptionalNumber,
    founded_year: YearSchema,
    hq_country: OptionalString,
    description: OptionalString,
  })
  .passthrough();

export type CompanyRecord = z.infer<typeof CompanyRecordSchema>;

// ============ Employee API ============

export const EmployeeIdListSchema = z.array(IdSchema);

export const EmployeePreviewSchema = z
  .object({
    id: IdSchema,
    full_name: OptionalString,
    headline: OptionalString,
    active_experience_title: OptionalString,
    active_experience_company_id: z
      .union([z.number(), z.string()])
      .nullish()
      .transform((v) => (v === null || v === undefined ? undefined : String(v))),
    location_full: OptionalString,
    _score: OptionalNumber,
  })
  .passthrough();

export type EmployeePreview = z.infer<typeof EmployeePreviewSchema>;

export const EmployeePreviewResponseSchema = z.array(EmployeePreviewSchema);

export const ExperienceSchema = z
  .object({
    company_id: z
      .union([z.number(), z.string()])
      .nullish()
      .transform((v) => (v === null || v === undefined ? undefined : String(v))),
    company_name: OptionalString,
    title: OptionalString,
    date_from_year: YearSchema,
    date_to_year: YearSchema,
    active_experience: z
      .union([z.boolean(), z.number()])
      .nullish()
      .transform((v) => v === true || v === 1),
  })
  .passthrough();

export type Experience = z.infer<typeof ExperienceSchema>;

export const EmployeeProfileSchema = z
  .object({
    id: IdSchema,
    full_name: OptionalString,
    headline: OptionalString,
    location_full: OptionalString,
    total_experience_duration_months: OptionalNumber,
    active_experience_title: OptionalString,
    active_experience_management_level: OptionalString,
    inferred_skills: z.array(z.string()).nullish().transform((v) => v ?? []),
    experience: z.array(ExperienceSchema).nullish().transform((v) => v ?? []),
  })
  .passthrough();

export type EmployeeProfile = z.infer<typeof EmployeeProfileSchema>;

// ============ Search Bodies ============

/** Elasticsearch DSL node as accepted by the search endpoints */
export type EsNode = { [key: string]: EsValue };
export type EsValue = string | number | boolean | null | EsNode | EsValue[];

export interface EsSearchBody {
  query: EsNode;
  sort?: EsValue[];
}

export interface EmployeeIdPage {
  ids: string[];
  /** Cursor for the next page, absent on the last one */
  nextAfter?: string;
}
