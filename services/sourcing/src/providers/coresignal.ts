/**
 * CoreSignal Adapters
 * Map the CoreSignal client onto the resolver and pipeline provider interfaces
 */

import {
  ExternalFetchError,
  isRetryableError,
  logger,
  type ChildLogger,
} from "@sourcer/core";
import type {
  CompanyPreview,
  CompanyRecord,
  CoreSignalClient,
  EmployeePreview,
  EmployeeProfile,
} from "@sourcer/coresignal";
import { toSearchBody, type StructuredQuery } from "../query/index.js";
import type { OrganizationSearchProvider } from "../resolver/index.js";
import type {
  CandidatePreview,
  CandidateProfile,
  EntityMatch,
  OrganizationRecord,
} from "../types.js";
import type { CandidateProvider, OrganizationProvider } from "./types.js";

/** Hard stop for cursor and page loops */
const MAX_PAGES = 50;

/**
 * A client, or a factory called on each request so commands that never reach
 * the provider run without its credentials
 */
export type ClientSource = CoreSignalClient | (() => CoreSignalClient);

abstract class CoreSignalAdapter {
  constructor(private readonly source: ClientSource) {}

  protected get client(): CoreSignalClient {
    return typeof this.source === "function" ? this.source() : this.source;
  }
}

// ============ Normalizers ============

export function toEntityMatch(company: CompanyPreview): EntityMatch {
  return { id: company.id, name: company.name, website: company.website };
}

export function toOrganizationRecord(company: CompanyRecord): OrganizationRecord {
  return {
    id: company.id,
    name: company.name,
    website: company.website,
    industry: company.industry,
    sizeRange: company.size_range,
    employeeCount: company.employees_count,
    foundedYear: company.founded_year,
    country: company.hq_country,
    description: company.description,
  };
}

export function toCandidatePreview(employee: EmployeePreview): CandidatePreview {
  return {
    id: employee.id,
    fullName: employee.full_name,
    headline: employee.headline,
    title: employee.active_experience_title,
    organizationId: employee.active_experience_company_id,
    location: employee.location_full,
  };
}

export function toCandidateProfile(employee: EmployeeProfile): CandidateProfile {
  return {
    id: employee.id,
    fullName: employee.full_name,
    headline: employee.headline,
    location: employee.location_full,
    title: employee.active_experience_title,
    managementLevel: employee.active_experience_management_level,
    totalExperienceMonths: employee.total_experience_duration_months,
    skills: employee.inferred_skills,
    experience: employee.experience.map((e) => ({
      organizationId: e.company_id,
      organizationName: e.company_name,
      title: e.title,
      startYear: e.date_from_year,
      endYear: e.date_to_year,
      current: e.active_experience,
    })),
  };
}

function fetchFailure(kind: string, id: string, error: unknown): ExternalFetchError {
  return new ExternalFetchError(
    `Failed to collect ${kind} ${id}: ${error instanceof Error ? error.message : String(error)}`,
    { itemId: id, cause: error, retryable: isRetryableError(error) }
  );
}

// ============ Organizations ============

export class CoreSignalOrganizationSearch extends CoreSignalAdapter implements OrganizationSearchProvider {
  async findByWebsite(domain: string): Promise<EntityMatch[]> {
    const companies = await this.client.searchCompaniesByWebsite(domain);
    return companies.map(toEntityMatch);
  }

  async searchByName(name: string): Promise<EntityMatch[]> {
    const companies = await this.client.searchCompaniesByName(name);
    return companies.map(toEntityMatch);
  }
}

export class CoreSignalOrganizationProvider extends CoreSignalAdapter implements OrganizationProvider {
  async fetchOrganization(id: string): Promise<OrganizationRecord> {
    try {
      return toOrganizationRecord(await this.client.collectCompany(id));
    } catch (error) {
      throw fetchFailure("organization", id, error);
    }
  }
}

// ============ Candidates ============

export class CoreSignalCandidateProvider extends CoreSignalAdapter implements CandidateProvider {
  private readonly log: ChildLogger;

  constructor(source: ClientSource) {
    super(source);
    this.log = logger.child({ component: "coresignal-candidates" });
  }

  /**
   * Follow the search cursor until the ids run out or the cap is reached
   */
  async searchIds(query: StructuredQuery, cap: number): Promise<string[]> {
    const body = toSearchBody(query);
    const seen = new Set<string>();
    let after: string | undefined;

    for (let page = 0; page < MAX_PAGES && seen.size < cap; page++) {
      const result = await this.client.searchEmployeeIds(body, after);
      for (const id of result.ids) {
        if (seen.size >= cap) break;
        seen.add(id);
      }
      if (!result.nextAfter || result.ids.length === 0) break;
      after = result.nextAfter;
    }

    this.log.debug("Candidate ids searched", { count: seen.size, cap });
    return [...seen];
  }

  async preview(query: StructuredQuery, limit: number): Promise<CandidatePreview[]> {
    const body = toSearchBody(query);
    const previews: CandidatePreview[] = [];

    for (let page = 1; page <= MAX_PAGES && previews.length < limit; page++) {
      const batch = await this.client.previewEmployees(body, page);
      if (batch.length === 0) break;
      previews.push(...batch.slice(0, limit - previews.length).map(toCandidatePreview));
    }

    return previews;
  }

  async fetchCandidate(id: string): Promise<CandidateProfile> {
    try {
      return toCandidateProfile(await this.client.collectEmployee(id));
    } catch (error) {
      throw fetchFailure("candidate", id, error);
    }
  }
}
