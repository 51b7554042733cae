/**
 * Provider Interfaces
 * What the pipeline needs from a people/company data provider
 */

import type { StructuredQuery } from "../query/index.js";
import type { CandidatePreview, CandidateProfile, OrganizationRecord } from "../types.js";

export interface CandidateProvider {
  /** All matching candidate ids, at most `cap`. Free. */
  searchIds(query: StructuredQuery, cap: number): Promise<string[]>;
  /** Top preview records, at most `limit`. Free. */
  preview(query: StructuredQuery, limit: number): Promise<CandidatePreview[]>;
  /** Full record. Metered. */
  fetchCandidate(id: string): Promise<CandidateProfile>;
}

export interface OrganizationProvider {
  /** Full organization record. Metered. */
  fetchOrganization(id: string): Promise<OrganizationRecord>;
}
