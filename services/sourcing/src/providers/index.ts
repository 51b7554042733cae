export type { CandidateProvider, OrganizationProvider } from "./types.js";
export {
  CoreSignalCandidateProvider,
  CoreSignalOrganizationProvider,
  CoreSignalOrganizationSearch,
  toCandidatePreview,
  toCandidateProfile,
  toEntityMatch,
  toOrganizationRecord,
  type ClientSource,
} from "./coresignal.js";
