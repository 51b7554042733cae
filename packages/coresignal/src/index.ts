/**
 * @sourcer/coresignal
 * CoreSignal API client and response types
 */

// Types
export {
  CompanyPreviewSchema,
  CompanyPreviewResponseSchema,
  type CompanyPreview,
  CompanyRecordSchema,
  type CompanyRecord,
  EmployeeIdListSchema,
  EmployeePreviewSchema,
  EmployeePreviewResponseSchema,
  type EmployeePreview,
  ExperienceSchema,
  type Experience,
  EmployeeProfileSchema,
  type EmployeeProfile,
  type EsNode,
  type EsValue,
  type EsSearchBody,
  type EmployeeIdPage,
} from "./types.js";

// Client
export {
  CoreSignalClient,
  getCoreSignalClient,
  resetClient,
  type CoreSignalClientOptions,
} from "./client.js";
