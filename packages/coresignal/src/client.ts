/**
 * CoreSignal API Client
 * Search (free) and collect (metered) endpoints with validation and error mapping
 */

import {
  getBaseConfig,
  logger,
  ConfigError,
  ExternalFetchTimeoutError,
  NetworkError,
  ProviderError,
  type ChildLogger,
} from "@sourcer/core";
import {
  CompanyPreviewResponseSchema,
  CompanyRecordSchema,
  EmployeeIdListSchema,
  EmployeePreviewResponseSchema,
  EmployeeProfileSchema,
  type CompanyPreview,
  type CompanyRecord,
  type EmployeeIdPage,
  type EmployeePreview,
  type EmployeeProfile,
  type EsSearchBody,
} from "./types.js";

const EMPLOYEE_DATASET = "employee_multi_source";
const COMPANY_DATASET = "company_multi_source";

/** Header carrying the cursor of the next id page */
const NEXT_PAGE_HEADER = "x-next-page-after";

export interface CoreSignalClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

interface Schema<T> {
  parse: (data: unknown) => T;
}

interface RequestResult<T> {
  data: T;
  headers: Headers;
}

export class CoreSignalClient {
  private log: ChildLogger;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: CoreSignalClientOptions = {}) {
    this.log = logger.child({ component: "coresignal" });

    const needsConfig = !options.apiKey || !options.baseUrl || !options.timeoutMs;
    const config = needsConfig ? getBaseConfig().coresignal : undefined;

    const apiKey = options.apiKey ?? config?.apiKey;
    if (!apiKey) {
      throw new ConfigError("Missing CORESIGNAL_API_KEY");
    }

    this.apiKey = apiKey;
    this.baseUrl = (options.baseUrl ?? config?.baseUrl ?? "https://api.coresignal.com/cdapi").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? config?.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Make a request and validate the JSON body
   */
  async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: Schema<T>,
    body?: object
  ): Promise<RequestResult<T>> {
    const url = `${this.baseUrl}${path}`;
    this.log.debug("CoreSignal request", { method, path });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          apikey: this.apiKey,
          Accept: "application/json",
          ...(body ? { "Content-Type": "application/json" } : {}),
        },
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new ExternalFetchTimeoutError(`CoreSignal ${method} ${path}`, this.timeoutMs);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Failed to reach CoreSignal API: ${message}`, error);
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new ProviderError(`CoreSignal API error: ${errorText.slice(0, 300)}`, {
        statusCode: response.status,
        endpoint: path,
      });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new ProviderError("CoreSignal API returned invalid JSON", {
        cause: error,
        statusCode: response.status,
        endpoint: path,
      });
    }

    try {
      return { data: schema.parse(json), headers: response.headers };
    } catch (error) {
      throw new ProviderError("CoreSignal API response failed validation", {
        cause: error,
        statusCode: response.status,
        endpoint: path,
      });
    }
  }

  // ============ Company Endpoints (free) ============

  /**
   * Look up companies by their normalized website domain
   */
  async searchCompaniesByWebsite(domain: string, limit = 5): Promise<CompanyPreview[]> {
    const body = {
      query: {
        bool: {
          should: [
            { term: { "website.domain_only": domain } },
            { match_phrase: { website: domain } },
          ],
          minimum_should_match: 1,
        },
      },
    };
    const { data } = await this.request(
      "POST",
      `/v2/${COMPANY_DATASET}/search/es_dsl/preview`,
      CompanyPreviewResponseSchema,
      body
    );
    return data.slice(0, limit);
  }

  /**
   * Search companies by name: exact phrase boosted over fuzzy match
   */
  async searchCompaniesByName(name: string, limit = 5): Promise<CompanyPreview[]> {
    const body = {
      query: {
        bool: {
          should: [
            { match_phrase: { name: { query: name, boost: 3.0 } } },
            { match: { name: { query: name, fuzziness: "AUTO", boost: 1.0 } } },
          ],
          minimum_should_match: 1,
        },
      },
    };
    const { data } = await this.request(
      "POST",
      `/v2/${COMPANY_DATASET}/search/es_dsl/preview`,
      CompanyPreviewResponseSchema,
      body
    );
    return data.slice(0, limit);
  }

  // ============ Employee Endpoints (free) ============

  /**
   * One page of matching employee ids (the API returns up to 1000 per page)
   */
  async searchEmployeeIds(body: EsSearchBody, after?: string): Promise<EmployeeIdPage> {
    const query = after ? `?after=${encodeURIComponent(after)}` : "";
    const { data, headers } = await this.request(
      "POST",
      `/v2/${EMPLOYEE_DATASET}/search/es_dsl${query}`,
      EmployeeIdListSchema,
      body
    );
    const nextAfter = headers.get(NEXT_PAGE_HEADER) ?? undefined;
    return { ids: data, nextAfter: nextAfter || undefined };
  }

  /**
   * One page of preview records (free, bounded page size)
   */
  async previewEmployees(body: EsSearchBody, page = 1): Promise<EmployeePreview[]> {
    const { data } = await this.request(
      "POST",
      `/v2/${EMPLOYEE_DATASET}/search/es_dsl/preview?page=${page}`,
      EmployeePreviewResponseSchema,
      body
    );
    return data;
  }

  // ============ Collect Endpoints (1 credit each) ============

  async collectEmployee(id: string): Promise<EmployeeProfile> {
    const { data } = await this.request(
      "GET",
      `/v2/${EMPLOYEE_DATASET}/collect/${encodeURIComponent(id)}`,
      EmployeeProfileSchema
    );
    return data;
  }

  async collectCompany(id: string): Promise<CompanyRecord> {
    const { data } = await this.request(
      "GET",
      `/v2/${COMPANY_DATASET}/collect/${encodeURIComponent(id)}`,
      CompanyRecordSchema
    );
    return data;
  }
}

// Singleton instance
let clientInstance: CoreSignalClient | null = null;

/**
 * Get the CoreSignal client instance
 */
export function getCoreSignalClient(): CoreSignalClient {
  if (!clientInstance) {
    clientInstance = new CoreSignalClient();
  }
  return clientInstance;
}

/**
 * Reset client (for testing)
 */
export function resetClient(): void {
  clientInstance = null;
}
