import { describe, expect, it } from "vitest";
import {
  ExternalFetchError,
  InvalidPaginationRequestError,
  ProviderError,
  SourcerError,
  isRetryableError,
  wrapError,
} from "./errors.js";

describe("isRetryableError", () => {
  it("follows the flag on sourcer errors", () => {
    expect(isRetryableError(new ExternalFetchError("down"))).toBe(true);
    expect(isRetryableError(new ExternalFetchError("gone", { retryable: false }))).toBe(false);
  });

  it("retries provider rate limits and outages, not client errors", () => {
    expect(isRetryableError(new ProviderError("slow down", { statusCode: 429 }))).toBe(true);
    expect(isRetryableError(new ProviderError("outage", { statusCode: 503 }))).toBe(true);
    expect(isRetryableError(new ProviderError("not found", { statusCode: 404 }))).toBe(false);
  });

  it("recognises transient failures in plain errors", () => {
    expect(isRetryableError(new Error("socket ECONNRESET"))).toBe(true);
    expect(isRetryableError(new Error("bad input"))).toBe(false);
    expect(isRetryableError("timeout")).toBe(false);
  });
});

describe("wrapError", () => {
  it("keeps sourcer errors as they are", () => {
    const error = new InvalidPaginationRequestError(150, 50, 120);
    expect(wrapError(error)).toBe(error);
  });

  it("wraps plain errors and strings with an unknown code", () => {
    const wrapped = wrapError(new Error("boom"));
    expect(wrapped).toBeInstanceOf(SourcerError);
    expect([wrapped.code, wrapped.message]).toEqual(["UNKNOWN_ERROR", "boom"]);
    expect(wrapError("plain").message).toBe("plain");
    expect(wrapError(42).message).toBe("Unknown error");
  });
});
