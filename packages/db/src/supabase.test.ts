import { afterEach, describe, expect, it, vi } from "vitest";
import { resetBaseConfig } from "@sourcer/core";
import { getSupabase, isSupabaseConfigured, resetSupabase } from "./supabase.js";

describe("getSupabase", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetBaseConfig();
    resetSupabase();
  });

  it("reuses one client until it is reset", () => {
    vi.stubEnv("SUPABASE_URL", "https://db.test");
    vi.stubEnv("SUPABASE_KEY", "test-secret");
    resetBaseConfig();

    const first = getSupabase();

    expect(isSupabaseConfigured()).toBe(true);
    expect(getSupabase()).toBe(first);
    resetSupabase();
    expect(getSupabase()).not.toBe(first);
  });
});
