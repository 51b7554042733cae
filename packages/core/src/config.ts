/**
 * Configuration Management
 * Loads and validates base configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

// Base environment schema - shared across all workspaces
const baseEnvSchema = z.object({
  // Data provider
  CORESIGNAL_API_KEY: z.string().optional(),
  CORESIGNAL_BASE_URL: z.string().url().default("https://api.coresignal.com/cdapi"),
  CORESIGNAL_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Supabase
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().optional(),

  // Scoring
  ANTHROPIC_API_KEY: z.string().optional(),
  SCORING_MODEL: z.string().default("claude-sonnet-4-5-20250929"),

  // General
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type BaseEnv = z.infer<typeof baseEnvSchema>;

/**
 * Base configuration - shared across all workspaces
 */
export interface BaseConfig {
  coresignal: {
    apiKey?: string;
    baseUrl: string;
    timeoutMs: number;
  };

  supabase?: {
    url: string;
    key: string;
  };

  scoring: {
    anthropicApiKey?: string;
    model: string;
  };

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    nodeEnv: "development" | "production" | "test";
  };
}

let baseConfigInstance: BaseConfig | null = null;

/**
 * Load and validate base configuration
 */
export function loadBaseConfig(source: NodeJS.ProcessEnv = process.env): BaseConfig {
  const parseResult = baseEnvSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  const env = parseResult.data;

  return {
    coresignal: {
      apiKey: env.CORESIGNAL_API_KEY,
      baseUrl: env.CORESIGNAL_BASE_URL.replace(/\/+$/, ""),
      timeoutMs: env.CORESIGNAL_TIMEOUT_MS,
    },

    supabase: env.SUPABASE_URL && env.SUPABASE_KEY
      ? {
          url: env.SUPABASE_URL,
          key: env.SUPABASE_KEY,
        }
      : undefined,

    scoring: {
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      model: env.SCORING_MODEL,
    },

    env: {
      logLevel: env.LOG_LEVEL,
      nodeEnv: env.NODE_ENV,
    },
  };
}

/**
 * Get base configuration (lazy-loaded singleton)
 */
export function getBaseConfig(): BaseConfig {
  if (!baseConfigInstance) {
    baseConfigInstance = loadBaseConfig();
  }
  return baseConfigInstance;
}

/**
 * Reset config (for testing)
 */
export function resetBaseConfig(): void {
  baseConfigInstance = null;
}
