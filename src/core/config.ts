import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

/**
 * Configuration Management
 * Loads and validates all config from environment variables
 */

const envSchema = z.object({
  // Anthropic (classification, web research, answers)
  ANTHROPIC_API_KEY: z.string().min(1, "ANTHROPIC_API_KEY is required"),

  // OpenAI (embeddings)
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),

  // Supabase (entity store)
  SUPABASE_URL: z.string().url("SUPABASE_URL must be a valid URL"),
  SUPABASE_KEY: z.string().min(1, "SUPABASE_KEY is required"),

  // Optional providers
  YOUTUBE_API_KEY: z.string().optional(),
  BGG_API_TOKEN: z.string().optional(),

  // Optional overrides
  DEFAULT_MODEL: z.enum(["haiku", "sonnet", "opus"]).default("sonnet"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty"),
  DATA_DIR: z.string().default("./data"),
  PUBLIC_BASE_URL: z.string().url().default("http://localhost:8000"),
  CRAWLER_USER_AGENT: z.string().default("GameScout/1.0 (+https://example.com/game-scout)"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
});

export type Env = z.infer<typeof envSchema>;

export type ModelName = "haiku" | "sonnet" | "opus";
export type ProfileName = "extract" | "research" | "search" | "answer";

// Agent profile configuration
export interface AgentProfile {
  model: ModelName;
  maxTurns: number;
  maxBudgetUsd: number;
  tools: string[];
  retries: number;
  backoffMs: number;
}

export interface ResearchLimits {
  /** Cap on sources returned by web-research discovery */
  maxSources: number;
  /** Characters of reference-page content handed to metadata extraction */
  metadataChars: number;
  /** Sources saved in parallel */
  saveConcurrency: number;
  /** Sources and characters used for the description summary */
  descriptionSources: number;
  descriptionCharsPerSource: number;
  descriptionChars: number;
  /** Video validation timeout */
  videoValidationTimeoutMs: number;
}

export interface IndexLimits {
  chunkWords: number;
  chunkOverlap: number;
  embedBatchSize: number;
  topK: number;
}

export interface AnswerLimits {
  historyWindow: number;
  fuzzyThreshold: number;
  contextChars: number;
  maxInternalCitations: number;
}

// Validated configuration
export interface Config {
  anthropic: {
    apiKey: string;
  };

  openai: {
    apiKey: string;
    embeddingModel: string;
  };

  supabase: {
    url: string;
    key: string;
  };

  youtube: {
    apiKey?: string;
  };

  bgg: {
    apiToken?: string;
  };

  http: {
    userAgent: string;
    timeoutMs: number;
  };

  defaults: {
    model: ModelName;
    logLevel: "debug" | "info" | "warn" | "error";
    logFormat: "pretty" | "json";
    dataDir: string;
    publicBaseUrl: string;
  };

  research: ResearchLimits;
  index: IndexLimits;
  answer: AnswerLimits;

  profiles: Record<ProfileName, AgentProfile>;
}

export const DEFAULT_RESEARCH_LIMITS: ResearchLimits = {
  maxSources: 30,
  metadataChars: 8000,
  saveConcurrency: 4,
  descriptionSources: 5,
  descriptionCharsPerSource: 1000,
  descriptionChars: 2000,
  videoValidationTimeoutMs: 10000,
};

export const DEFAULT_INDEX_LIMITS: IndexLimits = {
  chunkWords: 1000,
  chunkOverlap: 200,
  embedBatchSize: 64,
  topK: 5,
};

export const DEFAULT_ANSWER_LIMITS: AnswerLimits = {
  historyWindow: 200,
  fuzzyThreshold: 0.6,
  contextChars: 10000,
  maxInternalCitations: 5,
};

/**
 * Load and validate configuration from an environment map
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`, {
      fields: parseResult.error.issues.map((e) => e.path.join(".")),
    });
  }

  const env = parseResult.data;

  return {
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY,
    },

    openai: {
      apiKey: env.OPENAI_API_KEY,
      embeddingModel: env.EMBEDDING_MODEL,
    },

    supabase: {
      url: env.SUPABASE_URL,
      key: env.SUPABASE_KEY,
    },

    youtube: {
      apiKey: env.YOUTUBE_API_KEY,
    },

    bgg: {
      apiToken: env.BGG_API_TOKEN,
    },

    http: {
      userAgent: env.CRAWLER_USER_AGENT,
      timeoutMs: env.REQUEST_TIMEOUT_MS,
    },

    defaults: {
      model: env.DEFAULT_MODEL,
      logLevel: env.LOG_LEVEL,
      logFormat: env.LOG_FORMAT,
      dataDir: env.DATA_DIR,
      publicBaseUrl: env.PUBLIC_BASE_URL.replace(/\/+$/, ""),
    },

    research: { ...DEFAULT_RESEARCH_LIMITS },
    index: { ...DEFAULT_INDEX_LIMITS },
    answer: { ...DEFAULT_ANSWER_LIMITS },

    // ============================================================
    // AGENT PROFILES
    // Budgets are per agent run, not per research run
    // ============================================================
    profiles: {
      // Structured extraction: game names, page metadata, descriptions
      extract: {
        model: "haiku",
        maxTurns: 2,
        maxBudgetUsd: 0.1,
        tools: [],
        retries: 2,
        backoffMs: 1000,
      },

      // Source discovery over live web search
      research: {
        model: env.DEFAULT_MODEL,
        maxTurns: 12,
        maxBudgetUsd: 0.75,
        tools: ["WebSearch"],
        retries: 2,
        backoffMs: 2000,
      },

      // Single targeted web search (reference page / video fallback)
      search: {
        model: "haiku",
        maxTurns: 4,
        maxBudgetUsd: 0.2,
        tools: ["WebSearch"],
        retries: 1,
        backoffMs: 1000,
      },

      // Hybrid answers: indexed context plus live search
      answer: {
        model: env.DEFAULT_MODEL,
        maxTurns: 8,
        maxBudgetUsd: 0.5,
        tools: ["WebSearch"],
        retries: 2,
        backoffMs: 1000,
      },
    },
  };
}

// Singleton config instance
let configInstance: Config | null = null;

/**
 * Get configuration (lazy-loaded singleton)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
