/**
 * Configuration type definitions
 */
import { z } from "zod";

/**
 * Domain-specific configuration sections
 */
export interface TokenPrices {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens?: number;
  readonly reasoningTokens?: number;
  readonly cachedInputTokens?: number;
}

export interface LlmConfig {
  readonly provider: string;
  readonly apiKey: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxSteps: number;
  readonly tokenPrices: TokenPrices;
}

export interface HistoryConfig {
  readonly maxSymbols: number;
}

export interface PrometheusConfig {
  readonly url: string;
  readonly timeoutMs: number;
}

export interface TrueNasConfig {
  /** Empty when no TrueNAS is configured */
  readonly url: string;
  readonly apiKey: string;
  readonly verifySsl: boolean;
  readonly caCert?: string;
  readonly timeoutMs: number;
}

export interface LoggingConfig {
  readonly format: "pretty" | "json";
}

/**
 * Agent configuration - core functionality settings
 */
export interface AgentConfig {
  readonly history: HistoryConfig;
  readonly llm: LlmConfig;
}

/**
 * Parsed and validated configuration object
 */
export interface Config {
  readonly agent: AgentConfig;
  readonly prometheus: PrometheusConfig;
  readonly truenas: TrueNasConfig;
  readonly logging: LoggingConfig;
}

/**
 * Zod schema for configuration validation
 * Validates the entire configuration object structure
 */
export const configSchema = z.object({
  agent: z.object({
    history: z.object({
      maxSymbols: z.number().int().positive(),
    }),
    llm: z.object({
      provider: z.literal("openai"),
      apiKey: z.string().min(1),
      model: z.string().min(1),
      temperature: z.number().nonnegative(),
      maxSteps: z.number().int().positive(),
      tokenPrices: z.object({
        inputTokens: z.number().nonnegative(),
        outputTokens: z.number().nonnegative(),
        totalTokens: z.number().nonnegative().optional(),
        reasoningTokens: z.number().nonnegative().optional(),
        cachedInputTokens: z.number().nonnegative().optional(),
      }),
    }),
  }),
  prometheus: z.object({
    url: z.string().url(),
    timeoutMs: z.number().int().positive(),
  }),
  truenas: z.object({
    url: z.union([z.literal(""), z.string().url()]),
    apiKey: z.string(),
    verifySsl: z.boolean(),
    caCert: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive(),
  }).refine((t) => t.url === "" || t.apiKey.length > 0, {
    message: "TRUENAS_API_KEY is required when TRUENAS_URL is set",
    path: ["apiKey"],
  }),
  logging: z.object({
    format: z.enum(["pretty", "json"]),
  }),
});
