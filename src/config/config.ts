/**
 * Configuration built from environment variables
 */
import type { Config } from "./types.ts";
import { env, envNumberOptional, envStringOptional } from "./utils.ts";
export type { Config };

/**
 * Creates configuration instance from environment variables.
 * The result is not validated yet, see loadConfig.
 */
export function createDefaultConfig(): Config {
  return {
    agent: {
      history: {
        // Maximum total symbols to keep in conversation context
        maxSymbols: env("AGENT_MEMORY_MAX_SYMBOLS", 20000),
      },
      llm: {
        provider: env("AGENT_LLM_PROVIDER", "openai"),
        temperature: env("AGENT_LLM_TEMPERATURE", 0),
        apiKey: env("AGENT_LLM_API_KEY"), // Required, no default
        model: env("AGENT_LLM_MODEL", "gpt-5-mini"),
        maxSteps: env("AGENT_LLM_MAX_STEPS", 10),
        // USD per 1M tokens
        tokenPrices: {
          inputTokens: env("AGENT_LLM_PRICE_INPUT_TOKENS", 0.25),
          outputTokens: env("AGENT_LLM_PRICE_OUTPUT_TOKENS", 2.0),
          totalTokens: envNumberOptional("AGENT_LLM_PRICE_TOTAL_TOKENS"),
          reasoningTokens: envNumberOptional("AGENT_LLM_PRICE_REASONING_TOKENS"),
          cachedInputTokens: envNumberOptional("AGENT_LLM_PRICE_CACHED_INPUT_TOKENS"),
        },
      },
    },
    prometheus: {
      url: env("PROMETHEUS_URL"), // Required, no default
      timeoutMs: env("PROMETHEUS_TIMEOUT_MS", 15_000),
    },
    truenas: {
      // Empty disables the disk inventory
      url: env("TRUENAS_URL", ""),
      apiKey: env("TRUENAS_API_KEY", ""),
      verifySsl: env("TRUENAS_VERIFY_SSL", false),
      caCert: envStringOptional("TRUENAS_CA_CERT"),
      timeoutMs: env("TRUENAS_TIMEOUT_MS", 15_000),
    },
    logging: {
      // "pretty" for development, "json" for production
      format: env("LOGGING_FORMAT", "pretty") as "pretty" | "json",
    },
  };
}
