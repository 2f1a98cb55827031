import { readFileSync } from "node:fs";
import { join } from "node:path";
import type { Config } from "./types.ts";
import { configSchema } from "./types.ts";
import { createDefaultConfig } from "./config.ts";

/**
 * Parses KEY=value lines of a .env file. Comments and blank lines are skipped,
 * surrounding quotes removed.
 */
export function parseDotEnv(content: string): Record<string, string> {
  const env: Record<string, string> = {};

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }

    const equalIndex = trimmed.indexOf("=");
    if (equalIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, equalIndex).trim();
    const value = trimmed.slice(equalIndex + 1).trim();
    env[key] = value.replace(/^["']|["']$/g, "");
  }

  return env;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Loads environment variables from .env file if it exists
 * @returns Object with environment variables from .env file
 */
function loadDotEnv(dir: string): Record<string, string> {
  try {
    return parseDotEnv(readFileSync(join(dir, ".env"), "utf8"));
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw error;
  }
}

/**
 * Cached configuration instance
 */
let cachedConfig: Config | null = null;

/**
 * Clears the configuration cache
 * Used for testing purposes
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Loads and validates environment configuration.
 * Variables from `<dir>/.env` fill in what the environment does not set.
 * @throws {Error} if required variables are missing or invalid
 */
export function loadConfig(dir: string = process.cwd()): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  for (const [key, value] of Object.entries(loadDotEnv(dir))) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }

  cachedConfig = configSchema.parse(createDefaultConfig());
  return cachedConfig;
}
