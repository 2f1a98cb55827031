/**
 * Configuration tests
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import { createDefaultConfig } from "./config.ts";
import { clearConfigCache, loadConfig, parseDotEnv } from "./load.ts";

const MANAGED = /^(AGENT_|PROMETHEUS_|TRUENAS_|LOGGING_)/;
const originalEnv = { ...process.env };
let dir: string;

function setTestEnv(env: Record<string, string>) {
  clearConfigCache();
  for (const key of Object.keys(process.env)) {
    if (MANAGED.test(key)) delete process.env[key];
  }
  Object.assign(process.env, env);
}

const REQUIRED = {
  AGENT_LLM_API_KEY: "test-secret",
  PROMETHEUS_URL: "http://prometheus.test:9090",
};

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "config-test-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  setTestEnv({});
  for (const [key, value] of Object.entries(originalEnv)) {
    if (MANAGED.test(key) && value !== undefined) process.env[key] = value;
  }
  clearConfigCache();
});

test("config: loadConfig caches configuration", () => {
  setTestEnv(REQUIRED);

  const config1 = loadConfig(dir);
  expect(config1.prometheus.url).toBe("http://prometheus.test:9090");

  process.env.PROMETHEUS_URL = "http://other.test:9090";
  const config2 = loadConfig(dir);
  expect(config2).toBe(config1);
});

test("config: clearConfigCache forces a reload", () => {
  setTestEnv(REQUIRED);
  loadConfig(dir);

  process.env.PROMETHEUS_URL = "http://other.test:9090";
  clearConfigCache();
  expect(loadConfig(dir).prometheus.url).toBe("http://other.test:9090");
});

test("config: loadConfig validates required fields", () => {
  setTestEnv({ AGENT_LLM_API_KEY: "test-secret" });
  expect(() => loadConfig(dir)).toThrow("Required environment variable PROMETHEUS_URL is not set");
});

test("config: loadConfig rejects an invalid Prometheus URL", () => {
  setTestEnv({ ...REQUIRED, PROMETHEUS_URL: "not a url" });
  expect(() => loadConfig(dir)).toThrow();
});

test("config: TrueNAS API key is required once TrueNAS URL is set", () => {
  setTestEnv({ ...REQUIRED, TRUENAS_URL: "https://truenas.test" });
  expect(() => loadConfig(dir)).toThrow("TRUENAS_API_KEY is required when TRUENAS_URL is set");
});

test("config: handles .env file loading", () => {
  setTestEnv({ AGENT_LLM_API_KEY: "from-environment" });
  writeFileSync(
    join(dir, ".env"),
    "# local overrides\nPROMETHEUS_URL=\"http://from-dotenv.test:9090\"\nAGENT_LLM_API_KEY=from-dotenv\n",
  );

  const config = loadConfig(dir);
  expect(config.prometheus.url).toBe("http://from-dotenv.test:9090");
  // the environment wins over .env
  expect(config.agent.llm.apiKey).toBe("from-environment");
});

test("config: createDefaultConfig uses environment variables", () => {
  setTestEnv({
    ...REQUIRED,
    PROMETHEUS_TIMEOUT_MS: "5000",
    TRUENAS_URL: "https://truenas.test",
    TRUENAS_API_KEY: "test-secret",
    TRUENAS_VERIFY_SSL: "true",
    TRUENAS_CA_CERT: "/etc/ssl/truenas.pem",
    AGENT_LLM_MODEL: "gpt-test",
    AGENT_LLM_TEMPERATURE: "0.5",
    LOGGING_FORMAT: "json",
  });

  const config = createDefaultConfig();
  expect(config.prometheus.timeoutMs).toBe(5000);
  expect(config.truenas).toEqual({
    url: "https://truenas.test",
    apiKey: "test-secret",
    verifySsl: true,
    caCert: "/etc/ssl/truenas.pem",
    timeoutMs: 15000,
  });
  expect(config.agent.llm.model).toBe("gpt-test");
  expect(config.agent.llm.temperature).toBe(0.5);
  expect(config.logging.format).toBe("json");
});

test("config: createDefaultConfig uses defaults when env vars not set", () => {
  setTestEnv(REQUIRED);

  const config = createDefaultConfig();
  expect(config.prometheus.timeoutMs).toBe(15000);
  expect(config.truenas.url).toBe("");
  expect(config.truenas.verifySsl).toBe(false);
  expect(config.truenas.caCert).toBeUndefined();
  expect(config.agent.llm.provider).toBe("openai");
  expect(config.agent.llm.model).toBe("gpt-5-mini");
  expect(config.agent.llm.maxSteps).toBe(10);
  expect(config.agent.history.maxSymbols).toBe(20000);
  expect(config.logging.format).toBe("pretty");
});

test("config: unsupported log format is rejected", () => {
  setTestEnv({ ...REQUIRED, LOGGING_FORMAT: "xml" });
  expect(() => loadConfig(dir)).toThrow();
});

test("parseDotEnv: skips comments and strips quotes", () => {
  expect(parseDotEnv("# comment\n\nA=1\nB = 'two'\nC=\"x=y\"\nbroken line\n")).toEqual({
    A: "1",
    B: "two",
    C: "x=y",
  });
});
