/**
 * Main application entry point
 * Initializes all components and starts the chat
 */

import { createOpenAI } from "@ai-sdk/openai";
import { loadConfig } from "./config/load.ts";
import { toJSONWithoutPII } from "./config/utils.ts";
import { initializeLogger, log } from "./utils/logger.ts";
import { MainAgent } from "./agent/main-agent.ts";
import { ContextBuilder } from "./agent/context/builder.ts";
import { PrometheusClient } from "./clients/prometheus.ts";
import { TrueNasClient } from "./clients/truenas.ts";
import { createCostCalculator } from "./llm/cost.ts";
import { runRepl } from "./cli/repl.ts";

/**
 * Initializes the agent and runs the chat until the user leaves
 */
export async function startAgent(): Promise<void> {
  const config = loadConfig();

  initializeLogger(config.logging.format);

  // Log startup configuration (mask sensitive data)
  log({ mod: "boot", event: "config_loaded", config: toJSONWithoutPII(config) });

  const metrics = new PrometheusClient({
    baseUrl: config.prometheus.url,
    timeoutMs: config.prometheus.timeoutMs,
  });
  const inventory = config.truenas.url
    ? new TrueNasClient({
      baseUrl: config.truenas.url,
      apiKey: config.truenas.apiKey,
      timeoutMs: config.truenas.timeoutMs,
      verifySsl: config.truenas.verifySsl,
      caCert: config.truenas.caCert,
    })
    : null;
  if (!inventory) {
    log({ mod: "boot", event: "truenas_not_configured", level: "warn" });
  }

  const llmProvider = createOpenAI({ apiKey: config.agent.llm.apiKey });
  const costCalculator = createCostCalculator(config.agent.llm.tokenPrices);
  const mainAgent = new MainAgent({
    llmModel: llmProvider(config.agent.llm.model),
    llmTemperature: config.agent.llm.temperature,
    contextBuilder: new ContextBuilder(config.agent.history.maxSymbols),
    costCalculator,
    powerDeps: { metrics, inventory },
    maxSteps: config.agent.llm.maxSteps,
  });

  log({ mod: "boot", event: "started", model: config.agent.llm.model });
  await runRepl({ agent: mainAgent, costCalculator });
}
