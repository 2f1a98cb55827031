/**
 * Agent facade - unified interface for LLM interactions, conversation history,
 * and tool orchestration.
 *
 * Encapsulates LLM model, conversation history, and tools
 * to provide clean public API for user queries.
 */

import type { LanguageModelV2, LanguageModelV2Usage } from "@ai-sdk/provider";
import {
  Experimental_Agent as Agent,
  stepCountIs,
  type TypedToolCall,
  type TypedToolResult,
} from "ai";
import { ContextBuilder } from "./context/builder.ts";
import { createHddPowerStatusTool } from "./tools/index.ts";
import type { HddPowerStatusDeps } from "../power/report.ts";
import type { CostCalculator } from "../llm/cost.ts";
import { log } from "../utils/logger.ts";

export type AgentTools = {
  hdd_power_status: ReturnType<typeof createHddPowerStatusTool>;
};

export type deltaTextHandler = (delta: string) => void;
export type beforeCallThoughts = (thoughts: string) => void;
export type beforeCallHandler = (call: TypedToolCall<AgentTools>) => void;
export type afterCallHandler = (result: TypedToolResult<AgentTools>) => void;

export interface UserQuery {
  userQuery: string;
  correlationId?: string;
  /** Streaming callback for incremental assistant text */
  onTextDelta?: deltaTextHandler;
  /** Model's visible "thoughts" text right before executing tools */
  onThoughts?: beforeCallThoughts;
  beforeCall?: beforeCallHandler;
  afterCall?: afterCallHandler;
}

export interface AgentAnswer {
  text: string;
  cost: number;
  usage: LanguageModelV2Usage;
}

export interface MainAgentAPI {
  processUserQuery(input: UserQuery): Promise<AgentAnswer>;
  resetHistory(): void;
}

export interface MainAgentParams {
  llmModel: LanguageModelV2;
  llmTemperature: number;
  contextBuilder: ContextBuilder;
  costCalculator: CostCalculator;
  powerDeps: HddPowerStatusDeps;
  /** Maximum number of agent steps per user query (default: 10) */
  maxSteps?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Calls a user-supplied hook; a throwing hook must not break the stream.
 */
function safeCall<T>(event: string, hook: ((arg: T) => void) | undefined, arg: T): void {
  try {
    hook?.(arg);
  } catch (e) {
    log({ mod: "agent", level: "debug", event, error: errorMessage(e) });
  }
}

export class MainAgent implements MainAgentAPI {
  private readonly llmModel: LanguageModelV2;
  private readonly llmTemperature: number;
  private readonly contextBuilder: ContextBuilder;
  private readonly costCalculator: CostCalculator;
  private readonly tools: AgentTools;
  private readonly maxSteps: number;

  constructor(params: MainAgentParams) {
    this.llmModel = params.llmModel;
    this.llmTemperature = params.llmTemperature;
    this.contextBuilder = params.contextBuilder;
    this.costCalculator = params.costCalculator;
    this.tools = { hdd_power_status: createHddPowerStatusTool(params.powerDeps) };
    this.maxSteps = params.maxSteps ?? 10;
  }

  /**
   * Processes user query in dialog context.
   * Returns the final assistant text together with the cost of the query.
   */
  async processUserQuery({
    userQuery,
    correlationId,
    onTextDelta,
    onThoughts,
    beforeCall,
    afterCall,
  }: UserQuery): Promise<AgentAnswer> {
    if (!userQuery || userQuery.trim().length < 2) {
      throw new Error("Query text must be at least 2 characters long");
    }
    log({
      mod: "agent",
      event: "process_user_query_start",
      correlationId,
      textLength: userQuery.length,
    });

    this.contextBuilder.append({ role: "user", content: userQuery });
    const { systemPrompt, messages } = this.contextBuilder.getContext(SYSTEM_PROMPT_TEMPLATE);

    const agent = new Agent({
      model: this.llmModel,
      system: systemPrompt,
      temperature: this.llmTemperature,
      tools: this.tools,
      stopWhen: [stepCountIs(this.maxSteps)],
      onStepFinish: (step) => {
        this.contextBuilder.appendStepMessages(step.response.messages);
      },
    });

    try {
      log({ mod: "agent", level: "debug", event: "agent_context", correlationId, messages });
      const { fullStream, text, totalUsage } = agent.stream({ messages });

      let preToolBuffer = "";
      let seenTool = false;

      for await (const part of fullStream) {
        switch (part.type) {
          case "text-delta": {
            if (!seenTool) preToolBuffer += part.text;
            safeCall("onTextDelta_error", onTextDelta, part.text);
            break;
          }
          case "tool-call": {
            // text before the first tool call is the model's plan
            if (!seenTool && preToolBuffer) {
              safeCall("onThoughts_error", onThoughts, preToolBuffer);
            }
            seenTool = true;
            log({
              mod: "agent",
              event: "tool_call",
              correlationId,
              toolName: part.toolName,
              input: part.input,
            });
            safeCall("onBeforeCall_error", beforeCall, part);
            break;
          }
          case "tool-result": {
            safeCall("onAfterCall_error", afterCall, part);
            break;
          }
          case "tool-error": {
            log({
              mod: "agent",
              level: "error",
              event: "stream_tool_error",
              correlationId,
              toolName: part.toolName,
              error: errorMessage(part.error),
            });
            throw new Error(`Tool ${part.toolName} failed: ${errorMessage(part.error)}`);
          }
          case "error": {
            log({
              mod: "agent",
              level: "error",
              event: "stream_error",
              correlationId,
              error: errorMessage(part.error),
            });
            throw new Error(`Stream error: ${errorMessage(part.error)}`);
          }
          case "abort": {
            log({ mod: "agent", level: "error", event: "stream_abort", correlationId });
            throw new Error("Stream aborted");
          }
          default:
            // start, finish, reasoning and other parts carry nothing for the chat
            break;
        }
      }

      const lastStepText = await text;
      const usage = await totalUsage;
      const cost = this.costCalculator.calcCosts(usage);

      log({
        mod: "agent",
        event: "process_user_query_success",
        correlationId,
        responseLength: lastStepText.length,
        cost,
      });

      return { text: lastStepText, cost, usage };
    } catch (error) {
      log({
        mod: "agent",
        level: "error",
        event: "process_user_query_error",
        correlationId,
        error: errorMessage(error),
      });
      throw error;
    }
  }

  resetHistory(): void {
    this.contextBuilder.reset();
    log({ mod: "agent", event: "history_reset" });
  }
}

export const SYSTEM_PROMPT_TEMPLATE = `# Home-Lab Operations Assistant

## Role
You answer questions about the home lab's storage: which hard disks are spinning, which are in standby, how often they change state, and when they last did. Current time: {{CURRENT_TIME}}.

## Data sources
* **Prometheus** scrapes \`disk_power_state\` from disk-status-exporter on TrueNAS (one series per HDD, labelled by device and pool).
* **TrueNAS** disk inventory maps device identifiers to model, size, serial and pool.

## Available Tools

- **hdd_power_status** - complete HDD power summary:
  * request: { "duration": "<window such as 1h, 6h, 24h, 3d, 1w; default 24h>", "pool": "<optional ZFS pool>" }
  * response: plain-text report with current states, state-change counts and the last transition per disk.

## Rules
* Read-only: you observe, you never change anything on the servers.
* Use \`hdd_power_status\` for every question about disk power state, spin-up, spin-down or disk activity. Never guess states from memory of earlier answers; call the tool again.
* Pick the smallest duration that answers the question; pass \`pool\` when the user names one.
* If the tool answers with \`Error: ...\`, tell the user what failed in one sentence and what to check.
* Refer to disks by the human-readable names from the report.
* Times in the report are UTC; say so when you quote them.

## Response style
Short and direct. Lead with the answer, then the few facts that support it. No tables unless the user asks.
`;
