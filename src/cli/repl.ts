/**
 * Interactive chat loop on stdin/stdout
 */

import * as readline from "node:readline";
import type { LanguageModelV2Usage } from "@ai-sdk/provider";
import type { MainAgentAPI } from "../agent/main-agent.ts";
import type { CostCalculator } from "../llm/cost.ts";
import { yamlDump } from "../utils/dump.ts";
import { genCorrelationId, log } from "../utils/logger.ts";

const EXIT_COMMANDS = new Set(["quit", "exit", "q"]);
const RESET_COMMAND = "/reset";
const PROMPT = "You: ";

export interface ReplOptions {
  agent: MainAgentAPI;
  costCalculator: CostCalculator;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

function formatCost(cost: number): string {
  return `$${cost.toFixed(4)}`;
}

/**
 * Reads questions line by line until an exit command, Ctrl+C or EOF.
 * `/reset` clears the conversation history.
 * Resolves once the session is over.
 */
export async function runRepl(options: ReplOptions): Promise<void> {
  const { agent, costCalculator } = options;
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const write = (text: string) => {
    output.write(text);
  };

  const sessionId = genCorrelationId();
  const usages: LanguageModelV2Usage[] = [];
  let totalCost = 0;

  const rl = readline.createInterface({ input, output, terminal: false });
  const onSigint = () => rl.close();
  process.once("SIGINT", onSigint);

  write(
    `HDD power assistant (session ${sessionId}). Type "/reset" to clear history, "quit" to exit.\n`,
  );
  log({ mod: "cli", event: "session_start", sessionId });
  write(PROMPT);

  for await (const line of rl) {
    const query = line.trim();
    if (EXIT_COMMANDS.has(query.toLowerCase())) break;
    if (!query) {
      write(PROMPT);
      continue;
    }
    if (query.toLowerCase() === RESET_COMMAND) {
      agent.resetHistory();
      log({ mod: "cli", event: "conversation_reset", sessionId });
      write(`Conversation history cleared.\n${PROMPT}`);
      continue;
    }

    try {
      const answer = await agent.processUserQuery({
        userQuery: query,
        correlationId: sessionId,
        beforeCall: (call) => {
          write(`[tool] ${call.toolName}\n${yamlDump(call.input)}`);
        },
      });
      usages.push(answer.usage);
      totalCost += answer.cost;
      write(`Assistant: ${answer.text}\n(cost ${formatCost(answer.cost)})\n`);
    } catch (error) {
      write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    }
    write(PROMPT);
  }

  rl.close();
  process.off("SIGINT", onSigint);
  const total = costCalculator.sumUsages(usages);
  log({
    mod: "cli",
    event: "session_end",
    sessionId,
    questions: usages.length,
    totalTokens: total.totalTokens,
    totalCost,
  });
  write(`\nGoodbye! Session cost ${formatCost(totalCost)}.\n`);
}
