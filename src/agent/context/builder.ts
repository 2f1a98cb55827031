import type { ModelMessage } from "ai";

/**
 * Conversation history of one chat session
 */
export class ContextBuilder {
  private readonly maxSymbols: number;
  private readonly now: () => Date;
  /** Message history in AI SDK format (chronologically from beginning to end). */
  private messages: ModelMessage[] = [];

  constructor(maxSymbols: number, now: () => Date = () => new Date()) {
    this.maxSymbols = maxSymbols;
    this.now = now;
  }

  /**
   * Direct addition of ModelMessage (e.g., user message or arbitrary assistant message).
   */
  append(msg: ModelMessage): void {
    this.messages.push(msg);
  }

  /**
   * Addition of messages from step.response.messages.
   * Only messages that are not yet in history are recorded.
   */
  appendStepMessages(stepMessages: readonly ModelMessage[]): void {
    for (const msg of stepMessages) {
      const msgHash = this.hashMessage(msg);
      if (this.messages.some((existing) => this.hashMessage(existing) === msgHash)) {
        continue;
      }
      this.messages.push(msg);
    }
  }

  /**
   * Role and content serialized; providerOptions and other metadata are ignored.
   */
  private hashMessage(message: ModelMessage): string {
    try {
      return JSON.stringify({ role: message.role, content: message.content });
    } catch {
      return String(message.content);
    }
  }

  /**
   * Returns the system prompt and a "window" of recent context within the symbol budget.
   * Messages are taken from the end of history until the budget overflows.
   * `{{CURRENT_TIME}}` in the template is replaced with the current UTC time.
   */
  getContext(systemPromptTemplate: string): { systemPrompt: string; messages: ModelMessage[] } {
    const systemPrompt = systemPromptTemplate.replaceAll(
      "{{CURRENT_TIME}}",
      this.now().toISOString(),
    );
    const out: ModelMessage[] = [];
    let total = 0;

    for (let i = this.messages.length - 1; i >= 0; i--) {
      const msg = this.messages[i];
      const len = this.estimateSymbols(msg);

      if (total + len > this.maxSymbols) {
        if (out.length > 0) break; // window is full
        // newest message alone exceeds the budget: skip it
        continue;
      }

      out.unshift(msg);
      total += len;
    }

    return { systemPrompt, messages: out };
  }

  /** Complete history cleanup. */
  reset(): void {
    this.messages = [];
  }

  /** Estimate message "weight" by length of JSON representation of content. */
  private estimateSymbols(message: ModelMessage): number {
    const c: unknown = message.content;
    if (typeof c === "string") return c.length;
    try {
      return JSON.stringify(c ?? "").length;
    } catch {
      return 0;
    }
  }
}
