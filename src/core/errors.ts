/**
 * Errors whose message is meant for the user (and the LLM) rather than the logs
 */
export class ToolError extends Error {
  override readonly name = "ToolError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
