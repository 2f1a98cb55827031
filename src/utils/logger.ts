/**
 * Structured logging infrastructure with pretty and JSON format support
 * Provides human-readable development logs and machine-readable production logs.
 * Everything goes to stderr; stdout belongs to the chat.
 */

export type LogFormat = "pretty" | "json";

// Global logger configuration - initialized once at startup
const loggerConfig: { format: LogFormat } = { format: "pretty" };

/**
 * Initializes logger with configuration
 * Must be called before any logging functions
 */
export function initializeLogger(format: LogFormat): void {
  loggerConfig.format = format;
}

/**
 * Detects if terminal supports colors
 * Returns false in CI environments or when colors are not supported
 */
function supportsColor(): boolean {
  if (process.env.CI === "true" || process.env.CONTINUOUS_INTEGRATION === "true") {
    return false;
  }
  return process.stderr.isTTY === true;
}

function displayValue(value: unknown): string {
  if (typeof value === "string") return `"${value}"`;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Formats a log entry as pretty human-readable text with optional colors
 */
function formatPretty(fields: Record<string, unknown>): string {
  const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  const mod = typeof fields.mod === "string" && fields.mod ? fields.mod : "unknown";
  const event = typeof fields.event === "string" && fields.event ? fields.event : "unknown";

  const { mod: _, event: __, ts: ___, ...rest } = fields;

  const colors = supportsColor();
  const modColor = colors ? "\x1b[1;36m" : "";
  const eventColor = colors ? "\x1b[1;32m" : "";
  const resetColor = colors ? "\x1b[0m" : "";

  const parts: string[] = [
    `[${timestamp}]`,
    `${modColor}${mod.toUpperCase()}${resetColor}`,
    `${eventColor}${event}${resetColor}`,
  ];

  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined && value !== null) {
      parts.push(`${key}=${displayValue(value)}`);
    }
  }

  return parts.join(" ");
}

function formatJson(fields: Record<string, unknown>): string {
  return JSON.stringify({ ts: new Date().toISOString(), ...fields });
}

/**
 * Logs a structured message in configured format.
 * Conventional fields: mod, event, level ("debug" | "info" | "warn" | "error").
 */
export function log(fields: Record<string, unknown>): void {
  const line = loggerConfig.format === "json" ? formatJson(fields) : formatPretty(fields);
  process.stderr.write(`${line}\n`);
}

/**
 * Generates a unique correlation ID for request tracking
 */
export function genCorrelationId(): string {
  const rnd = Math.random().toString(36).slice(2, 10);
  return `${Date.now().toString(36)}-${rnd}`;
}
