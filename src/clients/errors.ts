/**
 * Transport errors of the HTTP clients
 */

import axios from "axios";

export type UpstreamErrorKind =
  | "connect"
  | "timeout"
  | "http"
  | "api"
  | "invalid_response";

/**
 * Failure talking to an external system.
 * The message is suitable for showing to the user as is.
 */
export class UpstreamError extends Error {
  override readonly name = "UpstreamError";
  readonly service: string;
  readonly kind: UpstreamErrorKind;
  readonly status: number | undefined;

  constructor(
    service: string,
    kind: UpstreamErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.service = service;
    this.kind = kind;
    this.status = options.status;
  }
}

const MAX_BODY_IN_MESSAGE = 500;

function bodyText(data: unknown): string {
  if (data === undefined || data === null) return "";
  if (typeof data === "string") return data;
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

/**
 * Maps an axios failure to UpstreamError. Anything that is not an axios
 * error is returned unchanged so programming errors keep their identity.
 */
export function toUpstreamError(
  service: string,
  baseUrl: string,
  timeoutMs: number,
  error: unknown,
  operation = "request",
): unknown {
  if (!axios.isAxiosError(error)) {
    return error;
  }

  if (error.response) {
    const status = error.response.status;
    const body = bodyText(error.response.data).slice(0, MAX_BODY_IN_MESSAGE);
    return new UpstreamError(
      service,
      "http",
      `${service} API error: HTTP ${status} - ${body}`,
      { status, cause: error },
    );
  }

  if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
    return new UpstreamError(
      service,
      "timeout",
      `${service} ${operation} timed out after ${timeoutMs / 1000}s`,
      { cause: error },
    );
  }

  return new UpstreamError(
    service,
    "connect",
    `Cannot connect to ${service} at ${baseUrl}: ${error.message}`,
    { cause: error },
  );
}
