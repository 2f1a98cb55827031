/**
 * Prometheus HTTP API client (instant and range queries)
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { log } from "../utils/logger.ts";
import { parseDuration } from "../utils/duration.ts";
import { toUpstreamError, UpstreamError } from "./errors.ts";
import type { InstantSeries, MetricsQueryClient, RangeSeries } from "./types.ts";

/** Prometheus rejects range queries resolving to more points than this */
export const MAX_RANGE_POINTS = 11_000;

const SERVICE = "Prometheus";

const labelsSchema = z.record(z.string(), z.string());
const samplePairSchema = z.tuple([z.number(), z.string()]);

const errorBodySchema = z.object({
  status: z.literal("error"),
  errorType: z.string().optional(),
  error: z.string().optional(),
});

const vectorBodySchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("success"),
    data: z.object({
      resultType: z.literal("vector"),
      result: z.array(z.object({ metric: labelsSchema, value: samplePairSchema })),
    }),
  }),
  errorBodySchema,
]);

const matrixBodySchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("success"),
    data: z.object({
      resultType: z.literal("matrix"),
      result: z.array(z.object({ metric: labelsSchema, values: z.array(samplePairSchema) })),
    }),
  }),
  errorBodySchema,
]);

export interface PrometheusClientOptions {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  /** Pre-configured axios instance, e.g. with a custom adapter */
  readonly http?: AxiosInstance;
}

export class PrometheusClient implements MetricsQueryClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(options: PrometheusClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.http = options.http ?? axios.create();
  }

  async instantQuery(selector: string): Promise<InstantSeries[]> {
    const body = await this.get("query", { query: selector });
    const parsed = vectorBodySchema.safeParse(body);
    if (!parsed.success) {
      throw this.invalidResponse("query", parsed.error);
    }
    if (parsed.data.status === "error") {
      throw this.apiError(parsed.data.errorType, parsed.data.error);
    }
    return parsed.data.data.result.map((r) => ({
      labels: r.metric,
      ts: r.value[0],
      value: r.value[1],
    }));
  }

  async rangeQuery(
    selector: string,
    start: number,
    end: number,
    step: string,
  ): Promise<RangeSeries[]> {
    const stepSeconds = parseDuration(step);
    if (stepSeconds === null || stepSeconds <= 0) {
      throw new RangeError(`Invalid range query step: ${step}`);
    }
    if ((end - start) / stepSeconds > MAX_RANGE_POINTS) {
      throw new RangeError(
        `Range query of ${end - start}s at step ${step} exceeds ${MAX_RANGE_POINTS} points`,
      );
    }

    const body = await this.get("query_range", { query: selector, start, end, step });
    const parsed = matrixBodySchema.safeParse(body);
    if (!parsed.success) {
      throw this.invalidResponse("query_range", parsed.error);
    }
    if (parsed.data.status === "error") {
      throw this.apiError(parsed.data.errorType, parsed.data.error);
    }
    return parsed.data.data.result.map((r) => ({
      labels: r.metric,
      values: [...r.values].sort((a, b) => a[0] - b[0]),
    }));
  }

  private async get(endpoint: string, params: Record<string, string | number>): Promise<unknown> {
    const startTime = Date.now();
    try {
      const response = await this.http.get<unknown>(`${this.baseUrl}/api/v1/${endpoint}`, {
        params,
        timeout: this.timeoutMs,
      });
      log({
        mod: "prometheus",
        event: "query_ok",
        endpoint,
        query: params.query,
        duration_ms: Date.now() - startTime,
      });
      return response.data;
    } catch (error) {
      const mapped = toUpstreamError(SERVICE, this.baseUrl, this.timeoutMs, error, "query");
      log({
        mod: "prometheus",
        event: "query_failed",
        level: "warn",
        endpoint,
        query: params.query,
        duration_ms: Date.now() - startTime,
        error: mapped instanceof Error ? mapped.message : String(mapped),
      });
      throw mapped;
    }
  }

  private apiError(errorType: string | undefined, message: string | undefined): UpstreamError {
    return new UpstreamError(
      SERVICE,
      "api",
      `${SERVICE} query error: ${errorType ?? "unknown"}: ${message ?? "no details"}`,
    );
  }

  private invalidResponse(endpoint: string, cause: z.ZodError): UpstreamError {
    return new UpstreamError(
      SERVICE,
      "invalid_response",
      `${SERVICE} returned an unexpected response for ${endpoint}`,
      { cause },
    );
  }
}
