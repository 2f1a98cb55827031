/**
 * TrueNAS REST API client (disk inventory)
 */

import { readFileSync } from "node:fs";
import { Agent } from "node:https";
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { log } from "../utils/logger.ts";
import type { DiskIdentity } from "../power/types.ts";
import { toUpstreamError, UpstreamError } from "./errors.ts";
import type { InventoryClient } from "./types.ts";

const SERVICE = "TrueNAS";

const diskEntrySchema = z.object({
  identifier: z.string().nullish(),
  name: z.string().nullish(),
  model: z.string().nullish(),
  serial: z.string().nullish(),
  size: z.number().nullish(),
  pool: z.string().nullish(),
  hddstandby: z.union([z.string(), z.number()]).nullish(),
});

const diskListSchema = z.array(diskEntrySchema);

export interface TrueNasClientOptions {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly timeoutMs: number;
  /** Verify the server certificate */
  readonly verifySsl: boolean;
  /** Path to a PEM bundle trusted instead of the system roots */
  readonly caCert?: string;
  readonly http?: AxiosInstance;
}

/**
 * TLS settings for the TrueNAS connection. Without verification any
 * certificate is accepted; with it the system roots are used, or only the
 * bundle at `caCert` when one is given.
 */
export function createHttpsAgent(
  options: Pick<TrueNasClientOptions, "verifySsl" | "caCert">,
): Agent {
  return new Agent({
    rejectUnauthorized: options.verifySsl,
    ca: options.caCert ? readFileSync(options.caCert) : undefined,
  });
}

export class TrueNasClient implements InventoryClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(options: TrueNasClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.http = options.http ?? axios.create({ httpsAgent: createHttpsAgent(options) });
  }

  async listDisks(): Promise<DiskIdentity[]> {
    const startTime = Date.now();
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(`${this.baseUrl}/api/v2.0/disk`, {
        headers: { Authorization: `Bearer ${this.apiKey}` },
        timeout: this.timeoutMs,
      });
      data = response.data;
    } catch (error) {
      const mapped = toUpstreamError(SERVICE, this.baseUrl, this.timeoutMs, error);
      log({
        mod: "truenas",
        event: "disk_list_failed",
        level: "warn",
        duration_ms: Date.now() - startTime,
        error: mapped instanceof Error ? mapped.message : String(mapped),
      });
      throw mapped;
    }

    const parsed = diskListSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(
        SERVICE,
        "invalid_response",
        `${SERVICE} returned an unexpected disk list`,
        { cause: parsed.error },
      );
    }

    log({
      mod: "truenas",
      event: "disk_list_ok",
      disks: parsed.data.length,
      duration_ms: Date.now() - startTime,
    });

    return parsed.data.map((d) => ({
      identifier: d.identifier ?? "",
      name: d.name ?? "",
      model: d.model ?? "",
      serial: d.serial ?? "",
      sizeBytes: d.size ?? 0,
      pool: d.pool ?? "",
      standbyTimer: d.hddstandby === undefined || d.hddstandby === null ? "" : String(d.hddstandby),
    }));
  }
}
