/**
 * In-memory client doubles for tests
 */

import type { DiskIdentity } from "../power/types.ts";
import type {
  InstantSeries,
  InventoryClient,
  Labels,
  MetricsQueryClient,
  RangeSeries,
} from "./types.ts";

export interface RangeCall {
  readonly selector: string;
  readonly start: number;
  readonly end: number;
  readonly step: string;
}

export interface MockMetricsHandlers {
  instant?: (selector: string) => InstantSeries[] | Promise<InstantSeries[]>;
  range?: (call: RangeCall) => RangeSeries[] | Promise<RangeSeries[]>;
}

export class MockMetricsClient implements MetricsQueryClient {
  readonly instantCalls: string[] = [];
  readonly rangeCalls: RangeCall[] = [];

  constructor(private readonly handlers: MockMetricsHandlers = {}) {}

  async instantQuery(selector: string): Promise<InstantSeries[]> {
    this.instantCalls.push(selector);
    return this.handlers.instant ? await this.handlers.instant(selector) : [];
  }

  async rangeQuery(
    selector: string,
    start: number,
    end: number,
    step: string,
  ): Promise<RangeSeries[]> {
    const call = { selector, start, end, step };
    this.rangeCalls.push(call);
    return this.handlers.range ? await this.handlers.range(call) : [];
  }
}

export class MockInventoryClient implements InventoryClient {
  calls = 0;

  constructor(private readonly disks: DiskIdentity[] | (() => Promise<DiskIdentity[]>)) {}

  async listDisks(): Promise<DiskIdentity[]> {
    this.calls++;
    return typeof this.disks === "function" ? await this.disks() : this.disks;
  }
}

export function powerLabels(deviceId: string, pool = ""): Labels {
  return pool
    ? { __name__: "disk_power_state", device_id: deviceId, type: "hdd", pool }
    : { __name__: "disk_power_state", device_id: deviceId, type: "hdd" };
}

export function instantSeries(deviceId: string, value: number, pool = ""): InstantSeries {
  return { labels: powerLabels(deviceId, pool), ts: 1_700_000_000, value: String(value) };
}

/**
 * Range series with one sample per `step` seconds starting at `start`
 */
export function rangeSeries(
  deviceId: string,
  values: readonly number[],
  options: { start?: number; step?: number; pool?: string } = {},
): RangeSeries {
  const start = options.start ?? 1_700_000_000;
  const step = options.step ?? 60;
  return {
    labels: powerLabels(deviceId, options.pool),
    values: values.map((v, i) => [start + i * step, String(v)] as const),
  };
}
