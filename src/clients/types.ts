/**
 * Interfaces of the external systems the power-state report reads from
 */

import type { DiskIdentity } from "../power/types.ts";

export type Labels = Readonly<Record<string, string>>;

/** [unix seconds, value as sent by Prometheus] */
export type SamplePair = readonly [number, string];

export interface InstantSeries {
  readonly labels: Labels;
  readonly ts: number;
  readonly value: string;
}

export interface RangeSeries {
  readonly labels: Labels;
  /** Ascending by timestamp */
  readonly values: readonly SamplePair[];
}

/**
 * Time-series backend. Implementations throw UpstreamError on failure.
 */
export interface MetricsQueryClient {
  instantQuery(selector: string): Promise<InstantSeries[]>;
  rangeQuery(selector: string, start: number, end: number, step: string): Promise<RangeSeries[]>;
}

/**
 * Disk inventory. Implementations throw UpstreamError on failure.
 */
export interface InventoryClient {
  listDisks(): Promise<DiskIdentity[]>;
}
