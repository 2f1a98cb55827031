/**
 * disk_power_state queries and their conversion to device series
 */

import { MAX_RANGE_POINTS } from "../clients/prometheus.ts";
import { parseDuration } from "../utils/duration.ts";
import type { Labels, MetricsQueryClient, RangeSeries } from "../clients/types.ts";
import { ensureAscending } from "./analyzer.ts";
import type { DeviceSeries, DeviceState } from "./types.ts";

export const POWER_STATE_METRIC = "disk_power_state";

const UNKNOWN_DEVICE = "unknown";

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/**
 * Selector for HDD power state series, optionally restricted to one pool
 */
export function buildPowerStateSelector(pool?: string): string {
  if (pool) {
    return `${POWER_STATE_METRIC}{type="hdd", pool="${escapeLabelValue(pool)}"}`;
  }
  return `${POWER_STATE_METRIC}{type="hdd"}`;
}

/**
 * Step for a range query over the given window: 15s up to an hour,
 * 60s up to a day, 5m beyond that.
 */
export function selectStep(durationSeconds: number): string {
  if (durationSeconds <= 3600) return "15s";
  if (durationSeconds <= 86400) return "60s";
  return "5m";
}

/**
 * Like selectStep, widened when the window would resolve to more points
 * than a single range query may return.
 */
export function selectStatsStep(durationSeconds: number): string {
  const step = selectStep(durationSeconds);
  const stepSeconds = parseDuration(step) ?? 300;
  if (durationSeconds / stepSeconds <= MAX_RANGE_POINTS) {
    return step;
  }
  return `${Math.ceil(durationSeconds / MAX_RANGE_POINTS)}s`;
}

function deviceIdOf(labels: Labels): string {
  return labels.device_id || UNKNOWN_DEVICE;
}

function poolOf(labels: Labels): string {
  return labels.pool ?? "";
}

export function toDeviceSeries(series: RangeSeries): DeviceSeries {
  return {
    deviceId: deviceIdOf(series.labels),
    pool: poolOf(series.labels),
    samples: ensureAscending(series.values.map(([ts, value]) => ({ ts, value: Number(value) }))),
  };
}

/**
 * Current power state of every matching disk
 */
export async function fetchCurrentStates(
  metrics: MetricsQueryClient,
  pool?: string,
): Promise<DeviceState[]> {
  const result = await metrics.instantQuery(buildPowerStateSelector(pool));
  return result.map((s) => ({
    deviceId: deviceIdOf(s.labels),
    pool: poolOf(s.labels),
    value: Number(s.value),
  }));
}

/**
 * Samples of every matching disk over [end - durationSeconds, end]
 */
export async function fetchDeviceSeries(
  metrics: MetricsQueryClient,
  durationSeconds: number,
  end: number,
  step: string,
  pool?: string,
): Promise<DeviceSeries[]> {
  const result = await metrics.rangeQuery(
    buildPowerStateSelector(pool),
    end - durationSeconds,
    end,
    step,
  );
  return result.map(toDeviceSeries);
}
