import { expect, test } from "vitest";
import { instantSeries, MockMetricsClient, rangeSeries } from "../clients/mock.ts";
import {
  buildPowerStateSelector,
  fetchCurrentStates,
  fetchDeviceSeries,
  selectStatsStep,
  selectStep,
  toDeviceSeries,
} from "./series.ts";

test("series: selector with and without pool", () => {
  expect(buildPowerStateSelector()).toBe('disk_power_state{type="hdd"}');
  expect(buildPowerStateSelector("tank")).toBe('disk_power_state{type="hdd", pool="tank"}');
});

test("series: pool label value is escaped", () => {
  expect(buildPowerStateSelector('a"b\\c')).toBe('disk_power_state{type="hdd", pool="a\\"b\\\\c"}');
});

test("series: step by window size", () => {
  expect(selectStep(3600)).toBe("15s");
  expect(selectStep(3601)).toBe("60s");
  expect(selectStep(86400)).toBe("60s");
  expect(selectStep(86401)).toBe("5m");
  expect(selectStep(604800)).toBe("5m");
});

test("series: stats step widens past the point limit", () => {
  expect(selectStatsStep(86400)).toBe("60s");
  expect(selectStatsStep(604800)).toBe("5m");
  // 30d at 5m is 8640 points
  expect(selectStatsStep(30 * 86400)).toBe("5m");
  // 60d at 5m would be 17280 points
  expect(selectStatsStep(60 * 86400)).toBe("472s");
});

test("series: range series conversion parses and sorts values", () => {
  const series = toDeviceSeries({
    labels: { device_id: "/dev/sda", pool: "tank" },
    values: [[20, "2"], [10, "0"]],
  });
  expect(series).toEqual({
    deviceId: "/dev/sda",
    pool: "tank",
    samples: [{ ts: 10, value: 0 }, { ts: 20, value: 2 }],
  });
});

test("series: missing labels default to unknown device and empty pool", () => {
  const series = toDeviceSeries({ labels: {}, values: [] });
  expect(series.deviceId).toBe("unknown");
  expect(series.pool).toBe("");
});

test("series: fetchCurrentStates", async () => {
  const metrics = new MockMetricsClient({
    instant: () => [instantSeries("/dev/sda", 2, "tank"), instantSeries("/dev/sdb", 0)],
  });

  const states = await fetchCurrentStates(metrics, "tank");

  expect(metrics.instantCalls).toEqual(['disk_power_state{type="hdd", pool="tank"}']);
  expect(states).toEqual([
    { deviceId: "/dev/sda", pool: "tank", value: 2 },
    { deviceId: "/dev/sdb", pool: "", value: 0 },
  ]);
});

test("series: fetchDeviceSeries queries the window ending now", async () => {
  const metrics = new MockMetricsClient({
    range: () => [rangeSeries("/dev/sda", [0, 2])],
  });

  const series = await fetchDeviceSeries(metrics, 3600, 1_700_003_600, "15s");

  expect(metrics.rangeCalls).toEqual([
    { selector: 'disk_power_state{type="hdd"}', start: 1_700_000_000, end: 1_700_003_600, step: "15s" },
  ]);
  expect(series[0].samples).toEqual([
    { ts: 1_700_000_000, value: 0 },
    { ts: 1_700_000_060, value: 2 },
  ]);
});
