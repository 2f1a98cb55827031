/**
 * Tests for the hdd_power_status tool
 */

import { expect, test } from "vitest";
import { instantSeries, MockMetricsClient } from "../../clients/mock.ts";
import {
  createHddPowerStatusTool,
  executeHddPowerStatus,
  HDD_POWER_STATUS_DESCRIPTION,
  HddPowerStatusParams,
} from "./hdd-power-status.ts";

const NOW = 1_700_604_800;

function deps(metrics: MockMetricsClient) {
  return { metrics, inventory: null, now: () => NOW };
}

test("hdd_power_status: input defaults to the last 24h over all pools", () => {
  expect(HddPowerStatusParams.parse({})).toEqual({ duration: "24h" });
  expect(HddPowerStatusParams.parse({ duration: "1w", pool: "tank" })).toEqual({
    duration: "1w",
    pool: "tank",
  });
});

test("hdd_power_status: empty pool means all pools", () => {
  const parsed = HddPowerStatusParams.parse({ duration: "6h", pool: "" });
  expect(parsed.pool).toBeUndefined();
  expect(parsed).toEqual({ duration: "6h" });
});

test("hdd_power_status: returns the report", async () => {
  const metrics = new MockMetricsClient({ instant: () => [instantSeries("/dev/sda", 0)] });

  const result = await executeHddPowerStatus(deps(metrics), { pool: "tank" });

  expect(result.split("\n").slice(0, 4)).toEqual([
    "HDD Power Status:",
    "",
    "In standby (1):",
    "  sda — standby (0)",
  ]);
  expect(metrics.instantCalls).toEqual(['disk_power_state{type="hdd", pool="tank"}']);
  // stats window follows the default duration
  expect(metrics.rangeCalls[0].end - metrics.rangeCalls[0].start).toBe(86400);
});

test("hdd_power_status: user-facing failures become text", async () => {
  const metrics = new MockMetricsClient();

  expect(await executeHddPowerStatus(deps(metrics), { duration: "soon" })).toBe(
    "Error: Invalid duration 'soon'. Use a value like '1h', '6h', '12h', '24h', '3d', or '1w'.",
  );
  expect(await executeHddPowerStatus(deps(metrics), {})).toBe(
    "Error: No disk_power_state metrics found. Check that disk-status-exporter is running on TrueNAS.",
  );
});

test("hdd_power_status: other errors are rethrown", async () => {
  const metrics = new MockMetricsClient({
    instant: () => {
      throw new RangeError("bad state");
    },
  });

  await expect(executeHddPowerStatus(deps(metrics), {})).rejects.toThrow(RangeError);
});

test("hdd_power_status: tool carries description and schema", () => {
  const tool = createHddPowerStatusTool(deps(new MockMetricsClient()));
  expect(tool.description).toBe(HDD_POWER_STATUS_DESCRIPTION);
  expect(tool.inputSchema).toBe(HddPowerStatusParams);
});
