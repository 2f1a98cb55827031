import { expect, test } from "vitest";
import { MockMetricsClient, rangeSeries } from "../clients/mock.ts";
import type { RangeCall } from "../clients/mock.ts";
import type { RangeSeries } from "../clients/types.ts";
import {
  findLastTransitions,
  findTransitionWindow,
  locateExactTransitions,
  TRANSITION_WINDOWS,
} from "./locator.ts";

const NOW = 1_700_604_800;
const SDA = "/dev/disk/by-id/wwn-0x5000c500eb02b449";
const SDB = "/dev/disk/by-id/wwn-0x5000c500f742ccbf";

/** Serves range queries by window length */
function byWindow(table: Record<number, RangeSeries[]>) {
  return (call: RangeCall) => table[call.end - call.start] ?? [];
}

test("locator: stops at the first window with a transition", async () => {
  const metrics = new MockMetricsClient({
    range: byWindow({
      3600: [rangeSeries(SDA, [3, 4, 5]), rangeSeries(SDB, [0, 0, 0])],
      21600: [rangeSeries(SDA, [0, 2, 3]), rangeSeries(SDB, [0, 0, 0])],
      86400: [rangeSeries(SDA, [2, 0, 2, 0])],
    }),
  });

  const result = await findTransitionWindow(metrics, NOW);

  expect(result?.window.label).toBe("6h");
  expect(result?.counts).toEqual(new Map([[SDA, 1], [SDB, 0]]));
  expect(metrics.rangeCalls.map((c) => [c.end - c.start, c.step])).toEqual([
    [3600, "15s"],
    [21600, "60s"],
  ]);
  expect(metrics.rangeCalls.every((c) => c.end === NOW)).toBe(true);
});

test("locator: null when no window shows a transition", async () => {
  const metrics = new MockMetricsClient({
    range: () => [rangeSeries(SDA, [0, 7, 0]), rangeSeries(SDB, [3, 4])],
  });

  expect(await findTransitionWindow(metrics, NOW)).toBeNull();
  expect(metrics.rangeCalls.map((c) => c.step)).toEqual(["15s", "60s", "60s", "5m"]);
  expect(metrics.rangeCalls.map((c) => c.end - c.start)).toEqual(
    TRANSITION_WINDOWS.map((w) => w.seconds),
  );
});

test("locator: pool filter reaches every query", async () => {
  const metrics = new MockMetricsClient();
  await findTransitionWindow(metrics, NOW, "backup");
  expect(metrics.rangeCalls).toHaveLength(4);
  for (const call of metrics.rangeCalls) {
    expect(call.selector).toBe('disk_power_state{type="hdd", pool="backup"}');
  }
});

test("locator: exact transitions and stable devices", async () => {
  const metrics = new MockMetricsClient({
    range: () => [
      rangeSeries(SDA, [0, 0, 2, 3], { start: 1000, step: 60 }),
      rangeSeries(SDB, [0, 0, 0], { start: 1000, step: 60 }),
      rangeSeries("/dev/sdz", [2, 0, 0, 3], { start: 1000, step: 60 }),
    ],
  });

  const result = await locateExactTransitions(metrics, TRANSITION_WINDOWS[2], NOW);

  expect(metrics.rangeCalls).toEqual([
    { selector: 'disk_power_state{type="hdd"}', start: NOW - 86400, end: NOW, step: "60s" },
  ]);
  // most recent first
  expect(result.transitions).toEqual([
    { deviceId: "/dev/sdz", ts: 1180, from: 0, to: 3 },
    { deviceId: SDA, ts: 1120, from: 0, to: 2 },
  ]);
  expect(result.stable).toEqual([SDB]);
});

test("locator: findLastTransitions combines search and pinpoint", async () => {
  const metrics = new MockMetricsClient({
    range: byWindow({ 3600: [rangeSeries(SDA, [0, 2], { start: 5000 })] }),
  });

  const result = await findLastTransitions(metrics, NOW);

  expect(result).toEqual({
    kind: "found",
    window: { label: "1h", seconds: 3600 },
    transitions: [{ deviceId: SDA, ts: 5060, from: 0, to: 2 }],
    stable: [],
  });
  expect(metrics.rangeCalls).toHaveLength(2);
});

test("locator: findLastTransitions reports stable disks", async () => {
  const metrics = new MockMetricsClient({ range: () => [rangeSeries(SDA, [0, 0])] });
  expect(await findLastTransitions(metrics, NOW)).toEqual({ kind: "stable" });
});
