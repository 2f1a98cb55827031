import { expect, test } from "vitest";
import {
  computePeriodStats,
  computeTimeInState,
  countGroupTransitions,
  ensureAscending,
  findLastTransition,
} from "./analyzer.ts";
import type { RawSample } from "./types.ts";

/** One sample per minute */
function samples(values: number[], start = 1_700_000_000): RawSample[] {
  return values.map((value, i) => ({ ts: start + i * 60, value }));
}

test("countGroupTransitions: sub-state noise is not a transition", () => {
  expect(countGroupTransitions(samples([3, 4, 5, 3, 6]))).toBe(0);
  expect(countGroupTransitions(samples([0, 7, 0]))).toBe(0);
});

test("countGroupTransitions: counts group changes", () => {
  expect(countGroupTransitions(samples([0, 0, 2, 2]))).toBe(1);
  expect(countGroupTransitions(samples([0, 4, 0, 2]))).toBe(3);
  expect(countGroupTransitions(samples([2, -1, 2]))).toBe(2);
});

test("countGroupTransitions: empty and single sample", () => {
  expect(countGroupTransitions([])).toBe(0);
  expect(countGroupTransitions(samples([0]))).toBe(0);
});

test("computeTimeInState: attributes each interval to the earlier sample", () => {
  // standby for 3 intervals, active for 1
  expect(computeTimeInState(samples([0, 0, 0, 2, 2]))).toEqual({
    activePct: 25,
    standbyPct: 75,
    errorPct: 0,
  });
});

test("computeTimeInState: percentages sum to 100", () => {
  const result = computeTimeInState(samples([0, 2, -1]));
  expect(result).toEqual({ activePct: 50, standbyPct: 50, errorPct: 0 });

  const thirds = computeTimeInState(samples([0, 2, -1, -1]));
  expect(thirds).toEqual({ activePct: 33.3, standbyPct: 33.3, errorPct: 33.3 });
  expect(thirds.activePct + thirds.standbyPct + thirds.errorPct).toBeCloseTo(100, 0);
});

test("computeTimeInState: uneven spacing is weighted by time", () => {
  const result = computeTimeInState([
    { ts: 0, value: 2 },
    { ts: 90, value: 0 },
    { ts: 100, value: 0 },
  ]);
  expect(result).toEqual({ activePct: 90, standbyPct: 10, errorPct: 0 });
});

test("computeTimeInState: fewer than two samples or zero duration is all zero", () => {
  const zero = { activePct: 0, standbyPct: 0, errorPct: 0 };
  expect(computeTimeInState([])).toEqual(zero);
  expect(computeTimeInState(samples([2]))).toEqual(zero);
  expect(computeTimeInState([{ ts: 5, value: 2 }, { ts: 5, value: 0 }])).toEqual(zero);
});

test("ensureAscending: sorts only when needed", () => {
  const ordered = samples([0, 2]);
  expect(ensureAscending(ordered)).toBe(ordered);

  const shuffled = [{ ts: 30, value: 2 }, { ts: 10, value: 0 }, { ts: 20, value: 1 }];
  expect(ensureAscending(shuffled).map((s) => s.ts)).toEqual([10, 20, 30]);
  expect(shuffled[0].ts).toBe(30);
});

test("findLastTransition: returns the most recent group change", () => {
  const result = findLastTransition(samples([0, 2, 2, 0, 0, 3, 4]));
  expect(result).toEqual({ ts: 1_700_000_000 + 5 * 60, from: 0, to: 3 });
});

test("findLastTransition: ignores sub-state changes after the last group change", () => {
  expect(findLastTransition(samples([0, 3, 4, 5]))).toEqual({
    ts: 1_700_000_060,
    from: 0,
    to: 3,
  });
});

test("findLastTransition: null when the group never changes", () => {
  expect(findLastTransition(samples([3, 4, 5]))).toBeNull();
  expect(findLastTransition(samples([0]))).toBeNull();
  expect(findLastTransition([])).toBeNull();
});

test("findLastTransition: orders unsorted samples first", () => {
  const result = findLastTransition([
    { ts: 300, value: 2 },
    { ts: 100, value: 0 },
    { ts: 200, value: 0 },
  ]);
  expect(result).toEqual({ ts: 300, from: 0, to: 2 });
});

test("computePeriodStats: per device", () => {
  const stats = computePeriodStats([
    { deviceId: "a", pool: "tank", samples: samples([0, 0, 2, 2, 2]) },
    { deviceId: "b", pool: "tank", samples: samples([7]) },
  ]);
  expect(stats.get("a")).toEqual({ changeCount: 1, activePct: 50, standbyPct: 50, errorPct: 0 });
  expect(stats.get("b")).toEqual({ changeCount: 0, activePct: 0, standbyPct: 0, errorPct: 0 });
});
