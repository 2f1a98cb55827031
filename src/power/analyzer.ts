/**
 * Power state analyzer - group transitions and time-in-state over a sample window
 */

import { classifyPowerState } from "./states.ts";
import type { DeviceSeries, PeriodStats, RawSample, StateGroup, TimeInState } from "./types.ts";

const ZERO_TIME_IN_STATE: TimeInState = { activePct: 0, standbyPct: 0, errorPct: 0 };

/**
 * Returns the samples ordered by timestamp. Already ordered input is returned as is.
 */
export function ensureAscending(samples: readonly RawSample[]): readonly RawSample[] {
  for (let i = 1; i < samples.length; i++) {
    if (samples[i].ts < samples[i - 1].ts) {
      return [...samples].sort((a, b) => a.ts - b.ts);
    }
  }
  return samples;
}

/**
 * Counts changes of state group between consecutive samples.
 * Fluctuation inside a group (idle_a → idle_b) is not a transition.
 */
export function countGroupTransitions(samples: readonly RawSample[]): number {
  let transitions = 0;
  for (let i = 1; i < samples.length; i++) {
    if (classifyPowerState(samples[i].value) !== classifyPowerState(samples[i - 1].value)) {
      transitions++;
    }
  }
  return transitions;
}

/**
 * Percentage of elapsed time spent in each group, rounded to one decimal.
 *
 * The interval between two samples is attributed to the group of the earlier
 * one. All zero for fewer than two samples or a zero-length window.
 */
export function computeTimeInState(samples: readonly RawSample[]): TimeInState {
  if (samples.length < 2) {
    return ZERO_TIME_IN_STATE;
  }

  const seconds: Record<StateGroup, number> = { active: 0, standby: 0, error: 0 };
  for (let i = 0; i < samples.length - 1; i++) {
    const group = classifyPowerState(samples[i].value);
    seconds[group] += samples[i + 1].ts - samples[i].ts;
  }

  const total = seconds.active + seconds.standby + seconds.error;
  if (total <= 0) {
    return ZERO_TIME_IN_STATE;
  }

  const pct = (s: number) => Math.round((s / total) * 1000) / 10;
  return {
    activePct: pct(seconds.active),
    standbyPct: pct(seconds.standby),
    errorPct: pct(seconds.error),
  };
}

/**
 * Finds the most recent group transition by walking the samples backwards.
 * Returns the timestamp of the first sample in the new group and the raw
 * values on both sides, or null when the group never changed.
 */
export function findLastTransition(
  samples: readonly RawSample[],
): { ts: number; from: number; to: number } | null {
  const ordered = ensureAscending(samples);
  for (let i = ordered.length - 1; i > 0; i--) {
    const curr = ordered[i];
    const prev = ordered[i - 1];
    if (classifyPowerState(curr.value) !== classifyPowerState(prev.value)) {
      return { ts: curr.ts, from: prev.value, to: curr.value };
    }
  }
  return null;
}

/**
 * Per-device transition count and time-in-state for one window
 */
export function computePeriodStats(series: readonly DeviceSeries[]): Map<string, PeriodStats> {
  const stats = new Map<string, PeriodStats>();
  for (const s of series) {
    stats.set(s.deviceId, {
      changeCount: countGroupTransitions(s.samples),
      ...computeTimeInState(s.samples),
    });
  }
  return stats;
}
