/**
 * Power state codes reported by disk-status-exporter and their coarse groups
 */

import type { StateGroup } from "./types.ts";

export const POWER_STATE_LABELS: ReadonlyMap<number, string> = new Map([
  [-2, "error"],
  [-1, "unknown"],
  [0, "standby"],
  [1, "idle"],
  [2, "active_or_idle"],
  [3, "idle_a"],
  [4, "idle_b"],
  [5, "idle_c"],
  [6, "active"],
  [7, "sleep"],
]);

/** Disk is spun up */
export const ACTIVE_STATES: ReadonlySet<number> = new Set([1, 2, 3, 4, 5, 6]);
/** Disk is spun down */
export const STANDBY_STATES: ReadonlySet<number> = new Set([0, 7]);
/** Exporter could not read the state */
export const ERROR_STATES: ReadonlySet<number> = new Set([-2, -1]);

/**
 * Classifies a raw power state value into its group.
 * idle_a/idle_b/idle_c are sub-states of "active"; anything unrecognised is "error".
 */
export function classifyPowerState(value: number): StateGroup {
  const code = Math.trunc(value);
  if (ACTIVE_STATES.has(code)) return "active";
  if (STANDBY_STATES.has(code)) return "standby";
  return "error";
}

/**
 * Human-readable label for a raw power state value, e.g. "standby (0)"
 */
export function formatPowerState(value: number): string {
  const code = Math.trunc(value);
  const label = POWER_STATE_LABELS.get(code);
  if (label) {
    return `${label} (${code})`;
  }
  return `unknown state (${code})`;
}
