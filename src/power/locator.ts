/**
 * Progressive transition locator.
 *
 * Looks for the most recent power state change by querying windows of
 * 1h, 6h, 24h and 7d in turn and stopping at the first one where any disk
 * changed group. The winning window is then re-queried to pinpoint the
 * change per disk.
 */

import type { MetricsQueryClient } from "../clients/types.ts";
import { log } from "../utils/logger.ts";
import { countGroupTransitions, findLastTransition } from "./analyzer.ts";
import { fetchDeviceSeries, selectStep } from "./series.ts";
import type { TransitionEvent } from "./types.ts";

export interface TransitionWindow {
  readonly label: string;
  readonly seconds: number;
}

export const TRANSITION_WINDOWS: readonly TransitionWindow[] = [
  { label: "1h", seconds: 3600 },
  { label: "6h", seconds: 21600 },
  { label: "24h", seconds: 86400 },
  { label: "7d", seconds: 604800 },
];

export interface WindowSearchResult {
  readonly window: TransitionWindow;
  /** Group transitions per device id in the window */
  readonly counts: ReadonlyMap<string, number>;
}

export interface ExactTransitions {
  /** Most recent transition per device, most recent first */
  readonly transitions: readonly TransitionEvent[];
  /** Devices with data in the window but no group change */
  readonly stable: readonly string[];
}

export type TransitionSearch =
  | { readonly kind: "stable" }
  | ({ readonly kind: "found"; readonly window: TransitionWindow } & ExactTransitions);

/**
 * Returns the smallest window in which any device changed group,
 * or null when none did within 7 days. Windows are queried one at a time.
 */
export async function findTransitionWindow(
  metrics: MetricsQueryClient,
  now: number,
  pool?: string,
): Promise<WindowSearchResult | null> {
  for (const window of TRANSITION_WINDOWS) {
    const series = await fetchDeviceSeries(
      metrics,
      window.seconds,
      now,
      selectStep(window.seconds),
      pool,
    );

    const counts = new Map<string, number>();
    let changed = false;
    for (const s of series) {
      const count = countGroupTransitions(s.samples);
      counts.set(s.deviceId, count);
      if (count > 0) changed = true;
    }

    log({ mod: "power", event: "window_checked", window: window.label, series: series.length, changed });
    if (changed) {
      return { window, counts };
    }
  }
  return null;
}

/**
 * Re-queries the window and finds the most recent group change of each device
 */
export async function locateExactTransitions(
  metrics: MetricsQueryClient,
  window: TransitionWindow,
  now: number,
  pool?: string,
): Promise<ExactTransitions> {
  const series = await fetchDeviceSeries(
    metrics,
    window.seconds,
    now,
    selectStep(window.seconds),
    pool,
  );

  const transitions: TransitionEvent[] = [];
  const stable: string[] = [];
  for (const s of series) {
    const last = findLastTransition(s.samples);
    if (last) {
      transitions.push({ deviceId: s.deviceId, ...last });
    } else {
      stable.push(s.deviceId);
    }
  }

  transitions.sort((a, b) => b.ts - a.ts);
  return { transitions, stable };
}

/**
 * Widens until a change is found, then pinpoints it
 */
export async function findLastTransitions(
  metrics: MetricsQueryClient,
  now: number,
  pool?: string,
): Promise<TransitionSearch> {
  const found = await findTransitionWindow(metrics, now, pool);
  if (!found) {
    return { kind: "stable" };
  }
  const exact = await locateExactTransitions(metrics, found.window, now, pool);
  return { kind: "found", window: found.window, ...exact };
}
