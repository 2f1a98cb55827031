/**
 * HDD power status report: current state, statistics for a duration and the
 * last power state change, cross-referenced with the disk inventory.
 *
 * Only the current-state query is mandatory. Inventory, statistics and
 * transition history degrade to reduced output when their queries fail.
 */

import type { InventoryClient, MetricsQueryClient } from "../clients/types.ts";
import { UpstreamError } from "../clients/errors.ts";
import { ToolError } from "../core/errors.ts";
import { parseDuration } from "../utils/duration.ts";
import { log } from "../utils/logger.ts";
import { computePeriodStats } from "./analyzer.ts";
import { buildDiskLookup, extractFingerprint, formatDiskName } from "./fingerprint.ts";
import { findLastTransitions, type TransitionSearch } from "./locator.ts";
import { fetchCurrentStates, fetchDeviceSeries, selectStatsStep } from "./series.ts";
import { classifyPowerState, formatPowerState } from "./states.ts";
import type { DeviceState, DiskIdentity, PeriodStats } from "./types.ts";

export interface HddPowerStatusDeps {
  readonly metrics: MetricsQueryClient;
  /** null when no inventory is configured */
  readonly inventory: InventoryClient | null;
  /** Current time in Unix seconds */
  readonly now?: () => number;
}

const defaultNow = () => Date.now() / 1000;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Key identifying a physical disk across both systems.
 * Devices without a hex fingerprint are keyed by their raw id.
 */
export function deviceKey(deviceId: string): string {
  return extractFingerprint(deviceId) || deviceId;
}

/** Unix seconds as "YYYY-MM-DD HH:MM:SS UTC" */
export function formatTimestamp(ts: number): string {
  const iso = new Date(ts * 1000).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

function formatPool(pool: string): string {
  return pool ? ` [pool: ${pool}]` : "";
}

class DiskNames {
  constructor(private readonly lookup: ReadonlyMap<string, DiskIdentity>) {}

  name(deviceId: string): string {
    return formatDiskName(this.lookup.get(extractFingerprint(deviceId)), deviceId);
  }
}

async function loadDiskLookup(
  inventory: InventoryClient | null,
): Promise<Map<string, DiskIdentity>> {
  if (!inventory) {
    log({ mod: "power", event: "inventory_not_configured" });
    return new Map();
  }
  try {
    return buildDiskLookup(await inventory.listDisks());
  } catch (error) {
    log({
      mod: "power",
      event: "inventory_unavailable",
      level: "warn",
      error: errorMessage(error),
    });
    return new Map();
  }
}

async function loadCurrentStates(
  metrics: MetricsQueryClient,
  pool: string | undefined,
): Promise<DeviceState[]> {
  let states: DeviceState[];
  try {
    states = await fetchCurrentStates(metrics, pool);
  } catch (error) {
    if (error instanceof UpstreamError) {
      throw new ToolError(error.message, { cause: error });
    }
    throw error;
  }

  if (states.length === 0) {
    const where = pool ? ` for pool "${pool}"` : "";
    throw new ToolError(
      `No disk_power_state metrics found${where}. Check that disk-status-exporter is running on TrueNAS.`,
    );
  }
  return states;
}

function renderCurrentStates(states: readonly DeviceState[], names: DiskNames): string[] {
  const active: string[] = [];
  const standby: string[] = [];
  const other: string[] = [];

  for (const state of states) {
    const line = `  ${names.name(state.deviceId)} — ${formatPowerState(state.value)}${formatPool(state.pool)}`;
    switch (classifyPowerState(state.value)) {
      case "active":
        active.push(line);
        break;
      case "standby":
        standby.push(line);
        break;
      case "error":
        other.push(line);
        break;
    }
  }

  const lines: string[] = [];
  const section = (title: string, entries: string[]) => {
    if (entries.length === 0) return;
    if (lines.length > 0) lines.push("");
    lines.push(`${title} (${entries.length}):`, ...entries);
  };
  section("Spun up", active);
  section("In standby", standby);
  section("Other", other);
  return lines;
}

function renderStats(
  duration: string,
  stats: ReadonlyMap<string, PeriodStats>,
  poolByDevice: ReadonlyMap<string, string>,
  names: DiskNames,
): string[] {
  let total = 0;
  for (const s of stats.values()) total += s.changeCount;

  const lines = [`\nLast ${duration}: ${total} state change(s) total`];
  for (const [deviceId, s] of stats) {
    const error = s.errorPct > 0 ? `, error ${s.errorPct.toFixed(1)}%` : "";
    lines.push(
      `  ${names.name(deviceId)}${formatPool(poolByDevice.get(deviceId) ?? "")} — ` +
        `${s.changeCount} change(s), standby ${s.standbyPct.toFixed(1)}%, ` +
        `active ${s.activePct.toFixed(1)}%${error}`,
    );
  }
  return lines;
}

function renderTransitions(
  search: TransitionSearch,
  states: readonly DeviceState[],
  names: DiskNames,
): string[] {
  if (search.kind === "stable") {
    return [
      "  No power state changes detected in the last 7 days. " +
      "All disks have been in their current state for at least 7 days.",
    ];
  }

  const window = search.window.label;
  if (search.transitions.length === 0) {
    return [`  Changes detected in the last ${window} but could not pinpoint exact times.`];
  }

  const lines: string[] = [];
  const changed = new Set<string>();
  for (const t of search.transitions) {
    changed.add(deviceKey(t.deviceId));
    lines.push(
      `  ${names.name(t.deviceId)} — ${formatTimestamp(t.ts)} ` +
        `(${formatPowerState(t.from)} → ${formatPowerState(t.to)})`,
    );
  }

  const stable = new Set(search.stable.map(deviceKey));
  for (const state of states) {
    const key = deviceKey(state.deviceId);
    if (changed.has(key)) continue;
    const note = stable.has(key) ? "no change" : "no data";
    lines.push(`  ${names.name(state.deviceId)} — ${note} in the last ${window}`);
  }
  return lines;
}

/**
 * Builds the HDD power status report.
 *
 * @param duration window for the statistics section, e.g. "24h", "3d", "1w"
 * @param pool restricts every section to disks of one pool
 * @throws ToolError on an invalid duration, when the current state cannot be
 *   queried, or when no disk reports a power state
 */
export async function getHddPowerStatus(
  deps: HddPowerStatusDeps,
  duration = "24h",
  pool?: string,
): Promise<string> {
  const parsed = parseDuration(duration);
  const durationSeconds = parsed === null ? 0 : Math.floor(parsed);
  if (durationSeconds <= 0) {
    throw new ToolError(
      `Invalid duration '${duration}'. Use a value like '1h', '6h', '12h', '24h', '3d', or '1w'.`,
    );
  }

  const now = Math.floor((deps.now ?? defaultNow)());
  const states = await loadCurrentStates(deps.metrics, pool);
  const names = new DiskNames(await loadDiskLookup(deps.inventory));

  const lines = ["HDD Power Status:\n", ...renderCurrentStates(states, names)];

  try {
    const series = await fetchDeviceSeries(
      deps.metrics,
      durationSeconds,
      now,
      selectStatsStep(durationSeconds),
      pool,
    );
    const stats = computePeriodStats(series);
    if (stats.size > 0) {
      const poolByDevice = new Map(series.map((s) => [s.deviceId, s.pool]));
      for (const state of states) poolByDevice.set(state.deviceId, state.pool);
      lines.push(...renderStats(duration, stats, poolByDevice, names));
    }
  } catch (error) {
    log({ mod: "power", event: "stats_unavailable", level: "warn", duration, error: errorMessage(error) });
  }

  lines.push("\nLast power state change:");
  try {
    const search = await findLastTransitions(deps.metrics, now, pool);
    lines.push(...renderTransitions(search, states, names));
  } catch (error) {
    log({ mod: "power", event: "transitions_unavailable", level: "warn", error: errorMessage(error) });
    lines.push("  Could not determine transition history (Prometheus query failed).");
  }

  return lines.join("\n");
}
