/**
 * hdd_power_status tool for LLM agent
 */

import * as z from "zod";
import { tool } from "ai";
import { ToolError } from "../../core/errors.ts";
import { getHddPowerStatus, type HddPowerStatusDeps } from "../../power/report.ts";
import { log } from "../../utils/logger.ts";

export const HddPowerStatusParams = z.object({
  duration: z.string().default("24h").describe(
    "Time window for stats and transition history. Examples: '1h', '6h', '12h', '24h', '3d', '1w'. Default '24h'.",
  ),
  pool: z.string().optional().transform((p) => p || undefined).describe(
    "Optional ZFS pool name to filter disks (e.g. 'tank', 'backup'). If omitted or empty, all HDD pools are included.",
  ),
});
export type HddPowerStatusInput = z.input<typeof HddPowerStatusParams>;

export const HDD_POWER_STATUS_DESCRIPTION = `Get a complete HDD power status summary for TrueNAS: which disks are spun up or in standby, mapped to human-readable disk names (model, size, serial), how many state changes occurred in the requested duration, and when each disk last changed power state.

Accepts optional \`duration\` (default '24h') and \`pool\` filter.

Use this for ANY question about HDD power state, spinup, spindown, or disk activity. This tool handles all the cross-referencing and transition detection automatically.

Examples:
- 'Which HDDs are spun up?' → hdd_power_status()
- 'Are the backup drives spun down?' → hdd_power_status(pool='backup')
- 'How many state changes in the last 12 hours?' → hdd_power_status(duration='12h')
- 'Were the tank HDDs active this week?' → hdd_power_status(duration='1w', pool='tank')
- 'What fraction of the last 6h were my drives in standby?' → hdd_power_status(duration='6h')`;

/**
 * Runs the report. A ToolError becomes the text result so the model can
 * relay it; anything else is logged and rethrown.
 */
export async function executeHddPowerStatus(
  deps: HddPowerStatusDeps,
  input: HddPowerStatusInput,
): Promise<string> {
  const startTime = Date.now();
  try {
    const report = await getHddPowerStatus(deps, input.duration ?? "24h", input.pool);
    log({
      mod: "tool",
      event: "hdd_power_status_ok",
      duration: input.duration,
      pool: input.pool,
      duration_ms: Date.now() - startTime,
    });
    return report;
  } catch (error) {
    if (error instanceof ToolError) {
      log({ mod: "tool", event: "hdd_power_status_failed", level: "warn", error: error.message });
      return `Error: ${error.message}`;
    }
    log({
      mod: "tool",
      event: "hdd_power_status_error",
      level: "error",
      error: error instanceof Error ? error.message : String(error),
      trace: error instanceof Error ? error.stack : undefined,
    });
    throw error;
  }
}

/**
 * Creates hdd_power_status tool for LLM
 */
export function createHddPowerStatusTool(deps: HddPowerStatusDeps) {
  return tool({
    description: HDD_POWER_STATUS_DESCRIPTION,
    inputSchema: HddPowerStatusParams,
    execute: (input) => executeHddPowerStatus(deps, input),
  });
}
