/**
 * Home-lab HDD power assistant
 * - Runtime: Node.js
 * - Interfaces: terminal chat, zod validation, AI SDK agent with tools
 * - Data: Prometheus (disk_power_state) and the TrueNAS disk inventory
 */

import { startAgent } from "./src/app.ts";
import { log } from "./src/utils/logger.ts";

try {
  await startAgent();
} catch (error) {
  log({
    mod: "boot",
    event: "fatal",
    level: "error",
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
}
