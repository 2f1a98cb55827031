export {
  createHddPowerStatusTool,
  executeHddPowerStatus,
  HDD_POWER_STATUS_DESCRIPTION,
  HddPowerStatusParams,
} from "./hdd-power-status.ts";
export type { HddPowerStatusInput } from "./hdd-power-status.ts";
