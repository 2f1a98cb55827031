/**
 * Types for the HDD power-state subsystem
 */

/**
 * Coarse power-state group. Transitions are only counted between groups.
 */
export type StateGroup = "active" | "standby" | "error";

/**
 * One sample of the disk_power_state series
 */
export interface RawSample {
  /** Seconds since epoch */
  readonly ts: number;
  readonly value: number;
}

/**
 * One disk's samples as returned by a range query
 */
export interface DeviceSeries {
  /** Device path from the exporter, e.g. /dev/disk/by-id/wwn-0x5000c500eb02b449 */
  readonly deviceId: string;
  /** Pool label, empty when the exporter does not know it */
  readonly pool: string;
  /** Ascending by ts */
  readonly samples: readonly RawSample[];
}

/**
 * Current power state of one disk (instant query)
 */
export interface DeviceState {
  readonly deviceId: string;
  readonly pool: string;
  readonly value: number;
}

/**
 * Disk as known to the inventory system
 */
export interface DiskIdentity {
  /** Opaque inventory identifier, e.g. {serial_lunid}5000c500eb02b449 */
  readonly identifier: string;
  readonly name: string;
  readonly model: string;
  readonly serial: string;
  readonly sizeBytes: number;
  readonly pool: string;
  /** Spin-down timer as configured in the inventory (minutes or "ALWAYS ON") */
  readonly standbyTimer: string;
}

export interface TransitionEvent {
  readonly deviceId: string;
  readonly ts: number;
  readonly from: number;
  readonly to: number;
}

export interface TimeInState {
  readonly activePct: number;
  readonly standbyPct: number;
  readonly errorPct: number;
}

export interface PeriodStats extends TimeInState {
  readonly changeCount: number;
}
