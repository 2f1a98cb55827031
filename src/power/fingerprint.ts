/**
 * Cross-referencing between exporter device paths and inventory identifiers.
 *
 * The exporter reports disks as /dev/disk/by-id/wwn-0x5000c500eb02b449 while
 * TrueNAS calls the same disk {serial_lunid}5000c500eb02b449. Both embed the
 * WWN as a hex run, which is used as the join key.
 */

import type { DiskIdentity } from "./types.ts";

const HEX_RUN = /[0-9a-fA-F]{8,}/g;

/**
 * Returns the longest run of at least 8 hex characters, lower-cased.
 * Ties go to the first run found. Returns "" when there is none.
 */
export function extractFingerprint(s: string): string {
  let longest = "";
  for (const match of s.matchAll(HEX_RUN)) {
    if (match[0].length > longest.length) {
      longest = match[0];
    }
  }
  return longest.toLowerCase();
}

/**
 * Builds fingerprint → disk lookup. Disks without a fingerprint are skipped;
 * on collision the first disk wins.
 */
export function buildDiskLookup(disks: readonly DiskIdentity[]): Map<string, DiskIdentity> {
  const lookup = new Map<string, DiskIdentity>();
  for (const disk of disks) {
    const key = extractFingerprint(disk.identifier);
    if (key && !lookup.has(key)) {
      lookup.set(key, disk);
    }
  }
  return lookup;
}

const BYTE_UNITS = ["B", "KiB", "MiB", "GiB", "TiB"] as const;

/**
 * Formats a byte count with binary units and one decimal, e.g. "7.3 TiB"
 */
export function formatBytes(bytes: number): string {
  let n = bytes;
  for (const unit of BYTE_UNITS) {
    if (Math.abs(n) < 1024) {
      return `${n.toFixed(1)} ${unit}`;
    }
    n /= 1024;
  }
  return `${n.toFixed(1)} PiB`;
}

/**
 * Formats a disk as "name: model (size, serial=…)".
 * Without an inventory entry falls back to the last segment of the device path.
 */
export function formatDiskName(disk: DiskIdentity | undefined, fallbackDeviceId: string): string {
  if (disk) {
    const serial = disk.serial ? `, serial=${disk.serial}` : "";
    return `${disk.name || "?"}: ${disk.model || "?"} (${formatBytes(disk.sizeBytes)}${serial})`;
  }
  const slash = fallbackDeviceId.lastIndexOf("/");
  return slash === -1 ? fallbackDeviceId : fallbackDeviceId.slice(slash + 1);
}
