/**
 * Prometheus-style duration strings ("15s", "24h", "1w")
 */

const UNIT_SECONDS: ReadonlyMap<string, number> = new Map([
  ["s", 1],
  ["m", 60],
  ["h", 3600],
  ["d", 86400],
  ["w", 604800],
]);

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)([smhdw])?$/;

/**
 * Parses "90", "15s", "1.5h", "3d" or "1w" to seconds.
 * A bare number is seconds. Returns null for anything else.
 */
export function parseDuration(text: string): number | null {
  const match = DURATION_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  const unit = match[2];
  const multiplier = unit === undefined ? 1 : UNIT_SECONDS.get(unit);
  if (multiplier === undefined) {
    return null;
  }
  return Number(match[1]) * multiplier;
}
