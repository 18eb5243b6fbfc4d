/**
 * Bundle naming utilities
 *
 * Bundles are named `<repo>.<YYYYMMDDHHMMSS>.bundle`. The timestamp segment
 * is the only ordering key; file mtimes are never consulted.
 */

export const BUNDLE_EXTENSION = ".bundle";
export const INVALID_SUFFIX = ".invalid";

export const BUNDLE_NAME_PATTERN = /^(.+)\.(\d{14})\.bundle$/;

export interface ParsedBundleName {
  repoName: string;
  timestamp: string;
  created: Date;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Format a date as a 14 digit UTC timestamp
 */
export function formatBundleTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

export function parseBundleTimestamp(timestamp: string): Date | null {
  const match = timestamp.match(/^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/);
  if (!match) return null;

  const [, year, month, day, hour, minute, second] = match.map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Reject rollovers such as month 13 or 25:00
  if (formatBundleTimestamp(date) !== timestamp) return null;
  return date;
}

export function generateBundleName(repoName: string, date: Date = new Date()): string {
  return `${repoName}.${formatBundleTimestamp(date)}${BUNDLE_EXTENSION}`;
}

export function parseBundleName(fileName: string): ParsedBundleName | null {
  const match = fileName.match(BUNDLE_NAME_PATTERN);
  if (!match) return null;

  const [, repoName, timestamp] = match;
  if (repoName === undefined || timestamp === undefined) return null;

  const created = parseBundleTimestamp(timestamp);
  if (!created) return null;

  return { repoName, timestamp, created };
}

export function invalidBundleName(fileName: string): string {
  return `${fileName}${INVALID_SUFFIX}`;
}
