/**
 * Shared notification text
 */

import type { BackupStats } from "../types";
import { runOutcome } from "../core/run/stats";

export const NOTIFICATION_TITLES = {
  succeeded: "backups succeeded",
  partial: "backups completed with errors",
  failed: "backups failed",
} as const;

export function notificationTitle(stats: BackupStats): string {
  return NOTIFICATION_TITLES[runOutcome(stats)];
}

/**
 * RFC 3339 timestamp to the second
 */
export function rfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function countsLine(stats: BackupStats): string {
  return `completed: ${stats.succeeded}, failed: ${stats.failed}`;
}
