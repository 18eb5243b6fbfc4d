/**
 * Run result aggregation
 */

import type { BackupStats, RunResult } from "../../types";

/**
 * Count outcomes across every provider. A provider that failed to enumerate
 * counts as one failure; every repository result counts by its status.
 * Skipped repositories are successes and are also counted in `skipped`.
 */
export function computeStats(run: RunResult): BackupStats {
  const stats: BackupStats = { succeeded: 0, failed: 0, skipped: 0 };

  for (const { result } of run.providers) {
    if (result.error) {
      stats.failed++;
    }

    for (const repo of result.results) {
      if (repo.status === "failed") {
        stats.failed++;
        continue;
      }
      stats.succeeded++;
      if (repo.skipped) stats.skipped++;
    }
  }

  return stats;
}

/**
 * Error messages, provider-level failures first
 */
export function collectErrors(run: RunResult): string[] {
  const errors: string[] = [];

  for (const { provider, result } of run.providers) {
    if (result.error) {
      errors.push(`${provider}: ${result.error}`);
    }
  }

  for (const { provider, result } of run.providers) {
    for (const repo of result.results) {
      if (repo.status === "failed") {
        errors.push(`${provider} ${repo.repo}: ${repo.error ?? "unknown error"}`);
      }
    }
  }

  return errors;
}

export type RunOutcome = "succeeded" | "partial" | "failed";

export function runOutcome(stats: BackupStats): RunOutcome {
  if (stats.succeeded > 0 && stats.failed === 0) return "succeeded";
  if (stats.succeeded > 0 && stats.failed > 0) return "partial";
  return "failed";
}
