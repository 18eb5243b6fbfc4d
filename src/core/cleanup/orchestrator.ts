/**
 * Retention cleanup across every repository under the backup root
 */

import type { GitClient } from "../../git/client";
import { findRepositoryDirectories, openBundleStore } from "../../storage";
import type { Logger } from "../../utils/logger";
import { errorMessage } from "../errors";

export interface CleanupOptions {
  backupRoot: string;
  /** Bundles to keep per repository; must be at least 1 */
  retain: number;
  git: GitClient;
  logger: Logger;
  dryRun?: boolean;
  /** Only repositories under this domain */
  domain?: string;
}

export interface CleanupDeletion {
  repo: string;
  bundle: string;
  success: boolean;
  error?: string;
}

export interface CleanupResult {
  totalRepositories: number;
  totalDeleted: number;
  deletions: CleanupDeletion[];
}

export async function runCleanup(options: CleanupOptions): Promise<CleanupResult> {
  const { git, logger } = options;

  if (!Number.isInteger(options.retain) || options.retain < 1) {
    throw new RangeError("retain must be a positive integer");
  }

  const repositories = (await findRepositoryDirectories(options.backupRoot)).filter(
    (repo) => !options.domain || repo.domain === options.domain,
  );

  const result: CleanupResult = { totalRepositories: repositories.length, totalDeleted: 0, deletions: [] };

  for (const repository of repositories) {
    const store = openBundleStore(repository, git, logger);

    if (options.dryRun) {
      const bundles = await store.listBundles();
      for (const bundle of bundles.slice(options.retain).reverse()) {
        result.deletions.push({ repo: repository.key, bundle: bundle.name, success: true });
      }
      continue;
    }

    try {
      const pruned = await store.prune(options.retain);
      for (const bundle of pruned) {
        result.deletions.push({ repo: repository.key, bundle: bundle.name, success: true });
      }
      result.totalDeleted += pruned.length;
    } catch (error) {
      logger.error(`Cleanup of ${repository.key} failed: ${errorMessage(error)}`);
      result.deletions.push({ repo: repository.key, bundle: "*", success: false, error: errorMessage(error) });
    }
  }

  return result;
}
