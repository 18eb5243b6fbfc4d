/**
 * Bundle integrity checks with `git bundle verify`
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import type { GitClient } from "../../git/client";
import { findRepositoryDirectories, openBundleStore } from "../../storage";
import type { BundleFile } from "../../types";
import type { Logger } from "../../utils/logger";

export interface VerifyOptions {
  backupRoot: string;
  git: GitClient;
  logger: Logger;
  /** Every bundle instead of only the latest per repository */
  all?: boolean;
  domain?: string;
}

export interface BundleVerification {
  repo: string;
  bundle: string;
  ok: boolean;
  issue?: string;
}

/**
 * Verify bundles inside a throwaway bare repository. Bundles made with
 * `--all` carry no prerequisites, so an empty repository is enough.
 */
export async function verifyBundles(options: VerifyOptions): Promise<BundleVerification[]> {
  const { git, logger } = options;
  const repositories = (await findRepositoryDirectories(options.backupRoot)).filter(
    (repo) => !options.domain || repo.domain === options.domain,
  );

  const results: BundleVerification[] = [];
  if (repositories.length === 0) {
    return results;
  }

  const scratch = await mkdtemp(path.join(tmpdir(), "repovault-verify-"));
  try {
    await git.initBare(scratch);

    for (const repository of repositories) {
      const store = openBundleStore(repository, git, logger);
      const bundles = await store.listBundles();
      const selected: BundleFile[] = options.all ? bundles : bundles.slice(0, 1);

      for (const bundle of selected) {
        const outcome = await git.verifyBundle(bundle.path, scratch);
        const verification: BundleVerification = { repo: repository.key, bundle: bundle.name, ok: outcome.success };
        if (!outcome.success) {
          verification.issue = outcome.timedOut
            ? "git bundle verify timed out"
            : outcome.stderr.trim() || `git exited with code ${outcome.exitCode}`;
          logger.warn(`${repository.key}/${bundle.name}: ${verification.issue}`);
        }
        results.push(verification);
      }
    }
  } finally {
    await rm(scratch, { recursive: true, force: true });
  }

  return results;
}
