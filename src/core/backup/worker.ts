/**
 * Per-repository backup pipeline
 *
 * prepare → diff check (refs mode) → mirror clone → snapshot → dedup → prune
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { GitClient } from "../../git/client";
import { BundleStore, type SnapshotResult } from "../../storage/bundle-store";
import type { GitProvider, RepoBackupResult, Repository } from "../../types";
import type { Logger } from "../../utils/logger";
import { isPathWithinDir, repoBackupPath, repoWorkingPath } from "../../utils/path";
import { maskSecrets } from "../../utils/url";
import { CloneError, errorMessage } from "../errors";
import { remoteMatchesLocal } from "./remote-diff";

export interface WorkerContext {
  backupRoot: string;
  provider: GitProvider;
  git: GitClient;
  logger: Logger;
  now?: () => Date;
}

/**
 * Back up one repository. Always resolves with exactly one result; every
 * failure is captured in it.
 */
export async function backupRepository(
  repo: Repository,
  context: WorkerContext,
): Promise<RepoBackupResult> {
  const startTime = Date.now();
  const { provider } = context;
  const backupRoot = path.resolve(context.backupRoot);
  const secrets = provider.secrets();
  const log = context.logger.child(repo.pathWithNamespace);

  const finish = (partial: Omit<RepoBackupResult, "repo" | "durationMs">): RepoBackupResult => ({
    repo: repo.pathWithNamespace,
    durationMs: Date.now() - startTime,
    ...partial,
    ...(partial.error !== undefined ? { error: maskSecrets(partial.error, secrets) } : {}),
  });

  try {
    const backupPath = repoBackupPath(backupRoot, repo.domain, repo.pathWithNamespace);
    const workingPath = repoWorkingPath(backupRoot, repo.domain, repo.pathWithNamespace);

    if (!isPathWithinDir(backupPath, backupRoot) || !isPathWithinDir(workingPath, backupRoot)) {
      return finish({
        status: "failed",
        error: `Repository path ${repo.pathWithNamespace} escapes the backup directory`,
      });
    }

    // Prepare
    try {
      await fs.rm(workingPath, { recursive: true, force: true });
    } catch (error) {
      return finish({
        status: "failed",
        error: `Failed to clear working directory: ${errorMessage(error)}`,
      });
    }

    const git = context.git.withSecrets(secrets);
    const store = new BundleStore(backupPath, repo.name, { git, logger: log, now: context.now });
    const cloneURL = provider.credentialedCloneURL(repo);

    // Diff check
    if (provider.compare === "refs") {
      const unchanged = await remoteMatchesLocal(cloneURL, { git, store, logger: log });
      if (unchanged) {
        log.info("No changes since latest bundle, skipping clone");
        return finish({ status: "ok", skipped: true });
      }
    }

    try {
      // Clone
      log.debug(`Cloning ${repo.httpsUrl}`);
      try {
        await fs.mkdir(workingPath, { recursive: true });
        await git.mirrorClone(cloneURL, workingPath);
      } catch (error) {
        const cloneError = new CloneError(`Clone failed: ${errorMessage(error)}`, { cause: error });
        log.error(maskSecrets(cloneError.message, secrets));
        return finish({ status: "failed", error: cloneError.message });
      }

      // Snapshot
      let snapshot: SnapshotResult;
      try {
        snapshot = await store.createSnapshot(workingPath);
      } catch (error) {
        log.error(maskSecrets(errorMessage(error), secrets));
        return finish({ status: "failed", error: errorMessage(error) });
      }

      if (snapshot.kind === "empty") {
        return finish({ status: "ok", empty: true });
      }

      // Post-process, best effort
      let bundle: string | undefined = snapshot.bundle.name;
      try {
        const removed = await store.deduplicate();
        if (removed) bundle = undefined;
      } catch (error) {
        log.warn(errorMessage(error));
      }

      if (provider.retain > 0) {
        try {
          await store.prune(provider.retain);
        } catch (error) {
          log.warn(errorMessage(error));
        }
      }

      return finish({ status: "ok", ...(bundle ? { bundle } : {}) });
    } finally {
      await fs.rm(workingPath, { recursive: true, force: true }).catch((error: unknown) => {
        log.warn(`Failed to remove working directory: ${errorMessage(error)}`);
      });
    }
  } catch (error) {
    log.error(maskSecrets(errorMessage(error), secrets));
    return finish({ status: "failed", error: errorMessage(error) });
  }
}
