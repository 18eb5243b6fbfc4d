/**
 * Remote change detection against the latest local bundle
 */

import { type GitClient, InvalidBundleError, refsEqual } from "../../git/client";
import type { BundleStore } from "../../storage/bundle-store";
import type { GitRefs } from "../../types";
import type { Logger } from "../../utils/logger";
import { DiffComparisonError, errorMessage } from "../errors";

export interface RemoteDiffContext {
  git: GitClient;
  store: BundleStore;
  logger: Logger;
}

/**
 * Heads of the most recent readable bundle. Unreadable bundles are renamed
 * aside and the next older one is tried. Null when none is left.
 */
export async function latestBundleHeads(
  store: BundleStore,
  logger: Logger,
): Promise<GitRefs | null> {
  for (;;) {
    const bundle = await store.latestBundle();
    if (!bundle) return null;

    try {
      return await store.readHeads(bundle);
    } catch (error) {
      if (!(error instanceof InvalidBundleError)) throw error;
      logger.warn(`Bundle ${bundle.name} is invalid`);
      await store.markInvalid(bundle);
    }
  }
}

/**
 * True only when the remote's refs are exactly those recorded in the latest
 * local bundle. Any failure along the way yields false so a clone happens.
 */
export async function remoteMatchesLocal(
  cloneURL: string,
  context: RemoteDiffContext,
): Promise<boolean> {
  const { git, store, logger } = context;

  try {
    if (!(await store.hasBundles())) {
      logger.debug("No existing bundles, clone required");
      return false;
    }

    const localRefs = await latestBundleHeads(store, logger);
    if (!localRefs) {
      logger.debug("No valid bundles left, clone required");
      return false;
    }

    const remoteRefs = await git.lsRemote(cloneURL);
    const matches = refsEqual(localRefs, remoteRefs);
    logger.debug(
      matches
        ? `Remote refs match latest bundle (${remoteRefs.size} refs)`
        : `Remote refs differ from latest bundle (local ${localRefs.size}, remote ${remoteRefs.size})`,
    );
    return matches;
  } catch (error) {
    const diffError = new DiffComparisonError(
      `Could not compare refs: ${errorMessage(error)}`,
      { cause: error },
    );
    logger.warn(diffError.message);
    return false;
  }
}
