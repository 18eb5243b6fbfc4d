/**
 * Filesystem-backed bundle storage for a single repository
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DedupError, errorMessage, PruneError, SnapshotError } from "../core/errors";
import type { GitClient, ObjectCounts } from "../git/client";
import type { BundleFile, GitRefs } from "../types";
import { computeFileChecksum } from "../utils/crypto";
import type { Logger } from "../utils/logger";
import { generateBundleName, invalidBundleName, parseBundleName } from "../utils/naming";

export interface BundleStoreOptions {
  git: GitClient;
  logger: Logger;
  /** Clock used to timestamp new bundles */
  now?: () => Date;
}

export type SnapshotResult =
  | { kind: "created"; bundle: BundleFile }
  | { kind: "empty" };

export class BundleStore {
  /** Absolute, since git writes bundles from inside the mirror directory */
  readonly backupPath: string;
  private readonly git: GitClient;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    backupPath: string,
    readonly repoName: string,
    options: BundleStoreOptions,
  ) {
    this.backupPath = path.resolve(backupPath);
    this.git = options.git;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * All correctly named bundles, newest first. A missing directory has none.
   */
  async listBundles(): Promise<BundleFile[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.backupPath);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const bundles: BundleFile[] = [];
    for (const name of entries) {
      const parsed = parseBundleName(name);
      if (!parsed) continue;
      bundles.push({
        name,
        path: path.join(this.backupPath, name),
        timestamp: parsed.timestamp,
        created: parsed.created,
      });
    }

    return bundles.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  }

  async hasBundles(): Promise<boolean> {
    return (await this.listBundles()).length > 0;
  }

  async latestBundle(): Promise<BundleFile | null> {
    const [latest] = await this.listBundles();
    return latest ?? null;
  }

  /**
   * Heads recorded in the bundle. Rejects with InvalidBundleError when the
   * file is not a readable bundle.
   */
  async readHeads(bundle: BundleFile): Promise<GitRefs> {
    return this.git.listBundleHeads(bundle.path);
  }

  /**
   * Rename a corrupt bundle to `<name>.bundle.invalid`. It no longer matches
   * the bundle pattern so every other operation ignores it.
   */
  async markInvalid(bundle: BundleFile): Promise<string> {
    const target = path.join(this.backupPath, invalidBundleName(bundle.name));
    await fs.rename(bundle.path, target);
    this.logger.warn(`Renamed invalid bundle to ${path.basename(target)}`);
    return target;
  }

  async sizeOf(bundle: BundleFile): Promise<number> {
    return (await fs.stat(bundle.path)).size;
  }

  /**
   * Write a bundle of the mirror at `workingClonePath`. An empty mirror
   * produces nothing.
   */
  async createSnapshot(workingClonePath: string): Promise<SnapshotResult> {
    let counts: ObjectCounts;
    try {
      counts = await this.git.countObjects(workingClonePath);
    } catch (error) {
      throw new SnapshotError(`Failed to inspect mirror: ${errorMessage(error)}`, { cause: error });
    }

    if (counts.loose === 0 && counts.packed === 0) {
      this.logger.info("Remote repository is empty, no bundle created");
      return { kind: "empty" };
    }

    const name = generateBundleName(this.repoName, this.now());
    const bundlePath = path.join(this.backupPath, name);

    try {
      await fs.mkdir(this.backupPath, { recursive: true });
    } catch (error) {
      throw new SnapshotError(`Failed to create ${this.backupPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (await exists(bundlePath)) {
      throw new SnapshotError(`Bundle ${name} already exists`);
    }

    try {
      await this.git.createBundle(workingClonePath, bundlePath);
    } catch (error) {
      await fs.rm(bundlePath, { force: true });
      throw new SnapshotError(`Failed to create bundle ${name}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = parseBundleName(name);
    if (!parsed) {
      throw new SnapshotError(`Generated bundle name ${name} does not parse`);
    }

    this.logger.info(`Created bundle ${name}`);
    return {
      kind: "created",
      bundle: { name, path: bundlePath, timestamp: parsed.timestamp, created: parsed.created },
    };
  }

  /**
   * Remove the newest bundle when it is byte-identical to the one before it.
   * Returns the removed bundle, if any.
   */
  async deduplicate(): Promise<BundleFile | null> {
    try {
      const [latest, previous] = await this.listBundles();
      if (!latest || !previous) return null;

      const [latestSize, previousSize] = await Promise.all([
        this.sizeOf(latest),
        this.sizeOf(previous),
      ]);
      if (latestSize !== previousSize) return null;

      const [latestHash, previousHash] = await Promise.all([
        computeFileChecksum(latest.path),
        computeFileChecksum(previous.path),
      ]);
      if (latestHash !== previousHash) return null;

      await fs.rm(latest.path);
      this.logger.info(`Removed ${latest.name}, identical to ${previous.name}`);
      return latest;
    } catch (error) {
      throw new DedupError(`Deduplication failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Keep the `retain` newest bundles and delete the rest, oldest first.
   * `retain` of 0 keeps everything.
   */
  async prune(retain: number): Promise<BundleFile[]> {
    if (retain <= 0) return [];

    try {
      const bundles = await this.listBundles();
      const candidates = bundles.slice(retain).reverse();

      for (const bundle of candidates) {
        await fs.rm(bundle.path);
        this.logger.debug(`Pruned ${bundle.name}`);
      }

      if (candidates.length > 0) {
        this.logger.info(`Pruned ${candidates.length} bundle(s), keeping ${retain}`);
      }
      return candidates;
    } catch (error) {
      throw new PruneError(`Pruning failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
