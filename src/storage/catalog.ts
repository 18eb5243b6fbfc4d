/**
 * Discovery of repository backup directories under a backup root
 */

import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { GitClient } from "../git/client";
import type { Logger } from "../utils/logger";
import { BUNDLE_EXTENSION, INVALID_SUFFIX } from "../utils/naming";
import { BundleStore } from "./bundle-store";

export interface RepositoryDirectory {
  /** `<domain>/<owner>/<repo>`, always with forward slashes */
  key: string;
  domain: string;
  path: string;
  repoName: string;
}

function isBundleFile(name: string): boolean {
  return name.endsWith(BUNDLE_EXTENSION) || name.endsWith(`${BUNDLE_EXTENSION}${INVALID_SUFFIX}`);
}

/**
 * Every directory below `backupRoot` that holds bundle files, sorted by key.
 * Dot-directories (the `.working` scratch area among them) are skipped.
 */
export async function findRepositoryDirectories(backupRoot: string): Promise<RepositoryDirectory[]> {
  const found: RepositoryDirectory[] = [];

  async function walk(dir: string, segments: string[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return;
      throw error;
    }

    const [domain] = segments;
    const repoName = segments[segments.length - 1];
    if (domain && repoName && segments.length >= 2 && entries.some((e) => e.isFile() && isBundleFile(e.name))) {
      found.push({ key: segments.join("/"), domain, path: dir, repoName });
    }

    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name.startsWith(".")) continue;
      await walk(path.join(dir, entry.name), [...segments, entry.name]);
    }
  }

  await walk(backupRoot, []);
  return found.sort((a, b) => a.key.localeCompare(b.key));
}

export function openBundleStore(repository: RepositoryDirectory, git: GitClient, logger: Logger): BundleStore {
  return new BundleStore(repository.path, repository.repoName, { git, logger: logger.child(repository.key) });
}
