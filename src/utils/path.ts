/**
 * Path validation and manipulation utilities
 */

import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal through names returned by provider APIs.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return (
    normalizedPath.startsWith(normalizedDir + path.sep) ||
    normalizedPath === normalizedDir
  );
}

export const WORKING_DIR_NAME = ".working";

/**
 * `<root>/<domain>/<owner>/<repo>`
 */
export function repoBackupPath(backupRoot: string, domain: string, pathWithNamespace: string): string {
  return path.join(backupRoot, domain, ...pathWithNamespace.split("/"));
}

/**
 * `<root>/.working/<domain>/<owner>/<repo>`
 */
export function repoWorkingPath(backupRoot: string, domain: string, pathWithNamespace: string): string {
  return path.join(backupRoot, WORKING_DIR_NAME, domain, ...pathWithNamespace.split("/"));
}
