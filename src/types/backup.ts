/**
 * Backup operation type definitions
 */

export interface BundleFile {
  /** File name, `<repo>.<YYYYMMDDHHMMSS>.bundle` */
  name: string;
  path: string;
  /** Timestamp segment, used for ordering */
  timestamp: string;
  created: Date;
}

export type RepoBackupStatus = "ok" | "failed";

export interface RepoBackupResult {
  /** pathWithNamespace of the repository */
  repo: string;
  status: RepoBackupStatus;
  error?: string;
  /** Clone skipped because remote refs matched the latest bundle */
  skipped?: boolean;
  /** Remote had no objects, nothing written */
  empty?: boolean;
  bundle?: string;
  durationMs: number;
}

export interface ProviderBackupResult {
  results: RepoBackupResult[];
  /** Set only when enumeration failed and no repository was attempted */
  error?: string;
}

export interface ProviderRunResult {
  provider: string;
  result: ProviderBackupResult;
}

export interface RunResult {
  startedAt: Date;
  finishedAt: Date;
  providers: ProviderRunResult[];
}

export interface BackupStats {
  succeeded: number;
  failed: number;
  skipped: number;
}
