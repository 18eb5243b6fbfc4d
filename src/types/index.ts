/**
 * Centralized type exports
 */

// Backup types
export type {
  BackupStats,
  BundleFile,
  ProviderBackupResult,
  ProviderRunResult,
  RepoBackupResult,
  RepoBackupStatus,
  RunResult,
} from "./backup";
// Config types
export type {
  AzureDevOpsConfig,
  BitbucketConfig,
  GitConfig,
  GiteaConfig,
  GitHubConfig,
  GitLabAccessLevel,
  GitLabConfig,
  HttpConfig,
  NotifyConfig,
  ProviderCommonConfig,
  ProvidersConfig,
  RepovaultConfig,
  ScheduleConfig,
  SourcehutConfig,
  WebhookFormat,
} from "./config";
// Repository types
export type { CompareMode, GitProvider, GitRefs, Repository } from "./repository";
