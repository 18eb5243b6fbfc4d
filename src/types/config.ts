/**
 * Configuration type definitions
 */

import type { LogLevel } from "../utils/logger";
import type { CompareMode } from "./repository";

export interface ProviderCommonConfig {
  /** Diff mode: always clone, or compare refs first */
  compare?: CompareMode;
  /** Bundles to keep per repository (0 = unlimited) */
  retain?: number;
  /** Parallel workers for this provider */
  workers?: number;
}

export interface GitHubConfig extends ProviderCommonConfig {
  token: string;
  /** Organisations to include, "*" for every org the user belongs to */
  orgs?: string[];
  skipUserRepos?: boolean;
  /** Only repositories owned by the authenticated user */
  limitUserOwned?: boolean;
}

export type GitLabAccessLevel = 10 | 20 | 30 | 40 | 50;

export interface GitLabConfig extends ProviderCommonConfig {
  token: string;
  apiUrl?: string;
  minAccessLevel?: GitLabAccessLevel;
}

export interface BitbucketConfig extends ProviderCommonConfig {
  /** API token auth */
  email?: string;
  apiToken?: string;
  /** OAuth consumer auth */
  user?: string;
  key?: string;
  secret?: string;
  apiUrl?: string;
}

export interface GiteaConfig extends ProviderCommonConfig {
  token: string;
  apiUrl: string;
  orgs?: string[];
}

export interface AzureDevOpsConfig extends ProviderCommonConfig {
  userName: string;
  pat: string;
  orgs: string[];
}

export interface SourcehutConfig extends ProviderCommonConfig {
  token: string;
  apiUrl?: string;
}

export interface ProvidersConfig {
  github?: GitHubConfig;
  gitlab?: GitLabConfig;
  bitbucket?: BitbucketConfig;
  gitea?: GiteaConfig;
  azureDevOps?: AzureDevOpsConfig;
  sourcehut?: SourcehutConfig;
}

export interface ScheduleConfig {
  cron?: string;
  /** "24", "24h" or "30m" */
  interval?: string;
}

export type WebhookFormat = "full" | "short";

export interface NotifyConfig {
  webhook?: { url: string; format?: WebhookFormat };
  ntfy?: { url: string };
  slack?: { token: string; channelId: string };
  telegram?: { botToken: string; chatId: string };
  onFailureOnly?: boolean;
}

export interface GitConfig {
  /** Kill git subprocesses after this many seconds (0 = never) */
  timeoutSeconds: number;
}

export interface HttpConfig {
  timeoutSeconds: number;
}

export interface RepovaultConfig {
  version: string;
  backupDir: string;
  logLevel?: LogLevel;
  git: GitConfig;
  http: HttpConfig;
  schedule?: ScheduleConfig;
  notify?: NotifyConfig;
  providers: ProvidersConfig;
}
