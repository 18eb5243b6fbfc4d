/**
 * Configuration from environment variables
 *
 * Every variable can also be given as `<NAME>_FILE`, pointing at a file whose
 * trimmed contents are used as the value (Docker and Kubernetes secrets).
 */

import { readFileSync } from "node:fs";
import { isLogLevel } from "../utils/logger";
import type { RawConfig } from "./defaults";
import { ConfigError } from "./validator";

export type Env = Record<string, string | undefined>;
export type FileReader = (path: string) => string;

const LFS_VARIABLES = [
  "GITHUB_BACKUP_LFS",
  "GITLAB_BACKUP_LFS",
  "BITBUCKET_BACKUP_LFS",
  "GITEA_BACKUP_LFS",
  "AZURE_DEVOPS_BACKUP_LFS",
];

const TRUE_VALUES = ["true", "1", "yes", "y"];
const FALSE_VALUES = ["false", "0", "no", "n"];

function readTextFile(path: string): string {
  return readFileSync(path, "utf8");
}

export class EnvReader {
  constructor(
    private readonly env: Env = process.env,
    private readonly readFile: FileReader = readTextFile,
  ) {}

  /** Value of NAME, falling back to the contents of NAME_FILE */
  get(name: string): string | undefined {
    const direct = this.env[name];
    if (direct !== undefined && direct !== "") {
      return direct;
    }

    const filePath = this.env[`${name}_FILE`];
    if (!filePath) {
      return undefined;
    }

    let content: string;
    try {
      content = this.readFile(filePath);
    } catch (error) {
      throw new ConfigError(
        `Could not read ${name}_FILE (${filePath}): ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    const value = content.trim();
    return value === "" ? undefined : value;
  }

  bool(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    return envTrue(name, value);
  }

  int(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    if (!/^\d+$/.test(value.trim())) {
      throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
    }
    return Number.parseInt(value, 10);
  }

  list(name: string): string[] | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    return value
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean);
  }

  compare(name: string): "clone" | "refs" | undefined {
    const value = this.get(name)?.trim().toLowerCase();
    if (value === undefined) return undefined;
    if (value !== "clone" && value !== "refs") {
      throw new ConfigError(`${name} must be 'clone' or 'refs', got "${value}"`);
    }
    return value;
  }
}

export function envTrue(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean (true/false, yes/no, 1/0), got "${value}"`);
}

/**
 * Drop undefined values so they don't override lower-precedence sources
 */
function compact(values: RawConfig): RawConfig {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function common(env: EnvReader, prefix: string): RawConfig {
  return {
    compare: env.compare(`${prefix}_COMPARE`),
    retain: env.int(`${prefix}_BACKUPS`),
    workers: env.int(`${prefix}_WORKERS`),
  };
}

function providersFromEnv(env: EnvReader): RawConfig {
  const providers: RawConfig = {};

  const githubToken = env.get("GITHUB_TOKEN");
  if (githubToken) {
    providers.github = compact({
      token: githubToken,
      orgs: env.list("GITHUB_ORGS"),
      skipUserRepos: env.bool("GITHUB_SKIP_USER_REPOS"),
      limitUserOwned: env.bool("GITHUB_LIMIT_USER_OWNED"),
      ...common(env, "GITHUB"),
    });
  }

  const gitlabToken = env.get("GITLAB_TOKEN");
  if (gitlabToken) {
    providers.gitlab = compact({
      token: gitlabToken,
      apiUrl: env.get("GITLAB_APIURL"),
      minAccessLevel: env.int("GITLAB_PROJECT_MIN_ACCESS_LEVEL"),
      ...common(env, "GITLAB"),
    });
  }

  const bitbucket = compact({
    email: env.get("BITBUCKET_EMAIL"),
    apiToken: env.get("BITBUCKET_API_TOKEN"),
    user: env.get("BITBUCKET_USER"),
    key: env.get("BITBUCKET_KEY"),
    secret: env.get("BITBUCKET_SECRET"),
  });
  const bitbucketApiToken = Boolean(bitbucket.email && bitbucket.apiToken);
  const bitbucketOAuth = Boolean(bitbucket.user && bitbucket.key && bitbucket.secret);
  if (bitbucketApiToken || bitbucketOAuth) {
    providers.bitbucket = compact({
      ...bitbucket,
      apiUrl: env.get("BITBUCKET_APIURL"),
      ...common(env, "BITBUCKET"),
    });
  }

  const giteaUrl = env.get("GITEA_APIURL");
  const giteaToken = env.get("GITEA_TOKEN");
  if (giteaUrl && giteaToken) {
    providers.gitea = compact({
      apiUrl: giteaUrl,
      token: giteaToken,
      orgs: env.list("GITEA_ORGS"),
      ...common(env, "GITEA"),
    });
  }

  const azureUser = env.get("AZURE_DEVOPS_USERNAME");
  const azurePat = env.get("AZURE_DEVOPS_PAT");
  const azureOrgs = env.list("AZURE_DEVOPS_ORGS");
  if (azureUser && azurePat && azureOrgs && azureOrgs.length > 0) {
    providers.azureDevOps = compact({
      userName: azureUser,
      pat: azurePat,
      orgs: azureOrgs,
      ...common(env, "AZURE_DEVOPS"),
    });
  }

  const sourcehutToken = env.get("SOURCEHUT_PAT");
  if (sourcehutToken) {
    providers.sourcehut = compact({
      token: sourcehutToken,
      apiUrl: env.get("SOURCEHUT_APIURL"),
      ...common(env, "SOURCEHUT"),
    });
  }

  return providers;
}

function notifyFromEnv(env: EnvReader): RawConfig | undefined {
  const notify: RawConfig = {};

  const webhookUrl = env.get("REPOVAULT_WEBHOOK_URL");
  if (webhookUrl) {
    notify.webhook = compact({ url: webhookUrl, format: env.get("REPOVAULT_WEBHOOK_FORMAT") });
  }

  const ntfyUrl = env.get("REPOVAULT_NTFY_URL");
  if (ntfyUrl) {
    notify.ntfy = { url: ntfyUrl };
  }

  const slackToken = env.get("SLACK_API_TOKEN");
  const slackChannel = env.get("SLACK_CHANNEL_ID");
  if (slackToken && slackChannel) {
    notify.slack = { token: slackToken, channelId: slackChannel };
  }

  const telegramToken = env.get("REPOVAULT_TELEGRAM_BOT_TOKEN");
  const telegramChat = env.get("REPOVAULT_TELEGRAM_CHAT_ID");
  if (telegramToken && telegramChat) {
    notify.telegram = { botToken: telegramToken, chatId: telegramChat };
  }

  const onFailureOnly = env.bool("REPOVAULT_NOTIFY_ON_FAILURE_ONLY");
  if (onFailureOnly !== undefined) {
    notify.onFailureOnly = onFailureOnly;
  }

  return Object.keys(notify).length > 0 ? notify : undefined;
}

/**
 * Build a partial configuration from environment variables
 */
export function loadConfigFromEnv(env: Env = process.env, readFile: FileReader = readTextFile): RawConfig {
  const reader = new EnvReader(env, readFile);

  const logLevel = reader.get("REPOVAULT_LOG")?.trim().toLowerCase();
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigError(`REPOVAULT_LOG must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  const interval = reader.get("GIT_BACKUP_INTERVAL");
  const cron = reader.get("GIT_BACKUP_CRON");
  const gitTimeout = reader.int("GIT_COMMAND_TIMEOUT");
  const httpTimeout = reader.int("GIT_REQUEST_TIMEOUT");

  return compact({
    backupDir: reader.get("GIT_BACKUP_DIR"),
    logLevel,
    git: gitTimeout === undefined ? undefined : { timeoutSeconds: gitTimeout },
    http: httpTimeout === undefined ? undefined : { timeoutSeconds: httpTimeout },
    schedule: interval || cron ? compact({ interval, cron }) : undefined,
    notify: notifyFromEnv(reader),
    providers: providersFromEnv(reader),
  });
}

/**
 * Warnings for recognised variables that have no effect. Bundles hold git
 * history only, so `<PROVIDER>_BACKUP_LFS` never fetches LFS objects.
 */
export function ignoredEnvSettings(env: Env = process.env, readFile: FileReader = readTextFile): string[] {
  const reader = new EnvReader(env, readFile);
  return LFS_VARIABLES.filter((name) => reader.bool(name) === true).map(
    (name) => `${name} is ignored: LFS objects are not included in bundles`,
  );
}
